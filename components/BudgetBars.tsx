"use client";
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer } from "recharts";
import type { BudgetBreakdown } from "@/lib/guide";

type Row = { name: string; amount: number };

export function budgetRows(b: BudgetBreakdown): Row[] {
  return [
    { name: "Stay", amount: b.accommodation.total },
    { name: "Food", amount: b.food.total },
    { name: "Transport", amount: b.transportation.total },
    { name: "Activities", amount: b.activities.total },
    { name: "Shopping", amount: b.shopping.total },
    { name: "Emergency", amount: b.emergencyFund },
  ].filter((r) => r.amount > 0);
}

export default function BudgetBars({ data, currency }: { data: Row[]; currency: string }) {
  return (
    <div className="w-full h-64">
      <ResponsiveContainer>
        <BarChart data={data}>
          <XAxis dataKey="name" />
          <YAxis />
          <Tooltip />
          <Bar dataKey="amount" name={`Total (${currency})`} fill="#0EA5E9" />
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
