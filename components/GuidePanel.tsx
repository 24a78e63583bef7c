// components/GuidePanel.tsx
"use client";

import * as React from "react";
import BudgetBars, { budgetRows } from "./BudgetBars";
import { PACKING_CATEGORIES, type Guide, type GuideSection } from "@/lib/guide";

const TABS: { id: GuideSection; label: string }[] = [
  { id: "insights", label: "Destination guide" },
  { id: "budget", label: "Budget" },
  { id: "packing", label: "Packing list" },
];

const CATEGORY_LABEL: Record<(typeof PACKING_CATEGORIES)[number], string> = {
  documents: "Documents",
  clothing: "Clothing",
  footwear: "Footwear",
  toiletries: "Toiletries",
  electronics: "Electronics",
  medications: "Medications",
  accessories: "Accessories",
  activitySpecific: "Activity gear",
  optional: "Nice to have",
};

const money = (n: number, currency: string) => {
  try {
    return new Intl.NumberFormat("en-US", { style: "currency", currency, maximumFractionDigits: 0 }).format(n);
  } catch {
    return `${currency} ${Math.round(n)}`;
  }
};

export default function GuidePanel({ guide, currency }: { guide: Guide; currency: string }) {
  const [tab, setTab] = React.useState<GuideSection>("insights");
  const failed = guide.errors.find((e) => e.section === tab);

  return (
    <div>
      <div role="tablist" className="mb-3 flex gap-2">
        {TABS.map((t) => (
          <button
            key={t.id}
            role="tab"
            type="button"
            aria-selected={tab === t.id}
            onClick={() => setTab(t.id)}
            className={`rounded-full border px-3 py-1 text-sm ${
              tab === t.id ? "border-sky-500 bg-sky-50 text-sky-800" : "bg-white"
            }`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {failed && (
        <p role="alert" className="text-sm text-red-600">
          This section could not be generated: {failed.message}
        </p>
      )}

      {tab === "insights" && guide.insights && (
        <div className="grid gap-4 md:grid-cols-2 text-sm">
          <div className="space-y-3">
            {guide.insights.description && <p className="rounded-lg bg-sky-50 p-3">{guide.insights.description}</p>}
            {guide.insights.bestTimeToVisit && (
              <div>
                <h4 className="font-semibold">Best time to visit</h4>
                <p>{guide.insights.bestTimeToVisit}</p>
              </div>
            )}
            {guide.insights.topAttractions.length > 0 && (
              <div>
                <h4 className="font-semibold">Top attractions</h4>
                <ul className="list-disc pl-5">
                  {guide.insights.topAttractions.map((a) => (
                    <li key={a.name}>
                      <span className="font-medium">{a.name}</span> — {a.description}
                      {a.timeNeeded && <span className="text-neutral-500"> · {a.timeNeeded}</span>}
                    </li>
                  ))}
                </ul>
              </div>
            )}
            {guide.insights.neighborhoods.length > 0 && (
              <div>
                <h4 className="font-semibold">Neighborhoods</h4>
                <ul className="list-disc pl-5">
                  {guide.insights.neighborhoods.map((n) => (
                    <li key={n.name}>
                      <span className="font-medium">{n.name}</span> — {n.vibe}
                      {n.bestFor && <span className="text-neutral-500"> · best for {n.bestFor}</span>}
                    </li>
                  ))}
                </ul>
              </div>
            )}
          </div>
          <div className="space-y-3">
            {guide.insights.localCuisine.length > 0 && (
              <div>
                <h4 className="font-semibold">Must-try food</h4>
                <ul className="list-disc pl-5">
                  {guide.insights.localCuisine.map((f) => (
                    <li key={f.dish}>
                      <span className="font-medium">{f.dish}</span> — {f.description}
                      {f.where && <span className="text-neutral-500"> · {f.where}</span>}
                    </li>
                  ))}
                </ul>
              </div>
            )}
            {(guide.insights.transportation.gettingAround || guide.insights.transportation.fromAirport) && (
              <div>
                <h4 className="font-semibold">Getting around</h4>
                <p>{guide.insights.transportation.gettingAround}</p>
                {guide.insights.transportation.fromAirport && (
                  <p className="text-neutral-600">From the airport: {guide.insights.transportation.fromAirport}</p>
                )}
              </div>
            )}
            {guide.insights.culturalTips.length > 0 && (
              <div>
                <h4 className="font-semibold">Cultural tips</h4>
                <ul className="list-disc pl-5">
                  {guide.insights.culturalTips.map((t) => (
                    <li key={t}>{t}</li>
                  ))}
                </ul>
              </div>
            )}
            {guide.insights.safety.rating > 0 && (
              <div>
                <h4 className="font-semibold">Safety</h4>
                <p>Rating: {guide.insights.safety.rating}/10</p>
                {guide.insights.safety.notes && <p className="text-neutral-600">{guide.insights.safety.notes}</p>}
              </div>
            )}
          </div>
        </div>
      )}

      {tab === "budget" && guide.budget && (
        <div className="space-y-3 text-sm">
          <div className="grid grid-cols-3 gap-3">
            <Metric label="Per person" value={money(guide.budget.totalPerPerson, currency)} />
            <Metric label="All travelers" value={money(guide.budget.totalAllTravelers, currency)} />
            <Metric label="Daily average" value={money(guide.budget.dailyAverage, currency)} />
          </div>
          <BudgetBars data={budgetRows(guide.budget)} currency={currency} />
          {guide.budget.savingsTips.length > 0 && (
            <div>
              <h4 className="font-semibold">Money-saving tips</h4>
              <ul className="list-disc pl-5">
                {guide.budget.savingsTips.map((t) => (
                  <li key={t}>{t}</li>
                ))}
              </ul>
            </div>
          )}
        </div>
      )}

      {tab === "packing" && guide.packing && (
        <div className="grid gap-4 md:grid-cols-2 text-sm">
          {PACKING_CATEGORIES.filter((c) => guide.packing && guide.packing[c].length > 0).map((c) => (
            <fieldset key={c}>
              <legend className="font-semibold">{CATEGORY_LABEL[c]}</legend>
              {guide.packing?.[c].map((item) => (
                <label key={item} className="flex items-start gap-2">
                  <input type="checkbox" className="mt-1" />
                  <span>{item}</span>
                </label>
              ))}
            </fieldset>
          ))}
        </div>
      )}
    </div>
  );
}

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded-lg border bg-white p-3">
      <div className="text-xs text-neutral-500">{label}</div>
      <div className="text-lg font-semibold">{value}</div>
    </div>
  );
}
