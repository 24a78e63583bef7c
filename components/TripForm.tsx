// components/TripForm.tsx
"use client";

import * as React from "react";
import { InvalidInputError } from "@/lib/errors";
import {
  BUDGET_LEVEL_LABEL,
  BUDGET_LEVELS,
  PREFERENCE_TAGS,
  parseTripRequest,
  type BudgetLevel,
  type PreferenceTag,
  type TripRequest,
} from "@/lib/trip";

export type TripFormValues = {
  destination: string;
  origin: string;
  startDate: string;
  endDate: string;
  travelers: string;
  budgetLevel: BudgetLevel;
  budget: string;
  currency: string;
  preferences: PreferenceTag[];
  notes: string;
};

export const emptyTripForm: TripFormValues = {
  destination: "",
  origin: "",
  startDate: "",
  endDate: "",
  travelers: "1",
  budgetLevel: "mid-range",
  budget: "",
  currency: "USD",
  preferences: ["culture"],
  notes: "",
};

/** Form strings → request body. Blank budget means "no fixed amount". */
export function toTripInput(v: TripFormValues) {
  const budget = v.budget.trim();
  return {
    destination: v.destination,
    origin: v.origin,
    startDate: v.startDate,
    endDate: v.endDate,
    travelers: Number(v.travelers),
    budgetLevel: v.budgetLevel,
    budget: budget === "" ? undefined : Number(budget),
    currency: v.currency,
    preferences: v.preferences,
    notes: v.notes,
  };
}

/** Same checks the server runs, so bad input never leaves the browser. */
export function validateTripForm(v: TripFormValues): { trip: TripRequest } | { error: string } {
  try {
    return { trip: parseTripRequest(toTripInput(v)) };
  } catch (e) {
    if (e instanceof InvalidInputError) return { error: e.message };
    throw e;
  }
}

export default function TripForm({
  busy,
  onSubmit,
}: {
  busy: boolean;
  onSubmit: (trip: TripRequest) => void;
}) {
  const [values, setValues] = React.useState<TripFormValues>(emptyTripForm);
  const [error, setError] = React.useState<string | null>(null);

  const update = (patch: Partial<TripFormValues>) => setValues((prev) => ({ ...prev, ...patch }));

  const togglePreference = (tag: PreferenceTag) =>
    setValues((prev) => ({
      ...prev,
      preferences: prev.preferences.includes(tag)
        ? prev.preferences.filter((t) => t !== tag)
        : [...prev.preferences, tag],
    }));

  function onSave(e: React.FormEvent) {
    e.preventDefault();
    const res = validateTripForm(values);
    if ("error" in res) {
      setError(res.error);
      return;
    }
    setError(null);
    onSubmit(res.trip);
  }

  return (
    <form onSubmit={onSave} className="space-y-6" aria-label="Trip details">
      <div className="rounded-2xl border bg-white p-4 shadow-sm">
        <h3 className="text-lg font-semibold">Where and when</h3>
        <div className="mt-3 grid grid-cols-1 sm:grid-cols-2 gap-3">
          <label className="text-sm">
            To*
            <input
              className="mt-1 w-full rounded-md border p-2"
              placeholder="Paris, Bali, Rome…"
              value={values.destination}
              onChange={(e) => update({ destination: e.target.value })}
            />
          </label>
          <label className="text-sm">
            From
            <input
              className="mt-1 w-full rounded-md border p-2"
              placeholder="New York, London, Tokyo…"
              value={values.origin}
              onChange={(e) => update({ origin: e.target.value })}
            />
          </label>
          <label className="text-sm">
            Start date*
            <input
              type="date"
              className="mt-1 w-full rounded-md border p-2"
              value={values.startDate}
              onChange={(e) => update({ startDate: e.target.value })}
            />
          </label>
          <label className="text-sm">
            End date*
            <input
              type="date"
              className="mt-1 w-full rounded-md border p-2"
              value={values.endDate}
              onChange={(e) => update({ endDate: e.target.value })}
            />
          </label>
        </div>
      </div>

      <div className="rounded-2xl border bg-white p-4 shadow-sm">
        <h3 className="text-lg font-semibold">Group and budget</h3>
        <div className="mt-3 grid grid-cols-2 sm:grid-cols-4 gap-3">
          <label className="text-sm">
            Travelers
            <input
              type="number"
              min={1}
              max={10}
              className="mt-1 w-full rounded-md border p-2"
              value={values.travelers}
              onChange={(e) => update({ travelers: e.target.value })}
            />
          </label>
          <label className="text-sm">
            Style
            <select
              className="mt-1 w-full rounded-md border p-2"
              value={values.budgetLevel}
              onChange={(e) => {
                const level = BUDGET_LEVELS.find((l) => l === e.target.value);
                if (level) update({ budgetLevel: level });
              }}
            >
              {BUDGET_LEVELS.map((l) => (
                <option key={l} value={l}>
                  {BUDGET_LEVEL_LABEL[l]}
                </option>
              ))}
            </select>
          </label>
          <label className="text-sm">
            Budget (optional)
            <input
              type="number"
              min={0}
              className="mt-1 w-full rounded-md border p-2"
              placeholder="e.g. 2500"
              value={values.budget}
              onChange={(e) => update({ budget: e.target.value })}
            />
          </label>
          <label className="text-sm">
            Currency
            <input
              className="mt-1 w-full rounded-md border p-2 uppercase"
              maxLength={3}
              value={values.currency}
              onChange={(e) => update({ currency: e.target.value })}
            />
          </label>
        </div>
      </div>

      <div className="rounded-2xl border bg-white p-4 shadow-sm">
        <h3 className="text-lg font-semibold">Interests</h3>
        <div className="mt-3 flex flex-wrap gap-2">
          {PREFERENCE_TAGS.map((tag) => {
            const on = values.preferences.includes(tag);
            return (
              <button
                key={tag}
                type="button"
                aria-pressed={on}
                onClick={() => togglePreference(tag)}
                className={`rounded-full border px-3 py-1 text-sm capitalize ${
                  on ? "border-sky-500 bg-sky-50 text-sky-800" : "bg-white text-neutral-700"
                }`}
              >
                {tag}
              </button>
            );
          })}
        </div>
        <textarea
          className="mt-3 w-full rounded-md border p-2 min-h-[80px]"
          placeholder="Optional: must-sees, mobility needs, dietary constraints…"
          value={values.notes}
          onChange={(e) => update({ notes: e.target.value })}
        />
        <p className="mt-2 text-xs text-gray-500">
          Pick 2–3 interests for more focused recommendations. 3–7 day trips work best.
        </p>
      </div>

      <div className="flex items-center gap-3">
        <button
          type="submit"
          disabled={busy}
          className="rounded-md bg-sky-600 px-4 py-2 text-white hover:bg-sky-700 disabled:opacity-60"
        >
          {busy ? "Generating…" : "Generate itinerary"}
        </button>
        <button
          type="button"
          disabled={busy}
          onClick={() => {
            setValues(emptyTripForm);
            setError(null);
          }}
          className="rounded-md border px-3 py-2"
        >
          Clear
        </button>
        {error && (
          <span role="alert" className="text-sm text-red-600">
            {error}
          </span>
        )}
      </div>
    </form>
  );
}
