// components/ItineraryText.tsx
"use client";

import * as React from "react";
import { outlineDays, splitAtDays } from "@/lib/outline";
import { formatLongDate, type TripDay } from "@/lib/trip";

// "Wed March 4"
const dayLabel = (d: TripDay) => `${d.weekday.slice(0, 3)} ${formatLongDate(d.date).replace(/, \d{4}$/, "")}`;

/**
 * Shows the generated itinerary exactly as returned, with a day navigator on top.
 * When the trip's calendar is given, each navigator link carries its date.
 */
export default function ItineraryText({ text, days = [] }: { text: string; days?: TripDay[] }) {
  const outline = React.useMemo(() => outlineDays(text), [text]);
  const blocks = React.useMemo(() => splitAtDays(text), [text]);
  const dates = React.useMemo(() => new Map(days.map((d): [number, string] => [d.day, dayLabel(d)])), [days]);
  const [copied, setCopied] = React.useState(false);

  async function copy() {
    try {
      await navigator.clipboard.writeText(text);
      setCopied(true);
      setTimeout(() => setCopied(false), 1000);
    } catch (e) {
      console.warn("[itinerary] clipboard write failed", e);
    }
  }

  return (
    <div className="space-y-3">
      <div className="flex flex-wrap items-center justify-between gap-2">
        {outline.length > 0 ? (
          <nav aria-label="Day navigator" className="flex flex-wrap gap-2">
            {outline.map((d) => (
              <a
                key={d.anchor}
                href={`#${d.anchor}`}
                className="rounded-full border bg-white px-3 py-1 text-xs sm:text-sm text-neutral-700 hover:border-sky-400"
              >
                Day {d.day}
                {dates.has(d.day) && <span className="text-neutral-500"> · {dates.get(d.day)}</span>}
              </a>
            ))}
          </nav>
        ) : (
          <span />
        )}
        <button type="button" onClick={() => void copy()} className="rounded-md border px-3 py-1.5 text-sm">
          {copied ? "Copied!" : "Copy text"}
        </button>
      </div>

      <article className="rounded-xl border bg-white p-4 font-sans text-sm leading-relaxed text-stone-800">
        {blocks.map((b, i) => (
          <div key={i} id={b.anchor} className="whitespace-pre-wrap scroll-mt-20">
            {b.text}
          </div>
        ))}
      </article>
    </div>
  );
}
