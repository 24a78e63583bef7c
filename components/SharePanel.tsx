// components/SharePanel.tsx
"use client";

import * as React from "react";
import { outlineDays } from "@/lib/outline";
import { buildExport, buildShareText, exportFileName } from "@/lib/share";
import type { TripRequest } from "@/lib/trip";

export default function SharePanel({
  trip,
  itinerary,
  model,
}: {
  trip: TripRequest;
  itinerary: string;
  model: string;
}) {
  const share = React.useMemo(() => buildShareText(trip, outlineDays(itinerary)), [trip, itinerary]);

  function download() {
    const now = new Date();
    const blob = new Blob([JSON.stringify(buildExport(trip, itinerary, model, now), null, 2)], {
      type: "application/json",
    });
    const url = URL.createObjectURL(blob);
    const a = document.createElement("a");
    a.href = url;
    a.download = exportFileName(trip, now);
    a.click();
    // revoking in the same tick can cancel the download
    setTimeout(() => URL.revokeObjectURL(url), 0);
  }

  return (
    <div className="space-y-3">
      <p className="text-sm text-neutral-600">Copy this summary to share with travel companions.</p>
      <pre className="whitespace-pre-wrap rounded-lg border bg-neutral-50 p-3 text-sm">{share}</pre>
      <button
        type="button"
        onClick={download}
        className="rounded-md bg-sky-600 px-3 py-1.5 text-sm text-white hover:bg-sky-700"
      >
        Download itinerary (JSON)
      </button>
    </div>
  );
}
