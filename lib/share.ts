// lib/share.ts
import type { DayHeading } from "./outline";
import { BUDGET_LEVEL_LABEL, formatLongDate, tripLengthDays, type TripRequest } from "./trip";

const slugify = (s: string) =>
  s.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/(^-|-$)/g, "");

export function tripDateRange(trip: TripRequest): string {
  return `${formatLongDate(trip.startDate)} - ${formatLongDate(trip.endDate)}`;
}

/** Plain-text summary for sharing with travel companions. */
export function buildShareText(trip: TripRequest, outline: DayHeading[]): string {
  const days = tripLengthDays(trip);
  const lines = [
    `Trip to ${trip.destination}`,
    `Dates: ${tripDateRange(trip)} (${days} day${days === 1 ? "" : "s"})`,
  ];
  if (trip.origin) lines.push(`From: ${trip.origin}`);
  lines.push(`Travelers: ${trip.travelers}`);
  lines.push(`Budget: ${BUDGET_LEVEL_LABEL[trip.budgetLevel]}`);
  if (trip.preferences.length) lines.push(`Interests: ${trip.preferences.join(", ")}`);

  const highlights = outline.slice(0, 5);
  if (highlights.length) {
    lines.push("", "Daily highlights:");
    for (const h of highlights) lines.push(`Day ${h.day}: ${h.title || "Explore"}`);
  }
  return lines.join("\n");
}

/** trip_<origin>_<destination>_<YYYYMMDD>.json */
export function exportFileName(trip: TripRequest, today: Date): string {
  const stamp = today.toISOString().slice(0, 10).replaceAll("-", "");
  const parts = ["trip", slugify(trip.origin ?? "") || "anywhere", slugify(trip.destination) || "trip", stamp];
  return `${parts.join("_")}.json`;
}

export type TripExport = {
  trip: TripRequest;
  itinerary: string;
  model: string;
  exportedAt: string;
};

export function buildExport(trip: TripRequest, itinerary: string, model: string, now: Date): TripExport {
  return { trip, itinerary, model, exportedAt: now.toISOString() };
}
