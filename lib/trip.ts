// lib/trip.ts
import { z } from "zod";
import { InvalidInputError } from "./errors";

export const PREFERENCE_TAGS = [
  "culture",
  "adventure",
  "food",
  "relaxation",
  "shopping",
  "nature",
  "photography",
] as const;
export type PreferenceTag = (typeof PREFERENCE_TAGS)[number];

export const BUDGET_LEVELS = ["budget", "mid-range", "luxury"] as const;
export type BudgetLevel = (typeof BUDGET_LEVELS)[number];

export const BUDGET_LEVEL_LABEL: Record<BudgetLevel, string> = {
  budget: "Budget",
  "mid-range": "Mid-range",
  luxury: "Luxury",
};

export const MAX_TRIP_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------- dates ----------------
/** Parses a strict `YYYY-MM-DD` calendar date to a UTC timestamp, or null. */
export function parseIsoDate(s: string): number | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const t = Date.UTC(y, mo - 1, d);
  const back = new Date(t);
  if (
    back.getUTCFullYear() !== y ||
    back.getUTCMonth() !== mo - 1 ||
    back.getUTCDate() !== d
  ) {
    return null; // e.g. 2025-02-30
  }
  return t;
}

const isoDate = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .refine((s) => parseIsoDate(s) !== null, `${label} must be a calendar date (YYYY-MM-DD)`);

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((v) => (v ? v : undefined));

// ---------------- schema ----------------
export const TripRequestSchema = z
  .object({
    destination: z
      .string({ required_error: "Destination is required" })
      .trim()
      .min(1, "Destination is required")
      .max(120, "Destination is too long"),
    origin: optionalText(120),
    startDate: isoDate("Start date"),
    endDate: isoDate("End date"),
    budget: z
      .number({ invalid_type_error: "Budget must be a number" })
      .finite()
      .nonnegative("Budget must be zero or more")
      .optional(),
    currency: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, "Currency must be a 3-letter code")
      .transform((c) => c.toUpperCase())
      .default("USD"),
    budgetLevel: z.enum(BUDGET_LEVELS).default("mid-range"),
    travelers: z
      .number({ invalid_type_error: "Travelers must be a number" })
      .int("Travelers must be a whole number")
      .min(1, "At least 1 traveler")
      .max(10, "At most 10 travelers")
      .default(1),
    preferences: z
      .array(z.enum(PREFERENCE_TAGS))
      .default([])
      .transform((tags) => Array.from(new Set(tags))),
    notes: optionalText(500),
  })
  .superRefine((t, ctx) => {
    const start = parseIsoDate(t.startDate);
    const end = parseIsoDate(t.endDate);
    if (start === null || end === null) return;
    if (end < start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: "End date must be on or after the start date",
      });
      return;
    }
    if ((end - start) / DAY_MS + 1 > MAX_TRIP_DAYS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: `Trip length must be ${MAX_TRIP_DAYS} days or less`,
      });
    }
  });

export type TripRequest = z.output<typeof TripRequestSchema>;
export type TripRequestInput = z.input<typeof TripRequestSchema>;

/** Validates raw input (e.g. a JSON body) into a TripRequest or throws InvalidInputError. */
export function parseTripRequest(raw: unknown): TripRequest {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new InvalidInputError("Trip request must be an object");
  }
  const res = TripRequestSchema.safeParse(raw);
  if (!res.success) throw InvalidInputError.fromZod(res.error);
  return res.data;
}

// ---------------- derived values ----------------
/** Inclusive day count; a same-day trip is 1 day. */
export function tripLengthDays(trip: Pick<TripRequest, "startDate" | "endDate">): number {
  const start = parseIsoDate(trip.startDate) ?? 0;
  const end = parseIsoDate(trip.endDate) ?? start;
  return Math.round((end - start) / DAY_MS) + 1;
}

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export type TripDay = { day: number; date: string; weekday: string };

export function tripDays(trip: Pick<TripRequest, "startDate" | "endDate">): TripDay[] {
  const start = parseIsoDate(trip.startDate) ?? 0;
  const out: TripDay[] = [];
  for (let i = 0; i < tripLengthDays(trip); i++) {
    const d = new Date(start + i * DAY_MS);
    out.push({
      day: i + 1,
      date: d.toISOString().slice(0, 10),
      weekday: WEEKDAYS[d.getUTCDay()],
    });
  }
  return out;
}

export type Season = "winter" | "spring" | "summer" | "fall";

// Dec–Feb winter, Mar–May spring, Jun–Aug summer, Sep–Nov fall
export function seasonOf(isoDate: string): Season {
  const month = Number(isoDate.slice(5, 7));
  const seasons: Season[] = ["winter", "spring", "summer", "fall"];
  return seasons[Math.floor((month % 12) / 3)];
}

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/** "March 4, 2026" */
export function formatLongDate(isoDate: string): string {
  const [y, m, d] = isoDate.split("-").map(Number);
  return `${MONTHS[m - 1]} ${d}, ${y}`;
}
