// lib/guide.ts
import { z } from "zod";
import { parse as partialJsonParse } from "partial-json";
import type { CompletionService } from "./completion";
import { errorMessage } from "./errors";
import { short, silentLogger, type Logger } from "./log";
import {
  buildBudgetPrompt,
  buildInsightsPrompt,
  buildPackingPrompt,
  GUIDE_SYSTEM_PROMPT,
} from "./prompt";
import { seasonOf, tripLengthDays, type TripRequest } from "./trip";

// ---------------- model output (lenient) ----------------
// Missing or mistyped fields fall back instead of failing the whole section.
const text = z.string().trim().catch("");
const amount = z.coerce.number().finite().nonnegative().catch(0);
const texts = z
  .array(z.unknown())
  .catch([])
  .transform((xs) => xs.filter((x): x is string => typeof x === "string" && x.trim() !== "").map((x) => x.trim()));

export const InsightsSchema = z.object({
  description: text,
  bestTimeToVisit: text,
  averageDailyBudget: z
    .object({ budget: amount, midRange: amount, luxury: amount })
    .catch({ budget: 0, midRange: 0, luxury: 0 }),
  topAttractions: z
    .array(z.object({ name: text, description: text, timeNeeded: text, cost: amount }))
    .catch([]),
  localCuisine: z.array(z.object({ dish: text, description: text, where: text })).catch([]),
  culturalTips: texts,
  safety: z
    .object({ rating: z.coerce.number().min(0).max(10).catch(0), notes: text })
    .catch({ rating: 0, notes: "" }),
  transportation: z
    .object({ gettingAround: text, fromAirport: text })
    .catch({ gettingAround: "", fromAirport: "" }),
  languageTips: texts,
  currency: text,
  neighborhoods: z.array(z.object({ name: text, vibe: text, bestFor: text })).catch([]),
});

export const BudgetSchema = z.object({
  accommodation: z
    .object({ perNight: amount, nights: amount, total: amount, notes: text })
    .catch({ perNight: 0, nights: 0, total: 0, notes: "" }),
  food: z
    .object({ breakfastAvg: amount, lunchAvg: amount, dinnerAvg: amount, dailyTotal: amount, total: amount })
    .catch({ breakfastAvg: 0, lunchAvg: 0, dinnerAvg: 0, dailyTotal: 0, total: 0 }),
  transportation: z
    .object({ airportTransfer: amount, dailyLocal: amount, total: amount, notes: text })
    .catch({ airportTransfer: 0, dailyLocal: 0, total: 0, notes: "" }),
  activities: z
    .object({ dailyAvg: amount, total: amount, notes: text })
    .catch({ dailyAvg: 0, total: 0, notes: "" }),
  shopping: z.object({ total: amount, notes: text }).catch({ total: 0, notes: "" }),
  emergencyFund: amount,
  totalPerPerson: amount,
  totalAllTravelers: amount,
  dailyAverage: amount,
  savingsTips: texts,
});

export const PACKING_CATEGORIES = [
  "documents",
  "clothing",
  "footwear",
  "toiletries",
  "electronics",
  "medications",
  "accessories",
  "activitySpecific",
  "optional",
] as const;

export const PackingSchema = z.object({
  documents: texts,
  clothing: texts,
  footwear: texts,
  toiletries: texts,
  electronics: texts,
  medications: texts,
  accessories: texts,
  activitySpecific: texts,
  optional: texts,
});

export type Insights = z.infer<typeof InsightsSchema>;
export type BudgetBreakdown = z.infer<typeof BudgetSchema>;
export type PackingList = z.infer<typeof PackingSchema>;

export type GuideSection = "insights" | "budget" | "packing";

export type Guide = {
  insights: Insights | null;
  budget: BudgetBreakdown | null;
  packing: PackingList | null;
  errors: { section: GuideSection; message: string }[];
};

// ---------------- parsing ----------------
/** strict parse → fallback partial (truncated completions) */
export function parseModelJson(raw: string): unknown {
  const trimmed = raw.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    try {
      return partialJsonParse(trimmed);
    } catch (e) {
      throw new Error(`Model returned invalid JSON: ${errorMessage(e)}`);
    }
  }
}

function parseSection<S extends z.ZodTypeAny>(schema: S, raw: string): z.output<S> {
  const json = parseModelJson(raw);
  if (!json || typeof json !== "object" || Array.isArray(json)) {
    throw new Error("Model returned non-object JSON");
  }
  return schema.parse(json);
}

// ---------------- cache ----------------
/** Small insertion-ordered cache; the oldest entry goes first when full. */
export class GuideCache<V> {
  private entries = new Map<string, V>();

  constructor(private readonly maxEntries = 100) {}

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V) {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size() {
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }
}

const insightsCache = new GuideCache<Insights>();
const packingCache = new GuideCache<PackingList>();

export function clearGuideCache() {
  insightsCache.clear();
  packingCache.clear();
}

const cacheKey = (...parts: (string | number)[]) =>
  parts.map((p) => String(p).trim().toLowerCase()).join("|");

// ---------------- generation ----------------
export type GuideOptions = {
  service: CompletionService;
  timeoutMs?: number;
  log?: Logger;
};

async function cached<V>(
  cache: GuideCache<V>,
  key: string,
  produce: () => Promise<V>
): Promise<V> {
  const hit = cache.get(key);
  if (hit) return hit;
  const value = await produce();
  cache.set(key, value);
  return value;
}

/** Runs the three guide sections in parallel; a failed section is reported, not thrown. */
export async function generateGuide(trip: TripRequest, opts: GuideOptions): Promise<Guide> {
  const log = opts.log ?? silentLogger;
  const { service } = opts;

  const ask = async <S extends z.ZodTypeAny>(
    section: GuideSection,
    schema: S,
    prompt: string,
    maxTokens: number,
    temperature: number
  ): Promise<z.output<S>> => {
    const signal = opts.timeoutMs ? AbortSignal.timeout(opts.timeoutMs) : undefined;
    const raw = await service.complete(
      { system: GUIDE_SYSTEM_PROMPT, prompt, json: true, maxTokens, temperature },
      { signal }
    );
    log.info(`${section} raw.head: ${short(raw, 300)}`);
    return parseSection(schema, raw);
  };

  const days = tripLengthDays(trip);
  const season = seasonOf(trip.startDate);

  const [insights, budget, packing] = await Promise.allSettled([
    cached(insightsCache, cacheKey(trip.destination), () =>
      ask("insights", InsightsSchema, buildInsightsPrompt(trip.destination), 1500, 0.7)
    ),
    ask("budget", BudgetSchema, buildBudgetPrompt(trip), 700, 0.5),
    cached(packingCache, cacheKey(trip.destination, season, days, trip.preferences.join(",")), () =>
      ask("packing", PackingSchema, buildPackingPrompt(trip), 700, 0.6)
    ),
  ]);

  const guide: Guide = { insights: null, budget: null, packing: null, errors: [] };
  const settle = <K extends GuideSection>(section: K, r: PromiseSettledResult<NonNullable<Guide[K]>>) => {
    if (r.status === "fulfilled") {
      guide[section] = r.value;
    } else {
      const message = errorMessage(r.reason);
      log.warn(`${section} failed: ${message}`);
      guide.errors.push({ section, message });
    }
  };
  settle("insights", insights);
  settle("budget", budget);
  settle("packing", packing);
  return guide;
}
