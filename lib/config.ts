// lib/config.ts
import { z } from "zod";

export const MAX_TIMEOUT_MS = 600_000;

const Env = z.object({
  OPENAI_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined)),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o"),
  OPENAI_GUIDE_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  // timers clamp anything past 2^31-1 ms to 1 ms
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(60_000),
  PLAN_MAX_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
});

export type AppConfig = {
  apiKey?: string;
  model: string;
  guideModel: string;
  timeoutMs: number;
  maxRetries: number;
};

// Empty strings count as unset so `.env` placeholders fall back to defaults
function blankToUndefined(env: Record<string, string | undefined>) {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = v === undefined || v.trim() === "" ? undefined : v;
  }
  return out;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = Env.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    apiKey: e.OPENAI_API_KEY,
    model: e.OPENAI_MODEL,
    guideModel: e.OPENAI_GUIDE_MODEL,
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    maxRetries: e.PLAN_MAX_RETRIES,
  };
}
