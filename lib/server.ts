// lib/server.ts
import { loadConfig, type AppConfig } from "./config";
import { createOpenAICompletionService, type CompletionService } from "./completion";
import { createItineraryDispatcher, type ItineraryDispatcher } from "./dispatcher";
import type { Logger } from "./log";

let config: AppConfig | undefined;
let guideService: CompletionService | undefined;

export function getConfig(): AppConfig {
  config ??= loadConfig();
  return config;
}

/** One dispatcher per request so logs carry the request id. */
export function getDispatcher(log: Logger): ItineraryDispatcher {
  const cfg = getConfig();
  return createItineraryDispatcher({
    service: createOpenAICompletionService({
      apiKey: cfg.apiKey,
      model: cfg.model,
      timeoutMs: cfg.timeoutMs,
    }),
    timeoutMs: cfg.timeoutMs,
    maxRetries: cfg.maxRetries,
    log,
  });
}

export function getGuideService(): CompletionService {
  const cfg = getConfig();
  guideService ??= createOpenAICompletionService({
    apiKey: cfg.apiKey,
    model: cfg.guideModel,
    timeoutMs: cfg.timeoutMs,
  });
  return guideService;
}
