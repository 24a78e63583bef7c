// lib/dispatcher.ts
import type { CompletionService } from "./completion";
import { ServiceUnavailableError } from "./errors";
import { short, silentLogger, type Logger } from "./log";
import { buildItineraryPrompt, ITINERARY_SYSTEM_PROMPT } from "./prompt";
import { parseTripRequest, tripLengthDays, type TripRequest } from "./trip";

export type DispatcherOptions = {
  service: CompletionService;
  /** abort the call after this long and fail with ServiceUnavailable("timeout") */
  timeoutMs: number;
  /** extra attempts on transient network failure; 0 disables */
  maxRetries?: number;
  log?: Logger;
};

export type ItineraryResult = {
  /** the service's text, unchanged */
  itinerary: string;
  model: string;
  attempts: number;
  trip: TripRequest;
};

export type ItineraryDispatcher = {
  dispatch(raw: unknown): Promise<ItineraryResult>;
};

function withTimeout(timeoutMs: number, run: (signal: AbortSignal) => Promise<string>): Promise<string> {
  const controller = new AbortController();
  const timedOut = () =>
    new ServiceUnavailableError("timeout", `Completion service timed out after ${timeoutMs}ms`);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(timedOut());
      controller.abort();
    }, timeoutMs);
  });
  const call = run(controller.signal).catch((err: unknown) => {
    // whatever the service throws once aborted, the cause is the deadline
    throw controller.signal.aborted ? timedOut() : err;
  });
  return Promise.race([call, expired]).finally(() => clearTimeout(timer));
}

export function createItineraryDispatcher(opts: DispatcherOptions): ItineraryDispatcher {
  const log = opts.log ?? silentLogger;
  const maxRetries = Math.max(0, opts.maxRetries ?? 0);

  return {
    async dispatch(raw) {
      // throws InvalidInputError before anything goes out
      const trip = parseTripRequest(raw);
      const prompt = buildItineraryPrompt(trip);
      const days = tripLengthDays(trip);

      log.info(
        `dest=${trip.destination} days=${days} model=${opts.service.model} | prompt.length=${prompt.length}\n[prompt.head]\n${short(prompt, 600)}`
      );

      let attempt = 0;
      for (;;) {
        attempt++;
        try {
          const itinerary = await withTimeout(opts.timeoutMs, (signal) =>
            opts.service.complete(
              {
                system: ITINERARY_SYSTEM_PROMPT,
                prompt,
                temperature: 0.7,
                maxTokens: Math.min(16_000, 600 * days + 400),
              },
              { signal }
            )
          );
          log.info(`attempt=${attempt} ok | text.length=${itinerary.length}`);
          return { itinerary, model: opts.service.model, attempts: attempt, trip };
        } catch (err) {
          const failure =
            err instanceof ServiceUnavailableError
              ? err
              : new ServiceUnavailableError("upstream", err instanceof Error ? err.message : "request failed", {
                  cause: err,
                });
          if (failure.transient && attempt <= maxRetries) {
            log.warn(`attempt=${attempt} failed (${failure.reason}): ${failure.message}; retrying`);
            continue;
          }
          log.error(`attempt=${attempt} failed (${failure.reason}): ${failure.message}`);
          throw failure;
        }
      }
    },
  };
}
