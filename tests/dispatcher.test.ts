import { createItineraryDispatcher } from "@/lib/dispatcher";
import { InvalidInputError, ServiceUnavailableError } from "@/lib/errors";
import { buildItineraryPrompt, ITINERARY_SYSTEM_PROMPT } from "@/lib/prompt";
import { parseTripRequest } from "@/lib/trip";
import { FakeCompletionService, validTrip } from "./fakes";

const networkDown = () => {
  throw new ServiceUnavailableError("network", "connect ECONNREFUSED 127.0.0.1:443");
};

describe("createItineraryDispatcher", () => {
  it("makes exactly one call and returns the text unchanged", async () => {
    const text = "  ## Day 1 — Arrival\n\n- Check in  \n\n";
    const service = new FakeCompletionService(() => text);
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000 });

    const result = await dispatcher.dispatch(validTrip);

    expect(result.itinerary).toBe(text);
    expect(result.model).toBe("test-model");
    expect(result.attempts).toBe(1);
    expect(service.calls).toHaveLength(1);
    expect(service.calls[0].req.prompt).toBe(buildItineraryPrompt(parseTripRequest(validTrip)));
    expect(service.calls[0].req.system).toBe(ITINERARY_SYSTEM_PROMPT);
    expect(service.calls[0].opts?.signal).toBeInstanceOf(AbortSignal);
  });

  it("fails with InvalidInput before any call when the destination is empty", async () => {
    const service = new FakeCompletionService();
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000 });

    await expect(dispatcher.dispatch({ ...validTrip, destination: "" })).rejects.toBeInstanceOf(
      InvalidInputError
    );
    expect(service.calls).toHaveLength(0);
  });

  it("fails with InvalidInput when the start date is after the end date", async () => {
    const service = new FakeCompletionService();
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000 });

    await expect(
      dispatcher.dispatch({ ...validTrip, startDate: "2026-03-10", endDate: "2026-03-06" })
    ).rejects.toThrow("End date must be on or after the start date");
    expect(service.calls).toHaveLength(0);
  });

  it("retries a refused connection no more than the configured bound", async () => {
    const service = new FakeCompletionService(networkDown);
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000, maxRetries: 2 });

    const err = await dispatcher.dispatch(validTrip).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceUnavailableError);
    expect(err).toMatchObject({ reason: "network" });
    expect(service.calls).toHaveLength(3);
  });

  it("does not retry when retries are disabled", async () => {
    const service = new FakeCompletionService(networkDown);
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000, maxRetries: 0 });

    await expect(dispatcher.dispatch(validTrip)).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(service.calls).toHaveLength(1);
  });

  it("recovers when a retry succeeds", async () => {
    const service = new FakeCompletionService(() => "Day 1: Alfama").queue(networkDown);
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000, maxRetries: 1 });

    const result = await dispatcher.dispatch(validTrip);

    expect(result.itinerary).toBe("Day 1: Alfama");
    expect(result.attempts).toBe(2);
  });

  it("does not retry authentication or rate-limit failures", async () => {
    for (const reason of ["auth", "rate_limit"] as const) {
      const service = new FakeCompletionService(() => {
        throw new ServiceUnavailableError(reason, "nope");
      });
      const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000, maxRetries: 3 });

      await expect(dispatcher.dispatch(validTrip)).rejects.toMatchObject({ reason });
      expect(service.calls).toHaveLength(1);
    }
  });

  it("aborts the call and fails with ServiceUnavailable on timeout", async () => {
    let seen: AbortSignal | undefined;
    const service = new FakeCompletionService(
      (_req, opts) =>
        new Promise<string>((_resolve, reject) => {
          seen = opts?.signal;
          opts?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 20, maxRetries: 2 });

    await expect(dispatcher.dispatch(validTrip)).rejects.toMatchObject({
      name: "ServiceUnavailableError",
      reason: "timeout",
    });
    expect(seen?.aborted).toBe(true);
    expect(service.calls).toHaveLength(1);
  });

  it("wraps unexpected service errors as ServiceUnavailable", async () => {
    const service = new FakeCompletionService(() => {
      throw new TypeError("socket hang up");
    });
    const dispatcher = createItineraryDispatcher({ service, timeoutMs: 1000 });

    await expect(dispatcher.dispatch(validTrip)).rejects.toMatchObject({
      reason: "upstream",
      message: "socket hang up",
    });
  });
});
