// lib/api.ts
import type { Guide } from "./guide";
import type { TripRequestInput } from "./trip";
import type { ErrorBody, HealthResponse, PlanResponse } from "./types";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

const browserFetch: FetchLike = (url, init) => fetch(url, init);

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly kind: ErrorBody["error"] | "Network"
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorBody(x: unknown): x is ErrorBody {
  if (typeof x !== "object" || x === null || !("error" in x) || !("message" in x)) return false;
  return typeof x.error === "string" && typeof x.message === "string";
}

async function postJson<T>(url: string, body: unknown, fetchImpl: FetchLike): Promise<T> {
  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      cache: "no-store",
    });
  } catch {
    throw new ApiError("Can't reach the planning service. Check your connection.", 0, "Network");
  }
  const data: unknown = await res.json().catch(() => null);
  if (!res.ok) {
    if (isErrorBody(data)) throw new ApiError(data.message, res.status, data.error);
    throw new ApiError(`Request failed (${res.status})`, res.status, "Internal");
  }
  return data as T;
}

export function requestPlan(trip: TripRequestInput, fetchImpl: FetchLike = browserFetch) {
  return postJson<PlanResponse>("/api/plan", trip, fetchImpl);
}

export function requestGuide(trip: TripRequestInput, fetchImpl: FetchLike = browserFetch) {
  return postJson<Guide>("/api/guide", trip, fetchImpl);
}

export async function checkHealth(fetchImpl: FetchLike = browserFetch): Promise<HealthResponse> {
  try {
    const res = await fetchImpl("/api/plan", { cache: "no-store" });
    return (await res.json()) as HealthResponse;
  } catch {
    return { ok: false, model: null };
  }
}

/** Sends a browser error to the server logs; never throws. */
export function reportClientError(scope: string, error: Error & { digest?: string }, extra?: unknown) {
  fetch("/api/client-log", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({
      scope,
      message: error.message,
      digest: error.digest,
      stack: error.stack,
      extra,
    }),
  }).catch((e: unknown) => {
    // eslint-disable-next-line no-console
    console.warn("[client-log] failed", e);
  });
}
