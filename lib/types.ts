// lib/types.ts
import type { ServiceUnavailableReason } from "./errors";
import type { TripRequest } from "./trip";

export type PlanResponse = {
  itinerary: string;
  model: string;
  attempts: number;
  trip: TripRequest;
};

export type ErrorBody =
  | { error: "InvalidInput"; message: string; issues: string[] }
  | { error: "ServiceUnavailable"; message: string; reason: ServiceUnavailableReason }
  | { error: "Internal"; message: string };

export type HealthResponse = { ok: boolean; model: string | null };
