// lib/errors.ts
import type { ZodError } from "zod";

export type ServiceUnavailableReason =
  | "network"
  | "timeout"
  | "auth"
  | "rate_limit"
  | "upstream";

/** Trip parameters were missing or malformed. Raised before any network call. */
export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }

  static fromZod(err: ZodError): InvalidInputError {
    const issues = err.issues.map((i) =>
      i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    return new InvalidInputError(err.issues[0]?.message ?? "Invalid trip request", issues);
  }
}

/** The completion service could not produce an answer. */
export class ServiceUnavailableError extends Error {
  readonly reason: ServiceUnavailableReason;

  constructor(reason: ServiceUnavailableReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ServiceUnavailableError";
    this.reason = reason;
  }

  // only dropped connections are worth another attempt
  get transient(): boolean {
    return this.reason === "network";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "Unknown error";
}
