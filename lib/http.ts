// lib/http.ts
import { NextResponse } from "next/server";
import { InvalidInputError, ServiceUnavailableError } from "./errors";
import type { Logger } from "./log";
import type { ErrorBody } from "./types";

/** Reads a JSON body; a malformed body is the caller's input problem. */
export async function readJsonBody(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new InvalidInputError("Request body must be valid JSON");
  }
}

export function errorResponse(err: unknown, log: Logger): NextResponse<ErrorBody> {
  if (err instanceof InvalidInputError) {
    log.warn(`invalid input: ${err.issues.join("; ") || err.message}`);
    return NextResponse.json<ErrorBody>(
      { error: "InvalidInput", message: err.message, issues: err.issues },
      { status: 400 }
    );
  }
  if (err instanceof ServiceUnavailableError) {
    return NextResponse.json<ErrorBody>(
      { error: "ServiceUnavailable", message: err.message, reason: err.reason },
      { status: 503 }
    );
  }
  log.error("Fatal:", err);
  return NextResponse.json<ErrorBody>({ error: "Internal", message: "Unexpected server error" }, { status: 500 });
}
