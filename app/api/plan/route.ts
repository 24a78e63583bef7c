// app/api/plan/route.ts
import { NextResponse } from "next/server";
import { errorResponse, readJsonBody } from "@/lib/http";
import { scopedLogger } from "@/lib/log";
import { getConfig, getDispatcher } from "@/lib/server";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: Request) {
  const log = scopedLogger("plan");
  try {
    const rawBody = await readJsonBody(req);
    const result = await getDispatcher(log).dispatch(rawBody);
    log.info(`done attempts=${result.attempts}`);
    return NextResponse.json({
      itinerary: result.itinerary,
      model: result.model,
      attempts: result.attempts,
      trip: result.trip,
    });
  } catch (err) {
    return errorResponse(err, log);
  }
}

// status badge: is a credential configured?
export async function GET() {
  try {
    const cfg = getConfig();
    return NextResponse.json({ ok: Boolean(cfg.apiKey), model: cfg.model });
  } catch (err) {
    console.error("[plan] config error:", err instanceof Error ? err.message : err);
    return NextResponse.json({ ok: false, model: null });
  }
}
