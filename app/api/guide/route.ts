// app/api/guide/route.ts
import { NextResponse } from "next/server";
import { generateGuide } from "@/lib/guide";
import { errorResponse, readJsonBody } from "@/lib/http";
import { scopedLogger } from "@/lib/log";
import { getConfig, getGuideService } from "@/lib/server";
import { parseTripRequest } from "@/lib/trip";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: Request) {
  const log = scopedLogger("guide");
  try {
    const trip = parseTripRequest(await readJsonBody(req));
    const guide = await generateGuide(trip, {
      service: getGuideService(),
      timeoutMs: getConfig().timeoutMs,
      log,
    });
    log.info(`done errors=${guide.errors.length}`);
    return NextResponse.json(guide);
  } catch (err) {
    return errorResponse(err, log);
  }
}
