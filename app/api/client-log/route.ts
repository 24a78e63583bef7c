// app/api/client-log/route.ts
import { NextResponse } from "next/server";
import { z } from "zod";

const ClientLog = z.object({
  scope: z.string().max(60).default("client"),
  message: z.string().max(2000).default(""),
  digest: z.string().max(200).optional(),
  stack: z.string().max(8000).optional(),
  extra: z.unknown().optional(),
});

export async function POST(req: Request) {
  const body: unknown = await req.json().catch(() => null);
  const parsed = ClientLog.safeParse(body ?? {});
  if (!parsed.success) {
    console.error("[client-log] rejected", parsed.error.issues.map((i) => i.message));
    return NextResponse.json({ ok: false }, { status: 400 });
  }
  // This console.error is what shows up in the server function logs
  console.error("[client-log]", parsed.data);
  return NextResponse.json({ ok: true });
}
