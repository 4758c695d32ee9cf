import { NextResponse } from "next/server";
import { z } from "zod";
import { listRuns } from "@/sync/ledger/runs";

const querySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** GET /api/sync/runs?limit: Most recent runs first. */
export async function GET(request: Request) {
  const parsed = querySchema.safeParse(Object.fromEntries(new URL(request.url).searchParams));
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid query", details: parsed.error.issues },
      { status: 400 },
    );
  }
  return NextResponse.json({ runs: listRuns(parsed.data.limit) });
}
