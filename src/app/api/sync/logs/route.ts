import { NextResponse } from "next/server";
import { listLogEntries } from "@/sync/ledger/runs";
import { logQuerySchema } from "@/sync/types/api";

/**
 * GET /api/sync/logs?offset&limit&runId&action&resourceType
 *
 * Newest entries first, with the total matching count.
 */
export async function GET(request: Request) {
  const query = Object.fromEntries(new URL(request.url).searchParams);
  const parsed = logQuerySchema.safeParse(query);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid query", details: parsed.error.issues },
      { status: 400 },
    );
  }
  return NextResponse.json(listLogEntries(parsed.data));
}
