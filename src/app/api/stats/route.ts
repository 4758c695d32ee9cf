import { NextResponse } from "next/server";
import { getStats } from "@/sync/ledger/runs";

/** GET /api/stats: Mirror row counts, run totals and the latest runs. */
export async function GET() {
  return NextResponse.json(getStats());
}
