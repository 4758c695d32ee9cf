import { NextResponse } from "next/server";
import { readOptionalJson, withQueryFlag } from "@/app/api/body";
import { getSyncEngine } from "@/sync/engine";
import { createChildLogger } from "@/sync/logger";
import { fullSyncRequestSchema } from "@/sync/types/api";

const log = createChildLogger("api-sync-full");

/**
 * POST /api/sync/full: Cascade from documents down to parts and features.
 *
 * Body (optional):
 *   forceRefresh?: boolean
 *   documentIds?: string[]   restrict the cascade to these documents
 *
 * `?force_refresh=true` is accepted as well.
 */
export async function POST(request: Request) {
  const read = await readOptionalJson(request);
  if (!read.ok) {
    return NextResponse.json(
      { error: "Invalid JSON in request body" },
      { status: 400 },
    );
  }

  const parsed = fullSyncRequestSchema.safeParse(withQueryFlag(read.body, request));
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid request", details: parsed.error.issues },
      { status: 400 },
    );
  }

  const { forceRefresh, documentIds } = parsed.data;
  try {
    const run = getSyncEngine().dispatcher.dispatch(
      documentIds ? { kind: "full", documentIds } : { kind: "full" },
      { forceRefresh },
    );
    log.info("Full sync dispatched via API", { runId: run.runId, forceRefresh, documentIds });
    return NextResponse.json({ runId: run.runId, status: run.status }, { status: 202 });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Could not dispatch full sync", { error: message });
    return NextResponse.json({ error: "Sync failed to start", message }, { status: 500 });
  }
}
