import { z } from "zod";
import {
  RESOURCE_TYPES,
  type PageCursor,
  type ResourceType,
  type SyncAction,
  type SyncCounts,
  type SyncErrorKind,
  type SyncLogEntry,
  type SyncOutcome,
  type SyncRun,
  type SyncRunStatus,
  type SyncScope,
} from "@/sync/types";
import type { LogQuery } from "@/sync/types/api";
import { getDatabase } from "./db";
import { countRecords } from "./repository";
import type { LogPage, SyncStats } from "./types";

const OPEN = "('pending', 'running')";

// --- Sync Runs ---

export function createRun(runId: string, scope: SyncScope, forceRefresh: boolean, now = new Date()): SyncRun {
  getDatabase()
    .prepare(`
      INSERT INTO sync_runs (run_id, scope_json, force_refresh, status, started_at)
      VALUES (?, ?, ?, 'pending', ?)
    `)
    .run(runId, JSON.stringify(scope), forceRefresh ? 1 : 0, now.toISOString());
  return requireRun(runId);
}

/** pending → running. False when the run is not pending any more. */
export function startRun(runId: string, now = new Date()): boolean {
  const result = getDatabase()
    .prepare("UPDATE sync_runs SET status = 'running', started_at = ? WHERE run_id = ? AND status = 'pending'")
    .run(now.toISOString(), runId);
  return result.changes === 1;
}

export function requestCancel(runId: string): boolean {
  const result = getDatabase()
    .prepare(`UPDATE sync_runs SET cancel_requested = 1 WHERE run_id = ? AND status IN ${OPEN}`)
    .run(runId);
  return result.changes === 1;
}

/** Sets the terminal status. A run that already finished is returned as it was. */
export function completeRun(runId: string, status: Exclude<SyncRunStatus, "pending" | "running">, message: string | null, now = new Date()): SyncRun {
  getDatabase()
    .prepare(`
      UPDATE sync_runs
      SET status = ?, message = ?, completed_at = ?
      WHERE run_id = ? AND status IN ${OPEN}
    `)
    .run(status, message, now.toISOString(), runId);
  return requireRun(runId);
}

/** Runs a previous process left open can never finish; close them as failed. */
export function abandonOpenRuns(message: string): number {
  const result = getDatabase()
    .prepare(`UPDATE sync_runs SET status = 'failed', message = ?, completed_at = ? WHERE status IN ${OPEN}`)
    .run(message, new Date().toISOString());
  return result.changes;
}

export function isRunOpen(runId: string): boolean {
  const row = getDatabase()
    .prepare<[string], { open: number }>(`SELECT 1 AS open FROM sync_runs WHERE run_id = ? AND status IN ${OPEN}`)
    .get(runId);
  return row !== undefined;
}

export function getRun(runId: string): SyncRun | undefined {
  const row = getDatabase()
    .prepare<[string], RawRunRow>("SELECT * FROM sync_runs WHERE run_id = ?")
    .get(runId);
  return row ? toSyncRun(row) : undefined;
}

export function listRuns(limit = 20): SyncRun[] {
  return getDatabase()
    .prepare<[number], RawRunRow>("SELECT * FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT ?")
    .all(limit)
    .map(toSyncRun);
}

function requireRun(runId: string): SyncRun {
  const run = getRun(runId);
  if (!run) {
    throw new Error(`Sync run ${runId} does not exist`);
  }
  return run;
}

// --- Sync Log Entries ---

export function appendLogEntry(runId: string, outcome: SyncOutcome, now = new Date()): SyncLogEntry {
  const createdAt = now.toISOString();
  const result = getDatabase()
    .prepare(`
      INSERT INTO sync_log_entries (run_id, resource_type, entity_key, action, error_kind, detail, cursor_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      runId,
      outcome.resourceType,
      outcome.entityKey,
      outcome.action,
      outcome.errorKind,
      outcome.detail,
      outcome.cursor ? JSON.stringify(outcome.cursor) : null,
      createdAt,
    );
  return { ...outcome, id: Number(result.lastInsertRowid), runId, createdAt };
}

/**
 * Pages a run could not fetch, oldest first: error entries that carry a
 * resume cursor. Entity-level errors have none.
 */
export function listPageFailures(runId: string): SyncLogEntry[] {
  return getDatabase()
    .prepare<[string], RawLogRow>(`
      SELECT * FROM sync_log_entries
      WHERE run_id = ? AND action = 'error' AND cursor_json IS NOT NULL
      ORDER BY id
    `)
    .all(runId)
    .map(toLogEntry);
}

/** Counts for one run, or across every run when `runId` is omitted. */
export function countActions(runId?: string): SyncCounts {
  const db = getDatabase();
  const rows = runId
    ? db.prepare<[string], ActionCountRow>("SELECT action, COUNT(*) AS n FROM sync_log_entries WHERE run_id = ? GROUP BY action").all(runId)
    : db.prepare<[], ActionCountRow>("SELECT action, COUNT(*) AS n FROM sync_log_entries GROUP BY action").all();

  const counts: SyncCounts = { created: 0, updated: 0, unchanged: 0, failed: 0 };
  for (const row of rows) {
    if (row.action === "error") counts.failed += row.n;
    else if (row.action === "created" || row.action === "updated" || row.action === "unchanged") counts[row.action] += row.n;
  }
  return counts;
}

/** Newest first. */
export function listLogEntries(query: LogQuery): LogPage<SyncLogEntry> {
  const clauses: string[] = [];
  const params: string[] = [];
  if (query.runId) {
    clauses.push("run_id = ?");
    params.push(query.runId);
  }
  if (query.action) {
    clauses.push("action = ?");
    params.push(query.action);
  }
  if (query.resourceType) {
    clauses.push("resource_type = ?");
    params.push(query.resourceType);
  }
  const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
  const db = getDatabase();

  const total = db.prepare<string[], { n: number }>(`SELECT COUNT(*) AS n FROM sync_log_entries ${where}`).get(...params)?.n ?? 0;
  const items = db
    .prepare<Array<string | number>, RawLogRow>(`SELECT * FROM sync_log_entries ${where} ORDER BY id DESC LIMIT ? OFFSET ?`)
    .all(...params, query.limit, query.offset)
    .map(toLogEntry);

  return { items, total, offset: query.offset, limit: query.limit };
}

// --- Stats ---

export function getStats(): SyncStats {
  const db = getDatabase();
  const runs: Record<SyncRunStatus, number> = { pending: 0, running: 0, succeeded: 0, partiallyFailed: 0, failed: 0 };
  for (const row of db.prepare<[], { status: string; n: number }>("SELECT status, COUNT(*) AS n FROM sync_runs GROUP BY status").all()) {
    const status = runStatusSchema.safeParse(row.status);
    if (status.success) runs[status.data] = row.n;
  }

  const totals = countActions();
  const actions: Record<SyncAction, number> = {
    created: totals.created,
    updated: totals.updated,
    unchanged: totals.unchanged,
    error: totals.failed,
  };

  return {
    records: countRecords(),
    runs,
    actions,
    recentRuns: listRuns(5).map(({ runId, scope, status, startedAt, completedAt, counts }) => ({
      runId,
      scope,
      status,
      startedAt,
      completedAt,
      counts,
    })),
  };
}

// --- Internal helpers ---

interface RawRunRow {
  run_id: string;
  scope_json: string;
  force_refresh: number;
  status: string;
  started_at: string;
  completed_at: string | null;
  cancel_requested: number;
  message: string | null;
}

interface RawLogRow {
  id: number;
  run_id: string;
  resource_type: string;
  entity_key: string;
  action: string;
  error_kind: string | null;
  detail: string | null;
  cursor_json: string | null;
  created_at: string;
}

interface ActionCountRow {
  action: string;
  n: number;
}

const resourceTypeSchema = z.enum(RESOURCE_TYPES);
const runStatusSchema = z.enum(["pending", "running", "succeeded", "partiallyFailed", "failed"]);
const actionSchema = z.enum(["created", "updated", "unchanged", "error"]);
const errorKindSchema: z.ZodType<SyncErrorKind> = z.enum([
  "auth",
  "network",
  "http_status",
  "malformed_response",
  "exhausted",
  "rate_limited",
  "orphaned_parent",
  "internal",
]);

const scopeSchema: z.ZodType<SyncScope> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("single"), resourceType: resourceTypeSchema, parentKey: z.string().optional() }),
  z.object({ kind: z.literal("full"), documentIds: z.array(z.string()).optional() }),
  z.object({ kind: z.literal("resume"), runId: z.string() }),
]);

const cursorSchema: z.ZodType<PageCursor> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("start") }),
  z.object({ kind: z.literal("offset"), offset: z.number().int().min(0) }),
  z.object({ kind: z.literal("token"), token: z.string(), position: z.number().int().min(0).optional() }),
]);

function toSyncRun(row: RawRunRow): SyncRun {
  return {
    runId: row.run_id,
    scope: scopeSchema.parse(JSON.parse(row.scope_json)),
    forceRefresh: row.force_refresh === 1,
    status: runStatusSchema.parse(row.status),
    startedAt: row.started_at,
    completedAt: row.completed_at,
    cancelRequested: row.cancel_requested === 1,
    message: row.message,
    counts: countActions(row.run_id),
  };
}

function toLogEntry(row: RawLogRow): SyncLogEntry {
  const resourceType: ResourceType = resourceTypeSchema.parse(row.resource_type);
  return {
    id: row.id,
    runId: row.run_id,
    resourceType,
    entityKey: row.entity_key,
    action: actionSchema.parse(row.action),
    errorKind: row.error_kind === null ? null : errorKindSchema.parse(row.error_kind),
    detail: row.detail,
    cursor: row.cursor_json === null ? null : cursorSchema.parse(JSON.parse(row.cursor_json)),
    createdAt: row.created_at,
  };
}
