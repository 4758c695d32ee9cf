import type { RemoteEntity, SyncLogEntry, SyncOutcome } from "@/sync/types";
import { OrphanedParentError, SyncError, describeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { parentTypeOf } from "@/sync/onshape/resources";
import { getDatabase } from "./db";
import { findRecord, insertRecord, recordExists, updateRecord } from "./repository";
import { appendLogEntry } from "./runs";

const log = createChildLogger("reconciler");

export interface ReconcileOptions {
  forceRefresh?: boolean;
  now?: Date;
}

/**
 * Upsert one remote entity into its mirror table and report what happened.
 *
 * - Unknown key: inserted, `created`.
 * - Known key, same revision: left alone, `unchanged` (unless forced).
 * - Known key, new revision or `forceRefresh`: overwritten, `updated`.
 *
 * The parent must already be mirrored. Each call is its own transaction,
 * so an error leaves the row exactly as it was.
 */
export function reconcileEntity(entity: RemoteEntity, options: ReconcileOptions = {}): SyncOutcome {
  const now = (options.now ?? new Date()).toISOString();
  const base = { resourceType: entity.resourceType, entityKey: entity.key, cursor: null };

  const apply = getDatabase().transaction((): SyncOutcome => {
    const parentType = parentTypeOf(entity.resourceType);
    if (parentType && (!entity.parentKey || !recordExists(parentType, entity.parentKey))) {
      throw new OrphanedParentError(entity.key, entity.parentKey ?? "(none)");
    }

    const existing = findRecord(entity.resourceType, entity.key);
    if (!existing) {
      insertRecord(entity, now);
      return { ...base, action: "created", errorKind: null, detail: null };
    }
    if (existing.revision === entity.revision && !options.forceRefresh) {
      return { ...base, action: "unchanged", errorKind: null, detail: null };
    }
    log.debug("Updating record", { key: entity.key, previous: existing.revision, next: entity.revision });
    updateRecord(entity, now);
    return {
      ...base,
      action: "updated",
      errorKind: null,
      detail: existing.revision === entity.revision ? "forced refresh" : null,
    };
  });

  try {
    return apply();
  } catch (error) {
    if (error instanceof SyncError) {
      return { ...base, action: "error", errorKind: error.kind, detail: error.message };
    }
    if (isForeignKeyViolation(error)) {
      // The parent row vanished between the check and the write
      return { ...base, action: "error", errorKind: "orphaned_parent", detail: "orphaned parent" };
    }
    log.error("Unexpected ledger failure", { key: entity.key, error: describeError(error) });
    return { ...base, action: "error", errorKind: "internal", detail: describeError(error) };
  }
}

/**
 * Reconcile and append the outcome to the run's log, as one transaction:
 * when the run has already finished the append is refused and the record
 * write is rolled back with it.
 */
export function reconcile(runId: string, entity: RemoteEntity, options: ReconcileOptions = {}): SyncLogEntry {
  return getDatabase().transaction(() => {
    const outcome = reconcileEntity(entity, options);
    if (outcome.action === "error") {
      log.warn("Entity not reconciled", { runId, key: entity.key, kind: outcome.errorKind, detail: outcome.detail });
    }
    return appendLogEntry(runId, outcome, options.now);
  })();
}

function isForeignKeyViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "SQLITE_CONSTRAINT_FOREIGNKEY"
  );
}
