import * as p from "@clack/prompts";
import type { ResourceType, SyncCounts, SyncScope } from "@/sync/types";
import { createSyncEngine, type SyncEngine } from "@/sync/engine";
import { closeDatabase } from "@/sync/ledger/db";
import { listLogEntries, listPageFailures } from "@/sync/ledger/runs";
import type { CliOptions } from "./args";

type ScopeChoice = "full" | ResourceType;

const SCOPE_OPTIONS: Array<{ value: ScopeChoice; label: string; hint?: string }> = [
  { value: "full", label: "Everything", hint: "documents down to parts and features" },
  { value: "document", label: "Documents" },
  { value: "workspace", label: "Workspaces", hint: "of mirrored documents" },
  { value: "element", label: "Elements", hint: "of mirrored workspaces" },
  { value: "part", label: "Parts", hint: "of mirrored part studios" },
  { value: "feature", label: "Features", hint: "of mirrored part studios" },
];

function toScope(choice: ScopeChoice): SyncScope {
  return choice === "full" ? { kind: "full" } : { kind: "single", resourceType: choice };
}

function formatCounts(counts: SyncCounts): string {
  const parts: string[] = [];
  if (counts.created > 0) parts.push(`${counts.created} created`);
  if (counts.updated > 0) parts.push(`${counts.updated} updated`);
  if (counts.unchanged > 0) parts.push(`${counts.unchanged} unchanged`);
  if (counts.failed > 0) parts.push(`${counts.failed} failed`);
  return parts.length > 0 ? parts.join(", ") : "nothing to mirror";
}

export async function runInteractiveSync(options: CliOptions): Promise<void> {
  p.intro("CAD Mirror");

  let engine: SyncEngine;
  try {
    engine = createSyncEngine();
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    p.outro("Set up your .env.local file and try again.");
    return;
  }

  const connectSpinner = p.spinner();
  connectSpinner.start("Checking Onshape credentials...");
  const connection = await engine.client.testConnection();
  if (!connection.connected) {
    connectSpinner.stop("Could not reach Onshape.");
    p.log.error(connection.error);
    p.outro("Sync could not start. Check your API keys and try again.");
    closeDatabase();
    return;
  }
  connectSpinner.stop(`Connected as ${connection.user.name ?? connection.user.id}.`);

  let scope = options.scope;
  let forceRefresh = options.forceRefresh;
  if (!options.scopeGiven) {
    const choice = await p.select<ScopeChoice>({
      message: "What would you like to sync?",
      options: SCOPE_OPTIONS,
      initialValue: "full",
    });
    if (p.isCancel(choice)) {
      p.outro("Sync cancelled.");
      closeDatabase();
      return;
    }
    scope = toScope(choice);

    const force = await p.confirm({
      message: "Rewrite rows even when the revision has not changed?",
      initialValue: forceRefresh,
    });
    if (p.isCancel(force)) {
      p.outro("Sync cancelled.");
      closeDatabase();
      return;
    }
    forceRefresh = force;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");
  const run = await engine.orchestrator.runSync(scope, { forceRefresh, signal: controller.signal });
  process.removeListener("SIGINT", onInterrupt);
  syncSpinner.stop(`Sync ${run.status}.`);

  if (run.status === "succeeded") {
    p.log.success(formatCounts(run.counts));
  } else {
    p.log.warn(`${formatCounts(run.counts)}${run.message ? ` (${run.message})` : ""}`);
    const errors = listLogEntries({ runId: run.runId, action: "error", offset: 0, limit: 10 });
    for (const entry of errors.items) {
      p.log.message(`  ${entry.resourceType} ${entry.entityKey}: ${entry.detail ?? entry.errorKind ?? "error"}`);
    }
    if (errors.total > errors.items.length) {
      p.log.message(`  ...and ${errors.total - errors.items.length} more. See /api/sync/logs?runId=${run.runId}`);
    }
    if (listPageFailures(run.runId).length > 0) {
      p.log.info(`Retry the failed pages later with: npm run sync -- --resume=${run.runId}`);
    }
  }

  closeDatabase();
  p.outro("Done!");
}
