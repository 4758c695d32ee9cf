import { randomUUID } from "crypto";
import {
  START_CURSOR,
  isTerminal,
  type PageCursor,
  type ParentRef,
  type ResourceType,
  type SyncRun,
  type SyncRunStatus,
  type SyncScope,
} from "@/sync/types";
import { AuthError, describeError, errorKindOf } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { reconcile } from "@/sync/ledger/reconciler";
import { findParent, listParents } from "@/sync/ledger/repository";
import {
  appendLogEntry,
  completeRun,
  createRun,
  getRun,
  isRunOpen,
  listPageFailures,
  requestCancel,
  startRun,
} from "@/sync/ledger/runs";
import { toParentRef } from "@/sync/onshape/mappers";
import { childTypesOf, parentTypeOf } from "@/sync/onshape/resources";
import { PART_STUDIO } from "@/sync/onshape/types";
import type { HierarchyWalker, WalkItem, WalkOutcome } from "@/sync/onshape/walker";

const log = createChildLogger("sync-engine");

export interface OrchestratorOptions {
  /** Sub-walks in flight at once. Defaults to the governor's request cap. */
  maxParallelWalks?: number;
}

export interface RunOptions {
  forceRefresh?: boolean;
  /** Reuse a run the dispatcher already created as `pending`. */
  runId?: string;
  signal?: AbortSignal;
}

/** One level to enumerate under one parent. */
export interface WalkTask {
  resourceType: ResourceType;
  parent: ParentRef | null;
  cursor?: PageCursor | null;
}

/** What a scope turns into once the ledger has been read. */
interface RunPlan {
  tasks: WalkTask[];
  /** Walk the levels below every committed entity. */
  cascade: boolean;
  documentIds?: string[];
  /** Set when the scope cannot be walked at all; the run fails with it. */
  problem?: string;
}

interface RunState {
  runId: string;
  forceRefresh: boolean;
  cascade: boolean;
  documentIds?: string[];
  controller: AbortController;
  succeeded: number;
  failed: number;
  pagesFetched: number;
  /** Set when the run's first remote call was rejected; nothing else gets scheduled. */
  abortReason: string | null;
  /** The run was closed from outside while walks were in flight; nothing more is written. */
  closed: boolean;
}

const ROOT_KEY = "root";

type FinalStatus = Exclude<SyncRunStatus, "pending" | "running">;

export class SyncOrchestrator {
  private readonly controllers = new Map<string, AbortController>();
  private readonly maxParallelWalks: number;

  constructor(
    private readonly walker: HierarchyWalker,
    options: OrchestratorOptions = {},
  ) {
    this.maxParallelWalks = Math.max(1, options.maxParallelWalks ?? walker.concurrency);
  }

  /**
   * Run one sync to a terminal state. Never throws: whatever goes wrong ends
   * up in the run's status, message and log entries.
   */
  async runSync(scope: SyncScope, options: RunOptions = {}): Promise<SyncRun> {
    const runId = options.runId ?? randomUUID();
    const forceRefresh = options.forceRefresh ?? false;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();
    this.controllers.set(runId, controller);

    try {
      const existing = getRun(runId) ?? createRun(runId, scope, forceRefresh);
      if (!startRun(runId)) {
        log.warn("Run is not pending, leaving it as it is", { runId, status: existing.status });
        return existing;
      }
      if (existing.cancelRequested) controller.abort();

      log.info("Starting sync run", { runId, scope, forceRefresh });
      const plan = this.plan(scope);
      if (plan.problem) {
        log.warn("Nothing to walk for this scope", { runId, reason: plan.problem });
      }
      const state: RunState = {
        runId,
        forceRefresh,
        cascade: plan.cascade,
        documentIds: plan.documentIds,
        controller,
        succeeded: 0,
        failed: 0,
        pagesFetched: 0,
        abortReason: plan.problem ?? null,
        closed: false,
      };

      await this.drain(plan.tasks, state);

      const { status, message } = decideStatus(state);
      const run = completeRun(runId, status, message);
      log.info("Sync run complete", { runId, status: run.status, counts: run.counts });
      return run;
    } catch (error) {
      log.error("Sync run failed", { runId, error: describeError(error) });
      return failRun(runId, scope, forceRefresh, error);
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
      this.controllers.delete(runId);
    }
  }

  /**
   * Ask a run to stop. Pages already fetched are still reconciled; no
   * further page or sub-walk is scheduled. False when the run is unknown or
   * already finished.
   */
  cancelRun(runId: string): boolean {
    const accepted = requestCancel(runId);
    const controller = this.controllers.get(runId);
    if (controller) {
      controller.abort();
      log.info("Cancellation requested", { runId });
    }
    return accepted;
  }

  isRunning(runId: string): boolean {
    return this.controllers.has(runId);
  }

  private plan(scope: SyncScope): RunPlan {
    switch (scope.kind) {
      case "full":
        return { tasks: [{ resourceType: "document", parent: null }], cascade: true, documentIds: scope.documentIds };
      case "single":
        return this.planSingle(scope.resourceType, scope.parentKey);
      case "resume":
        return this.planResume(scope.runId);
    }
  }

  /** One level, under one stored parent or under every stored parent of the level above. */
  private planSingle(resourceType: ResourceType, parentKey: string | undefined): RunPlan {
    const parentType = parentTypeOf(resourceType);
    const elementType = parentType === "element" ? PART_STUDIO : undefined;

    if (parentKey !== undefined) {
      const parent = parentType ? findParent(parentType, parentKey) : undefined;
      if (!parent) {
        return { tasks: [], cascade: false, problem: `No mirrored ${parentType ?? "parent"} ${parentKey}` };
      }
      if (elementType && parent.elementType !== elementType) {
        return { tasks: [], cascade: false, problem: `Element ${parentKey} is not a part studio` };
      }
      return { tasks: [{ resourceType, parent }], cascade: false };
    }

    if (!parentType) {
      return { tasks: [{ resourceType, parent: null }], cascade: false };
    }
    const parents = listParents(parentType, elementType ? { elementType } : {});
    if (parents.length === 0) {
      log.warn("No stored parents to walk from; sync their level first", { resourceType, parentType });
    }
    return { tasks: parents.map((parent) => ({ resourceType, parent })), cascade: false };
  }

  /**
   * Retry the pages a finished run could not fetch, from the cursors it
   * logged. The resumed walks cascade and filter the way the original run did.
   */
  private planResume(sourceRunId: string): RunPlan {
    const source = getRun(sourceRunId);
    if (!source) {
      return { tasks: [], cascade: false, problem: `Sync run ${sourceRunId} does not exist` };
    }
    if (!isTerminal(source.status)) {
      return { tasks: [], cascade: false, problem: `Sync run ${sourceRunId} has not finished` };
    }

    const tasks: WalkTask[] = [];
    const seen = new Set<string>();
    for (const failure of listPageFailures(sourceRunId)) {
      const id = `${failure.resourceType} ${failure.entityKey}`;
      if (seen.has(id)) continue;
      seen.add(id);

      const parentType = parentTypeOf(failure.resourceType);
      let parent: ParentRef | null = null;
      if (parentType && failure.entityKey !== ROOT_KEY) {
        const stored = findParent(parentType, failure.entityKey);
        if (!stored) {
          log.warn("Parent of a failed page is gone, not resuming it", { sourceRunId, parentKey: failure.entityKey });
          continue;
        }
        parent = stored;
      }
      tasks.push({ resourceType: failure.resourceType, parent, cursor: failure.cursor });
    }

    log.info("Resuming failed pages", { sourceRunId, pages: tasks.length });
    return { tasks, ...inheritedShape(source.scope) };
  }

  /**
   * Work through the task list. The first task runs alone so an auth
   * rejection on the very first call stops the run before anything else
   * is sent; after that up to `maxParallelWalks` sub-walks run at once.
   */
  private async drain(tasks: WalkTask[], state: RunState): Promise<void> {
    const queue = [...tasks];
    const inFlight = new Set<Promise<void>>();

    const launch = (task: WalkTask): Promise<void> => {
      const running: Promise<void> = this.runTask(task, state)
        .then((children) => {
          queue.push(...children);
        })
        .finally(() => {
          inFlight.delete(running);
        });
      inFlight.add(running);
      return running;
    };

    try {
      const first = queue.shift();
      if (first && this.canSchedule(state)) await launch(first);

      for (;;) {
        while (queue.length > 0 && inFlight.size < this.maxParallelWalks && this.canSchedule(state)) {
          const task = queue.shift();
          if (task) void launch(task);
        }
        if (inFlight.size === 0) break;
        await Promise.race(inFlight);
      }
    } catch (error) {
      // Let the other walks wind down before the run is closed as failed
      state.controller.abort();
      await Promise.allSettled(inFlight);
      throw error;
    }

    if (queue.length > 0) {
      log.info("Unscheduled walks dropped", { runId: state.runId, remaining: queue.length });
    }
  }

  private canSchedule(state: RunState): boolean {
    return state.abortReason === null && !state.closed && !state.controller.signal.aborted;
  }

  /** Walk one level under one parent and return the sub-walks of what committed. */
  private async runTask(task: WalkTask, state: RunState): Promise<WalkTask[]> {
    const { resourceType, parent } = task;
    const committed: ParentRef[] = [];
    const firstCall = state.pagesFetched === 0 && state.succeeded === 0 && state.failed === 0;

    try {
      const walk = this.walker.walk(resourceType, parent, task.cursor ?? null, { signal: state.controller.signal });
      let step = await walk.next();
      while (!step.done) {
        if (!state.closed) {
          this.recordItem(step.value, resourceType, state, committed);
        }
        step = await walk.next();
      }
      if (!state.closed) {
        this.recordOutcome(task, step.value, state, firstCall);
      }
    } catch (error) {
      if (!isRunOpen(state.runId)) {
        this.markClosed(state);
        return [];
      }
      log.error("Walk crashed", { runId: state.runId, resourceType, parent: parent?.key, error: describeError(error) });
      appendLogEntry(state.runId, {
        resourceType,
        entityKey: parent?.key ?? ROOT_KEY,
        action: "error",
        errorKind: "internal",
        detail: describeError(error),
        cursor: task.cursor ?? START_CURSOR,
      });
      state.failed++;
    }

    if (!state.cascade || !this.canSchedule(state)) {
      return [];
    }
    return committed.flatMap((child) =>
      childTypesOf(child).map((childType) => ({ resourceType: childType, parent: child })),
    );
  }

  private recordItem(item: WalkItem, resourceType: ResourceType, state: RunState, committed: ParentRef[]): void {
    if (!item.ok) {
      appendLogEntry(state.runId, {
        resourceType,
        entityKey: item.key,
        action: "error",
        errorKind: item.error.kind,
        detail: item.error.message,
        cursor: null,
      });
      state.failed++;
      return;
    }
    if (isExcluded(state, item.entity.resourceType, item.entity.ids.documentId)) {
      log.debug("Document outside the requested set", { key: item.entity.key });
      return;
    }
    const entry = reconcile(state.runId, item.entity, { forceRefresh: state.forceRefresh });
    if (entry.action === "error") {
      state.failed++;
    } else {
      state.succeeded++;
      committed.push(toParentRef(item.entity));
    }
  }

  /** The run was finished by someone else; stop walking and writing. */
  private markClosed(state: RunState): void {
    if (state.closed) return;
    state.closed = true;
    state.controller.abort();
    log.warn("Run was closed while walks were in flight, discarding the rest", { runId: state.runId });
  }

  private recordOutcome(task: WalkTask, outcome: WalkOutcome, state: RunState, firstCall: boolean): void {
    state.pagesFetched += outcome.pagesFetched;
    if (outcome.status !== "interrupted") return;

    const error = outcome.error ?? new Error("walk interrupted");
    appendLogEntry(state.runId, {
      resourceType: task.resourceType,
      entityKey: task.parent?.key ?? ROOT_KEY,
      action: "error",
      errorKind: errorKindOf(error),
      detail: describeError(error),
      cursor: outcome.cursor,
    });
    state.failed++;

    if (firstCall && outcome.pagesFetched === 0 && error instanceof AuthError) {
      state.abortReason = `Authentication failed on the first request: ${error.message}`;
      log.error("Aborting run", { runId: state.runId, reason: state.abortReason });
    }
  }
}

function isExcluded(state: RunState, resourceType: ResourceType, documentId: string): boolean {
  return resourceType === "document" && state.documentIds !== undefined && !state.documentIds.includes(documentId);
}

/** Cascade and document filter of a scope, followed back through resumed runs. */
function inheritedShape(scope: SyncScope): Pick<RunPlan, "cascade" | "documentIds"> {
  switch (scope.kind) {
    case "full":
      return { cascade: true, documentIds: scope.documentIds };
    case "single":
      return { cascade: false };
    case "resume": {
      const source = getRun(scope.runId);
      return source ? inheritedShape(source.scope) : { cascade: false };
    }
  }
}

function decideStatus(state: RunState): { status: FinalStatus; message: string | null } {
  if (state.abortReason !== null) {
    return { status: "failed", message: state.abortReason };
  }
  if (state.controller.signal.aborted) {
    return { status: "partiallyFailed", message: "Cancelled" };
  }
  if (state.failed > 0 && state.succeeded === 0) {
    return { status: "failed", message: `${state.failed} error(s), nothing reconciled` };
  }
  if (state.failed > 0) {
    return { status: "partiallyFailed", message: `${state.failed} error(s)` };
  }
  return { status: "succeeded", message: null };
}

/** Last resort when the ledger itself failed mid-run. */
function failRun(runId: string, scope: SyncScope, forceRefresh: boolean, error: unknown): SyncRun {
  const message = describeError(error);
  try {
    return completeRun(runId, "failed", message);
  } catch (ledgerError) {
    log.error("Could not record the failed run", { runId, error: describeError(ledgerError) });
    const now = new Date().toISOString();
    return {
      runId,
      scope,
      forceRefresh,
      status: "failed",
      startedAt: now,
      completedAt: now,
      cancelRequested: false,
      message,
      counts: { created: 0, updated: 0, unchanged: 0, failed: 0 },
    };
  }
}
