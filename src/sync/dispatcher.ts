import { randomUUID } from "crypto";
import type { SyncRun, SyncScope } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import { completeRun, createRun, getRun, requestCancel } from "@/sync/ledger/runs";
import type { SyncOrchestrator } from "./index";

const log = createChildLogger("dispatcher");

interface QueuedRun {
  runId: string;
  scope: SyncScope;
  forceRefresh: boolean;
}

/**
 * In-process worker pool for sync runs. `dispatch` records the run as
 * pending and returns at once; up to `workers` runs execute at a time, the
 * rest wait in arrival order.
 */
export class SyncDispatcher {
  private readonly queue: QueuedRun[] = [];
  private readonly running = new Set<Promise<void>>();

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    private readonly workers = 1,
  ) {
    if (!Number.isInteger(workers) || workers < 1) {
      throw new RangeError(`Dispatcher needs at least one worker, got ${workers}`);
    }
  }

  dispatch(scope: SyncScope, options: { forceRefresh?: boolean } = {}): SyncRun {
    const runId = randomUUID();
    const forceRefresh = options.forceRefresh ?? false;
    const run = createRun(runId, scope, forceRefresh);
    this.queue.push({ runId, scope, forceRefresh });
    log.info("Run queued", { runId, scope, forceRefresh, queued: this.queue.length });
    this.pump();
    return run;
  }

  /**
   * Cancel a queued or running run. A queued run never starts and is closed
   * straight away; a running one stops at its next page boundary.
   * Returns the run as it stands, or undefined for an unknown ID.
   */
  cancel(runId: string): SyncRun | undefined {
    if (!getRun(runId)) return undefined;

    const index = this.queue.findIndex((queued) => queued.runId === runId);
    if (index >= 0) {
      this.queue.splice(index, 1);
      requestCancel(runId);
      log.info("Queued run cancelled", { runId });
      return completeRun(runId, "partiallyFailed", "Cancelled before start");
    }

    this.orchestrator.cancelRun(runId);
    return getRun(runId);
  }

  get queued(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running.size;
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  private pump(): void {
    while (this.running.size < this.workers) {
      const next = this.queue.shift();
      if (!next) return;

      const task: Promise<void> = this.orchestrator
        .runSync(next.scope, { runId: next.runId, forceRefresh: next.forceRefresh })
        .then((run) => {
          log.info("Run finished", { runId: run.runId, status: run.status });
        })
        .finally(() => {
          this.running.delete(task);
          this.pump();
        });
      this.running.add(task);
    }
  }
}
