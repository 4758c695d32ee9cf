import { getCredential, getEnv } from "@/sync/config/env";
import { RequestGovernor, type GovernorOptions } from "@/sync/http/governor";
import { abandonOpenRuns } from "@/sync/ledger/runs";
import { createChildLogger } from "@/sync/logger";
import { OnshapeClient, type OnshapeClientOptions } from "@/sync/onshape/client";
import { HierarchyWalker } from "@/sync/onshape/walker";
import { SyncDispatcher } from "./dispatcher";
import { SyncOrchestrator } from "./index";

const log = createChildLogger("engine");

export interface SyncEngine {
  client: OnshapeClient;
  governor: RequestGovernor;
  walker: HierarchyWalker;
  orchestrator: SyncOrchestrator;
  dispatcher: SyncDispatcher;
}

export interface SyncEngineOverrides extends OnshapeClientOptions {
  sleep?: GovernorOptions["sleep"];
  random?: GovernorOptions["random"];
}

/** Wire the engine from the environment. Overrides are for tests. */
export function createSyncEngine(overrides: SyncEngineOverrides = {}): SyncEngine {
  const env = getEnv();
  const client = new OnshapeClient(getCredential(), {
    transport: overrides.transport,
    clock: overrides.clock,
    nonce: overrides.nonce,
  });
  const governor = new RequestGovernor({
    maxConcurrency: env.SYNC_MAX_CONCURRENCY,
    maxAttempts: env.SYNC_MAX_ATTEMPTS,
    baseDelayMs: env.SYNC_BACKOFF_BASE_MS,
    maxDelayMs: env.SYNC_BACKOFF_MAX_MS,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    ...(overrides.random ? { random: overrides.random } : {}),
  });
  const walker = new HierarchyWalker(client, governor, env.SYNC_PAGE_SIZE);
  const orchestrator = new SyncOrchestrator(walker);
  const dispatcher = new SyncDispatcher(orchestrator, env.SYNC_WORKERS);
  return { client, governor, walker, orchestrator, dispatcher };
}

declare global {
  // Survives module reloads in development, so live runs keep their dispatcher
  var __syncEngine: SyncEngine | undefined;
}

/** Process-wide engine used by the route handlers. */
export function getSyncEngine(): SyncEngine {
  globalThis.__syncEngine ??= createSyncEngine();
  return globalThis.__syncEngine;
}

/**
 * Close runs a previous process left pending or running. Call once at
 * process start, before any run is dispatched: afterwards an open run may
 * belong to a live worker.
 */
export function closeInterruptedRuns(): number {
  const abandoned = abandonOpenRuns("Interrupted by a restart");
  if (abandoned > 0) {
    log.warn("Closed runs left open by a previous process", { abandoned });
  }
  return abandoned;
}
