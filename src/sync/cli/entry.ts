import { config } from "dotenv";
config({ path: ".env.local" });

import { runInteractiveSync } from "./interactive";
import { parseCliArgs } from "./args";
import { createSyncEngine } from "@/sync/engine";
import { closeDatabase } from "@/sync/ledger/db";

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.auto) {
    // Headless mode: one run, JSON summary on stdout
    const { orchestrator } = createSyncEngine();
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());

    const run = await orchestrator.runSync(options.scope, {
      forceRefresh: options.forceRefresh,
      signal: controller.signal,
    });
    console.log(JSON.stringify(run, null, 2));
    closeDatabase();
    if (run.status === "failed") process.exitCode = 1;
  } else {
    // Interactive mode - friendly prompts
    await runInteractiveSync(options);
  }
}

main().catch((err: unknown) => {
  console.error("Sync failed:", err instanceof Error ? err.message : err);
  closeDatabase();
  process.exit(1);
});
