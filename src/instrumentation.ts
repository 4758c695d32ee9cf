/**
 * Next.js startup hook. Runs once per server process, before any request is
 * handled, so every open run in the ledger belongs to a process that is gone.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;
  const { closeInterruptedRuns } = await import("@/sync/engine");
  closeInterruptedRuns();
}
