/**
 * Tests for engine wiring and startup recovery.
 *
 * Source: src/sync/engine.ts, src/instrumentation.ts
 */
import { register } from "@/instrumentation";
import { closeInterruptedRuns, getSyncEngine } from "@/sync/engine";
import { closeDatabase } from "@/sync/ledger/db";
import { createRun, getRun, startRun } from "@/sync/ledger/runs";

const originalRuntime = process.env.NEXT_RUNTIME;

afterEach(() => {
  globalThis.__syncEngine = undefined;
  if (originalRuntime === undefined) {
    delete process.env.NEXT_RUNTIME;
  } else {
    process.env.NEXT_RUNTIME = originalRuntime;
  }
  closeDatabase();
});

describe("getSyncEngine", () => {
  it("returns the same engine on every call", () => {
    expect(getSyncEngine()).toBe(getSyncEngine());
  });

  it("leaves runs that are still in flight open", () => {
    createRun("live", { kind: "full" }, false);
    startRun("live");

    getSyncEngine();
    globalThis.__syncEngine = undefined;
    getSyncEngine();

    expect(getRun("live")?.status).toBe("running");
  });
});

describe("closeInterruptedRuns", () => {
  it("closes pending and running runs as failed", () => {
    createRun("queued", { kind: "full" }, false);
    createRun("walking", { kind: "full" }, false);
    startRun("walking");

    expect(closeInterruptedRuns()).toBe(2);
    expect(getRun("queued")).toMatchObject({ status: "failed", message: "Interrupted by a restart" });
    expect(getRun("walking")).toMatchObject({ status: "failed", message: "Interrupted by a restart" });
  });
});

describe("register", () => {
  it("closes interrupted runs when the Node.js server starts", async () => {
    process.env.NEXT_RUNTIME = "nodejs";
    createRun("walking", { kind: "full" }, false);
    startRun("walking");

    await register();

    expect(getRun("walking")).toMatchObject({ status: "failed", message: "Interrupted by a restart" });
  });

  it("does nothing in the edge runtime", async () => {
    process.env.NEXT_RUNTIME = "edge";
    createRun("walking", { kind: "full" }, false);
    startRun("walking");

    await register();

    expect(getRun("walking")?.status).toBe("running");
  });
});
