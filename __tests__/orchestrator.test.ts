/**
 * End-to-end sync scenarios against an in-process Onshape fake and an
 * in-memory ledger.
 *
 * Source: src/sync/index.ts
 */
import type { SyncOrchestrator } from "@/sync";
import { closeDatabase, getDatabase } from "@/sync/ledger/db";
import { countRecords } from "@/sync/ledger/repository";
import { abandonOpenRuns, completeRun, createRun, getRun, listLogEntries } from "@/sync/ledger/runs";
import {
  FakeOnshape,
  createTestOrchestrator,
  serveAccount,
  twoDocumentAccount,
  type DocumentFixture,
} from "./helpers/fake-onshape";

const RUN_ID = "0b7d8c52-93f4-4f0e-8d7a-6c5b4a392817";

const partStudioAccount: DocumentFixture[] = [
  {
    id: "d1",
    workspaces: [
      {
        id: "w1",
        elements: [
          {
            id: "ps",
            elementType: "PARTSTUDIO",
            parts: [
              { partId: "JHD", name: "Bracket" },
              { partId: "JHH", name: "Pin" },
            ],
            features: [{ featureId: "F1", name: "Sketch 1" }],
          },
          { id: "asm", elementType: "ASSEMBLY" },
        ],
      },
    ],
  },
];

const threeDocumentAccount: DocumentFixture[] = [
  ...twoDocumentAccount(),
  { id: "d3", workspaces: [{ id: "w-d3", elements: [{ id: "d3-asm", elementType: "ASSEMBLY" }] }] },
];

/** Documents two per page; while `outage.active`, every page past the first answers 503. */
function documentPages(fake: FakeOnshape, outage: { active: boolean }): FakeOnshape {
  const all = threeDocumentAccount.map((d) => ({ id: d.id, name: `Document ${d.id}`, modifiedAt: "2026-10-01T00:00:00Z" }));
  return fake.route("documents", (url) => {
    const offset = Number(url.searchParams.get("offset"));
    if (outage.active && offset >= 2) return { status: 503 };
    return { body: { items: all.slice(offset, offset + 2), totalCount: all.length } };
  });
}

/** Mirror rows without their timestamps. */
function mirrorSnapshot() {
  const db = getDatabase();
  return ["documents", "workspaces", "elements", "parts", "features"].map((table) =>
    db.prepare(`SELECT key, parent_key, name, revision, attributes_json FROM ${table} ORDER BY key`).all(),
  );
}

function errorsOf(runId: string) {
  return listLogEntries({ runId, action: "error", offset: 0, limit: 100 }).items;
}

afterEach(() => {
  closeDatabase();
});

describe("full cascade", () => {
  it("mirrors every level and succeeds", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" });

    expect(run.status).toBe("succeeded");
    expect(run.message).toBeNull();
    expect(run.counts).toEqual({ created: 10, updated: 0, unchanged: 0, failed: 0 });
    expect(countRecords()).toEqual({ document: 2, workspace: 2, element: 6, part: 0, feature: 0 });
    expect(fake.requests).toHaveLength(5);
  });

  it("reports everything unchanged on a second run", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    const second = await orchestrator.runSync({ kind: "full" });

    expect(second.status).toBe("succeeded");
    expect(second.counts).toEqual({ created: 0, updated: 0, unchanged: 10, failed: 0 });
    expect(countRecords().element).toBe(6);
  });

  it("updates only what moved", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    // documents and workspaces take their revision from modifiedAt; elements keep theirs
    serveAccount(fake, twoDocumentAccount(), "2026-10-02T00:00:00Z");
    const second = await orchestrator.runSync({ kind: "full" });

    expect(second.counts).toEqual({ created: 0, updated: 4, unchanged: 6, failed: 0 });
  });

  it("rewrites everything under forceRefresh", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    const forced = await orchestrator.runSync({ kind: "full" }, { forceRefresh: true });

    expect(forced.forceRefresh).toBe(true);
    expect(forced.counts).toEqual({ created: 0, updated: 10, unchanged: 0, failed: 0 });
  });

  it("walks parts and features of part studios only", async () => {
    const fake = serveAccount(new FakeOnshape(), partStudioAccount);

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" });

    expect(run.counts.created).toBe(7);
    expect(countRecords()).toEqual({ document: 1, workspace: 1, element: 2, part: 2, feature: 1 });
    expect(fake.requestsTo("parts/d/d1/w/w1/e/ps")).toHaveLength(1);
    expect(fake.requestsTo("partstudios/d/d1/w/w1/e/ps/features")).toHaveLength(1);
    expect(fake.requestsTo("parts/d/d1/w/w1/e/asm")).toHaveLength(0);
  });

  it("restricts the cascade to the requested documents", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "full", documentIds: ["d2"] });

    expect(run.status).toBe("succeeded");
    expect(run.counts.created).toBe(5);
    expect(countRecords().document).toBe(1);
    expect(fake.requestsTo("documents/d/d1/workspaces")).toHaveLength(0);
  });
});

describe("partial failure", () => {
  it("keeps going when one document's workspaces cannot be fetched", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.sequence("documents/d/d2/workspaces", { status: 500, body: { message: "boom" } });

    const run = await createTestOrchestrator(fake, { maxAttempts: 3 }).runSync({ kind: "full" });

    expect(run.status).toBe("partiallyFailed");
    expect(run.counts).toEqual({ created: 6, updated: 0, unchanged: 0, failed: 1 });
    expect(errorsOf(run.runId)).toEqual([
      expect.objectContaining({
        resourceType: "workspace",
        entityKey: "d/d2",
        errorKind: "exhausted",
        cursor: { kind: "start" },
      }),
    ]);
    expect(fake.requestsTo("documents/d/d2/workspaces")).toHaveLength(3);
    expect(countRecords()).toEqual({ document: 2, workspace: 1, element: 3, part: 0, feature: 0 });
  });

  it("records the resume cursor of a failed page", async () => {
    const account: DocumentFixture[] = [...twoDocumentAccount(), { id: "d3", workspaces: [] }];
    const fake = serveAccount(new FakeOnshape(), account);
    fake.route("documents", (url) => {
      const offset = Number(url.searchParams.get("offset"));
      if (offset >= 2) return { status: 503 };
      return {
        body: {
          items: ["d1", "d2"].map((id) => ({ id, name: id, modifiedAt: "2026-10-01T00:00:00Z" })),
          totalCount: 3,
        },
      };
    });

    const run = await createTestOrchestrator(fake, { pageSize: 2 }).runSync({ kind: "full" });

    expect(run.status).toBe("partiallyFailed");
    expect(run.counts.created).toBe(10);
    expect(errorsOf(run.runId)).toEqual([
      expect.objectContaining({ resourceType: "document", entityKey: "root", cursor: { kind: "offset", offset: 2 } }),
    ]);
  });

  it("logs undecodable items and mirrors the rest", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.serve("documents", { items: [{ id: "d1", name: "Good" }, { name: "Broken" }], totalCount: 2 });

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" });

    expect(run.status).toBe("partiallyFailed");
    expect(run.counts).toEqual({ created: 5, updated: 0, unchanged: 0, failed: 1 });
    expect(errorsOf(run.runId)).toEqual([
      expect.objectContaining({ entityKey: "root#document[1]", errorKind: "malformed_response" }),
    ]);
  });

  it("fails when nothing could be reconciled", async () => {
    const fake = new FakeOnshape().sequence("documents", { status: 500 });

    const run = await createTestOrchestrator(fake, { maxAttempts: 2 }).runSync({ kind: "full" });

    expect(run.status).toBe("failed");
    expect(run.message).toBe("1 error(s), nothing reconciled");
    expect(run.counts.failed).toBe(1);
  });
});

describe("resuming failed pages", () => {
  it("reaches the same mirror as an uninterrupted run", async () => {
    const outage = { active: true };
    const fake = documentPages(serveAccount(new FakeOnshape(), threeDocumentAccount), outage);
    const orchestrator = createTestOrchestrator(fake, { pageSize: 2 });

    const interrupted = await orchestrator.runSync({ kind: "full" });
    expect(interrupted.status).toBe("partiallyFailed");
    expect(countRecords().document).toBe(2);

    outage.active = false;
    const resumed = await orchestrator.runSync({ kind: "resume", runId: interrupted.runId });

    expect(resumed.status).toBe("succeeded");
    expect(resumed.counts).toEqual({ created: 3, updated: 0, unchanged: 0, failed: 0 });
    const afterResume = mirrorSnapshot();

    closeDatabase();
    const uninterrupted = documentPages(serveAccount(new FakeOnshape(), threeDocumentAccount), { active: false });
    await createTestOrchestrator(uninterrupted, { pageSize: 2 }).runSync({ kind: "full" });

    expect(mirrorSnapshot()).toEqual(afterResume);
  });

  it("starts from the logged cursor instead of the first page", async () => {
    const outage = { active: true };
    const fake = documentPages(serveAccount(new FakeOnshape(), threeDocumentAccount), outage);
    const orchestrator = createTestOrchestrator(fake, { pageSize: 2 });
    const interrupted = await orchestrator.runSync({ kind: "full" });
    const sentBefore = fake.requestsTo("documents").length;

    outage.active = false;
    await orchestrator.runSync({ kind: "resume", runId: interrupted.runId });

    const resumedPages = fake.requestsTo("documents").slice(sentBefore);
    expect(resumedPages.map((r) => new URL(r.url).searchParams.get("offset"))).toEqual(["2"]);
  });

  it("cascades below a resumed parent-level page", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.sequence("documents/d/d2/workspaces", { status: 500 });
    const orchestrator = createTestOrchestrator(fake);
    const interrupted = await orchestrator.runSync({ kind: "full" });

    serveAccount(fake, twoDocumentAccount());
    const resumed = await orchestrator.runSync({ kind: "resume", runId: interrupted.runId });

    expect(resumed.status).toBe("succeeded");
    expect(resumed.counts).toEqual({ created: 4, updated: 0, unchanged: 0, failed: 0 });
    expect(countRecords()).toEqual({ document: 2, workspace: 2, element: 6, part: 0, feature: 0 });
  });

  it("fails for a run that does not exist", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "resume", runId: "missing-run" });

    expect(run.status).toBe("failed");
    expect(run.message).toBe("Sync run missing-run does not exist");
    expect(fake.requests).toHaveLength(0);
  });

  it("fails for a run that is still open", async () => {
    createRun("open-run", { kind: "full" }, false);
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "resume", runId: "open-run" });

    expect(run.message).toBe("Sync run open-run has not finished");
    expect(fake.requests).toHaveLength(0);
  });
});

describe("runs closed elsewhere", () => {
  it("stop writing once the run is no longer open", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.route("documents/d/d1/workspaces", () => {
      abandonOpenRuns("Interrupted by a restart");
      return { body: [{ id: "w-d1", name: "Main", modifiedAt: "2026-10-01T00:00:00Z" }] };
    });

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" }, { runId: RUN_ID });

    expect(run).toMatchObject({ status: "failed", message: "Interrupted by a restart" });
    expect(run.counts).toEqual({ created: 2, updated: 0, unchanged: 0, failed: 0 });
    expect(countRecords()).toEqual({ document: 2, workspace: 0, element: 0, part: 0, feature: 0 });
  });
});

describe("authentication", () => {
  it("aborts the run when the first call is rejected", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.sequence("documents", { status: 401 });

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" });

    expect(run.status).toBe("failed");
    expect(run.message).toBe("Authentication failed on the first request: Onshape rejected the request signature (401)");
    expect(run.counts.failed).toBe(1);
    // the original attempt and one re-signed retry
    expect(fake.requests).toHaveLength(2);
    expect(countRecords().document).toBe(0);
  });

  it("treats a later rejection as a page failure", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.sequence("documents/d/d1/workspaces", { status: 403 });

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" });

    expect(run.status).toBe("partiallyFailed");
    expect(run.counts).toEqual({ created: 6, updated: 0, unchanged: 0, failed: 1 });
    expect(errorsOf(run.runId)[0]).toMatchObject({ entityKey: "d/d1", errorKind: "auth" });
  });
});

describe("cancellation", () => {
  it("sends nothing when cancelled before the first page", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    const controller = new AbortController();
    controller.abort();

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" }, { signal: controller.signal });

    expect(run.status).toBe("partiallyFailed");
    expect(run.message).toBe("Cancelled");
    expect(fake.requests).toHaveLength(0);
  });

  it("stops scheduling sub-walks once cancelled", async () => {
    let orchestrator: SyncOrchestrator | undefined;
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());
    fake.route("documents/d/d1/workspaces", () => {
      orchestrator?.cancelRun(RUN_ID);
      return { body: [{ id: "w-d1", name: "Main", modifiedAt: "2026-10-01T00:00:00Z" }] };
    });
    orchestrator = createTestOrchestrator(fake);

    const run = await orchestrator.runSync({ kind: "full" }, { runId: RUN_ID });

    expect(run.status).toBe("partiallyFailed");
    expect(run.message).toBe("Cancelled");
    expect(run.cancelRequested).toBe(true);
    // both workspace pages were already in flight; no element walk started
    expect(run.counts.created).toBe(4);
    expect(countRecords().element).toBe(0);
    expect(orchestrator.isRunning(RUN_ID)).toBe(false);
  });

  it("does not cancel an unknown run", () => {
    const orchestrator = createTestOrchestrator(new FakeOnshape());

    expect(orchestrator.cancelRun(RUN_ID)).toBe(false);
  });
});

describe("single-level scope", () => {
  it("walks from stored parents", async () => {
    const fake = serveAccount(new FakeOnshape(), partStudioAccount);
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    const run = await orchestrator.runSync({ kind: "single", resourceType: "part" });

    expect(run.status).toBe("succeeded");
    expect(run.scope).toEqual({ kind: "single", resourceType: "part" });
    expect(run.counts).toEqual({ created: 0, updated: 0, unchanged: 2, failed: 0 });
    expect(fake.requestsTo("parts/d/d1/w/w1/e/ps")).toHaveLength(2);
  });

  it("does not descend below the requested level", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "single", resourceType: "document" });

    expect(run.counts.created).toBe(2);
    expect(countRecords()).toEqual({ document: 2, workspace: 0, element: 0, part: 0, feature: 0 });
  });

  it("re-syncs the subtree under one stored parent", async () => {
    const account: DocumentFixture[] = [
      ...partStudioAccount,
      { id: "d2", workspaces: [{ id: "w2", elements: [{ id: "ps2", elementType: "PARTSTUDIO", parts: [{ partId: "K1", name: "Plate" }] }] }] },
    ];
    const fake = serveAccount(new FakeOnshape(), account);
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    const run = await orchestrator.runSync({ kind: "single", resourceType: "part", parentKey: "d/d1/w/w1/e/ps" });

    expect(run.status).toBe("succeeded");
    expect(run.counts).toEqual({ created: 0, updated: 0, unchanged: 2, failed: 0 });
    expect(fake.requestsTo("parts/d/d1/w/w1/e/ps")).toHaveLength(2);
    expect(fake.requestsTo("parts/d/d2/w/w2/e/ps2")).toHaveLength(1);
  });

  it("fails for a parent that is not mirrored", async () => {
    const fake = serveAccount(new FakeOnshape(), partStudioAccount);

    const run = await createTestOrchestrator(fake).runSync({ kind: "single", resourceType: "part", parentKey: "d/d9/w/w9/e/e9" });

    expect(run.status).toBe("failed");
    expect(run.message).toBe("No mirrored element d/d9/w/w9/e/e9");
    expect(fake.requests).toHaveLength(0);
  });

  it("only walks parts under a part studio", async () => {
    const fake = serveAccount(new FakeOnshape(), partStudioAccount);
    const orchestrator = createTestOrchestrator(fake);
    await orchestrator.runSync({ kind: "full" });

    const run = await orchestrator.runSync({ kind: "single", resourceType: "part", parentKey: "d/d1/w/w1/e/asm" });

    expect(run.message).toBe("Element d/d1/w/w1/e/asm is not a part studio");
    expect(fake.requestsTo("parts/d/d1/w/w1/e/asm")).toHaveLength(0);
  });

  it("has nothing to do without stored parents", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "single", resourceType: "workspace" });

    expect(run.status).toBe("succeeded");
    expect(run.counts).toEqual({ created: 0, updated: 0, unchanged: 0, failed: 0 });
    expect(fake.requests).toHaveLength(0);
  });
});

describe("run records", () => {
  it("persists the finished run", async () => {
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" }, { runId: RUN_ID });

    expect(getRun(RUN_ID)).toEqual(run);
    expect(run.completedAt).not.toBeNull();
  });

  it("leaves a finished run untouched", async () => {
    createRun(RUN_ID, { kind: "full" }, false);
    completeRun(RUN_ID, "failed", "earlier failure");
    const fake = serveAccount(new FakeOnshape(), twoDocumentAccount());

    const run = await createTestOrchestrator(fake).runSync({ kind: "full" }, { runId: RUN_ID });

    expect(run).toMatchObject({ status: "failed", message: "earlier failure" });
    expect(fake.requests).toHaveLength(0);
  });
});
