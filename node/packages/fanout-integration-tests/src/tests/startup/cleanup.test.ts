/**
 * Tests for failing work left unfinished by a previous process
 */

import { describe, it, before, after, afterEach } from "mocha";
import { expect } from "chai";
import { failInterruptedWork, getRun, INTERRUPTED_ERROR } from "fanout";
import { TestDatabase, createTestContext, testLogger } from "fanout-test-utils";

describe("Startup Cleanup", () => {
  const testDb = new TestDatabase({ logger: testLogger });

  before(async () => {
    await testDb.setup();
  });

  afterEach(() => {
    testDb.truncateAllTables();
  });

  after(async () => {
    await testDb.cleanup();
  });

  it("should fail pending and running runs and their unfinished jobs", async () => {
    testDb.insertRun({ id: "run-running", workflowName: "ci", status: "running", startedAt: 1000 });
    testDb.insertRun({ id: "run-pending", workflowName: "ci", status: "pending" });
    testDb.insertRun({ id: "run-done", workflowName: "ci", status: "succeeded" });
    testDb.insertJob({ runId: "run-running", index: 0, status: "succeeded" });
    testDb.insertJob({ runId: "run-running", index: 1, status: "running" });
    testDb.insertJob({ runId: "run-running", index: 2, status: "pending" });

    const summary = failInterruptedWork(testDb.getDb());
    expect(summary).to.deep.equal({ runs: 2, jobs: 2 });

    const ctx = createTestContext(testDb.getDb());
    const running = await getRun(ctx, "run-running");
    if (!running.success || !running.data) throw new Error("Run not found");

    expect(running.data.status).to.equal("failed");
    expect(running.data.error).to.equal(INTERRUPTED_ERROR);
    expect(running.data.jobs.map((job) => [job.status, job.reason])).to.deep.equal([
      ["succeeded", undefined],
      ["failed", "cancelled"],
      ["failed", "cancelled"],
    ]);

    const done = await getRun(ctx, "run-done");
    expect(done.success && done.data?.status).to.equal("succeeded");
    expect(done.success && done.data?.error).to.equal(undefined);
  });

  it("should do nothing when no work is unfinished", () => {
    testDb.insertRun({ id: "run-done", workflowName: "ci", status: "failed" });

    expect(failInterruptedWork(testDb.getDb())).to.deep.equal({ runs: 0, jobs: 0 });
  });
});
