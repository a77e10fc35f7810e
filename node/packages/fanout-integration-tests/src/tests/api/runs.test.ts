/**
 * Integration tests for the run API
 */

import { describe, it, before, after, afterEach } from "mocha";
import { expect } from "chai";
import { waitForAllRuns, type PaginatedResult, type Run, type RunWithJobs } from "fanout";
import {
  TestDatabase,
  TestServer,
  createScriptedStepRunner,
  createTempDir,
  createTestHttpClient,
  httpGet,
  httpPost,
  removeTempDir,
  testLogger,
  waitFor,
  writeWorkflowFile,
  type TestHttpClient,
} from "fanout-test-utils";

const CI_WORKFLOW = `
name: ci
on: push
strategy:
  matrix:
    rust: [stable]
    include:
      - rust: nightly
        tolerant: true
steps:
  - name: build
    command: cargo
    args: ["+\${{ matrix.rust }}", build, --all]
`;

const BAD_AXIS_WORKFLOW = `
steps:
  - name: build
    command: make
    args: ["\${{ matrix.os }}"]
`;

type ErrorBody = { error: string };

describe("Runs API", () => {
  const testDb = new TestDatabase({ logger: testLogger });
  let workflowsRoot: string;
  let workspace: string;
  let server: TestServer;
  let client: TestHttpClient;
  let failStable = false;

  before(async function () {
    this.timeout(20000);

    await testDb.setup();
    workflowsRoot = await createTempDir("fanout-api-workflows-");
    workspace = await createTempDir("fanout-api-workspace-");
    await writeWorkflowFile(workflowsRoot, "ci", CI_WORKFLOW);
    await writeWorkflowFile(workflowsRoot, "bad-axis", BAD_AXIS_WORKFLOW);

    const runner = createScriptedStepRunner((_step, job) => {
      if (job.axes.rust === "nightly") {
        return { exitCode: 101, stderr: "error: internal compiler error" };
      }
      return failStable && job.axes.rust === "stable" ? { exitCode: 1 } : {};
    });

    server = new TestServer({
      database: testDb,
      workflowsRoot,
      workspace,
      runStep: runner.runStep,
      logger: testLogger,
    });
    await server.start();
    client = createTestHttpClient(server.getBaseUrl());
  });

  afterEach(async () => {
    failStable = false;
    await waitForAllRuns();
    testDb.truncateAllTables();
  });

  after(async function () {
    this.timeout(20000);
    await server.stop();
    await testDb.cleanup();
    await removeTempDir(workflowsRoot);
    await removeTempDir(workspace);
  });

  async function waitForRun(id: string): Promise<RunWithJobs> {
    const response = await waitFor(
      () => httpGet<RunWithJobs>(client, `/api/v1/runs/${id}`),
      (res) => res.data.status === "succeeded" || res.data.status === "failed",
    );
    return response.data;
  }

  describe("GET /health", () => {
    it("should report a healthy database", async () => {
      const response = await httpGet<{ status: string; services: Record<string, string> }>(
        client,
        "/health",
      );

      expect(response.status).to.equal(200);
      expect(response.data.status).to.equal("healthy");
      expect(response.data.services).to.deep.equal({ database: "connected" });
    });
  });

  describe("POST /api/v1/runs", () => {
    it("should create a pending run and execute it in the background", async () => {
      const response = await httpPost<Run>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "push", sha: "abc123" },
      });

      expect(response.status).to.equal(201);
      expect(response.data.workflowName).to.equal("ci");
      expect(response.data.status).to.equal("pending");
      expect(response.data.event).to.deep.equal({ kind: "push", sha: "abc123" });

      const run = await waitForRun(response.data.id);
      expect(run.status).to.equal("succeeded");
      expect(run.jobCount).to.equal(2);
      expect(run.failedCount).to.equal(1);
      expect(run.toleratedCount).to.equal(1);
      expect(run.durationMs).to.be.a("number");

      expect(run.jobs.map((job) => [job.name, job.tolerant, job.status])).to.deep.equal([
        ["ci (stable)", false, "succeeded"],
        ["ci (nightly)", true, "failed"],
      ]);
      const nightly = run.jobs[1];
      expect(nightly?.reason).to.equal("step-failure");
      expect(nightly?.failedStepName).to.equal("build");
      expect(nightly?.steps?.[0]?.stderr).to.equal("error: internal compiler error");
    });

    it("should fail the run when the required job fails", async () => {
      failStable = true;

      const response = await httpPost<Run>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "push" },
      });
      const run = await waitForRun(response.data.id);

      expect(run.status).to.equal("failed");
      expect(run.failedCount).to.equal(2);
      expect(run.toleratedCount).to.equal(1);
    });

    it("should answer 404 for an unknown workflow", async () => {
      const response = await httpPost<ErrorBody>(client, "/api/v1/runs", {
        workflowName: "deploy",
        event: { kind: "push" },
      });

      expect(response.status).to.equal(404);
      expect(response.data.error).to.equal("Workflow not found");
    });

    it("should answer 422 when the workflow is not triggered by the event", async () => {
      const response = await httpPost<ErrorBody>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "pull_request" },
      });

      expect(response.status).to.equal(422);
      expect(response.data.error).to.equal(
        'Workflow "ci" is not triggered by "pull_request"',
      );
    });

    it("should answer 400 for an invalid body", async () => {
      const response = await httpPost<ErrorBody>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "schedule" },
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid request");
    });

    it("should answer 400 for malformed JSON", async () => {
      const response = await httpPost<ErrorBody>(client, "/api/v1/runs", "{not json");

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid JSON in request body");
    });

    it("should answer 400 without storing a run for a configuration error", async () => {
      const response = await httpPost<ErrorBody>(client, "/api/v1/runs", {
        workflowName: "bad-axis",
        event: { kind: "push" },
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal(
        'Expression references undeclared matrix axis "os"',
      );

      const list = await httpGet<PaginatedResult<Run>>(client, "/api/v1/runs");
      expect(list.data.pagination.total).to.equal(0);
    });
  });

  describe("GET /api/v1/runs/:id", () => {
    it("should answer 404 for an unknown run", async () => {
      const response = await httpGet<ErrorBody>(client, "/api/v1/runs/missing");

      expect(response.status).to.equal(404);
      expect(response.data.error).to.equal("Run not found");
    });
  });

  describe("GET /api/v1/runs", () => {
    it("should list runs with filters", async () => {
      const first = await httpPost<Run>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "push" },
      });
      await waitForRun(first.data.id);
      failStable = true;
      const second = await httpPost<Run>(client, "/api/v1/runs", {
        workflowName: "ci",
        event: { kind: "push" },
      });
      await waitForRun(second.data.id);

      const all = await httpGet<PaginatedResult<Run>>(client, "/api/v1/runs?workflowName=ci");
      expect(all.status).to.equal(200);
      expect(all.data.data.map((run) => run.id)).to.deep.equal([
        second.data.id,
        first.data.id,
      ]);

      const failed = await httpGet<PaginatedResult<Run>>(client, "/api/v1/runs?status=failed");
      expect(failed.data.data.map((run) => run.id)).to.deep.equal([second.data.id]);

      const paged = await httpGet<PaginatedResult<Run>>(client, "/api/v1/runs?limit=1&offset=1");
      expect(paged.data.data.map((run) => run.id)).to.deep.equal([first.data.id]);
      expect(paged.data.pagination).to.deep.equal({ total: 2, limit: 1, offset: 1 });
    });

    it("should answer 400 for an invalid status filter", async () => {
      const response = await httpGet<ErrorBody>(client, "/api/v1/runs?status=done");
      expect(response.status).to.equal(400);
    });
  });

  describe("GET /api/v1/workflows", () => {
    it("should list the loadable workflows", async () => {
      const response = await httpGet<{ data: { name: string; on: string[] }[] }>(
        client,
        "/api/v1/workflows",
      );

      expect(response.status).to.equal(200);
      expect(
        [...response.data.data].sort((a, b) => a.name.localeCompare(b.name)),
      ).to.deep.equal([
        { name: "bad-axis", on: ["push", "pull_request"] },
        { name: "ci", on: ["push"] },
      ]);
    });
  });
});
