/**
 * Tests for run reports and plans
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  aggregateOutcomes,
  expandJobs,
  renderJsonReport,
  renderPlan,
  renderTextReport,
  type JobOutcome,
} from "fanout";

const stable: JobOutcome = {
  jobIndex: 0,
  jobKey: "rust=stable",
  jobName: "ci (stable)",
  axes: { rust: "stable" },
  tolerant: false,
  status: "succeeded",
  steps: [{ index: 0, name: "build", status: "succeeded", exitCode: 0, durationMs: 10 }],
  startedAt: 1000,
  completedAt: 1010,
  durationMs: 10,
};

const nightly: JobOutcome = {
  jobIndex: 1,
  jobKey: "rust=nightly",
  jobName: "ci (nightly)",
  axes: { rust: "nightly" },
  tolerant: true,
  status: "failed",
  reason: "step-failure",
  failedStepIndex: 0,
  failedStepName: "build",
  steps: [{ index: 0, name: "build", status: "failed", exitCode: 101, durationMs: 20 }],
  startedAt: 1000,
  completedAt: 1020,
  durationMs: 20,
};

describe("Run Reports", () => {
  describe("renderTextReport", () => {
    it("should list each job with its status and mark tolerated failures", () => {
      const report = renderTextReport("ci", aggregateOutcomes([stable, nightly]));

      expect(report.split("\n")).to.deep.equal([
        "Workflow ci: SUCCEEDED",
        "  + ci (stable)   ok",
        "  ~ ci (nightly)  FAILED (tolerated) [tolerant]",
        '      step 1 "build" step-failure, exit code 101',
        "2 job(s): 1 succeeded, 1 failed (1 tolerated)",
      ]);
    });

    it("should mark required failures and cancelled jobs", () => {
      const report = renderTextReport(
        "ci",
        aggregateOutcomes([
          { ...stable, status: "failed", reason: "cancelled", steps: [] },
        ]),
      );

      expect(report.split("\n")).to.deep.equal([
        "Workflow ci: FAILED",
        "  x ci (stable)  FAILED",
        "      cancelled before start",
        "1 job(s): 0 succeeded, 1 failed (0 tolerated)",
      ]);
    });

    it("should include the error of an environment failure", () => {
      const report = renderTextReport(
        "ci",
        aggregateOutcomes([
          {
            ...stable,
            status: "failed",
            reason: "environment-failure",
            failedStepIndex: 0,
            failedStepName: "build",
            error: "spawn cargo ENOENT",
            steps: [{ index: 0, name: "build", status: "failed", exitCode: 127 }],
          },
        ]),
      );

      expect(report.split("\n")[2]).to.equal(
        '      step 1 "build" environment-failure, exit code 127: spawn cargo ENOENT',
      );
    });
  });

  describe("renderJsonReport", () => {
    it("should report axes, tolerance and status per job", () => {
      const report: unknown = JSON.parse(
        renderJsonReport("ci", aggregateOutcomes([nightly, stable])),
      );

      expect(report).to.deep.equal({
        workflow: "ci",
        overall: "succeeded",
        counts: { total: 2, succeeded: 1, failed: 1, toleratedFailures: 1 },
        jobs: [
          {
            name: "ci (stable)",
            axes: { rust: "stable" },
            tolerant: false,
            status: "succeeded",
            durationMs: 10,
          },
          {
            name: "ci (nightly)",
            axes: { rust: "nightly" },
            tolerant: true,
            status: "failed",
            reason: "step-failure",
            failedStepIndex: 0,
            failedStepName: "build",
            durationMs: 20,
          },
        ],
      });
    });
  });

  describe("renderPlan", () => {
    it("should list jobs with their resolved commands", () => {
      const jobs = expandJobs({
        workflowName: "ci",
        matrix: {
          axes: [{ name: "rust", values: ["stable"] }],
          include: [{ values: { rust: "nightly" }, tolerant: true }],
        },
        steps: [
          { name: "build", command: "cargo", args: ["+${{ matrix.rust }}", "build"] },
        ],
      });

      expect(renderPlan("ci", jobs).split("\n")).to.deep.equal([
        "Workflow ci: 2 job(s)",
        "  1. ci (stable)",
        "      - build: cargo +stable build",
        "  2. ci (nightly) [tolerant]",
        "      - build: cargo +nightly build",
      ]);
    });
  });
});
