/**
 * Tests for workflow parsing, validation and trigger matching
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import {
  ConfigurationError,
  expandWorkflow,
  isTriggeredBy,
  loadWorkflow,
  parseWorkflow,
} from "fanout";
import { createTempDir, removeTempDir, writeWorkflowFile } from "fanout-test-utils";

const CI_WORKFLOW = `
name: ci
on: push
timeoutMinutes: 0.5
strategy:
  failFast: false
  matrix:
    rust: [stable]
    include:
      - rust: nightly
        tolerant: true
steps:
  - name: build
    command: cargo
    args: ["+\${{ matrix.rust }}", build, --all]
  - name: test
    command: cargo
    args: [test, --all]
    env:
      RUST_BACKTRACE: 1
`;

describe("Workflow Loading", () => {
  describe("parseWorkflow", () => {
    it("should parse a matrix workflow", () => {
      const workflow = parseWorkflow(CI_WORKFLOW, "fallback");

      expect(workflow.name).to.equal("ci");
      expect(workflow.on).to.deep.equal(["push"]);
      expect(workflow.timeoutMs).to.equal(30000);
      expect(workflow.strategy).to.deep.equal({ failFast: false, maxParallel: 0 });
      expect(workflow.matrix).to.deep.equal({
        axes: [{ name: "rust", values: ["stable"] }],
        include: [{ values: { rust: "nightly" }, tolerant: true }],
        exclude: [],
        experimental: {},
      });
      expect(workflow.steps).to.deep.equal([
        {
          name: "build",
          command: "cargo",
          args: ["+${{ matrix.rust }}", "build", "--all"],
          env: {},
        },
        {
          name: "test",
          command: "cargo",
          args: ["test", "--all"],
          env: { RUST_BACKTRACE: "1" },
        },
      ]);
    });

    it("should expand the parsed workflow into a required and a tolerant job", () => {
      const jobs = expandWorkflow(parseWorkflow(CI_WORKFLOW, "fallback"));

      expect(jobs.map((job) => [job.name, job.tolerant])).to.deep.equal([
        ["ci (stable)", false],
        ["ci (nightly)", true],
      ]);
      expect(jobs[1]?.steps[0]?.args).to.deep.equal(["+nightly", "build", "--all"]);
      expect(jobs[0]?.timeoutMs).to.equal(30000);
    });

    it("should apply defaults for name, triggers and strategy", () => {
      const workflow = parseWorkflow(
        `
steps:
  - name: hello
    command: echo
    args: [hi]
`,
        "fallback",
      );

      expect(workflow.name).to.equal("fallback");
      expect(workflow.on).to.deep.equal(["push", "pull_request"]);
      expect(workflow.timeoutMs).to.equal(undefined);
      expect(workflow.strategy).to.deep.equal({ failFast: false, maxParallel: 0 });
      expect(workflow.matrix.axes).to.deep.equal([]);
      expect(expandWorkflow(workflow).map((job) => job.name)).to.deep.equal([
        "fallback",
      ]);
    });

    it("should read experimental axis values", () => {
      const workflow = parseWorkflow(
        `
strategy:
  matrix:
    rust: [stable, nightly]
  experimental:
    rust: [nightly]
steps:
  - name: build
    command: cargo
`,
        "ci",
      );

      expect(expandWorkflow(workflow).map((job) => job.tolerant)).to.deep.equal([
        false,
        true,
      ]);
    });

    it("should reject invalid YAML", () => {
      expect(() => parseWorkflow("steps: [", "broken")).to.throw(
        ConfigurationError,
        'Invalid YAML in workflow "broken"',
      );
    });

    it("should list a missing steps section as an issue", () => {
      try {
        parseWorkflow("name: ci\n", "ci");
        expect.fail("Expected a configuration error");
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.issues).to.deep.equal(["steps: Required"]);
        }
      }
    });

    it("should reject unknown keys", () => {
      expect(() =>
        parseWorkflow(
          `
runs-on: ubuntu-latest
steps:
  - name: build
    command: cargo
`,
          "ci",
        ),
      ).to.throw(ConfigurationError, "Unrecognized key");
    });

    it("should reject a non-boolean include tolerance", () => {
      expect(() =>
        parseWorkflow(
          `
strategy:
  matrix:
    rust: [stable]
    include:
      - rust: nightly
        tolerant: "yes"
steps:
  - name: build
    command: cargo
`,
          "ci",
        ),
      ).to.throw(ConfigurationError, "tolerant must be a boolean");
    });

    it("should reject unknown trigger kinds", () => {
      expect(() =>
        parseWorkflow(
          `
on: schedule
steps:
  - name: build
    command: cargo
`,
          "ci",
        ),
      ).to.throw(ConfigurationError, 'Invalid workflow "ci"');
    });
  });

  describe("isTriggeredBy", () => {
    it("should only match the declared event kinds", () => {
      const workflow = parseWorkflow(CI_WORKFLOW, "ci");
      expect(isTriggeredBy(workflow, { kind: "push" })).to.equal(true);
      expect(isTriggeredBy(workflow, { kind: "pull_request" })).to.equal(false);
    });
  });

  describe("loadWorkflow", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir("fanout-workflow-test-");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it("should default the name to the file name", async () => {
      const path = await writeWorkflowFile(
        tempDir,
        "lint",
        "steps:\n  - name: lint\n    command: eslint\n",
      );

      const workflow = await loadWorkflow(path);
      expect(workflow.name).to.equal("lint");
    });

    it("should reject a missing file with a configuration error", async () => {
      await expect(loadWorkflow(`${tempDir}/missing.yaml`)).to.be.rejectedWith(
        ConfigurationError,
        "Cannot read workflow file",
      );
    });
  });
});
