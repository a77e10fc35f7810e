/**
 * Tests for matrix expansion and job specification
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ConfigurationError,
  expandJobs,
  expandMatrix,
  jobKey,
  jobName,
  type MatrixDeclaration,
} from "fanout";

describe("Matrix Expansion", () => {
  describe("expandMatrix", () => {
    it("should expand stable plus an included tolerant nightly into two cells", () => {
      const cells = expandMatrix({
        axes: [{ name: "rust", values: ["stable"] }],
        include: [{ values: { rust: "nightly" }, tolerant: true }],
      });

      expect(cells).to.deep.equal([
        { axes: { rust: "stable" }, tolerant: false },
        { axes: { rust: "nightly" }, tolerant: true },
      ]);
    });

    it("should mark cells tolerant through experimental axis values", () => {
      const cells = expandMatrix({
        axes: [{ name: "rust", values: ["stable", "beta", "nightly"] }],
        experimental: { rust: ["nightly"] },
      });

      expect(cells.map((cell) => cell.tolerant)).to.deep.equal([
        false,
        false,
        true,
      ]);
    });

    it("should produce the full cross product with the first axis varying slowest", () => {
      const cells = expandMatrix({
        axes: [
          { name: "os", values: ["linux", "macos", "windows"] },
          { name: "node", values: [18, 20] },
        ],
      });

      expect(cells).to.have.length(6);
      expect(cells.map((cell) => cell.axes)).to.deep.equal([
        { os: "linux", node: 18 },
        { os: "linux", node: 20 },
        { os: "macos", node: 18 },
        { os: "macos", node: 20 },
        { os: "windows", node: 18 },
        { os: "windows", node: 20 },
      ]);
    });

    it("should remove excluded combinations", () => {
      const cells = expandMatrix({
        axes: [
          { name: "os", values: ["linux", "windows"] },
          { name: "node", values: [18, 20] },
        ],
        exclude: [{ os: "windows", node: 18 }],
      });

      expect(cells.map((cell) => cell.axes)).to.deep.equal([
        { os: "linux", node: 18 },
        { os: "linux", node: 20 },
        { os: "windows", node: 20 },
      ]);
    });

    it("should exclude every cell matching a partial exclude", () => {
      const cells = expandMatrix({
        axes: [
          { name: "os", values: ["linux", "windows"] },
          { name: "node", values: [18, 20] },
        ],
        exclude: [{ os: "windows" }],
      });

      expect(cells.map((cell) => cell.axes)).to.deep.equal([
        { os: "linux", node: 18 },
        { os: "linux", node: 20 },
      ]);
    });

    it("should merge an include into matching cells instead of appending", () => {
      const cells = expandMatrix({
        axes: [
          { name: "os", values: ["linux", "macos"] },
          { name: "node", values: [18, 20] },
        ],
        include: [{ values: { os: "macos" }, tolerant: true }],
      });

      expect(cells).to.have.length(4);
      expect(
        cells.filter((cell) => cell.tolerant).map((cell) => cell.axes),
      ).to.deep.equal([
        { os: "macos", node: 18 },
        { os: "macos", node: 20 },
      ]);
    });

    it("should leave matching cells unchanged when an include sets no tolerance", () => {
      const cells = expandMatrix({
        axes: [{ name: "os", values: ["linux"] }],
        include: [{ values: { os: "linux" } }],
      });

      expect(cells).to.deep.equal([{ axes: { os: "linux" }, tolerant: false }]);
    });

    it("should append an include that matches no cell", () => {
      const cells = expandMatrix({
        axes: [{ name: "os", values: ["linux"] }],
        include: [{ values: { os: "freebsd" } }],
      });

      expect(cells).to.deep.equal([
        { axes: { os: "linux" }, tolerant: false },
        { axes: { os: "freebsd" }, tolerant: false },
      ]);
    });

    it("should apply experimental values to appended includes", () => {
      const cells = expandMatrix({
        axes: [{ name: "os", values: ["linux"] }],
        include: [{ values: { os: "freebsd" } }],
        experimental: { os: ["freebsd"] },
      });

      expect(cells[1]).to.deep.equal({ axes: { os: "freebsd" }, tolerant: true });
    });

    it("should yield a single empty cell for a matrix without axes", () => {
      expect(expandMatrix({ axes: [] })).to.deep.equal([
        { axes: {}, tolerant: false },
      ]);
    });

    it("should reject an axis without values", () => {
      expect(() =>
        expandMatrix({ axes: [{ name: "os", values: [] }] }),
      ).to.throw(ConfigurationError, 'Matrix axis "os" has no values');
    });

    it("should reject an axis declared twice", () => {
      expect(() =>
        expandMatrix({
          axes: [
            { name: "os", values: ["linux"] },
            { name: "os", values: ["macos"] },
          ],
        }),
      ).to.throw(ConfigurationError, 'Matrix axis "os" is declared twice');
    });

    it("should reject repeated axis values", () => {
      expect(() =>
        expandMatrix({ axes: [{ name: "os", values: ["linux", "linux"] }] }),
      ).to.throw(ConfigurationError, 'Matrix axis "os" repeats value "linux"');
    });

    it("should reject axes that map to the same environment variable", () => {
      expect(() =>
        expandMatrix({
          axes: [
            { name: "node-version", values: ["20"] },
            { name: "node_version", values: ["22"] },
          ],
        }),
      ).to.throw(
        ConfigurationError,
        'Matrix axes "node-version" and "node_version" map to the same environment variable FANOUT_MATRIX_NODE_VERSION',
      );
    });

    it("should reject includes and excludes naming undeclared axes", () => {
      expect(() =>
        expandMatrix({
          axes: [{ name: "os", values: ["linux"] }],
          include: [{ values: { arch: "arm64" } }],
        }),
      ).to.throw(
        ConfigurationError,
        'include[0] references undeclared matrix axis "arch"',
      );

      expect(() =>
        expandMatrix({
          axes: [{ name: "os", values: ["linux"] }],
          exclude: [{ arch: "arm64" }],
        }),
      ).to.throw(
        ConfigurationError,
        'exclude[0] references undeclared matrix axis "arch"',
      );
    });

    it("should reject experimental entries naming undeclared axes", () => {
      expect(() =>
        expandMatrix({
          axes: [{ name: "os", values: ["linux"] }],
          experimental: { rust: ["nightly"] },
        }),
      ).to.throw(
        ConfigurationError,
        'experimental references undeclared matrix axis "rust"',
      );
    });

    it("should reject a matrix whose excludes remove every cell", () => {
      expect(() =>
        expandMatrix({
          axes: [{ name: "os", values: ["linux"] }],
          exclude: [{ os: "linux" }],
        }),
      ).to.throw(ConfigurationError, "Matrix expansion produced no jobs");
    });
  });

  describe("jobKey and jobName", () => {
    it("should derive keys and names from axis values in declaration order", () => {
      const axes = { os: "linux", node: 20 };
      expect(jobKey(axes)).to.equal("os=linux,node=20");
      expect(jobName("ci", axes)).to.equal("ci (linux, 20)");
    });

    it("should use the bare workflow name for a job without axes", () => {
      expect(jobKey({})).to.equal("");
      expect(jobName("ci", {})).to.equal("ci");
    });
  });

  describe("expandJobs", () => {
    const matrix: MatrixDeclaration = {
      axes: [{ name: "rust", values: ["stable"] }],
      include: [{ values: { rust: "nightly" }, tolerant: true }],
    };

    it("should resolve step templates for every job", () => {
      const jobs = expandJobs({
        workflowName: "ci",
        matrix,
        steps: [
          {
            name: "Build (${{ matrix.rust }})",
            command: "cargo",
            args: ["+${{ matrix.rust }}", "build", "--all"],
            env: { TOOLCHAIN: "${{ matrix.rust }}" },
          },
          { name: "Test", command: "cargo", args: ["test"] },
        ],
      });

      expect(jobs).to.have.length(2);

      const [stable, nightly] = jobs;
      expect(stable?.index).to.equal(0);
      expect(stable?.key).to.equal("rust=stable");
      expect(stable?.name).to.equal("ci (stable)");
      expect(stable?.tolerant).to.equal(false);

      expect(nightly?.index).to.equal(1);
      expect(nightly?.name).to.equal("ci (nightly)");
      expect(nightly?.tolerant).to.equal(true);
      expect(nightly?.steps).to.deep.equal([
        {
          index: 0,
          name: "Build (nightly)",
          command: "cargo",
          args: ["+nightly", "build", "--all"],
          env: { TOOLCHAIN: "nightly" },
        },
        { index: 1, name: "Test", command: "cargo", args: ["test"], env: {} },
      ]);
    });

    it("should carry the timeout onto every job", () => {
      const jobs = expandJobs({
        workflowName: "ci",
        matrix,
        steps: [{ name: "Build", command: "cargo" }],
        timeoutMs: 60000,
      });

      expect(jobs.map((job) => job.timeoutMs)).to.deep.equal([60000, 60000]);
    });

    it("should reject a workflow without steps", () => {
      expect(() =>
        expandJobs({ workflowName: "ci", matrix, steps: [] }),
      ).to.throw(ConfigurationError, 'Workflow "ci" declares no steps');
    });

    it("should reject steps referencing undeclared axes", () => {
      expect(() =>
        expandJobs({
          workflowName: "ci",
          matrix,
          steps: [{ name: "Build", command: "cargo", args: ["${{ matrix.os }}"] }],
        }),
      ).to.throw(
        ConfigurationError,
        'Expression references undeclared matrix axis "os"',
      );
    });
  });
});
