/**
 * Matrix expansion - turns a matrix declaration and step templates into an
 * ordered list of job specifications
 */

import { createLogger } from "../lib/logger/index.js";
import { ConfigurationError } from "../lib/core/errors.js";
import { toEnvKey } from "../executor/security.js";
import { interpolateMatrix } from "./interpolate.js";
import type {
  AxisValue,
  AxisValues,
  JobSpec,
  MatrixCell,
  MatrixDeclaration,
  StepSpec,
  StepTemplate,
} from "./types.js";

const logger = createLogger("fanout:matrix:expand");

export type ExpandJobsInput = {
  workflowName: string;
  matrix: MatrixDeclaration;
  steps: readonly StepTemplate[];
  timeoutMs?: number;
};

function matchesAll(cell: AxisValues, selector: AxisValues): boolean {
  return Object.entries(selector).every(([axis, value]) => cell[axis] === value);
}

function assertDeclared(
  declared: ReadonlySet<string>,
  values: AxisValues,
  where: string,
): void {
  for (const axis of Object.keys(values)) {
    if (!declared.has(axis)) {
      throw new ConfigurationError(
        `${where} references undeclared matrix axis "${axis}"`,
      );
    }
  }
}

function validateDeclaration(matrix: MatrixDeclaration): Set<string> {
  const declared = new Set<string>();
  const envKeys = new Map<string, string>();

  for (const axis of matrix.axes) {
    if (declared.has(axis.name)) {
      throw new ConfigurationError(`Matrix axis "${axis.name}" is declared twice`);
    }
    declared.add(axis.name);

    // Each axis is exposed to steps as FANOUT_MATRIX_<KEY>
    const envKey = toEnvKey(axis.name);
    const clash = envKeys.get(envKey);
    if (clash !== undefined) {
      throw new ConfigurationError(
        `Matrix axes "${clash}" and "${axis.name}" map to the same environment variable FANOUT_MATRIX_${envKey}`,
      );
    }
    envKeys.set(envKey, axis.name);

    if (axis.values.length === 0) {
      throw new ConfigurationError(`Matrix axis "${axis.name}" has no values`);
    }

    const seen = new Set<AxisValue>();
    for (const value of axis.values) {
      if (seen.has(value)) {
        throw new ConfigurationError(
          `Matrix axis "${axis.name}" repeats value "${String(value)}"`,
        );
      }
      seen.add(value);
    }
  }

  (matrix.include ?? []).forEach((entry, i) =>
    assertDeclared(declared, entry.values, `include[${i}]`),
  );
  (matrix.exclude ?? []).forEach((entry, i) =>
    assertDeclared(declared, entry, `exclude[${i}]`),
  );
  for (const axis of Object.keys(matrix.experimental ?? {})) {
    if (!declared.has(axis)) {
      throw new ConfigurationError(
        `experimental references undeclared matrix axis "${axis}"`,
      );
    }
  }

  return declared;
}

function isExperimental(
  axes: AxisValues,
  experimental: MatrixDeclaration["experimental"],
): boolean {
  return Object.entries(experimental ?? {}).some(([axis, values]) => {
    const value = axes[axis];
    return value !== undefined && values.includes(value);
  });
}

/**
 * Cross product of all axes; the first declared axis varies slowest.
 * A matrix with no axes and no includes yields a single empty cell.
 */
function crossProduct(matrix: MatrixDeclaration): Record<string, AxisValue>[] {
  if (matrix.axes.length === 0) {
    return (matrix.include ?? []).length === 0 ? [{}] : [];
  }

  let combinations: Record<string, AxisValue>[] = [{}];
  for (const axis of matrix.axes) {
    const next: Record<string, AxisValue>[] = [];
    for (const combination of combinations) {
      for (const value of axis.values) {
        next.push({ ...combination, [axis.name]: value });
      }
    }
    combinations = next;
  }
  return combinations;
}

/**
 * Expand a matrix declaration into cells.
 *
 * Excludes remove base combinations first. Each include is then merged into
 * every cell whose values equal all of the include's named values (setting
 * its tolerant flag when the include names one), or appended as a new cell
 * when nothing matches.
 *
 * @throws ConfigurationError if the declaration is malformed or yields no cells
 */
export function expandMatrix(matrix: MatrixDeclaration): MatrixCell[] {
  validateDeclaration(matrix);

  const excludes = matrix.exclude ?? [];
  const cells: MatrixCell[] = crossProduct(matrix)
    .filter((axes) => !excludes.some((exclude) => matchesAll(axes, exclude)))
    .map((axes) => ({
      axes,
      tolerant: isExperimental(axes, matrix.experimental),
    }));

  for (const include of matrix.include ?? []) {
    const matched = cells.filter((cell) => matchesAll(cell.axes, include.values));

    if (matched.length === 0) {
      cells.push({
        axes: { ...include.values },
        tolerant:
          include.tolerant ?? isExperimental(include.values, matrix.experimental),
      });
      continue;
    }

    if (include.tolerant !== undefined) {
      for (const cell of matched) {
        cell.tolerant = include.tolerant;
      }
    }
  }

  if (cells.length === 0) {
    throw new ConfigurationError("Matrix expansion produced no jobs");
  }

  return cells;
}

export function jobKey(axes: AxisValues): string {
  return Object.entries(axes)
    .map(([axis, value]) => `${axis}=${String(value)}`)
    .join(",");
}

export function jobName(workflowName: string, axes: AxisValues): string {
  const values = Object.values(axes).map(String);
  return values.length === 0
    ? workflowName
    : `${workflowName} (${values.join(", ")})`;
}

function resolveSteps(
  steps: readonly StepTemplate[],
  axes: AxisValues,
  declared: ReadonlySet<string>,
): StepSpec[] {
  const resolve = (value: string) => interpolateMatrix(value, axes, declared);

  return steps.map((step, index) => ({
    index,
    name: resolve(step.name),
    command: resolve(step.command),
    args: (step.args ?? []).map(resolve),
    ...(step.cwd !== undefined ? { cwd: resolve(step.cwd) } : {}),
    env: Object.fromEntries(
      Object.entries(step.env ?? {}).map(([key, value]) => [key, resolve(value)]),
    ),
  }));
}

/**
 * Expand a workflow's matrix and steps into job specifications, in
 * expansion order (base product first, then appended includes).
 *
 * @throws ConfigurationError if the matrix or a step is malformed
 */
export function expandJobs(input: ExpandJobsInput): JobSpec[] {
  const { workflowName, matrix, steps, timeoutMs } = input;

  if (steps.length === 0) {
    throw new ConfigurationError(`Workflow "${workflowName}" declares no steps`);
  }

  const cells = expandMatrix(matrix);
  const declared = new Set(matrix.axes.map((axis) => axis.name));

  const jobs = cells.map((cell, index) => ({
    index,
    key: jobKey(cell.axes),
    name: jobName(workflowName, cell.axes),
    axes: cell.axes,
    tolerant: cell.tolerant,
    steps: resolveSteps(steps, cell.axes, declared),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  }));

  logger.debug("Matrix expanded", {
    workflowName,
    jobCount: jobs.length,
    tolerantJobs: jobs.filter((job) => job.tolerant).map((job) => job.name),
  });

  return jobs;
}
