/**
 * Workflow loading - YAML parsing and validation
 */

import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { parse as parseYaml } from "yaml";
import { createLogger } from "../lib/logger/index.js";
import { ConfigurationError } from "../lib/core/errors.js";
import { expandJobs } from "../matrix/expand-matrix.js";
import type { JobSpec } from "../matrix/types.js";
import { workflowFileSchema } from "./schema.js";
import type { TriggerEvent, Workflow } from "./types.js";

const logger = createLogger("fanout:workflow:load");

/**
 * Parse and validate workflow YAML
 *
 * @param source - YAML text
 * @param defaultName - Name used when the file declares none
 * @throws ConfigurationError listing every validation issue
 */
export function parseWorkflow(source: string, defaultName: string): Workflow {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML in workflow "${defaultName}"`, [message]);
  }

  const parsed = workflowFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid workflow "${defaultName}"`,
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  const file = parsed.data;
  const { matrix, experimental, failFast, maxParallel } = file.strategy;

  return {
    name: file.name ?? defaultName,
    on: file.on,
    ...(file.timeoutMinutes !== undefined
      ? { timeoutMs: Math.round(file.timeoutMinutes * 60_000) }
      : {}),
    strategy: { failFast, maxParallel },
    matrix: { ...matrix, experimental },
    steps: file.steps,
  };
}

/**
 * Read a workflow file; the file name (without extension) is the default
 * workflow name
 */
export async function loadWorkflow(path: string): Promise<Workflow> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (error) {
    logger.error("Failed to read workflow file", { path, error });
    throw new ConfigurationError(`Cannot read workflow file ${path}`);
  }

  const workflow = parseWorkflow(source, basename(path, extname(path)));
  logger.debug("Loaded workflow", {
    path,
    name: workflow.name,
    axes: workflow.matrix.axes.map((axis) => axis.name),
    steps: workflow.steps.length,
  });
  return workflow;
}

export function isTriggeredBy(workflow: Workflow, event: TriggerEvent): boolean {
  return workflow.on.includes(event.kind);
}

/**
 * Expand a workflow into its job specifications
 *
 * @throws ConfigurationError if the matrix or steps are malformed
 */
export function expandWorkflow(workflow: Workflow): JobSpec[] {
  return expandJobs({
    workflowName: workflow.name,
    matrix: workflow.matrix,
    steps: workflow.steps,
    ...(workflow.timeoutMs !== undefined ? { timeoutMs: workflow.timeoutMs } : {}),
  });
}
