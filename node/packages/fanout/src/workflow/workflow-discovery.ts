/**
 * Workflow discovery from filesystem
 * Workflows are <name>.yaml or <name>.yml files in the workflows root
 */

import { readdir, access, constants } from "fs/promises";
import { extname, join } from "path";
import { createLogger } from "../lib/logger/index.js";
import { validateName } from "../executor/security.js";
import { loadWorkflow } from "./load-workflow.js";
import type { Workflow, WorkflowSummary } from "./types.js";

const logger = createLogger("fanout:workflow:discovery");

const WORKFLOW_EXTENSIONS = [".yaml", ".yml"];

/**
 * Discover all loadable workflows; invalid files are logged and skipped
 */
export async function discoverWorkflows(
  workflowsRoot: string,
): Promise<WorkflowSummary[]> {
  let entries;
  try {
    entries = await readdir(workflowsRoot, { withFileTypes: true });
  } catch (error) {
    logger.error("Failed to read workflows root", { error, workflowsRoot });
    return [];
  }

  const workflows: WorkflowSummary[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !WORKFLOW_EXTENSIONS.includes(extname(entry.name))) {
      continue;
    }

    const path = join(workflowsRoot, entry.name);
    try {
      const workflow = await loadWorkflow(path);
      workflows.push({ name: workflow.name, path, on: workflow.on });
    } catch (error) {
      logger.warn("Skipping invalid workflow", { path, error });
    }
  }

  logger.info("Workflow discovery completed", { count: workflows.length });
  return workflows;
}

/**
 * Load a workflow by file name
 *
 * @returns The workflow, or null if no such file exists
 * @throws ConfigurationError if the file exists but is invalid
 */
export async function getWorkflow(
  workflowsRoot: string,
  name: string,
): Promise<Workflow | null> {
  validateName(name);

  for (const extension of WORKFLOW_EXTENSIONS) {
    const path = join(workflowsRoot, `${name}${extension}`);
    try {
      await access(path, constants.R_OK);
    } catch {
      continue;
    }
    return loadWorkflow(path);
  }

  logger.warn("Workflow not found", { name, workflowsRoot });
  return null;
}
