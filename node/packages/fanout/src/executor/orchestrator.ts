/**
 * Run orchestrator - ties together expansion, scheduling, execution and
 * aggregation for one triggered run
 */

import { v4 as uuidv4 } from "uuid";
import { createLogger } from "../lib/logger/index.js";
import { TriggerMismatchError } from "../lib/core/errors.js";
import type { JobSpec } from "../matrix/types.js";
import { expandWorkflow, isTriggeredBy } from "../workflow/load-workflow.js";
import type { TriggerEvent, Workflow } from "../workflow/types.js";
import { scheduleJobs, type SchedulerHooks } from "../scheduler/job-scheduler.js";
import { aggregateOutcomes } from "../aggregator/aggregate-outcomes.js";
import { executeJob, type StepRunner } from "./job-executor.js";
import type { JobProcessRegistry } from "./process-registry.js";
import type { ExecutorConfig, RunResult } from "./types.js";

const logger = createLogger("fanout:executor:orchestrator");

/**
 * Context for orchestrator operations
 */
export type OrchestratorContext = {
  config: ExecutorConfig;
  processRegistry: JobProcessRegistry;
  runStep?: StepRunner;
};

export type RunWorkflowInput = {
  workflow: Workflow;
  event: TriggerEvent;
  runId?: string;
  // Overrides the workflow's strategy.maxParallel when set
  maxParallel?: number;
  hooks?: SchedulerHooks & {
    onExpanded?: (jobs: readonly JobSpec[]) => void | Promise<void>;
  };
};

export type RunWorkflowOutput = {
  runId: string;
  jobs: readonly JobSpec[];
  result: RunResult;
};

/**
 * Effective parallelism: the workflow's own limit, then an explicit
 * override, then the executor-wide cap (0 means no limit at each level)
 */
function effectiveMaxParallel(
  workflowLimit: number,
  override: number | undefined,
  executorLimit: number,
): number {
  const requested = override ?? workflowLimit;
  if (executorLimit <= 0) {
    return requested;
  }
  return requested <= 0 ? executorLimit : Math.min(requested, executorLimit);
}

/**
 * Run a workflow for a trigger event and aggregate its outcome.
 *
 * @throws TriggerMismatchError if the workflow does not listen to the event
 * @throws ConfigurationError if expansion fails (no job is dispatched)
 */
export async function runWorkflow(
  ctx: OrchestratorContext,
  input: RunWorkflowInput,
): Promise<RunWorkflowOutput> {
  const { workflow, event, hooks } = input;
  const runId = input.runId ?? uuidv4();

  if (!isTriggeredBy(workflow, event)) {
    throw new TriggerMismatchError(workflow.name, event.kind);
  }

  const jobs = expandWorkflow(workflow);
  await hooks?.onExpanded?.(jobs);

  const maxParallel = effectiveMaxParallel(
    workflow.strategy.maxParallel,
    input.maxParallel,
    ctx.config.maxParallelJobs,
  );

  logger.info("Starting run", {
    runId,
    workflow: workflow.name,
    event: event.kind,
    jobCount: jobs.length,
    maxParallel,
    failFast: workflow.strategy.failFast,
  });

  const outcomes = await scheduleJobs(
    jobs,
    { maxParallel, failFast: workflow.strategy.failFast },
    (job) =>
      executeJob({
        runId,
        job,
        config: ctx.config,
        processRegistry: ctx.processRegistry,
        ...(ctx.runStep ? { runStep: ctx.runStep } : {}),
      }),
    hooks ?? {},
  );

  const result = aggregateOutcomes(outcomes);

  logger.info("Run finished", {
    runId,
    workflow: workflow.name,
    overall: result.overall,
    ...result.counts,
  });

  return { runId, jobs, result };
}
