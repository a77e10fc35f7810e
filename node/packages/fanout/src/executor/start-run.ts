/**
 * Background execution of a persisted run
 * Mirrors scheduler state changes into the run and job tables
 */

import { createLogger } from "../lib/logger/index.js";
import type { DataContext } from "../domain/data-context.js";
import { updateRun } from "../domain/run/update-run.js";
import { createJobs } from "../domain/job/create-jobs.js";
import { updateJob } from "../domain/job/update-job.js";
import type { JobSpec } from "../matrix/types.js";
import type { TriggerEvent, Workflow } from "../workflow/types.js";
import type { JobOutcome, JobState } from "./types.js";
import { runWorkflow } from "./orchestrator.js";

const logger = createLogger("fanout:executor:start-run");

/**
 * Runs executing in the background
 * Tests wait on these before tearing down the database
 */
const activeRuns = new Set<Promise<void>>();

export async function waitForAllRuns(): Promise<void> {
  if (activeRuns.size > 0) {
    logger.debug("Waiting for active runs", { count: activeRuns.size });
    await Promise.allSettled([...activeRuns]);
  }
}

export type StartRunInput = {
  runId: string;
  workflow: Workflow;
  event: TriggerEvent;
};

async function recordJobState(
  ctx: DataContext,
  runId: string,
  job: JobSpec,
  state: JobState,
  outcome?: JobOutcome,
): Promise<void> {
  const result =
    state === "running"
      ? await updateJob(ctx, runId, job.index, {
          status: "running",
          startedAt: Date.now(),
        })
      : await updateJob(ctx, runId, job.index, {
          status: state,
          ...(outcome
            ? {
                reason: outcome.reason,
                failedStepIndex: outcome.failedStepIndex,
                failedStepName: outcome.failedStepName,
                error: outcome.error,
                steps: outcome.steps,
                startedAt: outcome.startedAt,
                completedAt: outcome.completedAt,
                durationMs: outcome.durationMs,
              }
            : {}),
        });

  if (!result.success) {
    throw result.error;
  }
}

async function executeRun(ctx: DataContext, input: StartRunInput): Promise<void> {
  const { runId, workflow, event } = input;

  const started = await updateRun(ctx, runId, {
    status: "running",
    startedAt: Date.now(),
  });
  if (!started.success) {
    throw started.error;
  }

  try {
    const { result } = await runWorkflow(ctx.executor, {
      workflow,
      event,
      runId,
      hooks: {
        onExpanded: async (jobs) => {
          const created = await createJobs(
            ctx,
            runId,
            jobs.map((job) => ({
              index: job.index,
              key: job.key,
              name: job.name,
              axes: job.axes,
              tolerant: job.tolerant,
            })),
          );
          if (!created.success) {
            throw created.error;
          }
          const counted = await updateRun(ctx, runId, { jobCount: jobs.length });
          if (!counted.success) {
            throw counted.error;
          }
        },
        onStateChange: (job, state, outcome) =>
          recordJobState(ctx, runId, job, state, outcome),
      },
    });

    const finished = await updateRun(ctx, runId, {
      status: result.overall,
      jobCount: result.counts.total,
      failedCount: result.counts.failed,
      toleratedCount: result.counts.toleratedFailures,
      completedAt: Date.now(),
    });
    if (!finished.success) {
      throw finished.error;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Run failed before completion", { runId, error });
    const failed = await updateRun(ctx, runId, {
      status: "failed",
      error: message,
      completedAt: Date.now(),
    });
    if (!failed.success) {
      throw failed.error;
    }
  }
}

/**
 * Execute a previously created run. The returned promise settles when the
 * run is finished and its final state is stored.
 */
export function startRun(ctx: DataContext, input: StartRunInput): Promise<void> {
  logger.info("Starting persisted run", {
    runId: input.runId,
    workflow: input.workflow.name,
  });

  const promise = executeRun(ctx, input).finally(() => {
    activeRuns.delete(promise);
  });
  activeRuns.add(promise);
  return promise;
}
