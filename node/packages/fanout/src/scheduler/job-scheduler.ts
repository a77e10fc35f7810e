/**
 * Job scheduler - dispatches every job of a run to an executor with a
 * max-parallel limit and collects one outcome per job
 */

import { createLogger } from "../lib/logger/index.js";
import type { JobSpec } from "../matrix/types.js";
import type { JobOutcome, JobState } from "../executor/types.js";

const logger = createLogger("fanout:scheduler");

/**
 * Scheduling policy for one run
 */
export type SchedulerPolicy = {
  maxParallel: number; // 0 = unbounded (one execution context per job)
  failFast: boolean; // Cancel undispatched jobs after a required job fails
};

export type JobExecutor = (job: JobSpec) => Promise<JobOutcome>;

export type SchedulerHooks = {
  onStateChange?: (
    job: JobSpec,
    state: JobState,
    outcome?: JobOutcome,
  ) => void | Promise<void>;
};

const ALLOWED_TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ["running", "failed"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

/**
 * Per-job state machine: pending -> running -> {succeeded, failed}.
 * Terminal states are final.
 */
export class JobStateTracker {
  private states: JobState[];

  constructor(jobCount: number) {
    this.states = new Array<JobState>(jobCount).fill("pending");
  }

  get(index: number): JobState {
    const state = this.states[index];
    if (state === undefined) {
      throw new Error(`Unknown job index ${index}`);
    }
    return state;
  }

  transition(index: number, next: JobState): void {
    const current = this.get(index);
    if (!ALLOWED_TRANSITIONS[current].includes(next)) {
      throw new Error(
        `Illegal job state transition for job ${index}: ${current} -> ${next}`,
      );
    }
    this.states[index] = next;
  }

  isSettled(): boolean {
    return this.states.every(
      (state) => state === "succeeded" || state === "failed",
    );
  }
}

/**
 * Outcome recorded for a job that was never dispatched
 */
export function cancelledOutcome(job: JobSpec): JobOutcome {
  const now = Date.now();
  return {
    jobIndex: job.index,
    jobKey: job.key,
    jobName: job.name,
    axes: job.axes,
    tolerant: job.tolerant,
    status: "failed",
    reason: "cancelled",
    steps: job.steps.map((step) => ({
      index: step.index,
      name: step.name,
      status: "skipped" as const,
    })),
    startedAt: now,
    completedAt: now,
    durationMs: 0,
  };
}

function crashedOutcome(job: JobSpec, error: unknown, startedAt: number): JobOutcome {
  const completedAt = Date.now();
  const firstStep = job.steps[0];
  return {
    jobIndex: job.index,
    jobKey: job.key,
    jobName: job.name,
    axes: job.axes,
    tolerant: job.tolerant,
    status: "failed",
    reason: "environment-failure",
    error: error instanceof Error ? error.message : String(error),
    ...(firstStep
      ? { failedStepIndex: firstStep.index, failedStepName: firstStep.name }
      : {}),
    steps: job.steps.map((step) => ({
      index: step.index,
      name: step.name,
      status: "skipped" as const,
    })),
    startedAt,
    completedAt,
    durationMs: completedAt - startedAt,
  };
}

/**
 * Run every job and return their outcomes ordered by job index.
 *
 * A failing job never cancels its siblings unless failFast is set, and even
 * then only jobs that have not been dispatched yet are cancelled. Resolves
 * only after every job reached a terminal state.
 */
export async function scheduleJobs(
  jobs: readonly JobSpec[],
  policy: SchedulerPolicy,
  execute: JobExecutor,
  hooks: SchedulerHooks = {},
): Promise<JobOutcome[]> {
  const tracker = new JobStateTracker(jobs.length);
  const maxParallel = policy.maxParallel > 0 ? policy.maxParallel : jobs.length;
  let abandoned = false;

  logger.info("Scheduling jobs", {
    jobCount: jobs.length,
    maxParallel: policy.maxParallel > 0 ? policy.maxParallel : "unbounded",
    failFast: policy.failFast,
  });

  const notify = async (job: JobSpec, state: JobState, outcome?: JobOutcome) => {
    tracker.transition(job.index, state);
    if (!hooks.onStateChange) {
      return;
    }
    try {
      await hooks.onStateChange(job, state, outcome);
    } catch (error) {
      logger.error("Job state hook failed", { job: job.name, state, error });
    }
  };

  const runJob = async (job: JobSpec): Promise<JobOutcome> => {
    if (abandoned) {
      const outcome = cancelledOutcome(job);
      logger.info("Cancelling job after required failure", { job: job.name });
      await notify(job, "failed", outcome);
      return outcome;
    }

    await notify(job, "running");
    const startedAt = Date.now();

    let outcome: JobOutcome;
    try {
      outcome = await execute(job);
    } catch (error) {
      logger.error("Job executor threw", { job: job.name, error });
      outcome = crashedOutcome(job, error, startedAt);
    }

    if (policy.failFast && outcome.status === "failed" && !outcome.tolerant) {
      abandoned = true;
    }

    await notify(job, outcome.status, outcome);
    return outcome;
  };

  const outcomes = await executeWithConcurrency(jobs, maxParallel, runJob);

  if (!tracker.isSettled()) {
    throw new Error("Scheduler finished with unsettled jobs");
  }

  logger.info("All jobs finished", {
    jobCount: outcomes.length,
    failed: outcomes.filter((o) => o.status === "failed").length,
  });

  return outcomes;
}

/**
 * Execute tasks with a concurrency limit, one result slot per item
 *
 * @returns Results in original order
 */
async function executeWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  executor: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: (R | undefined)[] = new Array(items.length);
  const executing = new Map<number, Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (item === undefined) {
      continue;
    }

    const promise = executor(item).then((result) => {
      results[i] = result;
      executing.delete(i);
    });

    executing.set(i, promise);

    if (executing.size >= maxConcurrency) {
      await Promise.race(executing.values());
    }
  }

  await Promise.all(executing.values());
  return results.filter((r): r is R => r !== undefined);
}
