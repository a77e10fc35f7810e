/**
 * Job executor - runs one job's steps strictly in sequence
 * Stops at the first failing step; remaining steps are skipped
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join, resolve } from "path";
import type { ChildProcess } from "child_process";
import { createLogger } from "../lib/logger/index.js";
import type { JobSpec, StepSpec } from "../matrix/types.js";
import type {
  ExecutorConfig,
  FailureReason,
  JobOutcome,
  ProcessResult,
  StepResult,
} from "./types.js";
import { resolveSafePath, toEnvKey } from "./security.js";
import { spawnProcess } from "./process-spawn.js";
import type { JobProcessRegistry } from "./process-registry.js";

const logger = createLogger("fanout:executor:job");

/**
 * Context handed to a step runner for one step invocation
 */
export type StepRunContext = {
  runId: string;
  job: JobSpec;
  cwd: string;
  env: Record<string, string>;
  maxLogCapture: number;
  onSpawn: (proc: ChildProcess) => void;
};

/**
 * Runs one step and reports how its process terminated
 */
export type StepRunner = (
  step: StepSpec,
  context: StepRunContext,
) => Promise<ProcessResult>;

export const spawnStep: StepRunner = (step, context) =>
  spawnProcess(
    step.command,
    step.args,
    context.env,
    context.cwd,
    context.maxLogCapture,
    context.onSpawn,
  );

export type JobExecutionInput = {
  runId: string;
  job: JobSpec;
  config: ExecutorConfig;
  processRegistry: JobProcessRegistry;
  runStep?: StepRunner;
};

type StepFailure = {
  index: number;
  name: string;
  reason: FailureReason;
  error?: string;
};

/**
 * Environment shared by every step of one job and by nothing else
 */
export function buildJobEnv(
  runId: string,
  job: JobSpec,
  scratchDir: string,
): Record<string, string> {
  const env: Record<string, string> = {
    FANOUT_RUN_ID: runId,
    FANOUT_JOB: job.name,
    FANOUT_JOB_INDEX: String(job.index),
    FANOUT_JOB_TEMP: scratchDir,
  };
  for (const [axis, value] of Object.entries(job.axes)) {
    env[`FANOUT_MATRIX_${toEnvKey(axis)}`] = String(value);
  }
  return env;
}

function classify(result: ProcessResult): FailureReason | undefined {
  if (result.spawnError !== undefined) {
    return "environment-failure";
  }
  return result.exitCode === 0 ? undefined : "step-failure";
}

/**
 * Execute a job's steps in order in an isolated context
 *
 * A step fails on a non-zero exit code or when it cannot be started. The
 * first failure ends the job; it is never retried and never propagates
 * beyond the returned outcome.
 */
export async function executeJob(input: JobExecutionInput): Promise<JobOutcome> {
  const { runId, job, config, processRegistry } = input;
  const runStep = input.runStep ?? spawnStep;
  const startedAt = Date.now();
  const steps: StepResult[] = [];
  let failed: StepFailure | undefined;
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  logger.info("Executing job", {
    runId,
    job: job.name,
    tolerant: job.tolerant,
    stepCount: job.steps.length,
  });

  let scratchDir: string | undefined;
  try {
    scratchDir = await mkdtemp(join(tmpdir(), "fanout-job-"));
  } catch (error) {
    logger.error("Could not create job scratch directory", { runId, error });
    const firstStep = job.steps[0];
    failed = {
      index: firstStep?.index ?? 0,
      name: firstStep?.name ?? "",
      reason: "environment-failure",
      error: error instanceof Error ? error.message : String(error),
    };
    if (firstStep) {
      steps.push({ index: firstStep.index, name: firstStep.name, status: "failed" });
    }
  }

  if (scratchDir !== undefined) {
    const env = buildJobEnv(runId, job, scratchDir);

    if (job.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        logger.warn("Job timed out", { runId, job: job.name, timeoutMs: job.timeoutMs });
        processRegistry
          .killJob(runId, job.index, config.killGraceMs)
          .catch((error) => {
            logger.error("Failed to kill timed out job", { runId, job: job.name, error });
          });
      }, job.timeoutMs);
    }

    for (const step of job.steps) {
      if (timedOut) {
        failed = { index: step.index, name: step.name, reason: "timed-out" };
        steps.push({ index: step.index, name: step.name, status: "failed" });
        break;
      }

      const stepResult = await runOneStep(runStep, step, {
        runId,
        job,
        config,
        processRegistry,
        env,
      });

      const reason = timedOut ? "timed-out" : stepResult.reason;
      if (reason === undefined) {
        steps.push(stepResult.result);
        continue;
      }

      steps.push({ ...stepResult.result, status: "failed" });
      failed = {
        index: step.index,
        name: step.name,
        reason,
        ...(stepResult.error !== undefined ? { error: stepResult.error } : {}),
      };
      break;
    }

    if (timer !== undefined) {
      clearTimeout(timer);
    }

    try {
      await rm(scratchDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn("Could not remove job scratch directory", { scratchDir, error });
    }
  }

  for (const step of job.steps.slice(steps.length)) {
    steps.push({ index: step.index, name: step.name, status: "skipped" });
  }

  const completedAt = Date.now();
  const outcome: JobOutcome = {
    jobIndex: job.index,
    jobKey: job.key,
    jobName: job.name,
    axes: job.axes,
    tolerant: job.tolerant,
    status: failed ? "failed" : "succeeded",
    ...(failed
      ? {
          failedStepIndex: failed.index,
          failedStepName: failed.name,
          reason: failed.reason,
          ...(failed.error !== undefined ? { error: failed.error } : {}),
        }
      : {}),
    steps,
    startedAt,
    completedAt,
    durationMs: completedAt - startedAt,
  };

  if (failed) {
    logger.warn("Job failed", {
      runId,
      job: job.name,
      tolerant: job.tolerant,
      failedStep: failed.name,
      reason: failed.reason,
    });
  } else {
    logger.info("Job succeeded", { runId, job: job.name, durationMs: outcome.durationMs });
  }

  return outcome;
}

async function runOneStep(
  runStep: StepRunner,
  step: StepSpec,
  ctx: {
    runId: string;
    job: JobSpec;
    config: ExecutorConfig;
    processRegistry: JobProcessRegistry;
    env: Record<string, string>;
  },
): Promise<{ result: StepResult; reason?: FailureReason; error?: string }> {
  const { runId, job, config, processRegistry } = ctx;

  logger.debug("Running step", {
    runId,
    job: job.name,
    step: step.name,
    command: step.command,
    args: step.args,
  });

  try {
    const cwd =
      step.cwd !== undefined
        ? resolveSafePath(config.workspace, step.cwd)
        : resolve(config.workspace);

    const processResult = await runStep(step, {
      runId,
      job,
      cwd,
      env: { ...ctx.env, ...step.env },
      maxLogCapture: config.maxLogCapture,
      onSpawn: (proc) => processRegistry.register(runId, job.index, proc),
    });

    const reason = classify(processResult);
    const result: StepResult = {
      index: step.index,
      name: step.name,
      status: reason === undefined ? "succeeded" : "failed",
      exitCode: processResult.exitCode,
      durationMs: processResult.durationMs,
      ...(reason !== undefined
        ? { stdout: processResult.stdout, stderr: processResult.stderr }
        : {}),
    };

    return {
      result,
      ...(reason !== undefined ? { reason } : {}),
      ...(processResult.spawnError !== undefined
        ? { error: processResult.spawnError }
        : {}),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Step could not be run", { runId, job: job.name, step: step.name, error });
    return {
      result: { index: step.index, name: step.name, status: "failed" },
      reason: "environment-failure",
      error: message,
    };
  } finally {
    processRegistry.unregister(runId, job.index);
  }
}
