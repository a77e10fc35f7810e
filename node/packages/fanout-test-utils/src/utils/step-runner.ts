/**
 * Scripted step runner
 * Stands in for process spawning so scheduler and API tests control each
 * step's exit status, timing and concurrency without real commands
 */

import type { JobSpec, ProcessResult, StepRunner, StepSpec } from "fanout";

export type StepCall = {
  jobIndex: number;
  jobName: string;
  stepIndex: number;
  stepName: string;
  env: Record<string, string>;
  cwd: string;
  startedAt: number;
};

/**
 * Decides how a step ends; return exitCode 0 for success
 */
export type StepScript = (
  step: StepSpec,
  job: JobSpec,
) => Partial<ProcessResult> & { delayMs?: number };

export type ScriptedStepRunner = {
  runStep: StepRunner;
  calls: StepCall[];
  maxConcurrent: () => number;
};

export function stepResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    durationMs: 0,
    ...overrides,
  };
}

export function createScriptedStepRunner(
  script: StepScript = () => ({}),
): ScriptedStepRunner {
  const calls: StepCall[] = [];
  let running = 0;
  let peak = 0;

  const runStep: StepRunner = async (step, context) => {
    calls.push({
      jobIndex: context.job.index,
      jobName: context.job.name,
      stepIndex: step.index,
      stepName: step.name,
      env: context.env,
      cwd: context.cwd,
      startedAt: Date.now(),
    });

    running++;
    peak = Math.max(peak, running);
    try {
      const { delayMs = 0, ...result } = script(step, context.job);
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      return stepResult({ durationMs: delayMs, ...result });
    } finally {
      running--;
    }
  };

  return { runStep, calls, maxConcurrent: () => peak };
}
