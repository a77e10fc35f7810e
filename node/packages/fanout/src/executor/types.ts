/**
 * Executor types for fanout job execution
 */

import type { AxisValues } from "../matrix/types.js";

export type ExecutorConfig = {
  workspace: string; // Directory steps run in (step cwd is resolved inside it)
  maxLogCapture: number; // Max bytes to capture from stdout/stderr per step
  maxParallelJobs: number; // 0 = unbounded
  killGraceMs: number; // SIGTERM -> SIGKILL grace period
};

export type ProcessResult = {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  // Set when the process could not be started (missing executable, bad cwd)
  spawnError?: string;
};

export type JobState = "pending" | "running" | "succeeded" | "failed";

export type JobStatus = "succeeded" | "failed";

export type FailureReason =
  | "step-failure"
  | "environment-failure"
  | "timed-out"
  | "cancelled";

export type StepResult = {
  index: number;
  name: string;
  status: "succeeded" | "failed" | "skipped";
  exitCode?: number;
  durationMs?: number;
  stdout?: string; // Kept only for the failing step
  stderr?: string;
};

export type JobOutcome = {
  readonly jobIndex: number;
  readonly jobKey: string;
  readonly jobName: string;
  readonly axes: AxisValues;
  readonly tolerant: boolean;
  readonly status: JobStatus;
  readonly failedStepIndex?: number;
  readonly failedStepName?: string;
  readonly reason?: FailureReason;
  readonly error?: string;
  readonly steps: readonly StepResult[];
  readonly startedAt: number;
  readonly completedAt: number;
  readonly durationMs: number;
};

export type RunStatus = "succeeded" | "failed";

export type RunResult = {
  readonly overall: RunStatus;
  readonly jobs: readonly JobOutcome[];
  readonly counts: {
    readonly total: number;
    readonly succeeded: number;
    readonly failed: number;
    readonly toleratedFailures: number;
  };
};
