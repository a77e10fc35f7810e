/**
 * Pass/fail matrix report for a run result
 */

import type { JobOutcome, RunResult } from "../executor/types.js";
import type { JobSpec } from "../matrix/types.js";

function statusLabel(job: JobOutcome): string {
  if (job.status === "succeeded") {
    return "ok";
  }
  return job.tolerant ? "FAILED (tolerated)" : "FAILED";
}

function marker(job: JobOutcome): string {
  if (job.status === "succeeded") {
    return "+";
  }
  return job.tolerant ? "~" : "x";
}

function failureDetail(job: JobOutcome): string | undefined {
  if (job.status === "succeeded") {
    return undefined;
  }
  if (job.reason === "cancelled") {
    return "cancelled before start";
  }
  const step =
    job.failedStepIndex !== undefined
      ? `step ${job.failedStepIndex + 1} "${job.failedStepName ?? ""}"`
      : "job";
  const failedStep = job.steps.find((s) => s.index === job.failedStepIndex);
  const exit =
    failedStep?.exitCode !== undefined ? `, exit code ${failedStep.exitCode}` : "";
  const error = job.error !== undefined ? `: ${job.error}` : "";
  return `${step} ${job.reason ?? "failed"}${exit}${error}`;
}

/**
 * Render the run result as a plain-text table, one line per job
 */
export function renderTextReport(workflowName: string, result: RunResult): string {
  const width = Math.max(...result.jobs.map((job) => job.jobName.length), 3);
  const lines = [`Workflow ${workflowName}: ${result.overall.toUpperCase()}`];

  for (const job of result.jobs) {
    const name = job.jobName.padEnd(width);
    const tolerant = job.tolerant ? " [tolerant]" : "";
    lines.push(`  ${marker(job)} ${name}  ${statusLabel(job)}${tolerant}`);
    const detail = failureDetail(job);
    if (detail !== undefined) {
      lines.push(`      ${detail}`);
    }
  }

  const { total, succeeded, failed, toleratedFailures } = result.counts;
  lines.push(
    `${total} job(s): ${succeeded} succeeded, ${failed} failed (${toleratedFailures} tolerated)`,
  );
  return lines.join("\n");
}

/**
 * JSON report: overall status plus each job's axes, tolerance and status
 */
export function renderJsonReport(workflowName: string, result: RunResult): string {
  return JSON.stringify(
    {
      workflow: workflowName,
      overall: result.overall,
      counts: result.counts,
      jobs: result.jobs.map((job) => ({
        name: job.jobName,
        axes: job.axes,
        tolerant: job.tolerant,
        status: job.status,
        ...(job.reason !== undefined ? { reason: job.reason } : {}),
        ...(job.failedStepIndex !== undefined
          ? { failedStepIndex: job.failedStepIndex, failedStepName: job.failedStepName }
          : {}),
        durationMs: job.durationMs,
      })),
    },
    null,
    2,
  );
}

/**
 * Render the expanded jobs of a workflow without running them
 */
export function renderPlan(workflowName: string, jobs: readonly JobSpec[]): string {
  const lines = [`Workflow ${workflowName}: ${jobs.length} job(s)`];
  for (const job of jobs) {
    lines.push(`  ${job.index + 1}. ${job.name}${job.tolerant ? " [tolerant]" : ""}`);
    for (const step of job.steps) {
      const commandLine = [step.command, ...step.args].join(" ");
      lines.push(`      - ${step.name}: ${commandLine}`);
    }
  }
  return lines.join("\n");
}
