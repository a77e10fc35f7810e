import type { JobOutcome, RunResult } from "../executor/types.js";

/**
 * Fold job outcomes into the run result.
 *
 * The run fails if and only if at least one failed job is not tolerant.
 * Independent of the order outcomes arrive in; the result lists them by
 * job index.
 */
export function aggregateOutcomes(outcomes: readonly JobOutcome[]): RunResult {
  const jobs = [...outcomes].sort((a, b) => a.jobIndex - b.jobIndex);
  const failed = jobs.filter((job) => job.status === "failed");
  const requiredFailures = failed.filter((job) => !job.tolerant);

  return {
    overall: requiredFailures.length > 0 ? "failed" : "succeeded",
    jobs,
    counts: {
      total: jobs.length,
      succeeded: jobs.length - failed.length,
      failed: failed.length,
      toleratedFailures: failed.length - requiredFailures.length,
    },
  };
}
