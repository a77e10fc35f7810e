import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { JobRecordStatus } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { UpdateJobInput } from "../../types.js";

const logger = createLogger("fanout:domain:job");

type UpdateJobBindings = {
  runId: string;
  jobIndex: number;
  status: JobRecordStatus | null;
  reason: string | null;
  failedStepIndex: number | null;
  failedStepName: string | null;
  error: string | null;
  steps: string | null;
  startedAt: number | null;
  completedAt: number | null;
  durationMs: number | null;
};

/**
 * Update a job addressed by its run and position in the expansion
 */
export async function updateJob(
  ctx: DataContext,
  runId: string,
  jobIndex: number,
  input: UpdateJobInput,
): Promise<Result<void, Error>> {
  try {
    const result = ctx.db
      .prepare<UpdateJobBindings>(
        `UPDATE job SET
           status = COALESCE(@status, status),
           reason = COALESCE(@reason, reason),
           failed_step_index = COALESCE(@failedStepIndex, failed_step_index),
           failed_step_name = COALESCE(@failedStepName, failed_step_name),
           error = COALESCE(@error, error),
           steps = COALESCE(@steps, steps),
           started_at = COALESCE(@startedAt, started_at),
           completed_at = COALESCE(@completedAt, completed_at),
           duration_ms = COALESCE(@durationMs, duration_ms)
         WHERE run_id = @runId AND job_index = @jobIndex`,
      )
      .run({
        runId,
        jobIndex,
        status: input.status ?? null,
        reason: input.reason ?? null,
        failedStepIndex: input.failedStepIndex ?? null,
        failedStepName: input.failedStepName ?? null,
        error: input.error ?? null,
        steps: input.steps ? JSON.stringify(input.steps) : null,
        startedAt: input.startedAt ?? null,
        completedAt: input.completedAt ?? null,
        durationMs: input.durationMs ?? null,
      });

    if (result.changes === 0) {
      return failure(new Error(`Job ${jobIndex} not found in run ${runId}`));
    }

    return success(undefined);
  } catch (error) {
    logger.error("Failed to update job", { error, runId, jobIndex });
    return failure(toError(error));
  }
}
