import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { RunDbRow, RunRecordStatus } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Run, UpdateRunInput } from "../../types.js";
import { mapRunFromDb } from "../../mappers.js";

const logger = createLogger("fanout:domain:run");

type UpdateRunBindings = {
  id: string;
  status: RunRecordStatus | null;
  error: string | null;
  jobCount: number | null;
  failedCount: number | null;
  toleratedCount: number | null;
  startedAt: number | null;
  completedAt: number | null;
};

/**
 * Update a run. Fields left undefined keep their stored value; duration is
 * derived once both timestamps are known.
 */
export async function updateRun(
  ctx: DataContext,
  id: string,
  input: UpdateRunInput,
): Promise<Result<Run, Error>> {
  try {
    const result = ctx.db
      .prepare<UpdateRunBindings>(
        `UPDATE run SET
           status = COALESCE(@status, status),
           error = COALESCE(@error, error),
           job_count = COALESCE(@jobCount, job_count),
           failed_count = COALESCE(@failedCount, failed_count),
           tolerated_count = COALESCE(@toleratedCount, tolerated_count),
           started_at = COALESCE(@startedAt, started_at),
           completed_at = COALESCE(@completedAt, completed_at),
           duration_ms = CASE
             WHEN COALESCE(@completedAt, completed_at) IS NOT NULL
               AND COALESCE(@startedAt, started_at) IS NOT NULL
             THEN COALESCE(@completedAt, completed_at) - COALESCE(@startedAt, started_at)
             ELSE duration_ms
           END
         WHERE id = @id`,
      )
      .run({
        id,
        status: input.status ?? null,
        error: input.error ?? null,
        jobCount: input.jobCount ?? null,
        failedCount: input.failedCount ?? null,
        toleratedCount: input.toleratedCount ?? null,
        startedAt: input.startedAt ?? null,
        completedAt: input.completedAt ?? null,
      });

    if (result.changes === 0) {
      return failure(new Error(`Run not found: ${id}`));
    }

    const row = ctx.db
      .prepare<{ id: string }, RunDbRow>("SELECT * FROM run WHERE id = @id")
      .get({ id });

    if (!row) {
      return failure(new Error(`Run not found: ${id}`));
    }

    logger.debug("Updated run", { id, status: row.status });
    return success(mapRunFromDb(row));
  } catch (error) {
    logger.error("Failed to update run", { error, id, input });
    return failure(toError(error));
  }
}
