import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { JobDbRow, RunDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { RunWithJobs } from "../../types.js";
import { mapJobFromDb, mapRunFromDb } from "../../mappers.js";

const logger = createLogger("fanout:domain:run");

/**
 * Get a run with its jobs ordered by job index
 *
 * @returns Result containing the run, or null if it does not exist
 */
export async function getRun(
  ctx: DataContext,
  id: string,
): Promise<Result<RunWithJobs | null, Error>> {
  try {
    const row = ctx.db
      .prepare<{ id: string }, RunDbRow>("SELECT * FROM run WHERE id = @id")
      .get({ id });

    if (!row) {
      logger.debug("Run not found", { id });
      return success(null);
    }

    const jobRows = ctx.db
      .prepare<{ runId: string }, JobDbRow>(
        "SELECT * FROM job WHERE run_id = @runId ORDER BY job_index ASC",
      )
      .all({ runId: id });

    return success({ ...mapRunFromDb(row), jobs: jobRows.map(mapJobFromDb) });
  } catch (error) {
    logger.error("Failed to get run", { error, id });
    return failure(toError(error));
  }
}
