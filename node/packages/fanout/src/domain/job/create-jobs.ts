import { v4 as uuidv4 } from "uuid";
import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { JobDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateJobInput, Job } from "../../types.js";
import { mapJobFromDb } from "../../mappers.js";

const logger = createLogger("fanout:domain:job");

type InsertJobBindings = {
  id: string;
  runId: string;
  jobIndex: number;
  jobKey: string;
  name: string;
  axes: string;
  tolerant: number;
  createdAt: number;
};

/**
 * Create the pending job rows of a run in a single transaction
 */
export async function createJobs(
  ctx: DataContext,
  runId: string,
  jobs: readonly CreateJobInput[],
): Promise<Result<Job[], Error>> {
  try {
    const insert = ctx.db.prepare<InsertJobBindings>(
      `INSERT INTO job (id, run_id, job_index, job_key, name, axes, tolerant, status, created_at)
       VALUES (@id, @runId, @jobIndex, @jobKey, @name, @axes, @tolerant, 'pending', @createdAt)`,
    );

    const createdAt = Date.now();
    const insertAll = ctx.db.transaction((items: readonly CreateJobInput[]) => {
      for (const job of items) {
        insert.run({
          id: uuidv4(),
          runId,
          jobIndex: job.index,
          jobKey: job.key,
          name: job.name,
          axes: JSON.stringify(job.axes),
          tolerant: job.tolerant ? 1 : 0,
          createdAt,
        });
      }
    });
    insertAll(jobs);

    const rows = ctx.db
      .prepare<{ runId: string }, JobDbRow>(
        "SELECT * FROM job WHERE run_id = @runId ORDER BY job_index ASC",
      )
      .all({ runId });

    logger.info("Created jobs", { runId, count: rows.length });
    return success(rows.map(mapJobFromDb));
  } catch (error) {
    logger.error("Failed to create jobs", { error, runId });
    return failure(toError(error));
  }
}
