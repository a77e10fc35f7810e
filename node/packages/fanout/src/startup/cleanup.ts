/**
 * Server startup cleanup
 * Fails runs and jobs left pending or running by a previous process
 */

import type { Database } from "better-sqlite3";
import { createLogger } from "../lib/logger/index.js";

const logger = createLogger("fanout:startup:cleanup");

export const INTERRUPTED_ERROR = "interrupted";

export type CleanupSummary = {
  runs: number;
  jobs: number;
};

/**
 * Mark every unfinished run and job as failed
 *
 * @returns How many runs and jobs were failed
 */
export function failInterruptedWork(db: Database): CleanupSummary {
  const now = Date.now();
  const params = { error: INTERRUPTED_ERROR, completedAt: now };

  const apply = db.transaction((): CleanupSummary => {
    const jobs = db
      .prepare<{ error: string; completedAt: number }>(
        `UPDATE job SET status = 'failed', reason = 'cancelled',
           error = @error, completed_at = @completedAt
         WHERE status IN ('pending', 'running')`,
      )
      .run(params);

    const runs = db
      .prepare<{ error: string; completedAt: number }>(
        `UPDATE run SET status = 'failed', error = @error,
           completed_at = @completedAt,
           duration_ms = CASE WHEN started_at IS NOT NULL
             THEN @completedAt - started_at ELSE NULL END
         WHERE status IN ('pending', 'running')`,
      )
      .run(params);

    return { runs: runs.changes, jobs: jobs.changes };
  });

  const summary = apply();
  logger.info("Failed interrupted work", summary);
  return summary;
}
