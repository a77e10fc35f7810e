import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { RunDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Run, ListRunsParams, PaginatedResult } from "../../types.js";
import { mapRunFromDb } from "../../mappers.js";

const logger = createLogger("fanout:domain:run");

type ListRunsBindings = {
  workflowName: string | null;
  status: string | null;
  limit: number;
  offset: number;
};

const FILTER = `(@workflowName IS NULL OR workflow_name = @workflowName)
  AND (@status IS NULL OR status = @status)`;

/**
 * List runs, newest first, with optional filters and pagination
 */
export async function listRuns(
  ctx: DataContext,
  params: ListRunsParams = {},
): Promise<Result<PaginatedResult<Run>, Error>> {
  try {
    const { limit = 20, offset = 0 } = params;
    const bindings: ListRunsBindings = {
      workflowName: params.workflowName ?? null,
      status: params.status ?? null,
      limit,
      offset,
    };

    const countRow = ctx.db
      .prepare<ListRunsBindings, { total: number }>(
        `SELECT COUNT(*) AS total FROM run WHERE ${FILTER}`,
      )
      .get(bindings);

    const rows = ctx.db
      .prepare<ListRunsBindings, RunDbRow>(
        `SELECT * FROM run WHERE ${FILTER}
         ORDER BY created_at DESC, rowid DESC
         LIMIT @limit OFFSET @offset`,
      )
      .all(bindings);

    return success({
      data: rows.map(mapRunFromDb),
      pagination: { total: countRow?.total ?? 0, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list runs", { error, params });
    return failure(toError(error));
  }
}
