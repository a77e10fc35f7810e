import { v4 as uuidv4 } from "uuid";
import { type Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { RunDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Run, CreateRunInput } from "../../types.js";
import { mapRunFromDb } from "../../mappers.js";

const logger = createLogger("fanout:domain:run");

/**
 * Create a new pending run
 *
 * @param ctx - Data context containing database connection
 * @param input - Workflow name and trigger event
 * @returns Result containing the created run or an error
 */
export async function createRun(
  ctx: DataContext,
  input: CreateRunInput,
): Promise<Result<Run, Error>> {
  try {
    const id = uuidv4();

    ctx.db
      .prepare<{
        id: string;
        workflowName: string;
        eventKind: string;
        eventRef: string | null;
        eventSha: string | null;
        createdAt: number;
      }>(
        `INSERT INTO run (id, workflow_name, event_kind, event_ref, event_sha, status, created_at)
         VALUES (@id, @workflowName, @eventKind, @eventRef, @eventSha, 'pending', @createdAt)`,
      )
      .run({
        id,
        workflowName: input.workflowName,
        eventKind: input.event.kind,
        eventRef: input.event.ref ?? null,
        eventSha: input.event.sha ?? null,
        createdAt: Date.now(),
      });

    const row = ctx.db
      .prepare<{ id: string }, RunDbRow>("SELECT * FROM run WHERE id = @id")
      .get({ id });

    if (!row) {
      return failure(new Error("Failed to retrieve created run"));
    }

    logger.info("Created run", {
      id,
      workflowName: input.workflowName,
      event: input.event.kind,
    });

    return success(mapRunFromDb(row));
  } catch (error) {
    logger.error("Failed to create run", { error, input });
    return failure(toError(error));
  }
}
