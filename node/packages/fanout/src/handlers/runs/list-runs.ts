import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { listRuns } from "../../domain/run/list-runs.js";

const logger = createLogger("fanout:handlers:runs:list");

export const listRunsQuerySchema = z.object({
  workflowName: z.string().min(1).optional(),
  status: z.enum(["pending", "running", "succeeded", "failed"]).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

/**
 * GET /api/v1/runs - List runs with pagination
 */
export function listRunsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listRunsQuerySchema.parse(req.query);

      const result = await listRuns(ctx, params);

      if (!result.success) {
        logger.warn("Failed to list runs", { error: result.error.message });
        res.status(500).json({ error: result.error.message });
        return;
      }

      res.json(result.data);
    } catch (error) {
      if (error instanceof z.ZodError) {
        res
          .status(400)
          .json({ error: "Invalid query", details: error.errors });
        return;
      }
      logger.error("Error listing runs", { error });
      res.status(500).json({ error: "Internal server error" });
    }
  };
}
