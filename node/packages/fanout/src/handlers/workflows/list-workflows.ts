import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { discoverWorkflows } from "../../workflow/workflow-discovery.js";

const logger = createLogger("fanout:handlers:workflows:list");

/**
 * GET /api/v1/workflows - List loadable workflows
 */
export function listWorkflowsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const workflows = await discoverWorkflows(ctx.workflowsRoot);
      res.json({
        data: workflows.map((workflow) => ({
          name: workflow.name,
          on: workflow.on,
        })),
      });
    } catch (error) {
      logger.error("Error listing workflows", { error });
      res.status(500).json({ error: "Internal server error" });
    }
  };
}
