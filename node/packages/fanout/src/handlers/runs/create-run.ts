import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { ConfigurationError } from "../../lib/core/errors.js";
import type { DataContext } from "../../domain/data-context.js";
import { createRun } from "../../domain/run/create-run.js";
import { startRun } from "../../executor/start-run.js";
import { getWorkflow } from "../../workflow/workflow-discovery.js";
import { expandWorkflow, isTriggeredBy } from "../../workflow/load-workflow.js";
import { triggerEventSchema } from "../../workflow/schema.js";

const logger = createLogger("fanout:handlers:runs:create");

// Validation schema
export const createRunSchema = z.object({
  workflowName: z
    .string()
    .min(1)
    .regex(/^[a-zA-Z0-9_-]+$/, "Only alphanumeric, underscore, and hyphen allowed"),
  event: triggerEventSchema,
});

/**
 * POST /api/v1/runs - Trigger a workflow run
 */
export function createRunHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createRunSchema.parse(req.body);

      const workflow = await getWorkflow(ctx.workflowsRoot, input.workflowName);
      if (!workflow) {
        res.status(404).json({ error: "Workflow not found" });
        return;
      }

      if (!isTriggeredBy(workflow, input.event)) {
        res.status(422).json({
          error: `Workflow "${workflow.name}" is not triggered by "${input.event.kind}"`,
        });
        return;
      }

      // Reject configuration errors before anything is stored
      expandWorkflow(workflow);

      const result = await createRun(ctx, {
        workflowName: workflow.name,
        event: input.event,
      });

      if (!result.success) {
        res.status(500).json({ error: result.error.message });
        return;
      }

      const run = result.data;

      // Jobs execute in the background; the response carries the pending run
      startRun(ctx, { runId: run.id, workflow, event: input.event }).catch(
        (error: unknown) => {
          logger.error("Run execution failed", {
            runId: run.id,
            workflow: workflow.name,
            error,
          });
        },
      );

      res.status(201).json(run);
    } catch (error) {
      if (error instanceof z.ZodError) {
        res
          .status(400)
          .json({ error: "Invalid request", details: error.errors });
        return;
      }
      if (error instanceof ConfigurationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      logger.error("Failed to create run", { error });
      res.status(500).json({ error: "Internal server error" });
    }
  };
}
