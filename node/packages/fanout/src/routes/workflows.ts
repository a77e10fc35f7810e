import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { listWorkflowsHandler } from "../handlers/workflows/list-workflows.js";

export function createWorkflowsRouter(ctx: DataContext): Router {
  const router = Router();
  router.get("/", listWorkflowsHandler(ctx));
  return router;
}
