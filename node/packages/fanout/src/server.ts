/**
 * Express application for the run API
 */

import express from "express";
import { createLogger } from "./lib/logger/index.js";
import type { DataContext } from "./domain/data-context.js";
import { createRunsRouter } from "./routes/runs.js";
import { createWorkflowsRouter } from "./routes/workflows.js";

const logger = createLogger("fanout:server");

export function createApp(ctx: DataContext): express.Express {
  const app = express();

  // Request parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug("Request received", {
      method: req.method,
      url: req.url,
      ip: req.ip,
    });
    next();
  });

  // Health check
  app.get("/health", (_req, res) => {
    const services: Record<string, string> = {};

    try {
      ctx.db.prepare("SELECT 1 as ok").get();
      services.database = "connected";
    } catch (error) {
      services.database = "disconnected";
      logger.error("Database health check failed", { error });
    }

    const isHealthy = services.database === "connected";

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      services,
    });
  });

  // API routes
  app.use("/api/v1/runs", createRunsRouter(ctx));
  app.use("/api/v1/workflows", createWorkflowsRouter(ctx));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      // Handle JSON parsing errors
      if (err instanceof SyntaxError && "body" in err) {
        logger.warn("Invalid JSON in request", { error: err.message });
        res.status(400).json({ error: "Invalid JSON in request body" });
        return;
      }

      logger.error("Unhandled error", { error: err });
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}
