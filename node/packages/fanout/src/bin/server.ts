/**
 * Server startup logic
 * Separated from server.ts so the app can be built without side effects
 */

import { mkdirSync } from "fs";
import type { Server } from "http";
import { config as loadEnv } from "dotenv";
import { createLogger } from "../lib/logger/index.js";
import { createConnection, closeConnection, runMigrations } from "../lib/db/index.js";
import type { DataContext } from "../domain/data-context.js";
import { JobProcessRegistry } from "../executor/process-registry.js";
import { waitForAllRuns } from "../executor/start-run.js";
import { failInterruptedWork } from "../startup/cleanup.js";
import { createApp } from "../server.js";
import { loadConfig } from "../config.js";

const logger = createLogger("fanout:server");

/**
 * Start the HTTP API; resolves once the server is listening
 */
export async function startServer(): Promise<Server> {
  loadEnv();
  const config = loadConfig();

  mkdirSync(config.db.dataDir, { recursive: true });
  await runMigrations(config.db.dbPath);

  logger.info("Connecting to SQLite database", { path: config.db.dbPath });
  const db = createConnection(config.db.dbPath);

  // Work left unfinished by a previous process can never complete
  failInterruptedWork(db);

  logger.info("Executor configuration", {
    workflowsRoot: config.workflowsRoot,
    ...config.executor,
  });

  const processRegistry = new JobProcessRegistry();
  const ctx: DataContext = {
    db,
    workflowsRoot: config.workflowsRoot,
    executor: {
      config: config.executor,
      processRegistry,
    },
  };

  const app = createApp(ctx);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.server.port, config.server.host, () => {
      logger.info("Fanout server running", {
        host: config.server.host,
        port: config.server.port,
      });
      resolve(listening);
    });
    listening.on("error", reject);
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close();
    await processRegistry.killAll(config.executor.killGraceMs);
    await waitForAllRuns();
    closeConnection(db);
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((error: unknown) => {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((error: unknown) => {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    });
  });

  return server;
}
