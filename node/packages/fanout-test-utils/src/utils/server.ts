import type { Server } from "http";
import type { AddressInfo } from "net";
import {
  createApp,
  waitForAllRuns,
  type DataContext,
  type StepRunner,
} from "fanout";
import type { TestDatabase } from "./test-db.js";
import { createTestContext } from "./context.js";
import { type Logger, consoleLogger } from "./test-logger.js";

export interface TestServerOptions {
  database: TestDatabase;
  workflowsRoot: string;
  workspace: string;
  maxParallelJobs?: number;
  maxLogCapture?: number;
  runStep?: StepRunner;
  logger?: Logger;
}

/**
 * Runs the API in-process on an ephemeral port
 */
export class TestServer {
  private server: Server | null = null;
  private ctx: DataContext | null = null;
  private options: TestServerOptions;
  private logger: Logger;

  constructor(options: TestServerOptions) {
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  async start(): Promise<void> {
    this.ctx = createTestContext(this.options.database.getDb(), {
      workflowsRoot: this.options.workflowsRoot,
      config: {
        workspace: this.options.workspace,
        ...(this.options.maxLogCapture !== undefined
          ? { maxLogCapture: this.options.maxLogCapture }
          : {}),
        ...(this.options.maxParallelJobs !== undefined
          ? { maxParallelJobs: this.options.maxParallelJobs }
          : {}),
      },
      ...(this.options.runStep ? { runStep: this.options.runStep } : {}),
    });

    const app = createApp(this.ctx);
    this.server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
      listening.on("error", reject);
    });

    this.logger.info(`Test server listening on ${this.getBaseUrl()}`);
  }

  getBaseUrl(): string {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      throw new Error("Server not started");
    }
    const { port }: AddressInfo = address;
    return `http://127.0.0.1:${port}`;
  }

  getContext(): DataContext {
    if (!this.ctx) throw new Error("Server not started");
    return this.ctx;
  }

  async stop(): Promise<void> {
    // Background runs write to the database; let them settle first
    await waitForAllRuns();
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info("Test server stopped");
  }
}
