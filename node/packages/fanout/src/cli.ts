#!/usr/bin/env node
/**
 * Fanout CLI entry point
 * Runs a workflow's matrix locally, prints its plan, or serves the run API
 */

import { Command, InvalidArgumentError } from "commander";
import { resolve } from "path";
import { config as loadEnv } from "dotenv";
import { ConfigurationError, TriggerMismatchError } from "./lib/core/errors.js";
import { createLogger } from "./lib/logger/index.js";
import { loadWorkflow, expandWorkflow } from "./workflow/load-workflow.js";
import { triggerKindSchema } from "./workflow/schema.js";
import { runWorkflow } from "./executor/orchestrator.js";
import { JobProcessRegistry } from "./executor/process-registry.js";
import { renderJsonReport, renderPlan, renderTextReport } from "./report/render-report.js";
import { loadExecutorConfig } from "./config.js";

loadEnv();

const logger = createLogger("fanout:cli");

export const EXIT_FAILED = 1;
export const EXIT_CONFIGURATION = 2;

function parseNonNegativeInt(value: string): string {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return String(parsed);
}

function parseEventKind(value: string): string {
  const parsed = triggerKindSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Expected one of: ${triggerKindSchema.options.join(", ")}.`,
    );
  }
  return parsed.data;
}

function reportConfigurationError(error: ConfigurationError): void {
  console.error(`Configuration error: ${error.message}`);
}

const program = new Command();

program
  .name("fanout")
  .description("Matrix build-and-test orchestrator")
  .version("0.1.0");

program
  .command("run")
  .description("Expand a workflow's matrix and run every job")
  .argument("<file>", "Workflow YAML file")
  .option("-e, --event <kind>", "Trigger event kind", parseEventKind, "push")
  .option("--ref <ref>", "Git ref of the triggering event")
  .option("--sha <sha>", "Commit SHA of the triggering event")
  .option("-w, --workspace <path>", "Directory steps run in")
  .option("--max-parallel <number>", "Maximum concurrent jobs (0 = no limit)", parseNonNegativeInt)
  .option("--json", "Print the report as JSON")
  .option("--log-level <level>", "Log level (debug, info, warn, error, silent)")
  .action(
    async (
      file: string,
      options: {
        event: string;
        ref?: string;
        sha?: string;
        workspace?: string;
        maxParallel?: string;
        json?: boolean;
        logLevel?: string;
      },
    ) => {
      if (options.logLevel) {
        process.env.LOG_LEVEL = options.logLevel;
      }
      if (options.workspace) {
        process.env.FANOUT_WORKSPACE = resolve(options.workspace);
      }

      const processRegistry = new JobProcessRegistry();
      const config = loadExecutorConfig();

      process.once("SIGINT", () => {
        logger.warn("Interrupted, terminating running jobs");
        processRegistry.killAll(config.killGraceMs).then(
          () => process.exit(130),
          (error: unknown) => {
            logger.error("Failed to terminate jobs", { error });
            process.exit(130);
          },
        );
      });

      try {
        const workflow = await loadWorkflow(resolve(file));
        const { result } = await runWorkflow(
          { config, processRegistry },
          {
            workflow,
            event: {
              kind: triggerKindSchema.parse(options.event),
              ...(options.ref ? { ref: options.ref } : {}),
              ...(options.sha ? { sha: options.sha } : {}),
            },
            ...(options.maxParallel !== undefined
              ? { maxParallel: parseInt(options.maxParallel, 10) }
              : {}),
          },
        );

        console.log(
          options.json
            ? renderJsonReport(workflow.name, result)
            : renderTextReport(workflow.name, result),
        );
        process.exitCode = result.overall === "failed" ? EXIT_FAILED : 0;
      } catch (error) {
        if (error instanceof TriggerMismatchError) {
          console.log(`Skipped: ${error.message}`);
          process.exitCode = 0;
          return;
        }
        if (error instanceof ConfigurationError) {
          reportConfigurationError(error);
          process.exitCode = EXIT_CONFIGURATION;
          return;
        }
        throw error;
      }
    },
  );

program
  .command("plan")
  .description("Print the jobs a workflow's matrix expands to")
  .argument("<file>", "Workflow YAML file")
  .option("--json", "Print the jobs as JSON")
  .action(async (file: string, options: { json?: boolean }) => {
    try {
      const workflow = await loadWorkflow(resolve(file));
      const jobs = expandWorkflow(workflow);
      console.log(
        options.json ? JSON.stringify(jobs, null, 2) : renderPlan(workflow.name, jobs),
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        reportConfigurationError(error);
        process.exitCode = EXIT_CONFIGURATION;
        return;
      }
      throw error;
    }
  });

program
  .command("serve")
  .description("Start the HTTP run API")
  .option("-p, --port <number>", "Server port", parseNonNegativeInt)
  .option("-H, --host <host>", "Server host")
  .option("-d, --data-dir <path>", "Data directory for the SQLite database", "./data")
  .option("-f, --workflows <path>", "Workflows root directory", "./workflows")
  .option("-w, --workspace <path>", "Directory steps run in")
  .option("--max-parallel <number>", "Maximum concurrent jobs per run", parseNonNegativeInt)
  .option("--log-level <level>", "Log level (debug, info, warn, error, silent)")
  .action(
    async (options: {
      port?: string;
      host?: string;
      dataDir: string;
      workflows: string;
      workspace?: string;
      maxParallel?: string;
      logLevel?: string;
    }) => {
      // Options override the environment
      process.env.FANOUT_DATA_DIR = resolve(options.dataDir);
      process.env.FANOUT_WORKFLOWS_ROOT = resolve(options.workflows);
      const overrides: Record<string, string | undefined> = {
        FANOUT_SERVER_PORT: options.port,
        FANOUT_SERVER_HOST: options.host,
        FANOUT_WORKSPACE: options.workspace ? resolve(options.workspace) : undefined,
        FANOUT_MAX_PARALLEL_JOBS: options.maxParallel,
        LOG_LEVEL: options.logLevel,
      };
      for (const [name, value] of Object.entries(overrides)) {
        if (value !== undefined) {
          process.env[name] = value;
        }
      }

      const { startServer } = await import("./bin/server.js");
      await startServer();
    },
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Command failed", { error });
  process.exit(1);
});
