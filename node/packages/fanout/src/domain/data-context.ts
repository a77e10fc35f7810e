import type { Database } from "better-sqlite3";
import type { ExecutorConfig } from "../executor/types.js";
import type { JobProcessRegistry } from "../executor/process-registry.js";
import type { StepRunner } from "../executor/job-executor.js";

export type DataContext = {
  db: Database;
  workflowsRoot: string;
  executor: {
    config: ExecutorConfig;
    processRegistry: JobProcessRegistry;
    runStep?: StepRunner;
  };
};
