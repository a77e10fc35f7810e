import type { Database } from "better-sqlite3";
import {
  JobProcessRegistry,
  type DataContext,
  type ExecutorConfig,
  type StepRunner,
} from "fanout";

export type TestContextOptions = {
  workflowsRoot?: string;
  config?: Partial<ExecutorConfig>;
  runStep?: StepRunner;
};

/**
 * Data context over a test database with small, fast executor defaults
 */
export function createTestContext(
  db: Database,
  options: TestContextOptions = {},
): DataContext {
  return {
    db,
    workflowsRoot: options.workflowsRoot ?? process.cwd(),
    executor: {
      config: {
        workspace: process.cwd(),
        maxLogCapture: 8192,
        maxParallelJobs: 0,
        killGraceMs: 200,
        ...options.config,
      },
      processRegistry: new JobProcessRegistry(),
      ...(options.runStep ? { runStep: options.runStep } : {}),
    },
  };
}
