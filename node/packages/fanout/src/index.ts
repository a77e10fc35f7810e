/**
 * Fanout main entry point
 * Exports the orchestration modules for programmatic use and tests.
 * Does NOT start the server on import - use the CLI or call startServer()
 */

export type {
  Run,
  Job,
  RunWithJobs,
  CreateRunInput,
  CreateJobInput,
  UpdateRunInput,
  UpdateJobInput,
  ListRunsParams,
  PaginatedResult,
} from "./types.js";
export type { RunRecordStatus, JobRecordStatus } from "./lib/db/index.js";

export * from "./lib/core/index.js";
export { createLogger } from "./lib/logger/index.js";
export type { Logger, LogLevel, LogContext } from "./lib/logger/index.js";
export {
  createConnection,
  closeConnection,
  runMigrations,
} from "./lib/db/index.js";

// Matrix expansion
export type {
  AxisValue,
  AxisValues,
  MatrixAxis,
  MatrixInclude,
  MatrixDeclaration,
  MatrixCell,
  StepTemplate,
  StepSpec,
  JobSpec,
} from "./matrix/types.js";
export {
  expandMatrix,
  expandJobs,
  jobKey,
  jobName,
} from "./matrix/expand-matrix.js";
export type { ExpandJobsInput } from "./matrix/expand-matrix.js";
export { interpolateMatrix } from "./matrix/interpolate.js";

// Workflows
export type {
  TriggerKind,
  TriggerEvent,
  Workflow,
  WorkflowSummary,
} from "./workflow/types.js";
export {
  parseWorkflow,
  loadWorkflow,
  isTriggeredBy,
  expandWorkflow,
} from "./workflow/load-workflow.js";
export { discoverWorkflows, getWorkflow } from "./workflow/workflow-discovery.js";

// Execution
export type {
  ExecutorConfig,
  ProcessResult,
  JobState,
  JobStatus,
  FailureReason,
  StepResult,
  JobOutcome,
  RunStatus,
  RunResult,
} from "./executor/types.js";
export {
  executeJob,
  buildJobEnv,
  spawnStep,
} from "./executor/job-executor.js";
export type {
  StepRunner,
  StepRunContext,
  JobExecutionInput,
} from "./executor/job-executor.js";
export { runWorkflow } from "./executor/orchestrator.js";
export type {
  OrchestratorContext,
  RunWorkflowInput,
  RunWorkflowOutput,
} from "./executor/orchestrator.js";
export { startRun, waitForAllRuns } from "./executor/start-run.js";
export { JobProcessRegistry } from "./executor/process-registry.js";
export * as processSpawn from "./executor/process-spawn.js";
export * as security from "./executor/security.js";

// Scheduling and aggregation
export {
  scheduleJobs,
  cancelledOutcome,
  JobStateTracker,
} from "./scheduler/job-scheduler.js";
export type {
  SchedulerPolicy,
  SchedulerHooks,
  JobExecutor,
} from "./scheduler/job-scheduler.js";
export { aggregateOutcomes } from "./aggregator/aggregate-outcomes.js";
export {
  renderTextReport,
  renderJsonReport,
  renderPlan,
} from "./report/render-report.js";

// Persistence and HTTP
export type { DataContext } from "./domain/data-context.js";
export { createRun } from "./domain/run/create-run.js";
export { getRun } from "./domain/run/get-run.js";
export { listRuns } from "./domain/run/list-runs.js";
export { updateRun } from "./domain/run/update-run.js";
export { createJobs } from "./domain/job/create-jobs.js";
export { updateJob } from "./domain/job/update-job.js";
export { failInterruptedWork, INTERRUPTED_ERROR } from "./startup/cleanup.js";
export { createApp } from "./server.js";
