/**
 * API types for fanout run history
 */

import type { JobRecordStatus, RunRecordStatus } from "./lib/db/index.js";
import type { AxisValues } from "./matrix/types.js";
import type { FailureReason, StepResult } from "./executor/types.js";
import type { TriggerEvent } from "./workflow/types.js";

// Run domain type (camelCase for API)
export type Run = {
  id: string;
  workflowName: string;
  event: TriggerEvent;
  status: RunRecordStatus;
  error?: string;
  jobCount: number;
  failedCount: number;
  toleratedCount: number;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  durationMs?: number;
};

// Job domain type (camelCase for API)
export type Job = {
  id: string;
  runId: string;
  index: number;
  key: string;
  name: string;
  axes: AxisValues;
  tolerant: boolean;
  status: JobRecordStatus;
  reason?: FailureReason;
  failedStepIndex?: number;
  failedStepName?: string;
  error?: string;
  steps?: StepResult[];
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  durationMs?: number;
};

export type RunWithJobs = Run & { jobs: Job[] };

export type CreateRunInput = {
  workflowName: string;
  event: TriggerEvent;
};

export type CreateJobInput = {
  index: number;
  key: string;
  name: string;
  axes: AxisValues;
  tolerant: boolean;
};

export type UpdateRunInput = {
  status?: RunRecordStatus;
  error?: string;
  jobCount?: number;
  failedCount?: number;
  toleratedCount?: number;
  startedAt?: number;
  completedAt?: number;
};

export type UpdateJobInput = {
  status?: JobRecordStatus;
  reason?: FailureReason;
  failedStepIndex?: number;
  failedStepName?: string;
  error?: string;
  steps?: readonly StepResult[];
  startedAt?: number;
  completedAt?: number;
  durationMs?: number;
};

export type ListRunsParams = {
  workflowName?: string;
  status?: RunRecordStatus;
  limit?: number;
  offset?: number;
};

export type PaginatedResult<T> = {
  data: T[];
  pagination: {
    total: number;
    limit: number;
    offset: number;
  };
};
