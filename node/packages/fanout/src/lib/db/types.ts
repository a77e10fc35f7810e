/**
 * Database row types for fanout run history
 */

export type RunRecordStatus = "pending" | "running" | "succeeded" | "failed";

export type JobRecordStatus = "pending" | "running" | "succeeded" | "failed";

// Run table row (exact database schema with snake_case)
export type RunDbRow = {
  id: string;
  workflow_name: string;
  event_kind: string;
  event_ref: string | null;
  event_sha: string | null;
  status: RunRecordStatus;
  error: string | null;
  job_count: number;
  failed_count: number;
  tolerated_count: number;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  duration_ms: number | null;
};

// Job table row; axes and steps are JSON stored as TEXT
export type JobDbRow = {
  id: string;
  run_id: string;
  job_index: number;
  job_key: string;
  name: string;
  axes: string;
  tolerant: number; // SQLite has no boolean: 0 | 1
  status: JobRecordStatus;
  reason: string | null;
  failed_step_index: number | null;
  failed_step_name: string | null;
  error: string | null;
  steps: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  duration_ms: number | null;
};
