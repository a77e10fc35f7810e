/**
 * Mapper functions to convert database rows (snake_case) to domain types (camelCase)
 */

import { z } from "zod";
import type { JobDbRow, RunDbRow } from "./lib/db/index.js";
import type { FailureReason, StepResult } from "./executor/types.js";
import type { AxisValues } from "./matrix/types.js";
import { triggerKindSchema } from "./workflow/schema.js";
import type { Job, Run } from "./types.js";

const axesSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const stepResultsSchema = z.array(
  z.object({
    index: z.number(),
    name: z.string(),
    status: z.enum(["succeeded", "failed", "skipped"]),
    exitCode: z.number().optional(),
    durationMs: z.number().optional(),
    stdout: z.string().optional(),
    stderr: z.string().optional(),
  }),
);

const failureReasonSchema = z.enum([
  "step-failure",
  "environment-failure",
  "timed-out",
  "cancelled",
]);

function parseAxes(text: string): AxisValues {
  return axesSchema.parse(JSON.parse(text));
}

function parseSteps(text: string | null): StepResult[] | undefined {
  return text === null ? undefined : stepResultsSchema.parse(JSON.parse(text));
}

function parseReason(text: string | null): FailureReason | undefined {
  return text === null ? undefined : failureReasonSchema.parse(text);
}

export function mapRunFromDb(row: RunDbRow): Run {
  return {
    id: row.id,
    workflowName: row.workflow_name,
    event: {
      kind: triggerKindSchema.parse(row.event_kind),
      ...(row.event_ref !== null ? { ref: row.event_ref } : {}),
      ...(row.event_sha !== null ? { sha: row.event_sha } : {}),
    },
    status: row.status,
    error: row.error ?? undefined,
    jobCount: row.job_count,
    failedCount: row.failed_count,
    toleratedCount: row.tolerated_count,
    createdAt: row.created_at,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
  };
}

export function mapJobFromDb(row: JobDbRow): Job {
  return {
    id: row.id,
    runId: row.run_id,
    index: row.job_index,
    key: row.job_key,
    name: row.name,
    axes: parseAxes(row.axes),
    tolerant: row.tolerant === 1,
    status: row.status,
    reason: parseReason(row.reason),
    failedStepIndex: row.failed_step_index ?? undefined,
    failedStepName: row.failed_step_name ?? undefined,
    error: row.error ?? undefined,
    steps: parseSteps(row.steps),
    createdAt: row.created_at,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
  };
}
