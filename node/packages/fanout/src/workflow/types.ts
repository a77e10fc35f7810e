import type { z } from "zod";
import type { MatrixDeclaration, StepTemplate } from "../matrix/types.js";
import type { triggerEventSchema, triggerKindSchema } from "./schema.js";

export type TriggerKind = z.infer<typeof triggerKindSchema>;

export type TriggerEvent = z.infer<typeof triggerEventSchema>;

export type Workflow = {
  name: string;
  on: readonly TriggerKind[];
  timeoutMs?: number;
  strategy: {
    failFast: boolean;
    maxParallel: number; // 0 = unbounded
  };
  matrix: MatrixDeclaration;
  steps: readonly StepTemplate[];
};

export type WorkflowSummary = {
  name: string;
  path: string;
  on: readonly TriggerKind[];
};
