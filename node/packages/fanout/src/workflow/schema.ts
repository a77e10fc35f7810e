/**
 * Workflow file schema
 */

import { z } from "zod";
import type {
  AxisValue,
  AxisValues,
  MatrixAxis,
  MatrixInclude,
} from "../matrix/types.js";

export const triggerKindSchema = z.enum(["push", "pull_request"]);

export const triggerEventSchema = z.object({
  kind: triggerKindSchema,
  ref: z.string().optional(),
  sha: z.string().optional(),
});

const axisValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// Scalars in YAML (numbers, booleans) are accepted where a string is meant
const stringLikeSchema = axisValueSchema.transform(String);

const stepSchema = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1),
    args: z.array(stringLikeSchema).default([]),
    cwd: z.string().min(1).optional(),
    env: z
      .record(
        z.string().regex(/^[A-Z_][A-Z0-9_]*$/i, "Invalid environment variable name"),
        stringLikeSchema,
      )
      .default({}),
  })
  .strict();

const includeEntrySchema = z
  .record(axisValueSchema)
  .transform((entry, ctx): MatrixInclude => {
    const { tolerant, ...values } = entry;
    if (tolerant === undefined) {
      return { values };
    }
    if (typeof tolerant !== "boolean") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "tolerant must be a boolean",
        path: ["tolerant"],
      });
      return z.NEVER;
    }
    return { values, tolerant };
  });

type ParsedMatrix = {
  axes: MatrixAxis[];
  include: MatrixInclude[];
  exclude: AxisValues[];
};

/**
 * `matrix` maps axis names to value lists; `include` and `exclude` are
 * reserved keys holding lists of cells
 */
const matrixSchema = z
  .record(z.unknown())
  .transform((raw, ctx): ParsedMatrix => {
    const result: ParsedMatrix = { axes: [], include: [], exclude: [] };

    const parseInto = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T | undefined => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: issue.message,
            path: [key, ...issue.path],
          });
        }
        return undefined;
      }
      return parsed.data;
    };

    for (const [key, value] of Object.entries(raw)) {
      if (key === "include") {
        result.include = parseInto(key, z.array(includeEntrySchema), value) ?? [];
      } else if (key === "exclude") {
        result.exclude = parseInto(key, z.array(z.record(axisValueSchema)), value) ?? [];
      } else {
        const values: AxisValue[] | undefined = parseInto(key, z.array(axisValueSchema), value);
        if (values) {
          result.axes.push({ name: key, values });
        }
      }
    }

    return result;
  });

const strategySchema = z
  .object({
    failFast: z.boolean().default(false),
    maxParallel: z.number().int().min(0).default(0),
    matrix: matrixSchema.default({}),
    experimental: z.record(z.array(axisValueSchema)).default({}),
  })
  .strict();

export const workflowFileSchema = z
  .object({
    name: z
      .string()
      .regex(/^[a-zA-Z0-9_-]+$/, "Only alphanumeric, underscore, and hyphen allowed")
      .optional(),
    on: z
      .union([triggerKindSchema, z.array(triggerKindSchema).min(1)])
      .default(["push", "pull_request"])
      .transform((value) => (Array.isArray(value) ? value : [value])),
    timeoutMinutes: z.number().positive().optional(),
    strategy: strategySchema.default({}),
    steps: z.array(stepSchema).min(1),
  })
  .strict();

export type WorkflowFile = z.infer<typeof workflowFileSchema>;
