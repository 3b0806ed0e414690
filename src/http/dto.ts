import { z } from 'zod';
import type { JsonValue } from '../types';

const JsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValue), z.record(JsonValue)])
);

// One row of a batch: the row id followed by the function's arguments.
export const InvokeRow = z
  .array(JsonValue)
  .min(1, 'row must start with a row id')
  .refine((row) => Number.isSafeInteger(row[0]), 'row id must be a safe integer');

export const InvokeBody = z.object({
  data: z.array(InvokeRow)
});

export type InvokeBody = z.infer<typeof InvokeBody>;

export const FunctionPath = z.object({
  name: z.string().min(1)
});

export const CreateStatementQuery = z.object({
  replace: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value !== 'false')
});
