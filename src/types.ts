import type { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error', 'critical'];

export type SqlType = 'BOOL' | 'BIGINT' | 'DOUBLE' | 'TEXT' | 'JSON';

export interface SqlColumnType {
  sqlType: SqlType;
  nullable: boolean;
}

export interface FunctionParameter extends SqlColumnType {
  name: string;
}

export type ArgSchemas = Record<string, z.ZodTypeAny>;

export type UdfArgs<A extends ArgSchemas> = z.objectOutputType<A, z.ZodTypeAny, 'strip'>;

export interface UdfContext {
  signal: AbortSignal;
}

export type UdfHandler<A extends ArgSchemas, R extends z.ZodTypeAny> = (
  args: UdfArgs<A>,
  context: UdfContext
) => z.input<R> | Promise<z.input<R>>;

/**
 * A declared function as the registry stores it. The registry checks the
 * argument object against `args` before it reaches the handler.
 */
export interface UdfDefinition {
  name: string;
  args: ArgSchemas;
  returns: z.ZodTypeAny;
  timeoutMs: number;
  handler: (args: Record<string, unknown>, context: UdfContext) => unknown;
}

export interface FunctionSignature {
  args: FunctionParameter[];
  returns: SqlColumnType;
  signature: string;
}

export interface FunctionInfo extends FunctionSignature {
  endpoint: string;
}

export type FunctionInfoMap = Record<string, FunctionInfo>;
