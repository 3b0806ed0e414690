import { z } from 'zod';
import { UdfDefinitionError } from './errors';
import type {
  FunctionParameter,
  FunctionSignature,
  SqlColumnType,
  SqlType,
  UdfDefinition
} from './types';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function baseType(schema: z.ZodTypeAny): SqlType | undefined {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum || schema instanceof z.ZodNativeEnum) {
    return 'TEXT';
  }
  if (schema instanceof z.ZodNumber) {
    return schema.isInt ? 'BIGINT' : 'DOUBLE';
  }
  if (schema instanceof z.ZodBoolean) {
    return 'BOOL';
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === 'string') return 'TEXT';
    if (typeof value === 'number') return Number.isInteger(value) ? 'BIGINT' : 'DOUBLE';
    if (typeof value === 'boolean') return 'BOOL';
    return undefined;
  }
  if (
    schema instanceof z.ZodArray ||
    schema instanceof z.ZodObject ||
    schema instanceof z.ZodRecord ||
    schema instanceof z.ZodTuple
  ) {
    return 'JSON';
  }
  return undefined;
}

/** Maps a zod schema onto the SQL column type the database sees. */
export function sqlTypeOf(schema: z.ZodTypeAny, nullable = false): SqlColumnType {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return sqlTypeOf(schema.unwrap(), true);
  }
  if (schema instanceof z.ZodDefault) {
    return sqlTypeOf(schema.removeDefault(), nullable);
  }
  if (schema instanceof z.ZodEffects) {
    return sqlTypeOf(schema.innerType(), nullable);
  }
  if (schema instanceof z.ZodBranded || schema instanceof z.ZodReadonly) {
    return sqlTypeOf(schema.unwrap(), nullable);
  }
  const sqlType = baseType(schema);
  if (!sqlType) {
    throw new UdfDefinitionError(`Cannot map schema type '${schema.constructor.name}' to a SQL type`);
  }
  return { sqlType, nullable };
}

function columnText({ sqlType, nullable }: SqlColumnType): string {
  return `${sqlType} ${nullable ? 'NULL' : 'NOT NULL'}`;
}

export function describeFunction(definition: Pick<UdfDefinition, 'name' | 'args' | 'returns'>): FunctionSignature {
  const args: FunctionParameter[] = Object.entries(definition.args).map(([name, schema]) => {
    if (!isIdentifier(name)) {
      throw new UdfDefinitionError(`Invalid argument name '${name}' for function '${definition.name}'`);
    }
    return { name, ...sqlTypeOf(schema) };
  });
  const returns = sqlTypeOf(definition.returns);
  const params = args.map((arg) => `${arg.name} ${columnText(arg)}`).join(', ');
  return {
    args,
    returns,
    signature: `${definition.name}(${params}) RETURNS ${columnText(returns)}`
  };
}

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function createFunctionStatement(
  definition: Pick<UdfDefinition, 'name' | 'args' | 'returns'>,
  endpoint: string,
  options: { replace?: boolean } = {}
): string {
  const { args, returns } = describeFunction(definition);
  const params = args.map((arg) => `${quoteIdentifier(arg.name)} ${columnText(arg)}`).join(', ');
  const create = (options.replace ?? true) ? 'CREATE OR REPLACE EXTERNAL FUNCTION' : 'CREATE EXTERNAL FUNCTION';
  return (
    `${create} ${quoteIdentifier(definition.name)}(${params}) ` +
    `RETURNS ${columnText(returns)} ` +
    `AS REMOTE SERVICE ${quoteString(endpoint)} FORMAT JSON`
  );
}
