import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import {
  UdfAppError,
  UdfArgumentError,
  UdfDefinitionError,
  UdfExecutionError,
  UdfNotFoundError
} from './errors';
import { describeFunction, isIdentifier } from './signature';
import { createLogger, type Logger } from './util/log';
import type {
  ArgSchemas,
  FunctionSignature,
  UdfArgs,
  UdfContext,
  UdfDefinition,
  UdfHandler
} from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

interface RegistryEntry {
  definition: UdfDefinition;
  signature: FunctionSignature;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class FunctionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('registry')) {
    this.logger = logger;
  }

  register(definition: UdfDefinition, options: { replace?: boolean } = {}) {
    if (!isIdentifier(definition.name)) {
      throw new UdfDefinitionError(`Invalid function name '${definition.name}'`);
    }
    if (this.entries.has(definition.name) && !options.replace) {
      throw new UdfDefinitionError(`Function '${definition.name}' already registered`);
    }
    // Fails on schemas that have no SQL counterpart.
    const signature = describeFunction(definition);
    // Re-adding keeps `list()` in the order functions were last declared.
    this.entries.delete(definition.name);
    this.entries.set(definition.name, { definition, signature });
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): UdfDefinition | undefined {
    return this.entries.get(name)?.definition;
  }

  list(): UdfDefinition[] {
    return [...this.entries.values()].map((entry) => entry.definition);
  }

  get size(): number {
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }

  /**
   * Runs `name` with positional arguments, as they arrive in a row. Arguments
   * are checked against the declared schemas before the handler sees them.
   */
  async call(name: string, args: readonly unknown[]): Promise<unknown> {
    const registered = this.entries.get(name);
    if (!registered) {
      throw new UdfNotFoundError(name);
    }
    const { definition: entry, signature } = registered;

    const argNames = Object.keys(entry.args);
    if (args.length !== argNames.length) {
      throw new UdfArgumentError(
        `Function '${name}' expects ${argNames.length} argument(s), received ${args.length}`
      );
    }
    const named = Object.fromEntries(argNames.map((argName, index) => [argName, args[index]]));

    const parsedArgs = z.object(entry.args).safeParse(named);
    if (!parsedArgs.success) {
      throw new UdfArgumentError(`Invalid arguments for function '${name}': ${formatIssues(parsedArgs.error)}`);
    }
    for (const param of signature.args) {
      if (param.sqlType === 'BIGINT' && isUnsafeBigint(named[param.name])) {
        throw new UdfArgumentError(
          `Argument '${param.name}' of function '${name}' is outside the safe integer range`
        );
      }
    }

    const controller = new AbortController();
    const { handler, timeoutMs } = entry;
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        controller.abort();
        reject(new UdfExecutionError(`Function '${name}' timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      timeoutHandle.unref?.();
    });

    const started = performance.now();

    let result: unknown;
    try {
      const output = handler(named, { signal: controller.signal });
      if (output instanceof Promise) {
        output.catch((lateError: unknown) => {
          if (controller.signal.aborted) {
            this.logger.debug(`Function '${name}' rejected after its timeout`, lateError);
          }
        });
        result = await Promise.race([output, timeoutPromise]);
      } else {
        const elapsed = performance.now() - started;
        if (elapsed > timeoutMs) {
          throw new UdfExecutionError(`Function '${name}' exceeded budget (${elapsed.toFixed(2)}ms)`);
        }
        result = output;
      }
    } catch (err) {
      if (err instanceof UdfAppError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new UdfExecutionError(`Function '${name}' failed: ${reason}`, { cause: err });
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }

    let checked = entry.returns.safeParse(result);
    if (!checked.success && result === undefined) {
      checked = entry.returns.safeParse(null);
    }
    if (!checked.success) {
      throw new UdfExecutionError(
        `Function '${name}' returned an invalid value: ${formatIssues(checked.error)}`
      );
    }
    const value: unknown = checked.data ?? null;
    if (signature.returns.sqlType === 'BIGINT' && isUnsafeBigint(value)) {
      throw new UdfExecutionError(`Function '${name}' returned ${String(value)}, outside the safe integer range`);
    }
    return value;
  }
}

export const defaultRegistry = new FunctionRegistry();

export interface UdfOptions<A extends ArgSchemas, R extends z.ZodTypeAny> {
  name?: string;
  args: A;
  returns: R;
  timeoutMs?: number;
}

export type Udf<A extends ArgSchemas, R extends z.ZodTypeAny> = ((
  args: UdfArgs<A>,
  context?: Partial<UdfContext>
) => ReturnType<UdfHandler<A, R>>) & { readonly definition: UdfDefinition };

/**
 * Declares a UDF and adds it to `registry`. Declaring the same name again
 * replaces the earlier function, so re-running a notebook cell is safe.
 *
 * @example
 * const add = udf({ args: { a: z.number().int(), b: z.number().int() }, returns: z.number().int() },
 *   function add({ a, b }) { return a + b; });
 */
export function udf<A extends ArgSchemas, R extends z.ZodTypeAny>(
  options: UdfOptions<A, R>,
  fn: UdfHandler<A, R>,
  registry: FunctionRegistry = defaultRegistry
): Udf<A, R> {
  const name = options.name ?? fn.name;
  if (!name) {
    throw new UdfDefinitionError('A UDF needs a name: pass `name` or use a named function');
  }
  const argsSchema = z.object(options.args);

  const definition: UdfDefinition = {
    name,
    args: options.args,
    returns: options.returns,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    // `call()` has already validated the row, so this only recovers the typed shape.
    handler: (raw, context) => fn(argsSchema.parse(raw), context)
  };
  registry.register(definition, { replace: true });

  const callable = (args: UdfArgs<A>, context?: Partial<UdfContext>) =>
    fn(args, { signal: context?.signal ?? new AbortController().signal });
  return Object.assign(callable, { definition });
}
