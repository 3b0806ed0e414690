import { performance } from 'node:perf_hooks';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  UdfArgumentError,
  UdfDefinitionError,
  UdfExecutionError,
  UdfNotFoundError
} from '../src/errors';
import { FunctionRegistry, udf } from '../src/registry';
import { createLogger } from '../src/util/log';

function createRegistry() {
  return new FunctionRegistry(createLogger('registry', 'critical'));
}

describe('udf', () => {
  it('returns a callable that runs the function directly', () => {
    const registry = createRegistry();
    const smoke = udf({ args: {}, returns: z.string() }, function smoke_test() {
      return 'smoke';
    }, registry);

    expect(typeof smoke).toBe('function');
    expect(smoke({})).toBe('smoke');
    expect(smoke.definition.name).toBe('smoke_test');
    expect(registry.has('smoke_test')).toBe(true);
  });

  it('prefers an explicit name', () => {
    const registry = createRegistry();
    udf({ name: 'double_it', args: { x: z.number() }, returns: z.number() }, ({ x }) => x * 2, registry);
    expect(registry.list().map((definition) => definition.name)).toEqual(['double_it']);
  });

  it('requires a name', () => {
    expect(() => udf({ args: {}, returns: z.string() }, () => 'anonymous', createRegistry())).toThrow(
      UdfDefinitionError
    );
  });

  it('rejects names that are not identifiers', () => {
    expect(() =>
      udf({ name: 'drop table', args: {}, returns: z.string() }, () => 'x', createRegistry())
    ).toThrow("Invalid function name 'drop table'");
  });

  it('rejects schemas without a SQL type at declaration', () => {
    expect(() =>
      udf({ name: 'when', args: { at: z.date() }, returns: z.string() }, () => 'x', createRegistry())
    ).toThrow(UdfDefinitionError);
  });

  it('replaces an earlier declaration of the same name', async () => {
    const registry = createRegistry();
    udf({ name: 'version', args: {}, returns: z.number() }, () => 1, registry);
    udf({ name: 'version', args: {}, returns: z.number() }, () => 2, registry);

    expect(registry.size).toBe(1);
    await expect(registry.call('version', [])).resolves.toBe(2);
  });
});

describe('FunctionRegistry', () => {
  it('invokes registered functions with positional arguments', async () => {
    const registry = createRegistry();
    udf(
      { name: 'add', args: { a: z.number().int(), b: z.number().int() }, returns: z.number().int() },
      ({ a, b }) => a + b,
      registry
    );

    await expect(registry.call('add', [2, 3])).resolves.toBe(5);
  });

  it('runs async functions', async () => {
    const registry = createRegistry();
    udf(
      { name: 'shout', args: { text: z.string() }, returns: z.string() },
      async ({ text }) => text.toUpperCase(),
      registry
    );

    await expect(registry.call('shout', ['hey'])).resolves.toBe('HEY');
  });

  it('throws for unknown functions', async () => {
    await expect(createRegistry().call('not_registered', [])).rejects.toBeInstanceOf(UdfNotFoundError);
  });

  it('refuses duplicate registration without replace', () => {
    const registry = createRegistry();
    const definition = udf({ name: 'once', args: {}, returns: z.string().nullable() }, () => null, registry).definition;

    expect(() => registry.register(definition)).toThrow("Function 'once' already registered");
    expect(() => registry.register(definition, { replace: true })).not.toThrow();
  });

  it('checks the number of arguments', async () => {
    const registry = createRegistry();
    udf({ name: 'inc', args: { x: z.number() }, returns: z.number() }, ({ x }) => x + 1, registry);

    await expect(registry.call('inc', [1, 2])).rejects.toThrow(
      "Function 'inc' expects 1 argument(s), received 2"
    );
  });

  it('validates arguments against their schemas', async () => {
    const registry = createRegistry();
    udf({ name: 'inc', args: { x: z.number() }, returns: z.number() }, ({ x }) => x + 1, registry);

    const call = registry.call('inc', ['one']);
    await expect(call).rejects.toBeInstanceOf(UdfArgumentError);
    await expect(call).rejects.toThrow(
      "Invalid arguments for function 'inc': x: Expected number, received string"
    );
  });

  it('validates arguments of directly registered definitions', async () => {
    const registry = createRegistry();
    let ran = false;
    registry.register({
      name: 'echo',
      args: { x: z.number() },
      returns: z.string(),
      timeoutMs: 1000,
      handler: (args) => {
        ran = true;
        return String(args.x);
      }
    });

    const call = registry.call('echo', ['not-a-number']);
    await expect(call).rejects.toBeInstanceOf(UdfArgumentError);
    await expect(call).rejects.toThrow(
      "Invalid arguments for function 'echo': x: Expected number, received string"
    );
    expect(ran).toBe(false);
    await expect(registry.call('echo', [7])).resolves.toBe('7');
  });

  it('rejects BIGINT arguments past the safe integer range', async () => {
    const registry = createRegistry();
    udf({ name: 'same', args: { n: z.number().int() }, returns: z.number().int() }, ({ n }) => n, registry);

    const call = registry.call('same', [2 ** 53]);
    await expect(call).rejects.toBeInstanceOf(UdfArgumentError);
    await expect(call).rejects.toThrow("Argument 'n' of function 'same' is outside the safe integer range");
    await expect(registry.call('same', [Number.MAX_SAFE_INTEGER])).resolves.toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects BIGINT results past the safe integer range', async () => {
    const registry = createRegistry();
    udf({ name: 'grow', args: { n: z.number().int() }, returns: z.number().int() }, ({ n }) => n * 4, registry);

    const call = registry.call('grow', [Number.MAX_SAFE_INTEGER]);
    await expect(call).rejects.toBeInstanceOf(UdfExecutionError);
    await expect(call).rejects.toThrow(
      "Function 'grow' returned 36028797018963964, outside the safe integer range"
    );
  });

  it('validates the returned value', async () => {
    const registry = createRegistry();
    registry.register({ name: 'broken', args: {}, returns: z.number(), timeoutMs: 1000, handler: () => 'not a number' });

    await expect(registry.call('broken', [])).rejects.toThrow(
      "Function 'broken' returned an invalid value: Expected number, received string"
    );
  });

  it('maps an undefined result to null for nullable returns', async () => {
    const registry = createRegistry();
    registry.register({
      name: 'nothing',
      args: {},
      returns: z.string().nullable(),
      timeoutMs: 1000,
      handler: () => undefined
    });

    await expect(registry.call('nothing', [])).resolves.toBeNull();
  });

  it('wraps errors thrown by the function', async () => {
    const registry = createRegistry();
    const cause = new Error('boom');
    udf({ name: 'explode', args: {}, returns: z.string() }, () => {
      throw cause;
    }, registry);

    const error = await registry.call('explode', []).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UdfExecutionError);
    expect(error).toMatchObject({ message: "Function 'explode' failed: boom", cause });
  });

  it('enforces the execution timeout', async () => {
    const registry = createRegistry();
    let aborted = false;
    udf(
      { name: 'slow', args: {}, returns: z.string(), timeoutMs: 10 },
      async (_args, { signal }) => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        aborted = signal.aborted;
        return 'done';
      },
      registry
    );

    await expect(registry.call('slow', [])).rejects.toThrow("Function 'slow' timed out after 10ms");
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(aborted).toBe(true);
  });

  it('fails synchronous functions that overrun their budget', async () => {
    const registry = createRegistry();
    udf({ name: 'spin', args: {}, returns: z.string(), timeoutMs: 1 }, () => {
      const end = performance.now() + 20;
      while (performance.now() < end) {
        // busy
      }
      return 'done';
    }, registry);

    const call = registry.call('spin', []);
    await expect(call).rejects.toBeInstanceOf(UdfExecutionError);
    await expect(call).rejects.toThrow(/^Function 'spin' exceeded budget \(\d+\.\d{2}ms\)$/);
  });
});
