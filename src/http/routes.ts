import type { Context, Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { ulid } from 'ulid';
import { z } from 'zod';
import { CreateStatementQuery, FunctionPath, InvokeBody } from './dto';
import { RequestError, UdfArgumentError, UdfNotFoundError } from '../errors';
import type { UdfApplication } from '../application';
import type { Logger } from '../util/log';

export const MAX_BODY_BYTES = 16 * 1024 * 1024;

type ErrorStatus = 400 | 404 | 413 | 500;

export function registerRoutes(app: Hono, host: UdfApplication, log: Logger): Hono {
  app.use('*', async (c, next) => {
    const requestId = ulid();
    await next();
    c.res.headers.set('x-request-id', requestId);
  });

  if (log.enabled('info')) {
    app.use('*', requestLogger((line, ...rest) => log.info(line, ...rest)));
  }

  app.get('/status', (c) => c.json({ status: 'ok', functions: host.registry.size }));

  app.get('/functions', (c) => c.json({ functions: host.getFunctionInfo() }));

  app.get('/functions/:name', (c) => {
    const { name } = FunctionPath.parse({ name: c.req.param('name') });
    const info = host.getFunctionInfo()[name];
    if (!info) {
      return c.json({ message: `Function '${name}' is not registered` }, 404);
    }
    return c.json(info);
  });

  app.get('/functions/:name/create', (c) => {
    const { name } = FunctionPath.parse({ name: c.req.param('name') });
    const { replace } = CreateStatementQuery.parse(c.req.query());
    return c.json({ statement: host.createStatement(name, { replace }) });
  });

  app.post('/invoke/:name', async (c) => {
    const { name } = FunctionPath.parse({ name: c.req.param('name') });
    const body = await readJson(c, InvokeBody);
    const data = await host.invoke(name, body.data);
    return c.json({ data });
  });

  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) {
      log.error(`${c.req.method} ${c.req.path} failed: ${err.message}`);
    } else {
      log.debug(`${c.req.method} ${c.req.path} rejected: ${err.message}`);
    }
    return c.json({ message: err.message }, status);
  });

  return app;
}

function statusFor(err: Error): ErrorStatus {
  if (err instanceof RequestError) return err.status;
  if (err instanceof UdfArgumentError || err instanceof z.ZodError) return 400;
  if (err instanceof UdfNotFoundError) return 404;
  return 500;
}

async function readJson<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const lengthHeader = c.req.header('content-length');
  if (lengthHeader && Number(lengthHeader) > MAX_BODY_BYTES) {
    throw new RequestError('Payload too large', 413);
  }
  const arrayBuffer = await c.req.arrayBuffer();
  if (arrayBuffer.byteLength > MAX_BODY_BYTES) {
    throw new RequestError('Payload too large', 413);
  }
  if (arrayBuffer.byteLength === 0) {
    throw new RequestError('Request body is required');
  }
  const decoded = Buffer.from(arrayBuffer).toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoded);
  } catch {
    throw new RequestError('Request body must be valid JSON');
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new RequestError(`Invalid request body: ${reason}`);
  }
  return result.data;
}
