import { Hono } from 'hono';
import { RegistrationError, UdfNotFoundError } from './errors';
import { registerRoutes } from './http/routes';
import type { FunctionRegistrar } from './registrar';
import { defaultRegistry, FunctionRegistry } from './registry';
import { createFunctionStatement, describeFunction } from './signature';
import type { FunctionInfoMap, JsonValue, LogLevel } from './types';
import { createLogger, type Logger } from './util/log';

export interface UdfApplicationOptions {
  /** Public URL the database reaches this application at. */
  url: string;
  /** Path prefix the proxy forwards requests under. */
  basePath?: string;
  registry?: FunctionRegistry;
  registrar?: FunctionRegistrar;
  logLevel?: LogLevel;
  logger?: Logger;
}

export type InvokeResultRow = [rowId: number, result: unknown];

/**
 * HTTP application exposing every function in a registry as an external
 * function endpoint.
 */
export class UdfApplication {
  readonly url: string;
  readonly basePath: string;
  readonly registry: FunctionRegistry;
  readonly app: Hono;
  private readonly registrar?: FunctionRegistrar;
  private readonly logger: Logger;

  constructor(options: UdfApplicationOptions) {
    this.url = options.url.replace(/\/+$/, '');
    this.basePath = options.basePath ?? '/';
    this.registry = options.registry ?? defaultRegistry;
    this.registrar = options.registrar;
    this.logger = options.logger ?? createLogger('udf-app', options.logLevel);

    const routes = registerRoutes(new Hono(), this, this.logger.child('http'));
    this.app = new Hono();
    this.app.route(this.basePath, routes);
    this.app.notFound((c) => c.json({ message: 'Not Found' }, 404));
  }

  readonly fetch = (request: Request): Response | Promise<Response> => this.app.fetch(request);

  endpointFor(name: string): string {
    return `${this.url}/invoke/${encodeURIComponent(name)}`;
  }

  getFunctionInfo(): FunctionInfoMap {
    const info: FunctionInfoMap = {};
    for (const definition of this.registry.list()) {
      info[definition.name] = {
        ...describeFunction(definition),
        endpoint: this.endpointFor(definition.name)
      };
    }
    return info;
  }

  createStatement(name: string, options: { replace?: boolean } = {}): string {
    const definition = this.registry.get(name);
    if (!definition) {
      throw new UdfNotFoundError(name);
    }
    return createFunctionStatement(definition, this.endpointFor(name), options);
  }

  /** Creates (or replaces) every registered function in the database. */
  async registerFunctions(options: { replace?: boolean } = {}): Promise<string[]> {
    const statements = this.registry
      .list()
      .map((definition) => createFunctionStatement(definition, this.endpointFor(definition.name), options));
    if (statements.length === 0) {
      this.logger.debug('no functions to register');
      return [];
    }
    if (!this.registrar) {
      throw new RegistrationError('No function registrar configured');
    }
    await this.registrar.apply(statements);
    this.logger.info(`registered ${statements.length} function(s)`);
    return statements;
  }

  /** Evaluates one batch of rows; results keep the input order. */
  async invoke(name: string, rows: JsonValue[][]): Promise<InvokeResultRow[]> {
    if (!this.registry.has(name)) {
      throw new UdfNotFoundError(name);
    }
    return Promise.all(
      rows.map(async ([rowId, ...args]): Promise<InvokeResultRow> => [
        Number(rowId),
        await this.registry.call(name, args)
      ])
    );
  }
}
