import { UdfApplication, type UdfApplicationOptions } from './application';
import { gatewayUrl, loadAppConfig, registrationEndpoint, registrationToken } from './config';
import { UdfConnectionInfo } from './connection-info';
import { GatewayNotEnabledError } from './errors';
import { HttpRegistrar } from './registrar';
import type { FunctionRegistry } from './registry';
import { createServer, type ServerConfig, type UdfServer } from './server';
import type { FunctionInfoMap, LogLevel } from './types';
import { createLogger } from './util/log';
import { killProcessByPort } from './util/process';

export interface RunUdfAppOptions {
  logLevel?: LogLevel;
  /** Terminate whatever else is listening on the app port first. */
  killExistingAppServer?: boolean;
  registry?: FunctionRegistry;
  env?: Record<string, string | undefined>;
}

export interface UdfApplicationLike {
  readonly fetch: ServerConfig['fetch'];
  registerFunctions(options: { replace?: boolean }): Promise<unknown>;
  getFunctionInfo(): FunctionInfoMap;
}

export interface RunUdfAppDeps {
  createServer: (config: ServerConfig) => UdfServer;
  createApplication: (options: UdfApplicationOptions) => UdfApplicationLike;
  killProcessByPort: (port: number) => Promise<unknown>;
}

const defaultDeps: RunUdfAppDeps = {
  createServer,
  createApplication: (options) => new UdfApplication(options),
  killProcessByPort: (port) => killProcessByPort(port)
};

let runningServer: UdfServer | undefined;
// Tail of the start/stop queue; overlapping calls run one after another.
let pending: Promise<unknown> = Promise.resolve();

function enqueue<T>(task: () => Promise<T>): Promise<T> {
  const next = pending.then(task);
  pending = next.then(
    () => undefined,
    () => undefined
  );
  return next;
}

/**
 * Starts an HTTP server exposing the registered UDFs behind the gateway and
 * resolves once it accepts connections. A server started by an earlier call
 * is shut down first.
 */
export function runUdfApp(
  options: RunUdfAppOptions = {},
  deps: Partial<RunUdfAppDeps> = {}
): Promise<UdfConnectionInfo> {
  return enqueue(() => startUdfApp(options, deps));
}

async function startUdfApp(options: RunUdfAppOptions, deps: Partial<RunUdfAppDeps>): Promise<UdfConnectionInfo> {
  const { createServer, createApplication, killProcessByPort } = { ...defaultDeps, ...deps };
  const logLevel = options.logLevel ?? 'info';
  const log = createLogger('udf-app', logLevel);

  const config = loadAppConfig(options.env ?? process.env);
  if (!config.gatewayEnabled) {
    throw new GatewayNotEnabledError();
  }

  if (runningServer) {
    const previous = runningServer;
    runningServer = undefined;
    log.info('shutting down the previous UDF server');
    await previous.shutdown();
  }

  if (options.killExistingAppServer ?? true) {
    await killProcessByPort(config.listenPort);
  }

  const url = gatewayUrl(config);
  const app = createApplication({
    url,
    basePath: config.basePath,
    registry: options.registry,
    registrar: new HttpRegistrar({
      endpoint: registrationEndpoint(config),
      token: registrationToken(config),
      logger: log.child('registrar')
    }),
    logLevel,
    logger: log
  });

  if (config.runningInteractively) {
    await app.registerFunctions({ replace: true });
  }

  const server = createServer({
    fetch: app.fetch,
    port: config.listenPort,
    hostname: config.listenHost,
    logLevel
  });
  server.serve().catch((err: unknown) => {
    log.error('UDF server stopped with an error', err);
  });
  await server.waitForStartup();
  runningServer = server;

  log.info(`UDF server for ${config.baseUrl} published at ${url}`);
  return new UdfConnectionInfo(url, app.getFunctionInfo());
}

/** Shuts down the server started by `runUdfApp`, if any. */
export function stopUdfApp(): Promise<void> {
  return enqueue(async () => {
    const server = runningServer;
    runningServer = undefined;
    await server?.shutdown();
  });
}
