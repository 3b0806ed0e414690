import { serve } from '@hono/node-server';
import type { AddressInfo, Server } from 'node:net';
import type { LogLevel } from './types';
import { createLogger, type Logger } from './util/log';

export interface ServerConfig {
  fetch: (request: Request) => Response | Promise<Response>;
  port: number;
  hostname?: string;
  logLevel?: LogLevel;
}

export interface UdfServer {
  /** Starts listening; settles once the server has closed. */
  serve(): Promise<void>;
  waitForStartup(): Promise<void>;
  shutdown(): Promise<void>;
}

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * A node HTTP server whose startup and shutdown can be awaited separately
 * from the serving loop.
 */
export class AwaitableServer implements UdfServer {
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private server?: Server;
  private boundPort?: number;
  private readonly started = deferred();
  private closed?: Promise<void>;

  constructor(config: ServerConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger ?? createLogger('server', config.logLevel);
    // serve() reports the same error to its own caller.
    this.started.promise.catch((err: unknown) => this.logger.debug('startup failed', err));
  }

  get port(): number | undefined {
    return this.boundPort;
  }

  serve(): Promise<void> {
    if (this.closed) return this.closed;
    const { fetch, port, hostname } = this.config;

    this.closed = new Promise<void>((resolve, reject) => {
      const server: Server = serve({ fetch, port, hostname }, (info: AddressInfo) => {
        this.boundPort = info.port;
        this.logger.info(`listening on http://${hostname ?? 'localhost'}:${info.port}`);
        this.started.resolve();
      });
      this.server = server;
      server.once('error', (err: Error) => {
        this.logger.error(`server error: ${err.message}`);
        this.started.reject(err);
        reject(err);
      });
      server.once('close', () => {
        this.logger.debug('server closed');
        resolve();
      });
    });
    return this.closed;
  }

  waitForStartup(): Promise<void> {
    return this.started.promise;
  }

  async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => {
        if (err && !('code' in err && err.code === 'ERR_SERVER_NOT_RUNNING')) {
          reject(err);
          return;
        }
        resolve();
      });
    });
    this.logger.info('server stopped');
  }
}

export function createServer(config: ServerConfig): UdfServer {
  return new AwaitableServer(config);
}
