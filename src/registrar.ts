import { RegistrationError } from './errors';
import { createLogger, type Logger } from './util/log';

export interface FunctionRegistrar {
  apply(statements: string[]): Promise<void>;
}

type Fetch = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRegistrarOptions {
  endpoint: string;
  token?: string;
  fetch?: Fetch;
  logger?: Logger;
}

/** Sends function DDL to the gateway's registration endpoint. */
export class HttpRegistrar implements FunctionRegistrar {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly fetchImpl: Fetch;
  private readonly logger: Logger;

  constructor(options: HttpRegistrarOptions) {
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('registrar');
  }

  async apply(statements: string[]): Promise<void> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ statements })
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RegistrationError(`Could not reach ${this.endpoint}: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RegistrationError(
        `Function registration failed with status ${response.status}: ${text || response.statusText}`
      );
    }
    this.logger.debug(`applied ${statements.length} statement(s) via ${this.endpoint}`);
  }
}
