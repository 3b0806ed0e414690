import { z } from 'zod';
import { ConfigError } from './errors';

export interface AppConfig {
  listenPort: number;
  listenHost: string;
  baseUrl: string;
  basePath: string;
  notebookServerId: string;
  appToken?: string;
  userToken?: string;
  isLocalDev: boolean;
  runningInteractively: boolean;
  workloadType?: string;
  gatewayEnabled: boolean;
  gatewayEndpoint?: string;
  registrationEndpoint?: string;
}

type Env = Record<string, string | undefined>;

const ENV = {
  listenPort: 'UDF_APP_LISTEN_PORT',
  listenHost: 'UDF_APP_LISTEN_HOST',
  baseUrl: 'UDF_APP_BASE_URL',
  basePath: 'UDF_APP_BASE_PATH',
  notebookServerId: 'UDF_NOTEBOOK_SERVER_ID',
  appToken: 'UDF_APP_TOKEN',
  userToken: 'UDF_USER_TOKEN',
  isLocalDev: 'UDF_IS_LOCAL_DEV',
  runningInteractively: 'UDF_RUNNING_INTERACTIVELY',
  workloadType: 'UDF_WORKLOAD_TYPE',
  gatewayEnabled: 'UDF_GATEWAY_ENABLED',
  gatewayEndpoint: 'UDF_GATEWAY_ENDPOINT',
  registrationEndpoint: 'UDF_REGISTRATION_ENDPOINT'
} as const;

const INTERACTIVE_WORKLOAD = 'InteractiveNotebook';

const Port = z.coerce.number().int().min(0).max(65535);
const Url = z.string().url();

export function normalizeBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseWith<T>(schema: z.ZodType<T>, name: string, value: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(`Invalid environment variable ${name}: ${reason}`);
  }
  return result.data;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const isLocalDev = normalizeBoolean(read(env, ENV.isLocalDev), false);

  const required: string[] = [
    ENV.listenPort,
    ENV.baseUrl,
    ENV.basePath,
    ENV.notebookServerId,
    isLocalDev ? ENV.userToken : ENV.appToken
  ];
  const missing = required.filter((name) => read(env, name) === undefined);

  const gatewayEndpoint = read(env, ENV.gatewayEndpoint);
  const gatewayEnabled = normalizeBoolean(read(env, ENV.gatewayEnabled), gatewayEndpoint !== undefined);
  if (gatewayEnabled && gatewayEndpoint === undefined) {
    missing.push(ENV.gatewayEndpoint);
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variables: ${missing.join(', ')}`);
  }

  const workloadType = read(env, ENV.workloadType);
  const registrationEndpoint = read(env, ENV.registrationEndpoint);

  return {
    listenPort: parseWith(Port, ENV.listenPort, read(env, ENV.listenPort) ?? ''),
    listenHost: read(env, ENV.listenHost) ?? '0.0.0.0',
    baseUrl: parseWith(Url, ENV.baseUrl, read(env, ENV.baseUrl) ?? ''),
    basePath: normalizeBasePath(read(env, ENV.basePath) ?? ''),
    notebookServerId: read(env, ENV.notebookServerId) ?? '',
    appToken: read(env, ENV.appToken),
    userToken: read(env, ENV.userToken),
    isLocalDev,
    runningInteractively: normalizeBoolean(
      read(env, ENV.runningInteractively),
      workloadType === INTERACTIVE_WORKLOAD
    ),
    workloadType,
    gatewayEnabled,
    gatewayEndpoint:
      gatewayEndpoint === undefined ? undefined : parseWith(Url, ENV.gatewayEndpoint, gatewayEndpoint),
    registrationEndpoint:
      registrationEndpoint === undefined
        ? undefined
        : parseWith(Url, ENV.registrationEndpoint, registrationEndpoint)
  };
}

export function normalizeBasePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  if (trimmed === '') return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Public URL the gateway routes to this process's functions. */
export function gatewayUrl(config: AppConfig): string {
  if (!config.gatewayEnabled || config.gatewayEndpoint === undefined) {
    throw new ConfigError('Gateway endpoint is not configured');
  }
  const base = `${stripTrailingSlash(config.gatewayEndpoint)}/udfs/${encodeURIComponent(config.notebookServerId)}`;
  return config.runningInteractively ? `${base}/interactive` : base;
}

export function registrationEndpoint(config: AppConfig): string {
  if (config.registrationEndpoint !== undefined) return config.registrationEndpoint;
  if (config.gatewayEndpoint === undefined) {
    throw new ConfigError(`${ENV.registrationEndpoint} or ${ENV.gatewayEndpoint} must be set`);
  }
  return `${stripTrailingSlash(config.gatewayEndpoint)}/functions`;
}

export function registrationToken(config: AppConfig): string | undefined {
  return config.isLocalDev ? config.userToken : config.appToken ?? config.userToken;
}
