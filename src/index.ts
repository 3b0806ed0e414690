export { runUdfApp, stopUdfApp } from './run';
export type { RunUdfAppDeps, RunUdfAppOptions, UdfApplicationLike } from './run';
export { UdfConnectionInfo } from './connection-info';
export { UdfApplication } from './application';
export type { InvokeResultRow, UdfApplicationOptions } from './application';
export { udf, FunctionRegistry, defaultRegistry, DEFAULT_TIMEOUT_MS } from './registry';
export type { Udf, UdfOptions } from './registry';
export { HttpRegistrar } from './registrar';
export type { FunctionRegistrar, HttpRegistrarOptions } from './registrar';
export { AwaitableServer, createServer } from './server';
export type { ServerConfig, UdfServer } from './server';
export { loadAppConfig, gatewayUrl } from './config';
export type { AppConfig } from './config';
export { createFunctionStatement, describeFunction, sqlTypeOf } from './signature';
export { killProcessByPort } from './util/process';
export { createLogger, Logger } from './util/log';
export * from './errors';
export { LOG_LEVELS } from './types';
export type {
  ArgSchemas,
  FunctionInfo,
  FunctionInfoMap,
  FunctionParameter,
  FunctionSignature,
  JsonValue,
  LogLevel,
  SqlColumnType,
  SqlType,
  UdfArgs,
  UdfContext,
  UdfDefinition,
  UdfHandler
} from './types';
