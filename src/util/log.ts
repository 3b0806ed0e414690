import type { LogLevel } from '../types';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50
};

type Sink = (...data: unknown[]) => void;

export interface LogSinks {
  log: Sink;
  error: Sink;
}

/**
 * Console logger that prefixes every line with `[scope]` and drops lines
 * below its level. Warnings and worse go to the error sink.
 */
export class Logger {
  readonly scope: string;
  readonly level: LogLevel;
  private readonly sinks: LogSinks;

  constructor(scope: string, level: LogLevel = 'info', sinks?: LogSinks) {
    this.scope = scope;
    this.level = level;
    this.sinks = sinks ?? {
      log: console.log.bind(console),
      error: console.error.bind(console)
    };
  }

  enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string, ...data: unknown[]) {
    this.write('debug', message, data);
  }

  info(message: string, ...data: unknown[]) {
    this.write('info', message, data);
  }

  warn(message: string, ...data: unknown[]) {
    this.write('warning', message, data);
  }

  error(message: string, ...data: unknown[]) {
    this.write('error', message, data);
  }

  critical(message: string, ...data: unknown[]) {
    this.write('critical', message, data);
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level, this.sinks);
  }

  private write(level: LogLevel, message: string, data: unknown[]) {
    if (!this.enabled(level)) return;
    const sink = SEVERITY[level] >= SEVERITY.warning ? this.sinks.error : this.sinks.log;
    sink(`[${this.scope}] ${message}`, ...data);
  }
}

export function createLogger(scope: string, level: LogLevel = 'info', sinks?: LogSinks): Logger {
  return new Logger(scope, level, sinks);
}
