import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { createLogger, type Logger } from './log';

const execFileAsync = promisify(execFile);

export type ExecFile = (file: string, args: string[]) => Promise<{ stdout: string }>;

export interface KillOptions {
  exec?: ExecFile;
  kill?: (pid: number, signal: NodeJS.Signals) => void;
  platform?: NodeJS.Platform;
  selfPid?: number;
  logger?: Logger;
}

const defaultExec: ExecFile = async (file, args) => {
  const { stdout } = await execFileAsync(file, args);
  return { stdout };
};

function errorCode(err: unknown): string | number | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

function parsePids(lines: Iterable<string>): number[] {
  const pids = new Set<number>();
  for (const line of lines) {
    const pid = Number.parseInt(line.trim(), 10);
    if (Number.isInteger(pid) && pid > 0) pids.add(pid);
  }
  return [...pids];
}

/** Pids of processes with a TCP socket listening on `port`, per netstat output. */
export function parseNetstatListeners(output: string, port: number): number[] {
  const owners: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const columns = line.trim().split(/\s+/);
    // Proto  Local Address  Foreign Address  State  PID
    if (columns.length < 5 || columns[0].toUpperCase() !== 'TCP') continue;
    if (columns[3].toUpperCase() !== 'LISTENING') continue;
    if (!columns[1].endsWith(`:${port}`)) continue;
    owners.push(columns[4]);
  }
  return parsePids(owners);
}

async function findListeners(port: number, platform: NodeJS.Platform, exec: ExecFile, logger: Logger) {
  if (platform === 'win32') {
    const { stdout } = await exec('netstat', ['-ano', '-p', 'tcp']);
    return parseNetstatListeners(stdout, port);
  }
  try {
    const { stdout } = await exec('lsof', ['-t', '-i', `tcp:${port}`, '-sTCP:LISTEN']);
    return parsePids(stdout.split('\n'));
  } catch (err) {
    const code = errorCode(err);
    // lsof exits with 1 when nothing matches.
    if (code === 1) return [];
    if (code === 'ENOENT') {
      logger.warn(`lsof is not installed; cannot free port ${port}`);
      return [];
    }
    throw err;
  }
}

/**
 * Sends SIGTERM to every other process listening on `port` and returns the
 * pids signalled.
 */
export async function killProcessByPort(port: number, options: KillOptions = {}): Promise<number[]> {
  const exec = options.exec ?? defaultExec;
  const kill = options.kill ?? ((pid, signal) => process.kill(pid, signal));
  const platform = options.platform ?? process.platform;
  const selfPid = options.selfPid ?? process.pid;
  const logger = options.logger ?? createLogger('process');

  const pids = (await findListeners(port, platform, exec, logger)).filter((pid) => pid !== selfPid);
  const killed: number[] = [];
  for (const pid of pids) {
    try {
      kill(pid, 'SIGTERM');
      killed.push(pid);
      logger.info(`sent SIGTERM to process ${pid} on port ${port}`);
    } catch (err) {
      if (errorCode(err) !== 'ESRCH') throw err;
      logger.debug(`process ${pid} exited before it could be signalled`);
    }
  }
  return killed;
}
