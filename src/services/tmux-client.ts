import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logSystemCommand } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 10_000;

export interface TmuxResult {
  stdout: string;
  stderr: string;
}

/** Runs one tmux subcommand. Rejects with {@link TmuxCommandError}. */
export type TmuxRunner = (args: readonly string[]) => Promise<TmuxResult>;

export interface TmuxRunnerOptions {
  binary?: string;
  timeoutMs?: number;
}

interface ExecError extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  killed?: boolean;
}

export class TmuxCommandError extends Error {
  readonly args: readonly string[];
  /** Exit status, or null when the process never ran or was killed. */
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], message: string, details: { exitCode: number | null; stderr: string }) {
    super(message);
    this.name = 'TmuxCommandError';
    this.args = args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

function isExecError(err: unknown): err is ExecError {
  return err instanceof Error;
}

/**
 * The listener itself may run inside tmux; dropping `TMUX` makes every call
 * talk to the user's default server rather than the one hosting the listener.
 */
function userServerEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  delete env.TMUX;
  return env;
}

function toCommandError(binary: string, args: readonly string[], err: unknown): TmuxCommandError {
  if (!isExecError(err)) {
    return new TmuxCommandError(args, String(err), { exitCode: null, stderr: '' });
  }

  const stderr = (err.stderr ?? '').trim();
  if (err.code === 'ENOENT') {
    return new TmuxCommandError(args, `${binary} is not installed or not on PATH`, {
      exitCode: null,
      stderr,
    });
  }
  if (err.killed) {
    return new TmuxCommandError(args, `${binary} ${args[0] ?? ''} timed out`, {
      exitCode: null,
      stderr,
    });
  }

  const exitCode = typeof err.code === 'number' ? err.code : null;
  const reason = stderr || err.message;
  return new TmuxCommandError(args, `${binary} ${args[0] ?? ''} failed: ${reason}`, {
    exitCode,
    stderr,
  });
}

/** Build a runner that shells out to tmux with `execFile` (no shell involved). */
export function createTmuxRunner(options: TmuxRunnerOptions = {}): TmuxRunner {
  const binary = options.binary ?? 'tmux';
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (args) => {
    void logSystemCommand(binary, args);
    try {
      const { stdout, stderr } = await execFileAsync(binary, [...args], {
        env: userServerEnv(),
        timeout,
        encoding: 'utf8',
      });
      return { stdout, stderr };
    } catch (err) {
      throw toCommandError(binary, args, err);
    }
  };
}

/** Name of the tmux session the current process runs in, or null outside tmux. */
export async function resolveCurrentSession(run: TmuxRunner, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (!env.TMUX) return null;
  const paneTarget = env.TMUX_PANE;
  const args = paneTarget
    ? ['display-message', '-p', '-t', paneTarget, '#S']
    : ['display-message', '-p', '#S'];
  const { stdout } = await run(args);
  const name = stdout.trim();
  return name.length > 0 ? name : null;
}
