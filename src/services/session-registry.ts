import { logDebug } from '../utils/logger.js';
import { TmuxCommandError, type TmuxRunner } from './tmux-client.js';

/** Snapshot source of live tmux session names. */
export interface SessionRegistry {
  /** Empty set when no sessions exist; rejects with {@link RegistryQueryError} when the query itself fails. */
  listSessions(): Promise<ReadonlySet<string>>;
}

export class RegistryQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryQueryError';
  }
}

// What tmux prints on exit status 1 when there is simply nothing running.
const NO_SERVER_PATTERNS = [/no server running/i, /no sessions/i, /error connecting to/i];

function meansNoSessions(err: TmuxCommandError): boolean {
  return err.exitCode === 1 && NO_SERVER_PATTERNS.some((pattern) => pattern.test(err.stderr));
}

export class TmuxSessionRegistry implements SessionRegistry {
  readonly #run: TmuxRunner;

  constructor(run: TmuxRunner) {
    this.#run = run;
  }

  async listSessions(): Promise<ReadonlySet<string>> {
    let stdout: string;
    try {
      ({ stdout } = await this.#run(['list-sessions', '-F', '#{session_name}']));
    } catch (err) {
      if (err instanceof TmuxCommandError && meansNoSessions(err)) {
        void logDebug(`[SessionRegistry] tmux reports no sessions: ${err.stderr}`);
        return new Set();
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RegistryQueryError(`could not list tmux sessions (${reason})`, { cause: err });
    }

    const sessions = new Set(
      stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
    void logDebug(`[SessionRegistry] Found ${sessions.size} session(s): ${[...sessions].join(', ')}`);
    return sessions;
  }
}
