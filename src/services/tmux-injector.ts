import { logDebug } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { TmuxRunner } from './tmux-client.js';

/** Types text into a live session and submits it. */
export interface Injector {
  inject(session: string, text: string): Promise<void>;
}

export class InjectionError extends Error {
  readonly session: string;

  constructor(session: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InjectionError';
    this.session = session;
  }
}

/** Gap between the literal text and the Enter key, in ms. */
export const SUBMIT_DELAY_MS = 1000;

export interface TmuxInjectorOptions {
  submitDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** `=name:` makes tmux accept only an exact session-name match. */
export function exactSessionTarget(session: string): string {
  return `=${session}:`;
}

/**
 * tmux reads an argument ending in `;` as a command separator and drops the
 * `;`; a preceding backslash turns it back into a literal.
 */
export function escapeTrailingSemicolon(text: string): string {
  return text.endsWith(';') ? `${text.slice(0, -1)}\\;` : text;
}

/**
 * Injects keystrokes with two separate `send-keys` calls.
 *
 * The receiving program must have buffered the whole text before Enter
 * arrives, otherwise the submit can land first and the text is lost. The pause
 * between the calls is required, not cosmetic.
 */
export class TmuxInjector implements Injector {
  readonly #run: TmuxRunner;
  readonly #submitDelayMs: number;
  readonly #sleep: (ms: number) => Promise<void>;

  constructor(run: TmuxRunner, options: TmuxInjectorOptions = {}) {
    this.#run = run;
    this.#submitDelayMs = options.submitDelayMs ?? SUBMIT_DELAY_MS;
    this.#sleep = options.sleep ?? sleep;
  }

  async inject(session: string, text: string): Promise<void> {
    const target = exactSessionTarget(session);

    try {
      await this.#run(['send-keys', '-t', target, '-l', escapeTrailingSemicolon(text)]);
    } catch (err) {
      throw new InjectionError(session, `failed to type text into ${session}: ${describe(err)}`, { cause: err });
    }

    await this.#sleep(this.#submitDelayMs);

    try {
      await this.#run(['send-keys', '-t', target, 'C-m']);
    } catch (err) {
      throw new InjectionError(session, `text typed into ${session} but Enter was not sent: ${describe(err)}`, {
        cause: err,
      });
    }

    void logDebug(`[Injector] Submitted ${text.length} chars to ${session}`);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
