import type { DeliveryOutcome, Notifier, Update, UpdateSource } from '../types/messaging.js';
import type { AuditSink } from '../services/audit-log.js';
import { advanceCursor, type ListenerState, type StateStore } from '../services/listener-state.js';
import { formatOutcome } from '../services/message-router.js';
import { logDebug, logError, logThought, logWarning } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';

/** Phases of one listener cycle; backoff happens inside `polling`, in the API client. */
export type ListenerPhase = 'idle' | 'polling' | 'processing' | 'persisting';

export interface UpdateRouter {
  route(update: Update): Promise<DeliveryOutcome>;
}

export interface ListenerDeps {
  source: UpdateSource;
  notifier: Notifier;
  router: UpdateRouter;
  store: StateStore;
  audit?: AuditSink;
}

export interface ListenerOptions {
  /** Server-side long-poll timeout. @default 30 */
  pollTimeoutSeconds?: number;
  /** Pause after a poll that produced nothing. @default 1000 */
  idlePauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onPhase?: (phase: ListenerPhase) => void;
}

export interface TickReport {
  state: ListenerState;
  outcomes: DeliveryOutcome[];
  /** Message updates handed to the router this cycle. */
  received: number;
  pollFailed: boolean;
}

const DEFAULT_POLL_TIMEOUT_SECONDS = 30;
const DEFAULT_IDLE_PAUSE_MS = 1000;

/**
 * Single-threaded long-poll loop: poll → route each update in order → persist
 * the cursor → poll again.
 *
 * The cursor is saved only after the whole batch is routed. A crash mid-batch
 * therefore replays that batch on restart: delivery is at-least-once.
 */
export class ListenerDaemon {
  readonly #deps: ListenerDeps;
  readonly #pollTimeoutSeconds: number;
  readonly #idlePauseMs: number;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #onPhase?: (phase: ListenerPhase) => void;

  constructor(deps: ListenerDeps, options: ListenerOptions = {}) {
    this.#deps = deps;
    this.#pollTimeoutSeconds = options.pollTimeoutSeconds ?? DEFAULT_POLL_TIMEOUT_SECONDS;
    this.#idlePauseMs = options.idlePauseMs ?? DEFAULT_IDLE_PAUSE_MS;
    this.#sleep = options.sleep ?? sleep;
    this.#onPhase = options.onPhase;
  }

  /** One full cycle starting from `state`. Never throws. */
  async tick(state: ListenerState): Promise<TickReport> {
    this.#enter('polling');
    const offset = state.lastUpdateId + 1;
    const poll = await this.#deps.source.fetchUpdates(offset, this.#pollTimeoutSeconds);

    if (!poll.ok) {
      void logError(
        `[Listener] Polling at offset ${offset} failed after ${poll.attempts} attempt(s): ${poll.error}. Continuing.`,
      );
      this.#enter('idle');
      return { state, outcomes: [], received: 0, pollFailed: true };
    }

    if (poll.highestId === null) {
      this.#enter('idle');
      return { state, outcomes: [], received: 0, pollFailed: false };
    }

    this.#enter('processing');
    const outcomes = await this.processBatch(poll.updates);

    this.#enter('persisting');
    const next = advanceCursor(state, poll.highestId);
    if (next.lastUpdateId !== state.lastUpdateId) {
      try {
        await this.#deps.store.save(next);
        void logDebug(`[Listener] Cursor advanced to ${next.lastUpdateId}.`);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        void logError(`[Listener] Could not persist cursor ${next.lastUpdateId}: ${reason}`);
      }
    }

    this.#enter('idle');
    return { state: next, outcomes, received: poll.updates.length, pollFailed: false };
  }

  /** Route every update in API order; each yields at most one reply. */
  async processBatch(updates: readonly Update[]): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];

    for (const update of updates) {
      void logThought(
        `[Listener] Received update ${update.id} from ${update.senderName} ` +
        `(user_id: ${update.senderId}, chat_id: ${update.chatId}): ${update.text.slice(0, 50)}`,
      );

      let outcome: DeliveryOutcome;
      try {
        outcome = await this.#deps.router.route(update);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        void logError(`[Listener] Error processing update ${update.id}: ${reason}`);
        continue;
      }
      outcomes.push(outcome);

      const reply = formatOutcome(outcome);
      if (reply !== null) {
        const sent = await this.#deps.notifier.sendText(reply);
        if (!sent) {
          void logWarning(`[Listener] Reply for update ${update.id} (${outcome.kind}) was not delivered.`);
        }
      }

      await this.#deps.audit?.recordIncoming(update, outcome);
    }

    return outcomes;
  }

  /** Load the cursor and cycle until `signal` aborts. */
  async run(signal: AbortSignal): Promise<ListenerState> {
    let state = await this.#deps.store.load();
    void logThought(`[Listener] Starting from update offset ${state.lastUpdateId + 1}.`);
    void logThought('[Listener] Listening for messages...');

    while (!signal.aborted) {
      const report = await this.tick(state);
      state = report.state;

      if (report.received === 0 && !signal.aborted) {
        await this.#sleep(this.#idlePauseMs);
      }
    }

    void logThought(`[Listener] Stopped at cursor ${state.lastUpdateId}.`);
    return state;
  }

  #enter(phase: ListenerPhase): void {
    this.#onPhase?.(phase);
  }
}
