import type { DeliveryOutcome, Update } from '../types/messaging.js';
import { logDebug, logThought, logWarning } from '../utils/logger.js';
import { parseReply } from './message-parser.js';
import type { SessionRegistry } from './session-registry.js';
import type { Injector } from './tmux-injector.js';

export interface MessageRouterOptions {
  /** Name shown in the injected prefix, e.g. `[FROM USER via Telegram]`. */
  sourceLabel?: string;
  /** Only updates from this chat are routed. */
  authorizedChatId?: string | null;
  /** When set, only this sender may route messages. */
  authorizedUserId?: string | null;
}

const DEFAULT_SOURCE_LABEL = 'Telegram';

export function formatInjectedText(sourceLabel: string, payload: string): string {
  return `[FROM USER via ${sourceLabel}] ${payload}`;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Reply text for an outcome, or null when the sender is not told anything.
 * Output is sent with HTML parse mode, so free text is escaped.
 */
export function formatOutcome(outcome: DeliveryOutcome): string | null {
  switch (outcome.kind) {
    case 'delivered':
      return `[+] Message delivered to ${escapeHtml(outcome.destination)}`;
    case 'not_found': {
      const sessions = outcome.availableSessions.length > 0
        ? outcome.availableSessions.map(escapeHtml).join(', ')
        : 'none';
      return `[-] Session ${escapeHtml(outcome.destination)} not found\n\nActive sessions: ${sessions}`;
    }
    case 'no_sessions':
      return '[-] No tmux sessions are running';
    case 'failed':
      return `[-] Error: ${escapeHtml(outcome.diagnostic)}`;
    case 'parse_skipped':
    case 'unauthorized':
      return null;
  }
}

/**
 * Decides where one inbound Update goes and performs the delivery.
 *
 * The session list is queried fresh for every Update; nothing is cached
 * between calls, so routing the same Update twice against the same sessions
 * yields the same outcome.
 */
export class MessageRouter {
  readonly #registry: SessionRegistry;
  readonly #injector: Injector;
  readonly #sourceLabel: string;
  readonly #authorizedChatId: string | null;
  readonly #authorizedUserId: string | null;

  constructor(registry: SessionRegistry, injector: Injector, options: MessageRouterOptions = {}) {
    this.#registry = registry;
    this.#injector = injector;
    this.#sourceLabel = options.sourceLabel ?? DEFAULT_SOURCE_LABEL;
    this.#authorizedChatId = options.authorizedChatId ?? null;
    this.#authorizedUserId = options.authorizedUserId ?? null;
  }

  async route(update: Update): Promise<DeliveryOutcome> {
    if (!this.#isAuthorized(update)) {
      void logWarning(
        `[Router] Ignoring update ${update.id} from unauthorized sender ${update.senderName} ` +
        `(user_id: ${update.senderId}, chat_id: ${update.chatId}).`,
      );
      return { kind: 'unauthorized', chatId: update.chatId, senderId: update.senderId };
    }

    const parsed = parseReply(update.text);
    if (!parsed) {
      void logDebug(`[Router] Update ${update.id} is not a 'session: message' reply, ignoring.`);
      return { kind: 'parse_skipped' };
    }

    const { destination, payload } = parsed;
    void logThought(`[Router] Update ${update.id} targets session ${destination}.`);

    let sessions: ReadonlySet<string>;
    try {
      sessions = await this.#registry.listSessions();
    } catch (err) {
      const diagnostic = err instanceof Error ? err.message : String(err);
      void logWarning(`[Router] Session lookup failed for update ${update.id}: ${diagnostic}`);
      return { kind: 'failed', destination, stage: 'registry', diagnostic };
    }

    if (sessions.size === 0) {
      void logWarning('[Router] No tmux sessions are running.');
      return { kind: 'no_sessions' };
    }

    if (!sessions.has(destination)) {
      const availableSessions = [...sessions].sort();
      void logWarning(`[Router] Session ${destination} not found. Active: ${availableSessions.join(', ')}`);
      return { kind: 'not_found', destination, availableSessions };
    }

    try {
      await this.#injector.inject(destination, formatInjectedText(this.#sourceLabel, payload));
    } catch (err) {
      const diagnostic = err instanceof Error ? err.message : String(err);
      void logWarning(`[Router] Delivery to ${destination} failed: ${diagnostic}`);
      return { kind: 'failed', destination, stage: 'injection', diagnostic };
    }

    void logThought(`[Router] Message delivered to tmux session ${destination}.`);
    return { kind: 'delivered', destination };
  }

  #isAuthorized(update: Update): boolean {
    if (this.#authorizedChatId !== null && update.chatId !== this.#authorizedChatId) {
      return false;
    }
    if (this.#authorizedUserId !== null && update.senderId !== this.#authorizedUserId) {
      return false;
    }
    return true;
  }
}
