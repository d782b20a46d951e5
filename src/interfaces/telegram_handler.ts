import TelegramBot from 'node-telegram-bot-api';
import type { Notifier, PollResult, Update, UpdateSource } from '../types/messaging.js';
import { logDebug, logError, logThought } from '../utils/logger.js';
import { withRetry, withTimeout, type RetryOptions } from '../utils/retry.js';

/** The slice of the Bot API client the bridge talks to. */
export type TelegramBotClient = Pick<TelegramBot, 'getUpdates' | 'sendMessage' | 'getMe'>;

export type TelegramRetryOptions = Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'sleep'>;

export interface TelegramRequestTimeouts {
  /** Added to the server-side long-poll timeout for the client-side poll deadline. @default 5000 */
  pollMarginMs?: number;
  /** Deadline for every other call. @default 10000 */
  requestMs?: number;
}

export interface TelegramHandlerOptions {
  /** Chat that receives every outbound message. */
  chatId: string;
  retry?: TelegramRetryOptions;
  timeouts?: TelegramRequestTimeouts;
}

const DEFAULT_POLL_MARGIN_MS = 5_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

const UNKNOWN_SENDER = 'Unknown';
const LOG_PREVIEW_LENGTH = 50;

// Client errors the API will keep returning no matter how often we ask.
const PERMANENT_API_ERROR = /^ETELEGRAM: (400|401|403|404|409)\b/;

/** True for API rejections that a retry cannot fix (bad token, webhook conflict, ...). */
export function isPermanentApiError(err: unknown): boolean {
  return err instanceof Error && PERMANENT_API_ERROR.test(err.message);
}

/** Flatten a raw Bot API update; null for updates that carry no chat message. */
export function normalizeUpdate(raw: TelegramBot.Update): Update | null {
  const message = raw.message;
  if (!message) return null;

  return {
    id: raw.update_id,
    senderName: message.from?.first_name ?? UNKNOWN_SENDER,
    senderId: message.from ? String(message.from.id) : '',
    chatId: String(message.chat.id),
    text: message.text ?? '',
  };
}

/**
 * Wraps the Telegram Bot API to provide:
 *   - Long-poll fetching of inbound replies with bounded exponential backoff
 *   - Outbound HTML messages to the configured chat, retried the same way
 *
 * Polling is driven by the listener loop, never by the library itself, so the
 * update offset stays under the listener's control.
 */
export class TelegramHandler implements UpdateSource, Notifier {
  readonly #bot: TelegramBotClient;
  readonly #chatId: string;
  readonly #retry: TelegramRetryOptions;
  readonly #pollMarginMs: number;
  readonly #requestMs: number;

  constructor(bot: TelegramBotClient, options: TelegramHandlerOptions) {
    this.#bot = bot;
    this.#chatId = options.chatId;
    this.#retry = options.retry ?? {};
    this.#pollMarginMs = options.timeouts?.pollMarginMs ?? DEFAULT_POLL_MARGIN_MS;
    this.#requestMs = options.timeouts?.requestMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  static fromToken(token: string, options: TelegramHandlerOptions): TelegramHandler {
    return new TelegramHandler(new TelegramBot(token, { polling: false }), options);
  }

  /**
   * Long-poll for updates. The client-side deadline is the server timeout plus
   * a margin; a stalled connection fails the attempt and is retried.
   */
  async fetchUpdates(offset: number, timeoutSeconds: number): Promise<PollResult> {
    const deadlineMs = timeoutSeconds * 1000 + this.#pollMarginMs;
    const result = await withRetry(
      () => withTimeout(this.#bot.getUpdates({ offset, timeout: timeoutSeconds }), deadlineMs, 'telegram:getUpdates'),
      { ...this.#retry, label: 'telegram:getUpdates', shouldRetry: (err) => !isPermanentApiError(err) },
    );

    if (!result.ok) {
      return { ok: false, error: result.error, attempts: result.attempts };
    }

    const raw = result.value;
    const updates: Update[] = [];
    let highestId: number | null = null;
    for (const entry of raw) {
      highestId = highestId === null ? entry.update_id : Math.max(highestId, entry.update_id);
      const update = normalizeUpdate(entry);
      if (update) {
        updates.push(update);
      } else {
        void logDebug(`[TelegramHandler] Update ${entry.update_id} carries no message, skipping.`);
      }
    }

    if (raw.length > 0) {
      void logDebug(`[TelegramHandler] Poll at offset ${offset} returned ${raw.length} update(s).`);
    }
    return { ok: true, updates, highestId };
  }

  /** Send an HTML-formatted message to the configured chat. Resolves false when every attempt failed. */
  async sendText(text: string): Promise<boolean> {
    const result = await withRetry(
      () => withTimeout(
        this.#bot.sendMessage(this.#chatId, text, { parse_mode: 'HTML' }),
        this.#requestMs,
        'telegram:sendMessage',
      ),
      { ...this.#retry, label: 'telegram:sendMessage', shouldRetry: (err) => !isPermanentApiError(err) },
    );

    if (!result.ok) {
      void logError(`[TelegramHandler] Failed to send message after ${result.attempts} attempt(s): ${result.error}`);
      return false;
    }

    void logThought(`[TelegramHandler] Sent message: ${text.slice(0, LOG_PREVIEW_LENGTH)}`);
    return true;
  }

  /** Resolve the bot's username; rejects when the token is not accepted. */
  async verify(): Promise<string> {
    const me = await withTimeout(this.#bot.getMe(), this.#requestMs, 'telegram:getMe');
    return me.username ?? me.first_name;
  }
}
