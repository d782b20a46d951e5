import { describe, expect, it } from 'vitest';
import type TelegramBot from 'node-telegram-bot-api';
import {
  isPermanentApiError,
  normalizeUpdate,
  TelegramHandler,
  type TelegramBotClient,
} from '../../src/interfaces/telegram_handler.js';

function rawMessageUpdate(updateId: number, text: string | undefined, from?: Partial<TelegramBot.User>): TelegramBot.Update {
  return {
    update_id: updateId,
    message: {
      message_id: updateId * 10,
      date: 1_700_000_000,
      chat: { id: 1001, type: 'private' },
      text,
      from: from ? { id: 42, is_bot: false, first_name: 'Ada', ...from } : undefined,
    },
  };
}

class FakeBot implements TelegramBotClient {
  public readonly polls: Array<TelegramBot.GetUpdatesOptions | undefined> = [];
  public readonly sent: Array<{ chatId: TelegramBot.ChatId; text: string; options?: TelegramBot.SendMessageOptions }> = [];

  constructor(
    private readonly pollReplies: Array<TelegramBot.Update[] | Error> = [],
    private readonly sendReplies: Error[] = [],
  ) {}

  async getUpdates(options?: TelegramBot.GetUpdatesOptions): Promise<TelegramBot.Update[]> {
    this.polls.push(options);
    const reply = this.pollReplies.shift() ?? [];
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async sendMessage(
    chatId: TelegramBot.ChatId,
    text: string,
    options?: TelegramBot.SendMessageOptions,
  ): Promise<TelegramBot.Message> {
    this.sent.push({ chatId, text, options });
    const failure = this.sendReplies.shift();
    if (failure) throw failure;
    return { message_id: this.sent.length, date: 1_700_000_000, chat: { id: Number(chatId), type: 'private' }, text };
  }

  async getMe(): Promise<TelegramBot.User> {
    return { id: 7, is_bot: true, first_name: 'Bridge', username: 'bridge_bot' };
  }
}

function createHandler(bot: FakeBot) {
  const waits: number[] = [];
  const handler = new TelegramHandler(bot, {
    chatId: '1001',
    retry: {
      sleep: async (ms) => {
        waits.push(ms);
      },
    },
  });
  return { handler, waits };
}

describe('normalizeUpdate', () => {
  it('flattens a text message', () => {
    expect(normalizeUpdate(rawMessageUpdate(5, 'build-1: go', { first_name: 'Ada' }))).toEqual({
      id: 5,
      senderName: 'Ada',
      senderId: '42',
      chatId: '1001',
      text: 'build-1: go',
    });
  });

  it('fills in defaults for missing sender and text', () => {
    expect(normalizeUpdate(rawMessageUpdate(6, undefined))).toEqual({
      id: 6,
      senderName: 'Unknown',
      senderId: '',
      chatId: '1001',
      text: '',
    });
  });

  it('skips updates without a message', () => {
    expect(normalizeUpdate({ update_id: 9 })).toBeNull();
  });
});

describe('TelegramHandler.fetchUpdates', () => {
  it('long-polls from the given offset', async () => {
    const bot = new FakeBot([[rawMessageUpdate(11, 'a: x', {}), { update_id: 12 }, rawMessageUpdate(13, 'b: y', {})]]);
    const { handler } = createHandler(bot);

    const result = await handler.fetchUpdates(11, 30);

    expect(bot.polls).toEqual([{ offset: 11, timeout: 30 }]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.updates.map((update) => update.id)).toEqual([11, 13]);
    expect(result.highestId).toBe(13);
  });

  it('reports no highest id for an empty poll', async () => {
    const { handler } = createHandler(new FakeBot([[]]));

    expect(await handler.fetchUpdates(1, 30)).toEqual({ ok: true, updates: [], highestId: null });
  });

  it('retries transient failures with 1s and 2s waits, then reports failure', async () => {
    const bot = new FakeBot([new Error('EFATAL: socket hang up'), new Error('EFATAL: socket hang up'), new Error('EFATAL: socket hang up')]);
    const { handler, waits } = createHandler(bot);

    const result = await handler.fetchUpdates(1, 30);

    expect(result).toEqual({ ok: false, error: 'EFATAL: socket hang up', attempts: 3 });
    expect(bot.polls).toHaveLength(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it('does not retry a rejected token', async () => {
    const bot = new FakeBot([new Error('ETELEGRAM: 401 Unauthorized')]);
    const { handler, waits } = createHandler(bot);

    const result = await handler.fetchUpdates(1, 30);

    expect(result).toEqual({ ok: false, error: 'ETELEGRAM: 401 Unauthorized', attempts: 1 });
    expect(waits).toEqual([]);
  });
});

describe('TelegramHandler.sendText', () => {
  it('sends HTML to the configured chat', async () => {
    const bot = new FakeBot();
    const { handler } = createHandler(bot);

    expect(await handler.sendText('[+] Message delivered to a')).toBe(true);
    expect(bot.sent).toEqual([{ chatId: '1001', text: '[+] Message delivered to a', options: { parse_mode: 'HTML' } }]);
  });

  it('recovers from one transient failure', async () => {
    const bot = new FakeBot([], [new Error('ETIMEDOUT')]);
    const { handler, waits } = createHandler(bot);

    expect(await handler.sendText('hi')).toBe(true);
    expect(bot.sent).toHaveLength(2);
    expect(waits).toEqual([1000]);
  });

  it('resolves false once every attempt failed', async () => {
    const bot = new FakeBot([], [new Error('ETIMEDOUT'), new Error('ETIMEDOUT'), new Error('ETIMEDOUT')]);
    const { handler } = createHandler(bot);

    expect(await handler.sendText('hi')).toBe(false);
    expect(bot.sent).toHaveLength(3);
  });
});

describe('request deadlines', () => {
  class StalledBot extends FakeBot {
    public calls = 0;

    override async getUpdates(): Promise<TelegramBot.Update[]> {
      this.calls++;
      return new Promise<TelegramBot.Update[]>(() => {});
    }

    override async sendMessage(): Promise<TelegramBot.Message> {
      this.calls++;
      return new Promise<TelegramBot.Message>(() => {});
    }

    override async getMe(): Promise<TelegramBot.User> {
      return new Promise<TelegramBot.User>(() => {});
    }
  }

  function createStalledHandler() {
    const bot = new StalledBot();
    const waits: number[] = [];
    const handler = new TelegramHandler(bot, {
      chatId: '1001',
      retry: {
        sleep: async (ms) => {
          waits.push(ms);
        },
      },
      timeouts: { pollMarginMs: 20, requestMs: 20 },
    });
    return { bot, handler, waits };
  }

  it('gives up on a poll that never answers and reports failure', async () => {
    const { bot, handler, waits } = createStalledHandler();

    const result = await handler.fetchUpdates(1, 0);

    expect(result).toEqual({ ok: false, error: 'telegram:getUpdates timed out after 20ms', attempts: 3 });
    expect(bot.calls).toBe(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it('gives up on a send that never answers', async () => {
    const { handler } = createStalledHandler();

    expect(await handler.sendText('hi')).toBe(false);
  });

  it('fails verification when getMe never answers', async () => {
    const { handler } = createStalledHandler();

    await expect(handler.verify()).rejects.toThrow('telegram:getMe timed out after 20ms');
  });
});

describe('TelegramHandler.verify', () => {
  it('returns the bot username', async () => {
    const { handler } = createHandler(new FakeBot());
    expect(await handler.verify()).toBe('bridge_bot');
  });
});

describe('isPermanentApiError', () => {
  it('matches client errors only', () => {
    expect(isPermanentApiError(new Error('ETELEGRAM: 409 Conflict: terminated by other getUpdates request'))).toBe(true);
    expect(isPermanentApiError(new Error('ETELEGRAM: 429 Too Many Requests'))).toBe(false);
    expect(isPermanentApiError(new Error('EFATAL: socket hang up'))).toBe(false);
    expect(isPermanentApiError('ETELEGRAM: 401')).toBe(false);
  });
});
