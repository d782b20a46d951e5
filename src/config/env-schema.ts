/**
 * Registry of every environment key the bridge reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional'.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Telegram ────────────────────────────────────────────────────────────────
  {
    key: 'TELEGRAM_BOT_TOKEN',
    type: 'secret',
    class: 'required',
    description: 'Telegram Bot API token obtained from @BotFather.',
    remediation:
      'Set TELEGRAM_BOT_TOKEN in the environment or telegram.botToken in config.json. Create a bot at https://t.me/BotFather.',
  },
  {
    key: 'TELEGRAM_CHAT_ID',
    type: 'env',
    class: 'required',
    description: 'Chat that receives notifications; replies from other chats are ignored.',
    remediation:
      'Set TELEGRAM_CHAT_ID (or telegram.chatId in config.json) to the numeric id of your chat with the bot.',
  },
  {
    key: 'TELEGRAM_USER_ID',
    type: 'env',
    class: 'optional',
    description: 'When set, only this Telegram user may route replies into tmux.',
    remediation:
      'Set TELEGRAM_USER_ID to your numeric Telegram user ID. Find it by messaging @userinfobot on Telegram.',
  },

  // ── Listener ────────────────────────────────────────────────────────────────
  {
    key: 'TMUX_BRIDGE_POLL_TIMEOUT',
    type: 'env',
    class: 'optional',
    description: 'Server-side long-poll timeout in seconds (default: 30).',
    remediation: 'Set TMUX_BRIDGE_POLL_TIMEOUT to an integer between 1 and 50.',
  },
  {
    key: 'TMUX_BRIDGE_SOURCE_LABEL',
    type: 'env',
    class: 'optional',
    description: 'Label in the injected prefix, as in "[FROM USER via Telegram]" (default: Telegram).',
    remediation: 'Set TMUX_BRIDGE_SOURCE_LABEL to any non-empty label.',
  },
  {
    key: 'TMUX_BRIDGE_LOG_LEVEL',
    type: 'env',
    class: 'optional',
    description: 'Minimum log level: debug, info, warn or error (default: info).',
    remediation: 'Set TMUX_BRIDGE_LOG_LEVEL to one of debug, info, warn, error.',
  },
] as const;
