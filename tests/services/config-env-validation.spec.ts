import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { loadBridgeConfig, resolveBridgeConfig, validateRuntimeConfig } from '../../src/config/env-validator.js';
import { ConfigError, DEFAULT_CONFIG } from '../../src/config/json-config.js';

const FIXED_NOW = () => new Date('2024-05-01T12:00:00.000Z');

const VALID_ENV = {
  TELEGRAM_BOT_TOKEN: 'test-secret',
  TELEGRAM_CHAT_ID: '1001',
};

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((spec) => spec.key);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('requires only the bot token and chat id', () => {
    expect(CONFIG_SCHEMA.filter((spec) => spec.class === 'required').map((spec) => spec.key)).toEqual([
      'TELEGRAM_BOT_TOKEN',
      'TELEGRAM_CHAT_ID',
    ]);
  });
});

describe('validateRuntimeConfig', () => {
  it('passes with the required keys set', () => {
    const result = validateRuntimeConfig(DEFAULT_CONFIG, VALID_ENV, FIXED_NOW);

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.validatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(result.presentKeys).toEqual([
      'TELEGRAM_BOT_TOKEN',
      'TELEGRAM_CHAT_ID',
      'TMUX_BRIDGE_LOG_LEVEL',
      'TMUX_BRIDGE_POLL_TIMEOUT',
      'TMUX_BRIDGE_SOURCE_LABEL',
    ]);
  });

  it('reports each missing required key', () => {
    const result = validateRuntimeConfig(DEFAULT_CONFIG, {}, FIXED_NOW);

    expect(result.ok).toBe(false);
    expect(result.issues.map((issue) => [issue.key, issue.class])).toEqual([
      ['TELEGRAM_BOT_TOKEN', 'missing_required'],
      ['TELEGRAM_CHAT_ID', 'missing_required'],
    ]);
  });

  it('flags malformed values', () => {
    const result = validateRuntimeConfig(
      DEFAULT_CONFIG,
      {
        ...VALID_ENV,
        TELEGRAM_CHAT_ID: 'my-chat',
        TELEGRAM_USER_ID: '0',
        TMUX_BRIDGE_POLL_TIMEOUT: '90',
        TMUX_BRIDGE_LOG_LEVEL: 'loud',
      },
      FIXED_NOW,
    );

    expect(result.issues.map((issue) => issue.key)).toEqual([
      'TELEGRAM_CHAT_ID',
      'TELEGRAM_USER_ID',
      'TMUX_BRIDGE_POLL_TIMEOUT',
      'TMUX_BRIDGE_LOG_LEVEL',
    ]);
    expect(result.issues.every((issue) => issue.class === 'format_error')).toBe(true);
  });

  it('accepts negative group chat ids', () => {
    expect(validateRuntimeConfig(DEFAULT_CONFIG, { ...VALID_ENV, TELEGRAM_CHAT_ID: '-100200300' }).ok).toBe(true);
  });

  it('never echoes the bot token', () => {
    const result = validateRuntimeConfig(DEFAULT_CONFIG, { ...VALID_ENV, TELEGRAM_CHAT_ID: 'x' });
    expect(JSON.stringify(result)).not.toContain('test-secret');
  });
});

describe('resolveBridgeConfig', () => {
  it('resolves typed settings with defaults and paths under the bridge home', () => {
    const home = path.resolve('/tmp/bridge-home');
    const config = resolveBridgeConfig(DEFAULT_CONFIG, {
      ...VALID_ENV,
      TELEGRAM_USER_ID: '42',
      TMUX_BRIDGE_LOG_LEVEL: 'DEBUG',
      TMUX_BRIDGE_HOME: home,
    });

    expect(config).toEqual({
      botToken: 'test-secret',
      chatId: '1001',
      userId: '42',
      pollTimeoutSeconds: 30,
      sourceLabel: 'Telegram',
      logLevel: 'debug',
      home,
      configPath: path.join(home, 'config.json'),
      stateDir: path.join(home, 'state'),
      statePath: path.join(home, 'state', 'listener_state.json'),
      logDir: path.join(home, 'logs'),
    });
  });

  it('throws a ConfigError listing every problem', () => {
    expect(() => resolveBridgeConfig(DEFAULT_CONFIG, {})).toThrow(ConfigError);
    expect(() => resolveBridgeConfig(DEFAULT_CONFIG, {})).toThrow(
      /^Configuration is incomplete:\n {2}- Required config key 'TELEGRAM_BOT_TOKEN' is missing\./,
    );
  });
});

describe('loadBridgeConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tmux-bridge-env-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads config.json from the bridge home and lets the environment override it', async () => {
    await fs.writeFile(
      path.join(tempDir, 'config.json'),
      JSON.stringify({ telegram: { botToken: 'test-secret', chatId: 1001 }, listener: { sourceLabel: 'Phone' } }),
      'utf8',
    );

    const config = await loadBridgeConfig({ TMUX_BRIDGE_HOME: tempDir, TMUX_BRIDGE_SOURCE_LABEL: 'Laptop' });

    expect(config.botToken).toBe('test-secret');
    expect(config.chatId).toBe('1001');
    expect(config.sourceLabel).toBe('Laptop');
  });
});
