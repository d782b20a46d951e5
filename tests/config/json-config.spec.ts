import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
    ConfigError,
    DEFAULT_CONFIG,
    getConfigValue,
    mergeWithDefaults,
    readConfig,
    type BridgeFileConfig,
} from '../../src/config/json-config.js';

describe('bridge config.json', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tmux-bridge-config-'));
        configPath = path.join(tempDir, 'config.json');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig(configPath);
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('reads structured config correctly', async () => {
        const custom: BridgeFileConfig = {
            telegram: { botToken: 'test-secret', chatId: '1001', userId: '42' },
            listener: { pollTimeoutSeconds: 20, sourceLabel: 'Phone' },
            logging: { level: 'debug' },
        };
        await fs.writeFile(configPath, JSON.stringify(custom, null, 2), 'utf8');

        expect(await readConfig(configPath)).toEqual(custom);
    });

    it('throws a ConfigError for malformed JSON', async () => {
        await fs.writeFile(configPath, '{ malformed: true ', 'utf8');

        await expect(readConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
        await expect(readConfig(configPath)).rejects.toThrow(/Failed to parse config file/);
    });

    it('accepts numeric ids and ignores fields of the wrong type', () => {
        const merged = mergeWithDefaults({
            telegram: { chatId: -100123, userId: 42, botToken: true },
            listener: { pollTimeoutSeconds: '10' },
            extra: 'ignored',
        });

        expect(merged.telegram).toEqual({ botToken: '', chatId: '-100123', userId: '42' });
        expect(merged.listener.pollTimeoutSeconds).toBe(30);
    });

    it('treats a non-object document as empty', () => {
        expect(mergeWithDefaults([1, 2, 3])).toEqual(DEFAULT_CONFIG);
        expect(mergeWithDefaults(null)).toEqual(DEFAULT_CONFIG);
    });
});

describe('getConfigValue', () => {
    const fileConfig = mergeWithDefaults({
        telegram: { botToken: 'file-token', chatId: '1001' },
        listener: { pollTimeoutSeconds: 15 },
    });

    it('prefers a non-blank environment value', () => {
        expect(getConfigValue('TELEGRAM_CHAT_ID', fileConfig, { TELEGRAM_CHAT_ID: ' 2002 ' })).toBe('2002');
    });

    it('falls back to config.json when the variable is blank or unset', () => {
        expect(getConfigValue('TELEGRAM_BOT_TOKEN', fileConfig, { TELEGRAM_BOT_TOKEN: '   ' })).toBe('file-token');
        expect(getConfigValue('TMUX_BRIDGE_POLL_TIMEOUT', fileConfig, {})).toBe('15');
        expect(getConfigValue('TMUX_BRIDGE_SOURCE_LABEL', fileConfig, {})).toBe('Telegram');
    });

    it('returns undefined for unset keys', () => {
        expect(getConfigValue('TELEGRAM_USER_ID', fileConfig, {})).toBeUndefined();
        expect(getConfigValue('UNKNOWN_KEY', fileConfig, {})).toBeUndefined();
    });
});
