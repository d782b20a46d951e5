import * as fs from 'fs/promises';
import * as path from 'path';
import { getConfigPath } from './workspace.js';

export interface BridgeFileConfig {
    telegram: {
        botToken: string;
        chatId: string;
        userId: string;
    };
    listener: {
        pollTimeoutSeconds: number;
        sourceLabel: string;
    };
    logging: {
        level: string;
    };
}

export const DEFAULT_CONFIG: BridgeFileConfig = {
    telegram: {
        botToken: '',
        chatId: '',
        userId: '',
    },
    listener: {
        pollTimeoutSeconds: 30,
        sourceLabel: 'Telegram',
    },
    logging: {
        level: 'info',
    },
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export async function readConfig(overridePath?: string): Promise<BridgeFileConfig> {
    const targetPath = overridePath ? path.resolve(overridePath) : getConfigPath();
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return mergeWithDefaults({});
        throw new ConfigError(`Failed to read config file at ${targetPath}: ${fsError.message}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to parse config file at ${targetPath}: ${reason}`);
    }
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : {};
}

/** Ids may be written as JSON numbers; everything downstream compares strings. */
function pickString(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return fallback;
}

function pickNumber(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function mergeWithDefaults(loaded: unknown): BridgeFileConfig {
    const root = asRecord(loaded);
    const telegram = asRecord(root.telegram);
    const listener = asRecord(root.listener);
    const logging = asRecord(root.logging);

    return {
        telegram: {
            botToken: pickString(telegram, 'botToken', DEFAULT_CONFIG.telegram.botToken),
            chatId: pickString(telegram, 'chatId', DEFAULT_CONFIG.telegram.chatId),
            userId: pickString(telegram, 'userId', DEFAULT_CONFIG.telegram.userId),
        },
        listener: {
            pollTimeoutSeconds: pickNumber(listener, 'pollTimeoutSeconds', DEFAULT_CONFIG.listener.pollTimeoutSeconds),
            sourceLabel: pickString(listener, 'sourceLabel', DEFAULT_CONFIG.listener.sourceLabel),
        },
        logging: {
            level: pickString(logging, 'level', DEFAULT_CONFIG.logging.level),
        },
    };
}

/**
 * Resolve one flat config key: a non-blank environment variable wins over
 * config.json, which wins over the defaults.
 */
export function getConfigValue(
    key: string,
    config: BridgeFileConfig,
    env: NodeJS.ProcessEnv = process.env,
): string | undefined {
    const envValue = env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue.trim();
    }

    let jsonValue: string | number | undefined;
    switch (key) {
        case 'TELEGRAM_BOT_TOKEN': jsonValue = config.telegram.botToken; break;
        case 'TELEGRAM_CHAT_ID': jsonValue = config.telegram.chatId; break;
        case 'TELEGRAM_USER_ID': jsonValue = config.telegram.userId; break;
        case 'TMUX_BRIDGE_POLL_TIMEOUT': jsonValue = config.listener.pollTimeoutSeconds; break;
        case 'TMUX_BRIDGE_SOURCE_LABEL': jsonValue = config.listener.sourceLabel; break;
        case 'TMUX_BRIDGE_LOG_LEVEL': jsonValue = config.logging.level; break;
    }

    if (jsonValue !== undefined && String(jsonValue).trim() !== '') {
        return String(jsonValue).trim();
    }
    return undefined;
}
