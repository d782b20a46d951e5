/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for missing required keys
 * and malformed values, and resolves the typed {@link BridgeConfig} the
 * listener runs with. No secret values are ever included in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { ConfigError, getConfigValue, readConfig, type BridgeFileConfig } from './json-config.js';
import { getBridgeHome, getConfigPath, getLogDir, getStateDir, getStatePath } from './workspace.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the listener can start. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  validatedAt: string;
}

/** Fully resolved settings for one listener process. */
export interface BridgeConfig {
  botToken: string;
  chatId: string;
  userId: string | null;
  pollTimeoutSeconds: number;
  sourceLabel: string;
  logLevel: LogLevel;
  home: string;
  configPath: string;
  stateDir: string;
  statePath: string;
  logDir: string;
}

const MIN_POLL_TIMEOUT = 1;
const MAX_POLL_TIMEOUT = 50;

// ── Internal helpers ─────────────────────────────────────────────────────────

function isPositiveInteger(raw: string): boolean {
  return /^\d+$/.test(raw) && Number(raw) > 0;
}

/**
 * Validate format constraints for known keys.
 * Returns an issue string if invalid, null if ok.
 */
function formatError(spec: ConfigKeySpec, raw: string): string | null {
  switch (spec.key) {
    case 'TELEGRAM_CHAT_ID':
      // Group chats have negative ids.
      if (!/^-?\d+$/.test(raw)) {
        return `TELEGRAM_CHAT_ID must be an integer chat id, got '${raw}'.`;
      }
      break;
    case 'TELEGRAM_USER_ID':
      if (!isPositiveInteger(raw)) {
        return `TELEGRAM_USER_ID must be a positive integer, got '${raw}'.`;
      }
      break;
    case 'TMUX_BRIDGE_POLL_TIMEOUT': {
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed < MIN_POLL_TIMEOUT || parsed > MAX_POLL_TIMEOUT) {
        return `TMUX_BRIDGE_POLL_TIMEOUT must be an integer in range ${MIN_POLL_TIMEOUT}–${MAX_POLL_TIMEOUT}, got '${raw}'.`;
      }
      break;
    }
    case 'TMUX_BRIDGE_LOG_LEVEL':
      if (!isLogLevel(raw.toLowerCase())) {
        return `TMUX_BRIDGE_LOG_LEVEL must be one of debug, info, warn, error, got '${raw}'.`;
      }
      break;
    default:
      break;
  }
  return null;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the merged configuration against the schema.
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  config: BridgeFileConfig,
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const value = getConfigValue(spec.key, config, env);

    if (value === undefined) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is missing. ${spec.description}`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);
    // Secrets are never echoed back, so they are not format-checked either.
    const formatErr = spec.type === 'env' ? formatError(spec, value) : null;
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Resolve the typed runtime config, or throw a {@link ConfigError} that names
 * every problem with its remediation.
 */
export function resolveBridgeConfig(config: BridgeFileConfig, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const validation = validateRuntimeConfig(config, env);
  if (!validation.ok) {
    const reasons = validation.issues.map((issue) => `${issue.message} ${issue.remediation}`).join('\n  - ');
    throw new ConfigError(`Configuration is incomplete:\n  - ${reasons}`);
  }

  const value = (key: string): string | undefined => getConfigValue(key, config, env);
  const logLevel = (value('TMUX_BRIDGE_LOG_LEVEL') ?? 'info').toLowerCase();

  return {
    botToken: value('TELEGRAM_BOT_TOKEN') ?? '',
    chatId: value('TELEGRAM_CHAT_ID') ?? '',
    userId: value('TELEGRAM_USER_ID') ?? null,
    pollTimeoutSeconds: Number(value('TMUX_BRIDGE_POLL_TIMEOUT') ?? 30),
    sourceLabel: value('TMUX_BRIDGE_SOURCE_LABEL') ?? 'Telegram',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    home: getBridgeHome(env),
    configPath: getConfigPath(env),
    stateDir: getStateDir(env),
    statePath: getStatePath(env),
    logDir: getLogDir(env),
  };
}

/** Read config.json (if any), overlay the environment, and resolve. */
export async function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): Promise<BridgeConfig> {
  const fileConfig = await readConfig(getConfigPath(env));
  return resolveBridgeConfig(fileConfig, env);
}
