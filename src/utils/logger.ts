import * as fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Directory receiving `listener.log` and `errors.log`. Console-only when omitted. */
  directory?: string;
  level?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAIN_LOG_FILE = 'listener.log';
const ERROR_LOG_FILE = 'errors.log';
const REDACTED = '[REDACTED]';

/** Env keys whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN'];
const MIN_SENSITIVE_VALUE_LENGTH = 8;

// Telegram bot tokens look like `<digits>:<35 url-safe chars>`.
const BOT_TOKEN_PATTERN = /\d{6,12}:[A-Za-z0-9_-]{30,}/g;
const KEY_VALUE_PATTERN = /\b(token|secret|password|api[_-]?key)(\s*[=:]\s*)([^\s,;]+)/gi;

let directory: string | null = null;
let threshold: LogLevel = 'info';

export function configureLogger(options: LoggerOptions): void {
  directory = options.directory ?? null;
  threshold = options.level ?? 'info';
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Remove credentials from free text before it is printed or persisted.
 *
 * Covers bot tokens embedded in Bot API URLs, `token=...` style pairs, and the
 * literal values of sensitive environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text
    .replace(BOT_TOKEN_PATTERN, REDACTED)
    .replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`);

  for (const key of SENSITIVE_ENV_KEYS) {
    const value = process.env[key]?.trim();
    if (value && value.length >= MIN_SENSITIVE_VALUE_LENGTH) {
      scrubbed = scrubbed.split(value).join(REDACTED);
    }
  }

  return scrubbed;
}

function formatLine(level: LogLevel, message: string): string {
  return `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}`;
}

// File appends run one at a time, in the order the lines were logged.
let pendingWrites: Promise<void> = Promise.resolve();

async function appendLines(target: string, fileNames: readonly string[], line: string): Promise<void> {
  for (const fileName of fileNames) {
    const filePath = path.join(target, fileName);
    try {
      await fs.mkdir(target, { recursive: true });
      await fs.appendFile(filePath, `${line}\n`, 'utf8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[Logger] Failed to append to ${filePath}: ${reason}`);
    }
  }
}

function write(level: LogLevel, message: string): Promise<void> {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return pendingWrites;

  const line = formatLine(level, scrubSensitiveText(message));
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (!directory) return pendingWrites;
  const target = directory;
  const fileNames = level === 'error' ? [MAIN_LOG_FILE, ERROR_LOG_FILE] : [MAIN_LOG_FILE];
  pendingWrites = pendingWrites.then(() => appendLines(target, fileNames, line));
  return pendingWrites;
}

/** Record an informational event of the listener's life. */
export function logThought(message: string): Promise<void> {
  return write('info', message);
}

export function logDebug(message: string): Promise<void> {
  return write('debug', message);
}

export function logWarning(message: string): Promise<void> {
  return write('warn', message);
}

export function logError(message: string): Promise<void> {
  return write('error', message);
}

/** Trace an external command at debug level. */
export function logSystemCommand(command: string, args: readonly string[]): Promise<void> {
  const rendered = args.map((arg) => (/[\s'"]/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
  return write('debug', `[exec] ${command} ${rendered}`);
}
