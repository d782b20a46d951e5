import { logDebug, logWarning } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Return false to stop retrying on an error that will not go away. */
    shouldRetry?: (error: unknown) => boolean;
    /** Wait primitive, swapped out by tests. */
    sleep?: (ms: number) => Promise<void>;
}

/** Result of a retried operation. */
export type RetryResult<T> =
    | { ok: true; value: T; attempts: number; totalDurationMs: number }
    | { ok: false; error: string; attempts: number; totalDurationMs: number };

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay multiplies by `backoffFactor` after each attempt (capped at `maxDelayMs`).
 * - Never throws: exhaustion is reported through `ok: false`.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => bot.getUpdates({ offset, timeout: 30 }),
 *   { maxAttempts: 3, label: 'telegram:getUpdates' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const wait = options.sleep ?? sleep;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logDebug(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            if (options.shouldRetry && !options.shouldRetry(err)) {
                void logWarning(`[Retry] ${label} failed with a non-retryable error: ${lastError}.`);
                return { ok: false, error: lastError, attempts: attempt, totalDurationMs: Date.now() - start };
            }

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                void logWarning(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await wait(delay);
            } else {
                void logWarning(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

/** Reject with `<label> timed out after <ms>ms` unless `promise` settles first. */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
