import { logThought } from './logger.js';

export type Sleeper = (ms: number) => Promise<void>;

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt; 1 keeps it constant. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages. */
    label?: string;
    /** Injected for tests; defaults to a timer. */
    sleep?: Sleeper;
}

export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS: Required<Omit<RetryOptions, 'label' | 'sleep'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded retry.
 *
 * A rejection counts as a failed attempt. Probes that report failure as a
 * value should throw from inside `fn` so the attempt is retried.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => fetchOnce(url),
 *   { maxAttempts: 3, baseDelayMs: 1000, backoffFactor: 1, label: 'https:primary' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const pause = options.sleep ?? sleep;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn(attempt);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                await logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                await logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await pause(delay);
            } else {
                await logThought(
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

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
