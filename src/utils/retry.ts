import { logThought } from './logger.js';

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
    /**
     * Per-attempt timeout. An attempt running longer has its signal aborted and,
     * once it has settled, fails with {@link AttemptTimeoutError}. 0 disables it.
     */
    attemptTimeoutMs?: number;
    /** Return false to stop retrying after this error. */
    shouldRetry?: (err: unknown) => boolean;
    /** Called before every attempt. */
    onAttempt?: (attempt: number) => void;
    /** Called after every failed attempt. */
    onFailure?: (attempt: number, err: unknown) => void;
    sleep?: (ms: number) => Promise<void>;
    /** Label used in log messages for traceability. */
    label?: string;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The error thrown by the last failed attempt. */
    cause?: unknown;
    attempts: number;
    totalDurationMs: number;
}

export class AttemptTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Attempt timed out after ${timeoutMs}ms.`);
        this.name = 'AttemptTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
    attemptTimeoutMs: 0,
};

/** Backoff before retry number `attempt` (1-based), capped at `maxDelayMs`. */
export function computeBackoffDelay(
    attempt: number,
    baseDelayMs: number,
    backoffFactor: number,
    maxDelayMs: number,
): number {
    return Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
}

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure, unless `shouldRetry` says otherwise.
 * - Delay doubles after each attempt (capped at `maxDelayMs`).
 * - All attempts are logged for postmortem traceability.
 * - Attempts never overlap: a timed-out attempt is aborted and awaited before the next one starts.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   (signal) => sink.sendChunk(chatId, chunk, context, signal),
 *   { maxAttempts: 3, attemptTimeoutMs: 10_000, label: 'sink:sendChunk' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULTS.attemptTimeoutMs;
    const sleep = options.sleep ?? defaultSleep;
    const label = options.label ?? 'unnamed';

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        options.onAttempt?.(attempt);
        try {
            const value = await runWithTimeout(fn, attemptTimeoutMs);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastCause = err;
            lastError = err instanceof Error ? err.message : String(err);
            options.onFailure?.(attempt, err);

            const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
            if (!retryable) {
                void logThought(`[Retry] ${label} attempt ${attempt}/${maxAttempts} failed permanently: ${lastError}.`);
                return { ok: false, error: lastError, cause: err, attempts: attempt, totalDurationMs: Date.now() - start };
            }

            if (attempt < maxAttempts) {
                const delay = computeBackoffDelay(attempt, baseDelayMs, backoffFactor, maxDelayMs);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await sleep(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        cause: lastCause,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

function runWithTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
    const controller = new AbortController();
    if (timeoutMs <= 0) return fn(controller.signal);

    return new Promise<T>((resolve, reject) => {
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort(new AttemptTimeoutError(timeoutMs));
        }, timeoutMs);

        // Settle only once the attempt itself has; a late result is discarded.
        fn(controller.signal).then(
            (value) => {
                clearTimeout(timer);
                if (timedOut) reject(new AttemptTimeoutError(timeoutMs));
                else resolve(value);
            },
            (err: unknown) => {
                clearTimeout(timer);
                reject(timedOut ? new AttemptTimeoutError(timeoutMs) : err);
            },
        );
    });
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
