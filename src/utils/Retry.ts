import { createLogger } from './Logger.ts';
import { AttemptTimeoutError } from '../model/Errors.ts';

import type { Logger } from 'pino';

/**
 * One attempt of an operation. The signal is aborted when the attempt
 * times out, so fetch-like calls can stop their work.
 */
export type Attempt<T> = (signal: AbortSignal, attempt: number) => Promise<T>;

export interface RetryOptions {
    /** Total attempts, the first one included */
    maxAttempts?: number;
    timeoutMs?: number;
    /** Fixed wait between attempts */
    backoffMs?: number;
    /** Return false to fail fast on an error that retrying cannot fix */
    shouldRetry?: (err: unknown) => boolean;
    label?: string;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_BACKOFF_MS = 1_000;
/** Largest delay setTimeout honours; longer ones fire after 1 ms */
export const MAX_TIMER_MS = 2_147_483_647;

const defaultLogger = createLogger('Retry');

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` until it succeeds within `timeoutMs`, waiting `backoffMs`
 * between attempts. After the last attempt the last error is rethrown.
 *
 *   Attempting ──ok──▶ Succeeded
 *       │ error/timeout
 *       ├── attempts left ──▶ Waiting ──▶ Attempting
 *       └── none left ──────▶ Exhausted (throw)
 */
export async function callWithRetry<T>(operation: Attempt<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    const shouldRetry = options.shouldRetry ?? (() => true);
    const label = options.label ?? 'operation';
    const logger = options.logger ?? defaultLogger;
    const sleep = options.sleep ?? delay;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMER_MS)) {
        throw new RangeError(`timeoutMs must be between 1 and ${MAX_TIMER_MS}, got ${timeoutMs}`);
    }
    if (!(backoffMs >= 0 && backoffMs <= MAX_TIMER_MS)) {
        throw new RangeError(`backoffMs must be between 0 and ${MAX_TIMER_MS}, got ${backoffMs}`);
    }

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            logger.debug(`Attempting ${label} (attempt ${attempt}/${maxAttempts})`);
            const result = await runWithTimeout(operation, attempt, timeoutMs, label);
            logger.info(`${label} succeeded on attempt ${attempt}`);
            return result;
        } catch (err) {
            lastError = err;
            logger.warn({ err }, `${label} failed on attempt ${attempt}/${maxAttempts}`);

            if (!shouldRetry(err)) {
                logger.error(`${label} failed with a non-retryable error`);
                throw err;
            }
            if (attempt < maxAttempts) {
                await sleep(backoffMs);
            }
        }
    }

    logger.error({ err: lastError }, `${label} failed after ${maxAttempts} attempts`);
    throw lastError;
}

/**
 * Wraps `fn` so that every call goes through callWithRetry.
 */
export function withRetry<A extends unknown[], T>(
    fn: (signal: AbortSignal, ...args: A) => Promise<T>,
    options: RetryOptions = {}
): (...args: A) => Promise<T> {
    return (...args: A) => callWithRetry((signal) => fn(signal, ...args), options);
}

/**
 * Races one attempt against its timeout. Once the timeout wins the attempt's
 * own promise is ignored, so a late result can never leak out.
 */
function runWithTimeout<T>(
    operation: Attempt<T>,
    attempt: number,
    timeoutMs: number,
    label: string
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const err = new AttemptTimeoutError(timeoutMs, label);
            controller.abort(err);
            reject(err);
        }, timeoutMs);
    });

    // Executor form so a synchronous throw still rejects
    const run = new Promise<T>((resolve, reject) => {
        operation(controller.signal, attempt).then(resolve, reject);
    });

    return Promise.race([run, timeout]).finally(() => clearTimeout(timer));
}
