import type { BatchConfig } from '../types/config.types.js';
import { BackendAPIError, RateLimitError } from '../errors/index.js';

export interface RetryOptions {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    retryableErrors?: string[];
    /** Stops waiting and retrying once aborted */
    signal?: AbortSignal;
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Default retry options from batch config
 */
export function getRetryOptions(batchConfig: BatchConfig): RetryOptions {
    return {
        maxRetries: batchConfig.maxRetries,
        initialDelayMs: batchConfig.retryDelayMs,
        maxDelayMs: 30000,
        backoffMultiplier: batchConfig.backoffMultiplier,
        retryableErrors: ['429', '503', 'TIMEOUT', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED'],
    };
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error, retryableErrors: string[] = []): boolean {
    if (error instanceof RateLimitError) {
        return true;
    }

    if (error instanceof BackendAPIError) {
        return error.retryable;
    }

    const errorString = error.message + (error.name || '');
    return retryableErrors.some(pattern =>
        errorString.includes(pattern) || error.name.includes(pattern)
    );
}

/**
 * Calculate delay with exponential backoff and ±10% jitter
 */
export function calculateBackoffDelay(
    attempt: number,
    initialDelayMs: number,
    backoffMultiplier: number,
    maxDelayMs: number
): number {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.min(delay + jitter, maxDelayMs);
}

/**
 * Sleep for a specified duration. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt > options.maxRetries || options.signal?.aborted) {
                break;
            }

            if (!isRetryableError(lastError, options.retryableErrors)) {
                throw lastError;
            }

            let delayMs = calculateBackoffDelay(
                attempt,
                options.initialDelayMs,
                options.backoffMultiplier,
                options.maxDelayMs
            );

            if (lastError instanceof RateLimitError && lastError.retryAfterMs) {
                delayMs = Math.max(delayMs, lastError.retryAfterMs);
            }

            options.onRetry?.(attempt, lastError, delayMs);

            await sleep(delayMs, options.signal);

            if (options.signal?.aborted) {
                break;
            }
        }
    }

    throw lastError;
}
