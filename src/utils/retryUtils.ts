/**
 * Retry Utilities with Exponential Backoff
 *
 * Used at startup, where PostgreSQL or Redis may still be coming up when the
 * relay starts. Runtime paths (Pager notifications, Telegram sends) do not
 * retry.
 */

import { LogEngine } from '@wgtechlabs/log-engine';
import { getErrorMessage } from './errorHandler.js';

export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffFactor?: number;
    jitterFactor?: number;
}

export type RetryResult<T> =
    | { success: true; result: T; attemptCount: number; totalTimeMs: number }
    | { success: false; error: Error; attemptCount: number; totalTimeMs: number };

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Computes the wait before the next attempt, capped at maxDelayMs.
 */
export function computeBackoffDelay(
    attempt: number,
    options: Required<RetryOptions>,
    random: () => number = Math.random
): number {
    const baseDelay = Math.min(
        options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
        options.maxDelayMs
    );
    // jitter spreads restarts of several replicas
    const jitter = baseDelay * options.jitterFactor * (random() - 0.5);
    return Math.max(0, Math.round(baseDelay + jitter));
}

/**
 * Executes an async operation with exponential backoff retry logic
 */
export async function retryWithExponentialBackoff<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {},
    context: string = 'operation',
    sleep: Sleep = defaultSleep
): Promise<RetryResult<T>> {
    const resolved: Required<RetryOptions> = {
        maxAttempts: options.maxAttempts ?? 3,
        initialDelayMs: options.initialDelayMs ?? 100,
        maxDelayMs: options.maxDelayMs ?? 5000,
        backoffFactor: options.backoffFactor ?? 2,
        jitterFactor: options.jitterFactor ?? 0.1
    };

    const startTime = Date.now();
    let lastError: Error = new Error('Unknown error');
    let attemptCount = 0;

    for (let attempt = 1; attempt <= resolved.maxAttempts; attempt++) {
        attemptCount = attempt;

        try {
            const result = await operation();
            return {
                success: true,
                result,
                attemptCount,
                totalTimeMs: Date.now() - startTime
            };
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(getErrorMessage(error));

            if (attempt < resolved.maxAttempts) {
                const delay = computeBackoffDelay(attempt, resolved);
                LogEngine.warn(`${context} failed (attempt ${attempt}/${resolved.maxAttempts}), retrying in ${delay}ms`, {
                    error: lastError.message,
                    attempt,
                    nextRetryIn: `${delay}ms`
                });
                await sleep(delay);
            }
        }
    }

    const totalTimeMs = Date.now() - startTime;
    LogEngine.error(`${context} failed after ${attemptCount} attempts`, {
        totalTimeMs,
        finalError: lastError.message
    });

    return {
        success: false,
        error: lastError,
        attemptCount,
        totalTimeMs
    };
}

/**
 * Startup connection retry: 5 attempts, 2s doubling up to 30s.
 * Resolves with the operation's result or throws the last error.
 */
export async function retryConnection<T>(
    operation: () => Promise<T>,
    context: string,
    sleep: Sleep = defaultSleep
): Promise<T> {
    const outcome = await retryWithExponentialBackoff(operation, {
        maxAttempts: 5,
        initialDelayMs: 2000,
        maxDelayMs: 30000,
        backoffFactor: 2,
        jitterFactor: 0
    }, context, sleep);

    if (!outcome.success) {
        throw outcome.error;
    }
    return outcome.result;
}
