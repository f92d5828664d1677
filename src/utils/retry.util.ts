import { logger } from '../config/logger';
import { isRecord } from './guards.util';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    /** Replaces the default classification of which errors are worth another attempt */
    shouldRetry?: (error: unknown) => boolean;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

/**
 * Retry Utility
 *
 * Provides retry logic with exponential backoff for the generation calls.
 * Transport failures and malformed model output are retried; anything else
 * fails on the first attempt.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            shouldRetry
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = shouldRetry ? shouldRetry(error) : this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: error instanceof Error ? error.message : String(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                // Don't retry on last attempt
                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: error instanceof Error ? error.message : String(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError instanceof Error ? lastError.message : undefined
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError instanceof Error ? lastError : new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (!isRecord(error)) {
            return false;
        }

        // Errors that declare themselves retryable (e.g. malformed model output)
        if (error.retryable === true) {
            return true;
        }

        // Network errors
        const code = error.code;
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        // OpenAI API status codes
        const status = error.status;
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        const message = typeof error.message === 'string' ? error.message.toLowerCase() : '';
        return ['timeout', 'rate limit', 'quota', 'connection', 'network'].some(marker => message.includes(marker));
    }

    /**
     * Sleep for specified milliseconds
     */
    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
