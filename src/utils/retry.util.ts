import { logger } from '../config/logger';
import { isEngineError } from '../errors/engine-errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

/**
 * Retry Utility
 *
 * Retries transient failures of outbound calls (OpenAI, network) with
 * exponential backoff. Engine errors are never retried here.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
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

            } catch (error) {
                lastError = error;
                const retryable = RetryUtil.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: RetryUtil.messageOf(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: RetryUtil.messageOf(error)
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

                await RetryUtil.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: RetryUtil.messageOf(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError instanceof Error ? lastError : new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (typeof error !== 'object' || error === null || isEngineError(error)) {
            return false;
        }
        const code = 'code' in error ? error.code : undefined;
        const status = 'status' in error ? error.status : undefined;
        const message = 'message' in error ? error.message : undefined;
        const text = typeof message === 'string' ? message.toLowerCase() : '';

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        // OpenAI API rate limits and server errors
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        return ['timeout', 'rate limit', 'quota', 'connection', 'network'].some((needle) => text.includes(needle));
    }

    private static messageOf(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
