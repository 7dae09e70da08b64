import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryUtil } from '../../../src/utils/retry.util';
import { logger } from '../../../src/config/logger';
import { DependencyUnavailableError } from '../../../src/errors/engine-errors';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('RetryUtil', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('executeWithRetry', () => {
        it('should return the first successful result', async () => {
            const operation = vi.fn().mockResolvedValue('verdict');

            await expect(RetryUtil.executeWithRetry(operation, { operationName: 'judge' })).resolves.toBe('verdict');
            expect(operation).toHaveBeenCalledTimes(1);
        });

        it('should retry a transient failure', async () => {
            const operation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('verdict');

            const result = await RetryUtil.executeWithRetry(operation, {
                operationName: 'judge',
                maxAttempts: 3,
                baseDelay: 1
            });

            expect(result).toBe('verdict');
            expect(operation).toHaveBeenCalledTimes(2);
            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'judge', attempt: 2, maxAttempts: 3 },
                'judge succeeded on attempt 2'
            );
        });

        it('should give up after maxAttempts', async () => {
            const operation = vi.fn().mockRejectedValue(new Error('rate limit exceeded'));

            await expect(RetryUtil.executeWithRetry(operation, {
                operationName: 'judge',
                maxAttempts: 3,
                baseDelay: 1
            })).rejects.toThrow('rate limit exceeded');

            expect(operation).toHaveBeenCalledTimes(3);
            expect(logger.error).toHaveBeenCalledWith(
                { operation: 'judge', maxAttempts: 3, error: 'rate limit exceeded' },
                'judge failed after 3 attempts'
            );
        });

        it('should stop at the first non-retryable error', async () => {
            const operation = vi.fn().mockRejectedValue(new Error('Invalid API key'));

            await expect(RetryUtil.executeWithRetry(operation, { maxAttempts: 3 })).rejects.toThrow('Invalid API key');
            expect(operation).toHaveBeenCalledTimes(1);
        });

        it('should wrap a non-Error rejection', async () => {
            const operation = vi.fn().mockRejectedValue('boom');

            await expect(RetryUtil.executeWithRetry(operation, { operationName: 'narrative', maxAttempts: 2 }))
                .rejects.toThrow('narrative failed after 2 attempts');
            expect(operation).toHaveBeenCalledTimes(1);
        });
    });

    describe('isRetryableError', () => {
        it.each([
            [{ code: 'ECONNRESET' }],
            [{ code: 'ETIMEDOUT' }],
            [{ status: 429 }],
            [{ status: 503 }],
            [new Error('Request timeout')],
            [new Error('quota exceeded')]
        ])('should retry %o', (error) => {
            expect(RetryUtil.isRetryableError(error)).toBe(true);
        });

        it.each([
            [{ status: 400 }],
            [{ code: 'VALIDATION_ERROR' }],
            [new Error('Permission denied')],
            ['plain string'],
            [null]
        ])('should not retry %o', (error) => {
            expect(RetryUtil.isRetryableError(error)).toBe(false);
        });

        it('should never retry engine errors', () => {
            const error = new DependencyUnavailableError('Answer judge', new Error('timeout'));

            expect(RetryUtil.isRetryableError(error)).toBe(false);
        });
    });
});
