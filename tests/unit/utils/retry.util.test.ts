import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryUtil } from '../../../src/utils/retry.util';
import { logger } from '../../../src/config/logger';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('RetryUtil - Static Utility Tests', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('executeWithRetry - Success Cases', () => {
        it('should execute operation successfully on first attempt', async () => {
            const mockOperation = vi.fn().mockResolvedValue('success');
            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation'
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should succeed on second attempt after a retryable failure', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(2);
        });
    });

    describe('executeWithRetry - Failure Cases', () => {
        it('should fail after max attempts with retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('network error');

            expect(mockOperation).toHaveBeenCalledTimes(2);
        });

        it('should fail immediately with non-retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('Invalid API key'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3
            })).rejects.toThrow('Invalid API key');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should wrap non-Error rejections', async () => {
            const mockOperation = vi.fn().mockRejectedValue('String error');

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('test-operation failed after 2 attempts');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should cap the backoff delay at maxDelay', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5,
                backoffMultiplier: 2
            })).rejects.toThrow('network error');

            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 1, delay: 5 },
                'Retrying test-operation in 5ms'
            );
            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 2, delay: 5 },
                'Retrying test-operation in 5ms'
            );
        });
    });

    describe('executeWithRetry - Custom Classification', () => {
        it('should retry only what shouldRetry accepts', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10,
                shouldRetry: error => error instanceof TypeError
            })).rejects.toThrow('network error');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should retry errors the default classifier would refuse', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new TypeError('Permission denied'))
                .mockResolvedValueOnce('success');

            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10,
                shouldRetry: error => error instanceof TypeError
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(2);
        });
    });

    describe('isRetryableError - Error Classification', () => {
        it('should treat network codes as retryable', () => {
            for (const code of ['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT']) {
                expect(RetryUtil.isRetryableError({ code })).toBe(true);
            }
        });

        it('should treat OpenAI rate limit and server statuses as retryable', () => {
            for (const status of [429, 500, 502, 503]) {
                expect(RetryUtil.isRetryableError({ status })).toBe(true);
            }
            expect(RetryUtil.isRetryableError({ status: 400 })).toBe(false);
            expect(RetryUtil.isRetryableError({ status: 401 })).toBe(false);
        });

        it('should treat errors that declare themselves retryable as retryable', () => {
            expect(RetryUtil.isRetryableError({ retryable: true, message: 'bad output' })).toBe(true);
        });

        it('should classify by message', () => {
            expect(RetryUtil.isRetryableError(new Error('Request timeout'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('API quota exceeded'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('Rate limit reached'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('Permission denied'))).toBe(false);
        });

        it('should treat non-objects as not retryable', () => {
            expect(RetryUtil.isRetryableError('network')).toBe(false);
            expect(RetryUtil.isRetryableError(null)).toBe(false);
        });
    });

    describe('executeWithRetry - Logging Integration', () => {
        it('should log debug information for each attempt', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.debug).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 1, maxAttempts: 2 },
                'Executing test-operation (attempt 1/2)'
            );
            expect(logger.debug).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 2, maxAttempts: 2 },
                'Executing test-operation (attempt 2/2)'
            );
            expect(logger.debug).toHaveBeenCalledTimes(2);
        });

        it('should log warnings for failed attempts', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.warn).toHaveBeenCalledWith(
                {
                    operation: 'test-operation',
                    attempt: 1,
                    maxAttempts: 2,
                    error: 'network error',
                    isRetryable: true
                },
                'test-operation failed on attempt 1'
            );
        });
    });
});
