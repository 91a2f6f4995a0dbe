// Recovery strategies for transient failures

import type { AppError, RecoveryResult } from './types';
import { ErrorCode, createAppError, exponentialBackoff, isMatcherError, sleep, toError } from './types';
import { logger } from '../logger';

export interface RetryContext<T> {
    operation: () => Promise<T>;
    attempt?: number;
    maxRetries?: number;
    baseDelay?: number;
}

export interface RecoveryStrategy {
    name: string;
    canRecover: (error: AppError) => boolean;
    recover: <T>(error: AppError, context: RetryContext<T>) => Promise<RecoveryResult<T>>;
    maxRetries?: number;
}

/**
 * Retry with exponential backoff
 */
export const retryWithBackoff: RecoveryStrategy = {
    name: 'retry-with-backoff',
    maxRetries: 3,

    canRecover: (error: AppError) => {
        return [ErrorCode.NETWORK_ERROR, ErrorCode.TIMEOUT_ERROR].includes(error.code);
    },

    recover: async <T>(error: AppError, context: RetryContext<T>): Promise<RecoveryResult<T>> => {
        const attempt = context.attempt || 0;
        const maxRetries = context.maxRetries || 3;

        if (attempt >= maxRetries) {
            return { success: false, error, strategy: 'retry-with-backoff' };
        }

        const delay = exponentialBackoff(attempt, context.baseDelay);
        logger.info(`[Recovery] Retrying after ${delay}ms (attempt ${attempt + 1}/${maxRetries})`);

        await sleep(delay);

        try {
            const result = await context.operation();
            return { success: true, data: result, strategy: 'retry-with-backoff' };
        } catch (err) {
            return {
                success: false,
                error: classifyTransportError(err),
                strategy: 'retry-with-backoff',
            };
        }
    },
};

export const recoveryStrategies: RecoveryStrategy[] = [retryWithBackoff];

/**
 * Map a thrown transport error (fetch, abort signal) to an AppError.
 * A MatcherError keeps its own code.
 */
export function classifyTransportError(err: unknown): AppError {
    if (isMatcherError(err)) return err.appError;
    const error = toError(err);
    const name = error?.name ?? '';
    if (name === 'TimeoutError' || name === 'AbortError') {
        return createAppError(ErrorCode.TIMEOUT_ERROR, `Request timed out: ${error?.message}`, {}, error);
    }
    return createAppError(ErrorCode.NETWORK_ERROR, `Request failed: ${error?.message}`, {}, error);
}

/**
 * Attempt recovery using available strategies
 * @param attempt - Current attempt number (for retry strategies)
 */
export async function attemptRecovery<T>(
    error: AppError,
    context: RetryContext<T>,
    attempt: number = 0
): Promise<RecoveryResult<T>> {
    for (const strategy of recoveryStrategies) {
        if (!strategy.canRecover(error)) continue;

        logger.info(`[Recovery] Attempting strategy: ${strategy.name} (attempt ${attempt + 1})`);

        const result = await strategy.recover(error, { ...context, attempt });

        if (result.success) {
            logger.info(`[Recovery] Success with strategy: ${strategy.name}`);
            return result;
        }

        const maxRetries = context.maxRetries || strategy.maxRetries || 3;
        if (strategy.name === 'retry-with-backoff' && attempt < maxRetries - 1) {
            return attemptRecovery(result.error ?? error, context, attempt + 1);
        }

        return result;
    }

    logger.warn('[Recovery] No strategy could recover', { code: error.code });
    return { success: false, error, strategy: 'none' };
}
