/**
 * OpenID Provider - DynamoDB Retry Utilities
 *
 * Implements exponential backoff with jitter for transient DynamoDB failures.
 * Handles throttling, provisioned throughput exceeded, and transient errors.
 *
 * Retry Strategy:
 * - Exponential backoff: 100ms, 200ms, 400ms, 800ms, 1600ms
 * - Full jitter to prevent thundering herd
 * - Maximum 5 retries by default
 * - Only retries transient/throttling errors
 *
 * The protocol engine never retries; a failure that survives these retries
 * aborts the request.
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

// =============================================================================
// Types
// =============================================================================

export interface RetryConfig {
    /** Maximum number of retry attempts (default: 5) */
    maxRetries: number;
    /** Base delay in milliseconds (default: 100) */
    baseDelayMs: number;
    /** Maximum delay in milliseconds (default: 5000) */
    maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 5,
    baseDelayMs: 100,
    maxDelayMs: 5000,
};

// =============================================================================
// Retryable Error Detection
// =============================================================================

const RETRYABLE_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

const RETRYABLE_STATUS_CODES = new Set([
    429, // Too Many Requests
    500, // Internal Server Error
    502, // Bad Gateway
    503, // Service Unavailable
    504, // Gateway Timeout
]);

/**
 * Determine if an error is transient and worth retrying.
 */
export function isRetryableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
        return false;
    }

    if ('name' in error && typeof error.name === 'string' && RETRYABLE_ERROR_NAMES.has(error.name)) {
        return true;
    }

    // AWS SDK v3 errors carry the HTTP status in $metadata
    if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
        const metadata = error.$metadata;
        if (
            'httpStatusCode' in metadata &&
            typeof metadata.httpStatusCode === 'number' &&
            RETRYABLE_STATUS_CODES.has(metadata.httpStatusCode)
        ) {
            return true;
        }
    }

    if ('$retryable' in error && error.$retryable) {
        return true;
    }

    return false;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay with exponential backoff and full jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @returns Delay in milliseconds
 */
export function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
    const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
    return Math.floor(Math.random() * cappedDelay);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Wrapper
// =============================================================================

/**
 * Execute an async operation with retry logic.
 *
 * @throws The last error if all retries are exhausted, or the first
 *         non-retryable error
 *
 * @example
 * ```typescript
 * const result = await withRetry(() =>
 *     client.send(new GetCommand({ TableName, Key: { PK, SK: 'METADATA' } }))
 * );
 * ```
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!isRetryableError(error) || attempt >= config.maxRetries) {
                throw error;
            }
            await sleep(calculateDelay(attempt, config));
        }
    }
}
