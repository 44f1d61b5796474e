/**
 * Raised when an operation kept failing with a retryable error.
 * The last error is kept as the cause.
 */
export class RetryExhaustedError extends Error {
    readonly attempts: number;
    readonly lastError: unknown;

    constructor(attempts: number, lastError: unknown) {
        const reason = lastError instanceof Error ? lastError.message : String(lastError);
        super(`Giving up after ${attempts} attempts: ${reason}`);
        this.name = 'RetryExhaustedError';
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export interface RetryOptions {
    maxAttempts: number;
    isRetryable: (err: unknown) => boolean;
    /** Called before each new attempt with the error that ended the previous one. */
    onRetry?: (err: unknown, attempt: number) => void;
}

/**
 * Runs fn until it succeeds, a non-retryable error occurs or maxAttempts is reached.
 * Non-retryable errors are rethrown unchanged.
 *
 * @throws RetryExhaustedError when every attempt failed with a retryable error
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            if (!options.isRetryable(err)) {
                throw err;
            }
            if (attempt >= maxAttempts) {
                throw new RetryExhaustedError(attempt, err);
            }
            options.onRetry?.(err, attempt);
        }
    }
}
