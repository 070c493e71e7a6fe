/**
 * Decides how often a request is attempted and how long to wait in between
 */
export interface RetryPolicy {
    /**
     * Total attempts, the first one included
     */
    readonly maxAttempts: number;

    /**
     * Milliseconds to wait after the given failed attempt (1-based)
     */
    delayBeforeRetry(attempt: number): number;
}

/**
 * Fixed number of attempts with a constant delay (none by default)
 */
export class FixedRetryPolicy implements RetryPolicy {
    constructor(
        readonly maxAttempts: number,
        private readonly delayMs: number = 0
    ) {
        assertAttempts(maxAttempts);
    }

    delayBeforeRetry(_attempt: number): number {
        return this.delayMs;
    }
}

export interface BackoffOptions {
    retryDelay?: number;
    maxRetryDelay?: number;
    backoffFactor?: number;
}

/**
 * Delay grows by backoffFactor after every failure, capped at maxRetryDelay
 */
export class ExponentialBackoffPolicy implements RetryPolicy {
    private readonly options: Required<BackoffOptions>;

    constructor(
        readonly maxAttempts: number,
        options: BackoffOptions = {}
    ) {
        assertAttempts(maxAttempts);
        this.options = {
            retryDelay: 1000,
            maxRetryDelay: 30000,
            backoffFactor: 2,
            ...options
        };
    }

    delayBeforeRetry(attempt: number): number {
        const { retryDelay, maxRetryDelay, backoffFactor } = this.options;
        return Math.min(retryDelay * Math.pow(backoffFactor, attempt - 1), maxRetryDelay);
    }
}

function assertAttempts(maxAttempts: number): void {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
}
