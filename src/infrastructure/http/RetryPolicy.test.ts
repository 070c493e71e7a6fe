import { describe, it, expect } from '@jest/globals';
import { ExponentialBackoffPolicy, FixedRetryPolicy } from './RetryPolicy';

describe('FixedRetryPolicy', () => {
    it('should not wait between attempts by default', () => {
        const policy = new FixedRetryPolicy(3);

        expect(policy.maxAttempts).toBe(3);
        expect(policy.delayBeforeRetry(1)).toBe(0);
        expect(policy.delayBeforeRetry(2)).toBe(0);
    });

    it('should wait the configured delay', () => {
        expect(new FixedRetryPolicy(2, 250).delayBeforeRetry(1)).toBe(250);
    });

    it('should reject attempt counts below one', () => {
        expect(() => new FixedRetryPolicy(0)).toThrow('maxAttempts must be a positive integer, got 0');
        expect(() => new FixedRetryPolicy(1.5)).toThrow(RangeError);
    });
});

describe('ExponentialBackoffPolicy', () => {
    it('should double the delay after every failure', () => {
        const policy = new ExponentialBackoffPolicy(5);

        expect(policy.delayBeforeRetry(1)).toBe(1000);
        expect(policy.delayBeforeRetry(2)).toBe(2000);
        expect(policy.delayBeforeRetry(3)).toBe(4000);
    });

    it('should cap the delay', () => {
        const policy = new ExponentialBackoffPolicy(10, { retryDelay: 100, backoffFactor: 3, maxRetryDelay: 500 });

        expect(policy.delayBeforeRetry(1)).toBe(100);
        expect(policy.delayBeforeRetry(2)).toBe(300);
        expect(policy.delayBeforeRetry(3)).toBe(500);
    });

    it('should reject attempt counts below one', () => {
        expect(() => new ExponentialBackoffPolicy(-1)).toThrow(RangeError);
    });
});
