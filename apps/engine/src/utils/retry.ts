import { UnrecoverableError, isTransient } from '@sagaloop/sdk';

export interface RetryPolicy {
    // Retries allowed after the first attempt.
    budget: number;
    backoff: (attempt: number) => number;
    sleep: (ms: number) => Promise<void>;
}

export interface BackoffOptions {
    initialMs: number;
    multiplier: number;
    maxMs: number;
    // fraction of the delay added or removed at random
    jitter: number;
}

export const defaultBackoffOptions: BackoffOptions = {
    initialMs: 250,
    multiplier: 4,
    maxMs: 8000,
    jitter: 0.1,
};

/** Retry n (1-indexed) waits initialMs * multiplier^(n-1), capped at maxMs. */
export function exponentialBackoff(options: Partial<BackoffOptions> = {}): (attempt: number) => number {
    const { initialMs, multiplier, maxMs, jitter } = { ...defaultBackoffOptions, ...options };
    return attempt => {
        const delay = Math.min(initialMs * Math.pow(multiplier, attempt - 1), maxMs);
        const spread = delay * jitter;
        return Math.floor(delay + (Math.random() * 2 - 1) * spread);
    };
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const defaultRetryPolicy: RetryPolicy = {
    budget: 3,
    backoff: exponentialBackoff(),
    sleep,
};

/** The same policy with a step's own retry budget, when it sets one. */
export function withBudget(policy: RetryPolicy, budget: number | undefined): RetryPolicy {
    return budget === undefined ? policy : { ...policy, budget };
}

export interface RetryResult<T> {
    value: T;
    retries: number;
}

export class RetryExhaustedError extends UnrecoverableError {
    constructor(label: string, public readonly retries: number, originalError: unknown) {
        super(`${label} failed after ${retries} retries: ${originalError instanceof Error ? originalError.message : String(originalError)}`, originalError);
    }
}

// Failure carrying the number of retries spent before giving up, so callers can
// record it against the step's attempt count.
export class RetryFailure extends Error {
    constructor(public readonly error: UnrecoverableError, public readonly retries: number) {
        super(error.message);
        this.name = 'RetryFailure';
    }
}

/**
 * Run `fn`, retrying transient failures with backoff. Permanent failures and an
 * exhausted budget surface as a RetryFailure wrapping an UnrecoverableError.
 */
export async function withRetry<T>(label: string, policy: RetryPolicy, fn: () => Promise<T>): Promise<RetryResult<T>> {
    let retries = 0;
    for (;;) {
        try {
            return { value: await fn(), retries };
        } catch (err) {
            if (!isTransient(err)) {
                const permanent = err instanceof UnrecoverableError
                    ? err
                    : new UnrecoverableError(`${label} failed: ${err instanceof Error ? err.message : String(err)}`, err);
                throw new RetryFailure(permanent, retries);
            }
            if (retries >= policy.budget) {
                throw new RetryFailure(new RetryExhaustedError(label, retries, err), retries);
            }
            retries++;
            const delay = policy.backoff(retries);
            console.warn(`[retry] ${label} transient failure (retry ${retries}/${policy.budget} in ${delay}ms): ${err.message}`);
            await policy.sleep(delay);
        }
    }
}
