import type { BackoffStrategy, RandomSource } from '../backoff/types.js';

/**
 * Outcome of a retry evaluation for one failed attempt
 */
export interface RetryDecision {
    shouldRetry: boolean;
    /** Delay before the next attempt, 0 when not retrying */
    delayMs: number;
    /** Human-readable reason for logs and telemetry */
    reason: string;
}

/**
 * How a response status is treated by the retry policy
 */
export enum StatusClass {
    SUCCESS = 'success',
    TIMEOUT = 'timeout',
    RATE_LIMITED = 'rateLimited',
    SERVER_ERROR = 'serverError',
    CLIENT_ERROR = 'clientError',
    /** No status: connection refused, DNS failure, socket timeout */
    NETWORK_FAILURE = 'networkFailure',
    UNKNOWN = 'unknown',
}

export interface RetryOptions {
    strategy?: BackoffStrategy;
    baseDelayMs?: number;
    maxDelayMs?: number;
    /** Server-requested delay (Retry-After); honoured for 429 and 503 */
    retryAfterMs?: number;
    /** Retry statuses that fall outside every known class */
    retryOnUnknown?: boolean;
    random?: RandomSource;
}

export type RetryPreset = 'default' | 'aggressive' | 'conservative' | 'noRetry' | 'rateLimitAware';

/**
 * Named retry envelope. maxAttempts counts the initial attempt.
 */
export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    strategy: BackoffStrategy;
    retryOnUnknown: boolean;
}
