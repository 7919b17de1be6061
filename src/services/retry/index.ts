import { calculateBackoff, BackoffStrategy } from '../backoff/index.js';
import { RetryConfig, RetryDecision, RetryOptions, RetryPreset, StatusClass } from './types.js';

export const RETRY_DEFAULTS = {
    baseDelayMs: 500,
    maxDelayMs: 30000,
    strategy: BackoffStrategy.EXPONENTIAL_WITH_JITTER,
} as const;

const RETRY_PRESETS: Readonly<Record<RetryPreset, Readonly<RetryConfig>>> = {
    default: Object.freeze({
        maxAttempts: 3,
        baseDelayMs: 500,
        maxDelayMs: 30000,
        strategy: BackoffStrategy.EXPONENTIAL_WITH_JITTER,
        retryOnUnknown: false,
    }),
    aggressive: Object.freeze({
        maxAttempts: 5,
        baseDelayMs: 250,
        maxDelayMs: 60000,
        strategy: BackoffStrategy.EXPONENTIAL_WITH_JITTER,
        retryOnUnknown: true,
    }),
    conservative: Object.freeze({
        maxAttempts: 2,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        strategy: BackoffStrategy.EXPONENTIAL_WITH_JITTER,
        retryOnUnknown: false,
    }),
    noRetry: Object.freeze({
        maxAttempts: 1,
        baseDelayMs: 0,
        maxDelayMs: 0,
        strategy: BackoffStrategy.CONSTANT,
        retryOnUnknown: false,
    }),
    rateLimitAware: Object.freeze({
        maxAttempts: 4,
        baseDelayMs: 1000,
        maxDelayMs: 60000,
        strategy: BackoffStrategy.FULL_JITTER,
        retryOnUnknown: false,
    }),
};

/**
 * Get a named retry envelope. Unknown names fall back to 'default'.
 */
export function getRetryConfig(preset: string = 'default'): Readonly<RetryConfig> {
    return isRetryPreset(preset) ? RETRY_PRESETS[preset] : RETRY_PRESETS.default;
}

function isRetryPreset(name: string): name is RetryPreset {
    return Object.prototype.hasOwnProperty.call(RETRY_PRESETS, name);
}

/**
 * Classify a response status. null or a status <= 0 means the request never
 * got an HTTP answer.
 */
export function classifyStatus(statusCode: number | null): StatusClass {
    if (statusCode === null || !Number.isFinite(statusCode) || statusCode <= 0) {
        return StatusClass.NETWORK_FAILURE;
    }
    if (statusCode >= 200 && statusCode < 300) return StatusClass.SUCCESS;
    if (statusCode === 408) return StatusClass.TIMEOUT;
    if (statusCode === 429) return StatusClass.RATE_LIMITED;
    if (statusCode === 500 || statusCode === 502 || statusCode === 503 || statusCode === 504) {
        return StatusClass.SERVER_ERROR;
    }
    if (statusCode >= 400 && statusCode < 500) return StatusClass.CLIENT_ERROR;
    return StatusClass.UNKNOWN;
}

/**
 * Decide whether a failed attempt should be retried, and after how long.
 *
 * Attempt exhaustion wins over classification: once currentAttempt + 1
 * reaches maxAttempts nothing is retried.
 */
export function shouldRetry(
    statusCode: number | null,
    currentAttempt: number,
    maxAttempts: number,
    options: RetryOptions = {}
): RetryDecision {
    const attempt = Number.isFinite(currentAttempt) ? Math.max(0, Math.floor(currentAttempt)) : 0;
    const limit = Number.isFinite(maxAttempts) ? Math.max(1, Math.floor(maxAttempts)) : 1;

    if (attempt + 1 >= limit) {
        return giveUp('max attempts exceeded');
    }

    const statusClass = classifyStatus(statusCode);
    switch (statusClass) {
        case StatusClass.SUCCESS:
            return giveUp('request succeeded');
        case StatusClass.CLIENT_ERROR:
            return giveUp(`client error (${statusCode}) is not retryable`);
        case StatusClass.TIMEOUT:
            return retry('request timeout (408)', attempt, options, false);
        case StatusClass.RATE_LIMITED:
            return retry('rate limited (429)', attempt, options, true);
        case StatusClass.SERVER_ERROR:
            return retry(`server error (${statusCode})`, attempt, options, statusCode === 503);
        case StatusClass.NETWORK_FAILURE:
            return retry('network failure', attempt, options, false);
        case StatusClass.UNKNOWN:
            return options.retryOnUnknown
                ? retry(`unclassified status (${statusCode})`, attempt, options, false)
                : giveUp(`unclassified status (${statusCode}) is not retryable`);
    }
}

function retry(reason: string, attempt: number, options: RetryOptions, honourRetryAfter: boolean): RetryDecision {
    const baseDelayMs = options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? Math.max(RETRY_DEFAULTS.maxDelayMs, baseDelayMs);
    const retryAfter = options.retryAfterMs;

    if (honourRetryAfter && retryAfter !== undefined && Number.isFinite(retryAfter) && retryAfter >= 0) {
        return {
            shouldRetry: true,
            delayMs: Math.min(Math.round(retryAfter), maxDelayMs),
            reason: `${reason}, server requested delay`,
        };
    }

    return {
        shouldRetry: true,
        delayMs: calculateBackoff(
            attempt,
            baseDelayMs,
            maxDelayMs,
            options.strategy ?? RETRY_DEFAULTS.strategy,
            options.random
        ),
        reason,
    };
}

function giveUp(reason: string): RetryDecision {
    return { shouldRetry: false, delayMs: 0, reason };
}

export { RetryBudget } from './budget.js';
export * from './types.js';
