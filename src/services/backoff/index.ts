import { BackoffStrategy, RandomSource } from './types.js';
import { ResilienceConfigError } from '../../utils/errors.js';

// 2^1023 is the largest finite power of two; past it a zero base turns into NaN
const MAX_EXPONENT = 1023;

const STRATEGY_BY_NAME: ReadonlyMap<string, BackoffStrategy> = new Map(
    Object.values(BackoffStrategy).map(strategy => [strategy, strategy])
);

/**
 * Resolve a strategy from its shared name, or null when unknown
 */
export function parseBackoffStrategy(name: string): BackoffStrategy | null {
    return STRATEGY_BY_NAME.get(name) ?? null;
}

/**
 * Calculate the delay before the next attempt.
 *
 * Always returns an integer in [0, maxDelayMs]. A negative attempt counts as
 * attempt 0. Jittered strategies cap the exponential value at maxDelayMs
 * before drawing the random component.
 *
 * @param attempt - zero-based attempt counter
 * @param random - only consulted by the jittered strategies
 */
export function calculateBackoff(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number,
    strategy: BackoffStrategy,
    random: RandomSource = Math.random
): number {
    assertBounds(baseDelayMs, maxDelayMs);

    const n = Number.isFinite(attempt) ? Math.max(0, Math.floor(attempt)) : 0;
    const exponential = Math.min(baseDelayMs * Math.pow(2, Math.min(n, MAX_EXPONENT)), maxDelayMs);

    let delay: number;
    switch (strategy) {
        case BackoffStrategy.CONSTANT:
            delay = baseDelayMs;
            break;
        case BackoffStrategy.LINEAR:
            delay = baseDelayMs * (n + 1);
            break;
        case BackoffStrategy.EXPONENTIAL:
            delay = exponential;
            break;
        case BackoffStrategy.EXPONENTIAL_WITH_JITTER:
            delay = exponential * (0.5 + draw(random));
            break;
        case BackoffStrategy.FULL_JITTER:
            delay = draw(random) * exponential;
            break;
        case BackoffStrategy.EQUAL_JITTER: {
            const half = exponential / 2;
            delay = half + draw(random) * half;
            break;
        }
    }

    return clamp(Math.floor(delay), 0, maxDelayMs);
}

function assertBounds(baseDelayMs: number, maxDelayMs: number): void {
    if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
        throw new ResilienceConfigError(`baseDelayMs must be a non-negative number, got ${baseDelayMs}`);
    }
    if (!Number.isFinite(maxDelayMs) || maxDelayMs < baseDelayMs) {
        throw new ResilienceConfigError(`maxDelayMs (${maxDelayMs}) must be >= baseDelayMs (${baseDelayMs})`);
    }
}

// Keeps a misbehaving random source inside [0, 1]
function draw(random: RandomSource): number {
    const value = random();
    return Number.isFinite(value) ? clamp(value, 0, 1) : 0;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

export * from './types.js';
