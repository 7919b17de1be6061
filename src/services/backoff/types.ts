/**
 * Backoff strategies. Values are the names shared by every client.
 */
export enum BackoffStrategy {
    /** Same delay every attempt */
    CONSTANT = 'constant',
    /** base * (attempt + 1) */
    LINEAR = 'linear',
    /** base * 2^attempt */
    EXPONENTIAL = 'exponential',
    /** Exponential delay scaled by a random factor in [0.5, 1.5] */
    EXPONENTIAL_WITH_JITTER = 'exponentialWithJitter',
    /** Random delay in [0, exponential] */
    FULL_JITTER = 'fullJitter',
    /** Half the exponential delay plus a random share of the other half */
    EQUAL_JITTER = 'equalJitter',
}

/**
 * Source of uniform random numbers in [0, 1). Defaults to Math.random.
 */
export type RandomSource = () => number;
