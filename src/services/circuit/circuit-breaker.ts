import {
    CircuitBreakerConfig,
    CircuitEvaluation,
    CircuitMetrics,
    CircuitSnapshot,
    CircuitState,
} from './types.js';
import {
    applyFailure,
    applySuccess,
    createCircuitSnapshot,
    evaluateCircuit,
    parseCircuitSnapshot,
    serializeCircuitSnapshot,
} from './engine.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('CircuitBreaker');

export type TransitionListener = (from: CircuitState, to: CircuitState, reason: string) => void;

/**
 * Circuit Breaker for one key (RPC function name or host)
 *
 * Holds the plain-data snapshot the pure engine works on, plus call
 * statistics:
 * 1. CLOSED: Normal operation, counting failures within the window
 * 2. OPEN: Rejecting requests until the reset timeout has elapsed
 * 3. HALF_OPEN: Admitting a share of requests as recovery probes
 */
export class CircuitBreaker {
    private snapshot: CircuitSnapshot;
    private totalCalls = 0;
    private successfulCalls = 0;
    private failedCalls = 0;
    private rejectedCalls = 0;
    private lastFailureTime: Date | null = null;
    private lastSuccessTime: Date | null = null;
    private lastError: string | null = null;
    private lastStateChange: Date;

    constructor(
        private readonly key: string,
        private config: CircuitBreakerConfig,
        private readonly now: () => number = Date.now,
        private readonly onTransition?: TransitionListener
    ) {
        this.snapshot = createCircuitSnapshot(config);
        this.lastStateChange = new Date(now());
    }

    /**
     * Get current circuit state without consuming a probe
     */
    public getState(): CircuitState {
        return this.snapshot.state;
    }

    public getConfig(): CircuitBreakerConfig {
        return this.config;
    }

    /**
     * Replace the thresholds; the current state is kept
     */
    public updateConfig(config: CircuitBreakerConfig): void {
        this.config = config;
        this.snapshot = { ...this.snapshot, config };
    }

    /**
     * Check if a request may proceed. Half-open admission counts this call.
     */
    public tryAcquire(): CircuitEvaluation {
        const evaluation = evaluateCircuit(this.snapshot, this.config, this.now());
        this.commit(evaluation.snapshot, evaluation.reason);

        this.totalCalls++;
        if (!evaluation.allowed) {
            this.rejectedCalls++;
            logger.debug(`Rejected request for ${this.key}: ${evaluation.reason}`);
        }
        return evaluation;
    }

    /**
     * Record a successful request
     */
    public recordSuccess(): void {
        const now = this.now();
        this.successfulCalls++;
        this.lastSuccessTime = new Date(now);

        const wasHalfOpen = this.snapshot.state === CircuitState.HALF_OPEN;
        this.commit(applySuccess(this.snapshot, this.config, now), 'probe successes reached threshold');

        if (wasHalfOpen && this.snapshot.state === CircuitState.CLOSED) {
            logger.info(`Circuit closed for ${this.key} after ${this.config.successThreshold} successful probes`);
        }
    }

    /**
     * Record a failed request
     */
    public recordFailure(error: string = 'request failed'): void {
        const now = this.now();
        const previous = this.snapshot.state;
        this.failedCalls++;
        this.lastFailureTime = new Date(now);
        this.lastError = error;

        this.commit(applyFailure(this.snapshot, this.config, now), error);

        if (previous === CircuitState.HALF_OPEN) {
            logger.warn(`Circuit reopened for ${this.key}: ${error}`);
        } else if (previous === CircuitState.CLOSED && this.snapshot.state === CircuitState.OPEN) {
            logger.error(`Circuit opened for ${this.key} after ${this.config.failureThreshold} failures`);
        } else if (previous === CircuitState.CLOSED) {
            logger.warn(
                `Failure recorded for ${this.key}: ${error} (${this.snapshot.failureTimestamps.length}/${this.config.failureThreshold})`
            );
        }
    }

    /**
     * Force reset the circuit breaker
     */
    public reset(): void {
        this.commit(createCircuitSnapshot(this.config), 'manual reset');
        logger.info(`Circuit manually reset for ${this.key}`);
    }

    /**
     * Force the circuit open, e.g. while a backend is known to be down
     */
    public forceOpen(): void {
        this.commit(applyFailure({ ...this.snapshot, state: CircuitState.HALF_OPEN }, this.config, this.now()), 'forced open');
        logger.warn(`Circuit manually opened for ${this.key}`);
    }

    /**
     * Serialized snapshot, in the format evaluateCircuitState accepts
     */
    public serialize(): string {
        return serializeCircuitSnapshot(this.snapshot);
    }

    /**
     * Replace the snapshot with previously serialized state. Thresholds
     * embedded in the state replace the current ones.
     */
    public restore(serialized: string | null | undefined): void {
        const snapshot = parseCircuitSnapshot(serialized);
        if (snapshot.config) {
            this.config = snapshot.config;
        }
        this.commit(snapshot, 'restored');
    }

    /**
     * Get metrics for reporting
     */
    public getMetrics(): CircuitMetrics {
        const resetAt = this.snapshot.state === CircuitState.OPEN && this.snapshot.openedAt !== null
            ? new Date(this.snapshot.openedAt + this.config.resetTimeoutSeconds * 1000)
            : null;

        return {
            key: this.key,
            state: this.snapshot.state,
            failureCount: this.snapshot.failureTimestamps.length,
            consecutiveSuccesses: this.snapshot.consecutiveSuccesses,
            totalCalls: this.totalCalls,
            successfulCalls: this.successfulCalls,
            failedCalls: this.failedCalls,
            rejectedCalls: this.rejectedCalls,
            lastFailureTime: this.lastFailureTime,
            lastSuccessTime: this.lastSuccessTime,
            lastError: this.lastError,
            lastStateChange: this.lastStateChange,
            nextAttemptTime: resetAt,
        };
    }

    private commit(next: CircuitSnapshot, reason: string): void {
        const previous = this.snapshot.state;
        this.snapshot = next;

        if (previous !== next.state) {
            this.lastStateChange = new Date(this.now());
            logger.debug(`Circuit ${this.key}: ${previous} -> ${next.state}`);
            this.onTransition?.(previous, next.state, reason);
        }
    }
}
