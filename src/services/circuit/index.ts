import { EventEmitter } from 'events';
import { CircuitBreaker } from './circuit-breaker.js';
import { CIRCUIT_PRESETS } from './engine.js';
import {
    CircuitBreakerConfig,
    CircuitEvaluation,
    CircuitMetrics,
    CircuitState,
} from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('CircuitRegistry');

export type CircuitCheck = Omit<CircuitEvaluation, 'snapshot'>;

/**
 * Per-key circuit breakers, created lazily on first use
 *
 * Features:
 * - One breaker per RPC function name or host
 * - Pre-flight admission (tryAcquire) and outcome recording (recordResult)
 * - Thresholds updated in place when a caller passes a new config
 * - Event-driven notifications on state transitions (see CircuitEvents)
 *
 * Node runs every call to this registry on one thread, so each
 * read-modify-write of a key's state completes before the next begins.
 */
export class CircuitBreakerRegistry extends EventEmitter {
    private breakers: Map<string, CircuitBreaker> = new Map();

    constructor(
        private readonly defaultConfig: CircuitBreakerConfig = CIRCUIT_PRESETS.default,
        private readonly now: () => number = Date.now
    ) {
        super();
    }

    /**
     * Get the breaker for a key, creating it on first use
     */
    public getOrCreate(key: string, config?: CircuitBreakerConfig): CircuitBreaker {
        const existing = this.breakers.get(key);
        if (existing) {
            if (config && !sameConfig(existing.getConfig(), config)) {
                existing.updateConfig(config);
                logger.debug(`Updated circuit thresholds for ${key}`);
            }
            return existing;
        }

        const breaker = new CircuitBreaker(
            key,
            config ?? this.defaultConfig,
            this.now,
            (from, to, reason) => this.onTransition(key, from, to, reason)
        );
        this.breakers.set(key, breaker);
        logger.debug(`Created circuit breaker for ${key}`);
        return breaker;
    }

    /**
     * Check whether a request for this key may proceed
     */
    public tryAcquire(key: string, config?: CircuitBreakerConfig): CircuitCheck {
        const { allowed, state, waitTimeMs, reason } = this.getOrCreate(key, config).tryAcquire();
        return { allowed, state, waitTimeMs, reason };
    }

    /**
     * Record the outcome of a request for this key
     */
    public recordResult(key: string, success: boolean, error?: string): void {
        const breaker = this.getOrCreate(key);
        if (success) {
            breaker.recordSuccess();
        } else {
            breaker.recordFailure(error);
        }
    }

    public getState(key: string): CircuitState | null {
        return this.breakers.get(key)?.getState() ?? null;
    }

    public getMetrics(key: string): CircuitMetrics | null {
        return this.breakers.get(key)?.getMetrics() ?? null;
    }

    public getAllMetrics(): Record<string, CircuitMetrics> {
        const metrics: Record<string, CircuitMetrics> = {};
        for (const [key, breaker] of this.breakers) {
            metrics[key] = breaker.getMetrics();
        }
        return metrics;
    }

    /**
     * Count circuits per state
     */
    public getSummary(): { total: number; closed: number; open: number; halfOpen: number; openKeys: string[] } {
        const all = Object.values(this.getAllMetrics());
        const open = all.filter(m => m.state === CircuitState.OPEN);

        return {
            total: all.length,
            closed: all.filter(m => m.state === CircuitState.CLOSED).length,
            open: open.length,
            halfOpen: all.filter(m => m.state === CircuitState.HALF_OPEN).length,
            openKeys: open.map(m => m.key),
        };
    }

    /**
     * Force reset a key's circuit breaker
     */
    public reset(key: string): boolean {
        const breaker = this.breakers.get(key);
        if (!breaker) return false;

        breaker.reset();
        return true;
    }

    public resetAll(): void {
        for (const breaker of this.breakers.values()) {
            breaker.reset();
        }
    }

    public forceOpen(key: string): void {
        this.getOrCreate(key).forceOpen();
    }

    private onTransition(key: string, from: CircuitState, to: CircuitState, reason: string): void {
        switch (to) {
            case CircuitState.OPEN:
                this.emit('circuit:opened', { key, reason });
                break;
            case CircuitState.HALF_OPEN:
                this.emit('circuit:half-open', { key });
                break;
            case CircuitState.CLOSED:
                this.emit('circuit:closed', { key });
                break;
        }
        logger.info(`Circuit ${key} moved ${from} -> ${to}`);
    }
}

function sameConfig(a: CircuitBreakerConfig, b: CircuitBreakerConfig): boolean {
    return a.failureThreshold === b.failureThreshold
        && a.successThreshold === b.successThreshold
        && a.resetTimeoutSeconds === b.resetTimeoutSeconds
        && a.failureWindowSeconds === b.failureWindowSeconds
        && a.halfOpenRequestPercentage === b.halfOpenRequestPercentage;
}

export * from './types.js';
export * from './engine.js';
export { CircuitBreaker } from './circuit-breaker.js';
