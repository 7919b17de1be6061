/**
 * Circuit Breaker States
 */
export enum CircuitState {
    /** Circuit is closed, requests flow normally */
    CLOSED = 'closed',
    /** Circuit is open, requests are blocked */
    OPEN = 'open',
    /** Circuit is letting probe requests through to test recovery */
    HALF_OPEN = 'halfOpen',
}

export type CircuitPreset = 'default' | 'sensitive' | 'tolerant';

/**
 * Circuit Breaker configuration
 */
export interface CircuitBreakerConfig {
    /** Failures within the window that open the circuit */
    failureThreshold: number;
    /** Consecutive half-open successes that close the circuit */
    successThreshold: number;
    /** Time an open circuit waits before probing */
    resetTimeoutSeconds: number;
    /** Rolling window for counting failures */
    failureWindowSeconds: number;
    /** Share of half-open requests admitted as probes (1-100) */
    halfOpenRequestPercentage: number;
}

/**
 * Plain-data state of one circuit. Callers may persist it between calls.
 */
export interface CircuitSnapshot {
    state: CircuitState;
    /** Epoch ms of failures still inside the window (closed state only) */
    failureTimestamps: number[];
    consecutiveSuccesses: number;
    /** Requests evaluated since entering half-open */
    halfOpenRequests: number;
    /** Epoch ms the circuit last opened */
    openedAt: number | null;
    config?: CircuitBreakerConfig;
}

/**
 * Result of a pre-flight check on a typed snapshot
 */
export interface CircuitEvaluation {
    allowed: boolean;
    state: CircuitState;
    waitTimeMs: number | null;
    reason: string;
    snapshot: CircuitSnapshot;
}

/**
 * Result of a pre-flight check on serialized state
 */
export interface CircuitBreakerDecision {
    allowed: boolean;
    state: CircuitState;
    waitTimeMs: number | null;
    reason: string;
    /** Updated state the caller must store for the next call */
    serializedState: string;
}

export interface CircuitEvaluationOptions {
    /** Current time in epoch ms (default: Date.now()) */
    now?: number;
    /** Overrides the config embedded in the state */
    config?: CircuitBreakerConfig;
}

export interface CircuitMetrics {
    key: string;
    state: CircuitState;
    failureCount: number;
    consecutiveSuccesses: number;
    totalCalls: number;
    successfulCalls: number;
    failedCalls: number;
    rejectedCalls: number;
    lastFailureTime: Date | null;
    lastSuccessTime: Date | null;
    lastError: string | null;
    lastStateChange: Date;
    nextAttemptTime: Date | null;
}

/**
 * Registry event types
 */
export interface CircuitEvents {
    'circuit:opened': { key: string; reason: string };
    'circuit:half-open': { key: string };
    'circuit:closed': { key: string };
}
