import { z } from 'zod';
import {
    CircuitBreakerConfig,
    CircuitBreakerDecision,
    CircuitEvaluation,
    CircuitEvaluationOptions,
    CircuitPreset,
    CircuitSnapshot,
    CircuitState,
} from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('CircuitEngine');

export const CircuitBreakerConfigSchema = z.object({
    failureThreshold: z.number().int().min(1),
    successThreshold: z.number().int().min(1),
    resetTimeoutSeconds: z.number().min(0),
    failureWindowSeconds: z.number().positive(),
    halfOpenRequestPercentage: z.number().int().min(1).max(100),
});

const CircuitSnapshotSchema = z.object({
    state: z.nativeEnum(CircuitState),
    failureTimestamps: z.array(z.number()).default([]),
    consecutiveSuccesses: z.number().int().min(0).default(0),
    halfOpenRequests: z.number().int().min(0).default(0),
    openedAt: z.number().nullable().default(null),
    config: CircuitBreakerConfigSchema.optional(),
});

export const CIRCUIT_PRESETS: Readonly<Record<CircuitPreset, Readonly<CircuitBreakerConfig>>> = {
    default: Object.freeze({
        failureThreshold: 5,
        successThreshold: 3,
        resetTimeoutSeconds: 30,
        failureWindowSeconds: 60,
        halfOpenRequestPercentage: 50,
    }),
    sensitive: Object.freeze({
        failureThreshold: 3,
        successThreshold: 5,
        resetTimeoutSeconds: 60,
        failureWindowSeconds: 30,
        halfOpenRequestPercentage: 25,
    }),
    tolerant: Object.freeze({
        failureThreshold: 10,
        successThreshold: 2,
        resetTimeoutSeconds: 15,
        failureWindowSeconds: 120,
        halfOpenRequestPercentage: 75,
    }),
};

/**
 * Get circuit breaker configuration for a preset. Unknown names fall back
 * to 'default'.
 */
export function getCircuitBreakerConfig(preset: string = 'default'): Readonly<CircuitBreakerConfig> {
    return isCircuitPreset(preset) ? CIRCUIT_PRESETS[preset] : CIRCUIT_PRESETS.default;
}

export function isCircuitPreset(name: string): name is CircuitPreset {
    return Object.prototype.hasOwnProperty.call(CIRCUIT_PRESETS, name);
}

export function createCircuitSnapshot(config?: CircuitBreakerConfig): CircuitSnapshot {
    return {
        state: CircuitState.CLOSED,
        failureTimestamps: [],
        consecutiveSuccesses: 0,
        halfOpenRequests: 0,
        openedAt: null,
        ...(config ? { config } : {}),
    };
}

/**
 * Decode serialized circuit state. Missing or malformed state yields a fresh
 * closed circuit.
 */
export function parseCircuitSnapshot(serialized: string | null | undefined): CircuitSnapshot {
    if (!serialized) {
        return createCircuitSnapshot();
    }

    let raw: unknown;
    try {
        raw = JSON.parse(serialized);
    } catch (error) {
        logger.warn(`Discarding unparseable circuit state: ${error}`);
        return createCircuitSnapshot();
    }

    const result = CircuitSnapshotSchema.safeParse(raw);
    if (!result.success) {
        logger.warn(`Discarding invalid circuit state: ${result.error.issues.map(i => i.message).join('; ')}`);
        return createCircuitSnapshot();
    }

    const snapshot = result.data;
    if (snapshot.state === CircuitState.OPEN && snapshot.openedAt === null) {
        logger.warn('Discarding open circuit state without an open timestamp');
        return createCircuitSnapshot(snapshot.config);
    }
    return snapshot;
}

export function serializeCircuitSnapshot(snapshot: CircuitSnapshot): string {
    return JSON.stringify(snapshot);
}

/**
 * Pre-flight check on a typed snapshot. Returns the decision together with
 * the snapshot to store afterwards.
 */
export function evaluateCircuit(
    snapshot: CircuitSnapshot,
    config: CircuitBreakerConfig,
    now: number
): CircuitEvaluation {
    switch (snapshot.state) {
        case CircuitState.CLOSED:
            return {
                allowed: true,
                state: CircuitState.CLOSED,
                waitTimeMs: null,
                reason: 'circuit closed',
                snapshot: {
                    ...snapshot,
                    failureTimestamps: pruneFailures(snapshot.failureTimestamps, config, now),
                    config,
                },
            };

        case CircuitState.OPEN: {
            const resetMs = config.resetTimeoutSeconds * 1000;
            const elapsed = now - (snapshot.openedAt ?? now);
            if (elapsed < resetMs) {
                const waitTimeMs = Math.max(1, Math.ceil(resetMs - elapsed));
                return {
                    allowed: false,
                    state: CircuitState.OPEN,
                    waitTimeMs,
                    reason: `circuit open, retry in ${waitTimeMs}ms`,
                    snapshot: { ...snapshot, config },
                };
            }
            return admitProbe(toHalfOpen(snapshot), config);
        }

        case CircuitState.HALF_OPEN:
            return admitProbe(snapshot, config);
    }
}

/**
 * Apply a successful outcome to a snapshot
 */
export function applySuccess(snapshot: CircuitSnapshot, config: CircuitBreakerConfig, now: number): CircuitSnapshot {
    switch (snapshot.state) {
        case CircuitState.CLOSED:
            return {
                ...snapshot,
                failureTimestamps: pruneFailures(snapshot.failureTimestamps, config, now),
                config,
            };

        case CircuitState.HALF_OPEN: {
            const consecutiveSuccesses = snapshot.consecutiveSuccesses + 1;
            if (consecutiveSuccesses >= config.successThreshold) {
                return createCircuitSnapshot(config);
            }
            return { ...snapshot, consecutiveSuccesses, config };
        }

        case CircuitState.OPEN:
            return { ...snapshot, config };
    }
}

/**
 * Apply a failed outcome to a snapshot
 */
export function applyFailure(snapshot: CircuitSnapshot, config: CircuitBreakerConfig, now: number): CircuitSnapshot {
    switch (snapshot.state) {
        case CircuitState.CLOSED: {
            const failureTimestamps = [...pruneFailures(snapshot.failureTimestamps, config, now), now];
            if (failureTimestamps.length >= config.failureThreshold) {
                return toOpen(config, now);
            }
            return { ...snapshot, failureTimestamps, consecutiveSuccesses: 0, config };
        }

        case CircuitState.HALF_OPEN:
            return toOpen(config, now);

        case CircuitState.OPEN:
            return { ...snapshot, config };
    }
}

/**
 * Evaluate serialized circuit state to decide if a request may proceed
 */
export function evaluateCircuitState(
    serializedState: string | null | undefined,
    options: CircuitEvaluationOptions = {}
): CircuitBreakerDecision {
    const snapshot = parseCircuitSnapshot(serializedState);
    const { snapshot: next, ...decision } = evaluateCircuit(
        snapshot,
        resolveConfig(snapshot, options),
        options.now ?? Date.now()
    );
    return { ...decision, serializedState: serializeCircuitSnapshot(next) };
}

export function recordCircuitSuccess(
    serializedState: string | null | undefined,
    options: CircuitEvaluationOptions = {}
): string {
    const snapshot = parseCircuitSnapshot(serializedState);
    return serializeCircuitSnapshot(
        applySuccess(snapshot, resolveConfig(snapshot, options), options.now ?? Date.now())
    );
}

export function recordCircuitFailure(
    serializedState: string | null | undefined,
    options: CircuitEvaluationOptions = {}
): string {
    const snapshot = parseCircuitSnapshot(serializedState);
    return serializeCircuitSnapshot(
        applyFailure(snapshot, resolveConfig(snapshot, options), options.now ?? Date.now())
    );
}

function resolveConfig(snapshot: CircuitSnapshot, options: CircuitEvaluationOptions): CircuitBreakerConfig {
    return options.config ?? snapshot.config ?? CIRCUIT_PRESETS.default;
}

function pruneFailures(timestamps: number[], config: CircuitBreakerConfig, now: number): number[] {
    const windowMs = config.failureWindowSeconds * 1000;
    return timestamps.filter(ts => now - ts < windowMs);
}

function toOpen(config: CircuitBreakerConfig, now: number): CircuitSnapshot {
    return {
        state: CircuitState.OPEN,
        failureTimestamps: [],
        consecutiveSuccesses: 0,
        halfOpenRequests: 0,
        openedAt: now,
        config,
    };
}

function toHalfOpen(snapshot: CircuitSnapshot): CircuitSnapshot {
    return {
        ...snapshot,
        state: CircuitState.HALF_OPEN,
        consecutiveSuccesses: 0,
        halfOpenRequests: 0,
    };
}

// The n-th half-open request is admitted when it pushes the admitted count
// up by one; the first request is always admitted.
function admitProbe(snapshot: CircuitSnapshot, config: CircuitBreakerConfig): CircuitEvaluation {
    const pct = Math.min(100, Math.max(1, config.halfOpenRequestPercentage));
    const n = snapshot.halfOpenRequests;
    const allowed = Math.ceil(((n + 1) * pct) / 100) > Math.ceil((n * pct) / 100);

    return {
        allowed,
        state: CircuitState.HALF_OPEN,
        waitTimeMs: null,
        reason: allowed ? 'half-open probe admitted' : 'half-open probe quota reached',
        snapshot: { ...snapshot, halfOpenRequests: n + 1, config },
    };
}
