import { describe, it, expect, vi } from 'vitest';
import {
    evaluateCircuitState,
    recordCircuitFailure,
    recordCircuitSuccess,
    getCircuitBreakerConfig,
    parseCircuitSnapshot,
    CIRCUIT_PRESETS,
} from './engine.js';
import { CircuitBreakerConfig, CircuitState } from './types.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

const config: CircuitBreakerConfig = {
    failureThreshold: 3,
    successThreshold: 2,
    resetTimeoutSeconds: 10,
    failureWindowSeconds: 60,
    halfOpenRequestPercentage: 100,
};

const t0 = 1_700_000_000_000;

function openCircuit(at: number): string {
    let state: string | undefined;
    for (let i = 0; i < config.failureThreshold; i++) {
        state = recordCircuitFailure(state, { now: at, config });
    }
    return evaluateCircuitState(state, { now: at, config }).serializedState;
}

describe('evaluateCircuitState', () => {
    it('should treat missing state as a fresh closed circuit', () => {
        const decision = evaluateCircuitState(undefined, { now: t0, config });
        expect(decision.allowed).toBe(true);
        expect(decision.state).toBe(CircuitState.CLOSED);
        expect(decision.waitTimeMs).toBeNull();
    });

    it('should stay closed below the failure threshold and open on reaching it', () => {
        let state: string | undefined;

        for (let i = 1; i < config.failureThreshold; i++) {
            state = recordCircuitFailure(state, { now: t0 + i, config });
            const decision = evaluateCircuitState(state, { now: t0 + i, config });
            expect(decision.allowed).toBe(true);
            expect(decision.state).toBe(CircuitState.CLOSED);
            state = decision.serializedState;
        }

        state = recordCircuitFailure(state, { now: t0 + 3, config });
        const decision = evaluateCircuitState(state, { now: t0 + 3, config });
        expect(decision.state).toBe(CircuitState.OPEN);
        expect(decision.allowed).toBe(false);
        expect(decision.waitTimeMs).toBe(10_000);
    });

    it('should report the remaining wait while open', () => {
        const state = openCircuit(t0);
        const decision = evaluateCircuitState(state, { now: t0 + 4_000, config });
        expect(decision.allowed).toBe(false);
        expect(decision.waitTimeMs).toBe(6_000);
        expect(decision.reason).toBe('circuit open, retry in 6000ms');
    });

    it('should move to half-open once the reset timeout has elapsed', () => {
        const state = openCircuit(t0);
        const decision = evaluateCircuitState(state, { now: t0 + 10_000, config });
        expect(decision.state).toBe(CircuitState.HALF_OPEN);
        expect(decision.allowed).toBe(true);
        expect(decision.reason).toBe('half-open probe admitted');
    });

    it('should close after successThreshold consecutive half-open successes', () => {
        let state = evaluateCircuitState(openCircuit(t0), { now: t0 + 10_000, config }).serializedState;

        state = recordCircuitSuccess(state, { now: t0 + 10_001, config });
        expect(evaluateCircuitState(state, { now: t0 + 10_002, config }).state).toBe(CircuitState.HALF_OPEN);

        state = recordCircuitSuccess(state, { now: t0 + 10_003, config });
        const decision = evaluateCircuitState(state, { now: t0 + 10_004, config });
        expect(decision.state).toBe(CircuitState.CLOSED);
        expect(decision.allowed).toBe(true);
    });

    it('should reopen on a single half-open failure and restart the reset timer', () => {
        let state = evaluateCircuitState(openCircuit(t0), { now: t0 + 10_000, config }).serializedState;
        state = recordCircuitSuccess(state, { now: t0 + 10_500, config });
        state = recordCircuitFailure(state, { now: t0 + 11_000, config });

        const decision = evaluateCircuitState(state, { now: t0 + 11_000, config });
        expect(decision.state).toBe(CircuitState.OPEN);
        expect(decision.allowed).toBe(false);
        expect(decision.waitTimeMs).toBe(10_000);
    });

    it('should forget failures that fall outside the window', () => {
        let state = recordCircuitFailure(undefined, { now: t0, config });
        state = recordCircuitFailure(state, { now: t0 + 1, config });
        state = recordCircuitFailure(state, { now: t0 + 61_000, config });

        expect(evaluateCircuitState(state, { now: t0 + 61_000, config }).state).toBe(CircuitState.CLOSED);
    });

    it('should admit only the configured share of half-open requests', () => {
        const halfShare = { ...config, halfOpenRequestPercentage: 50 };
        let state = openCircuit(t0);
        const admitted: boolean[] = [];

        for (let i = 0; i < 4; i++) {
            const decision = evaluateCircuitState(state, { now: t0 + 10_000 + i, config: halfShare });
            admitted.push(decision.allowed);
            state = decision.serializedState;
        }

        expect(admitted).toEqual([true, false, true, false]);
    });

    it('should keep using the config embedded in the state', () => {
        let state = recordCircuitFailure(undefined, { now: t0, config });
        state = recordCircuitFailure(state, { now: t0 });
        state = recordCircuitFailure(state, { now: t0 });

        expect(evaluateCircuitState(state, { now: t0 }).state).toBe(CircuitState.OPEN);
    });

    it('should fail open on malformed state', () => {
        for (const garbage of ['{not json', '{"state":"exploded"}', '{"state":"open","openedAt":null}', '42']) {
            const decision = evaluateCircuitState(garbage, { now: t0, config });
            expect(decision.allowed).toBe(true);
            expect(decision.state).toBe(CircuitState.CLOSED);
        }
    });

    it('should hand back plain JSON state', () => {
        const state = openCircuit(t0);
        const parsed = JSON.parse(state);
        expect(parsed.state).toBe('open');
        expect(parsed.openedAt).toBe(t0);
    });
});

describe('parseCircuitSnapshot', () => {
    it('should default missing counters', () => {
        const snapshot = parseCircuitSnapshot('{"state":"halfOpen"}');
        expect(snapshot.state).toBe(CircuitState.HALF_OPEN);
        expect(snapshot.failureTimestamps).toEqual([]);
        expect(snapshot.halfOpenRequests).toBe(0);
    });
});

describe('getCircuitBreakerConfig', () => {
    it('should return named presets', () => {
        expect(getCircuitBreakerConfig('sensitive').failureThreshold).toBe(3);
        expect(getCircuitBreakerConfig('tolerant').resetTimeoutSeconds).toBe(15);
    });

    it('should fall back to default', () => {
        expect(getCircuitBreakerConfig()).toBe(CIRCUIT_PRESETS.default);
        expect(getCircuitBreakerConfig('unknown')).toBe(CIRCUIT_PRESETS.default);
    });
});
