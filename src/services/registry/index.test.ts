import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    RpcConfigRegistry,
    RPC_PRESETS,
    retryDelayFor,
    circuitConfigFor,
    loadDefaultFunctions,
} from './index.js';
import { BackoffStrategy } from '../backoff/index.js';
import { CIRCUIT_PRESETS } from '../circuit/index.js';
import { ResilienceConfigError } from '../../utils/errors.js';

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

describe('RPC_PRESETS', () => {
    it('should be frozen', () => {
        expect(Object.isFrozen(RPC_PRESETS)).toBe(true);
        expect(Object.isFrozen(RPC_PRESETS.strict)).toBe(true);
    });

    it('should keep every preset inside its own invariants', () => {
        for (const config of Object.values(RPC_PRESETS)) {
            expect(config.initialRetryDelayMs).toBeLessThanOrEqual(config.maxRetryDelayMs);
            expect(config.circuitFailureThreshold).toBeGreaterThanOrEqual(1);
            expect(config.maxRetries).toBeGreaterThanOrEqual(0);
        }
    });

    it('should only require audit logging for strict', () => {
        const audited = Object.entries(RPC_PRESETS)
            .filter(([, config]) => config.requiresAuditLog)
            .map(([name]) => name);
        expect(audited).toEqual(['strict']);
    });
});

describe('RpcConfigRegistry', () => {
    let registry: RpcConfigRegistry;

    beforeEach(() => {
        registry = RpcConfigRegistry.withDefaults();
    });

    it('should map authentication endpoints to strict', () => {
        expect(registry.getConfig('sign_in')).toEqual(RPC_PRESETS.strict);
        expect(registry.requiresAuditLog('sign_in')).toBe(true);
    });

    it('should force audit logging on profile and listing mutations', () => {
        const config = registry.getConfig('update_profile');
        expect(config).toEqual({ ...RPC_PRESETS.normal, requiresAuditLog: true });
        expect(registry.requiresAuditLog('create_listing')).toBe(true);
    });

    it('should map reads and sync endpoints to their classes', () => {
        expect(registry.getConfig('get_nearby_posts')).toBe(RPC_PRESETS.bulk);
        expect(registry.getConfig('search_posts')).toBe(RPC_PRESETS.bulk);
        expect(registry.getConfig('get_delta_sync')).toBe(RPC_PRESETS.sync);
        expect(registry.getConfig('subscribe_channel')).toBe(RPC_PRESETS.realtime);
        expect(registry.getConfig('get_bff_feed')).toBe(RPC_PRESETS.relaxed);
    });

    it('should fall back to normal for unknown functions', () => {
        expect(registry.has('unknown_fn')).toBe(false);
        expect(registry.getConfig('unknown_fn')).toBe(RPC_PRESETS.normal);
        expect(registry.requiresAuditLog('unknown_fn')).toBe(false);
    });

    it('should use a changed fallback preset', () => {
        registry.setFallbackPreset('bulk');
        expect(registry.getConfig('unknown_fn')).toBe(RPC_PRESETS.bulk);
    });

    it('should return a registered config', () => {
        const custom = { ...RPC_PRESETS.normal, maxRequests: 5, timeoutMs: 2000 };
        registry.register('custom_fn', custom);

        expect(registry.has('custom_fn')).toBe(true);
        expect(registry.getConfig('custom_fn')).toEqual(custom);
        expect(Object.isFrozen(registry.getConfig('custom_fn'))).toBe(true);
    });

    it('should reject configs that break an invariant', () => {
        expect(() => registry.register('bad_fn', {
            ...RPC_PRESETS.normal,
            initialRetryDelayMs: 20000,
            maxRetryDelayMs: 1000,
        })).toThrow(ResilienceConfigError);

        expect(() => registry.register('bad_fn', {
            ...RPC_PRESETS.normal,
            circuitFailureThreshold: 0,
        })).toThrow(/circuitFailureThreshold/);

        expect(() => registry.register('', RPC_PRESETS.normal)).toThrow(ResilienceConfigError);
        expect(registry.has('bad_fn')).toBe(false);
    });

    it('should register from a preset with overrides', () => {
        registry.registerPreset('export_report', 'bulk', { requiresAuditLog: true });
        expect(registry.getConfig('export_report')).toEqual({ ...RPC_PRESETS.bulk, requiresAuditLog: true });
    });

    it('should restore the startup mapping on unregister', () => {
        registry.registerPreset('sign_in', 'relaxed');
        expect(registry.getConfig('sign_in')).toEqual(RPC_PRESETS.relaxed);

        expect(registry.unregister('sign_in')).toBe(true);
        expect(registry.getConfig('sign_in')).toBe(RPC_PRESETS.strict);
    });

    it('should forget runtime-only functions on unregister', () => {
        registry.registerPreset('temp_fn', 'sync');
        expect(registry.unregister('temp_fn')).toBe(true);
        expect(registry.has('temp_fn')).toBe(false);
        expect(registry.unregister('temp_fn')).toBe(false);
    });

    it('should list functions sorted by name', () => {
        const names = registry.list().map(f => f.name);
        expect(names).toEqual([...names].sort((a, b) => a.localeCompare(b)));
        expect(names).toContain('get_full_sync');
        expect(names.length).toBe(loadDefaultFunctions().length);
    });

    it('should start empty without entries', () => {
        expect(new RpcConfigRegistry().list()).toEqual([]);
    });
});

describe('retryDelayFor', () => {
    it('should stay inside the config delay envelope', () => {
        expect(retryDelayFor(RPC_PRESETS.normal, 2, BackoffStrategy.EXPONENTIAL)).toBe(2000);
        expect(retryDelayFor(RPC_PRESETS.normal, 10, BackoffStrategy.EXPONENTIAL)).toBe(10000);
        expect(retryDelayFor(RPC_PRESETS.strict, 3, BackoffStrategy.EXPONENTIAL)).toBe(5000);
    });

    it('should use the injected random source for jitter', () => {
        expect(retryDelayFor(RPC_PRESETS.normal, 1, BackoffStrategy.FULL_JITTER, () => 0.5)).toBe(500);
    });
});

describe('circuitConfigFor', () => {
    it('should take thresholds from the RPC config', () => {
        expect(circuitConfigFor(RPC_PRESETS.strict)).toEqual({
            ...CIRCUIT_PRESETS.default,
            failureThreshold: 3,
            resetTimeoutSeconds: 60,
        });
    });
});
