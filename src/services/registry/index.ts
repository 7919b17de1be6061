import { createRequire } from 'module';
import { z } from 'zod';
import { calculateBackoff, BackoffStrategy, RandomSource } from '../backoff/index.js';
import { CIRCUIT_PRESETS, CircuitBreakerConfig } from '../circuit/index.js';
import { RegisteredRpcFunction, RpcConfig, RpcFunctionEntry, RpcPreset } from './types.js';
import { ResilienceConfigError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const require = createRequire(import.meta.url);
const logger = createLogger('RpcRegistry');

export const RPC_PRESET_NAMES = ['strict', 'normal', 'bulk', 'realtime', 'sync', 'relaxed'] as const;

export const RpcConfigSchema = z.object({
    maxRequests: z.number().int().min(1),
    windowMs: z.number().int().positive(),
    circuitFailureThreshold: z.number().int().min(1),
    circuitResetTimeoutMs: z.number().int().min(0),
    maxRetries: z.number().int().min(0),
    initialRetryDelayMs: z.number().int().min(0),
    maxRetryDelayMs: z.number().int().min(0),
    timeoutMs: z.number().int().positive(),
    requiresAuditLog: z.boolean(),
}).refine(c => c.initialRetryDelayMs <= c.maxRetryDelayMs, {
    message: 'initialRetryDelayMs must not exceed maxRetryDelayMs',
    path: ['initialRetryDelayMs'],
});

export const RpcFunctionEntrySchema = z.object({
    name: z.string().min(1),
    preset: z.enum(RPC_PRESET_NAMES),
    requiresAuditLog: z.boolean().optional(),
});

const RpcFunctionFileSchema = z.object({
    functions: z.array(RpcFunctionEntrySchema),
});

export const RPC_PRESETS: Readonly<Record<RpcPreset, Readonly<RpcConfig>>> = Object.freeze({
    strict: Object.freeze({
        maxRequests: 10,
        windowMs: 60000,
        circuitFailureThreshold: 3,
        circuitResetTimeoutMs: 60000,
        maxRetries: 1,
        initialRetryDelayMs: 1000,
        maxRetryDelayMs: 5000,
        timeoutMs: 10000,
        requiresAuditLog: true,
    }),
    normal: Object.freeze({
        maxRequests: 60,
        windowMs: 60000,
        circuitFailureThreshold: 5,
        circuitResetTimeoutMs: 30000,
        maxRetries: 3,
        initialRetryDelayMs: 500,
        maxRetryDelayMs: 10000,
        timeoutMs: 15000,
        requiresAuditLog: false,
    }),
    bulk: Object.freeze({
        maxRequests: 120,
        windowMs: 60000,
        circuitFailureThreshold: 10,
        circuitResetTimeoutMs: 15000,
        maxRetries: 2,
        initialRetryDelayMs: 1000,
        maxRetryDelayMs: 15000,
        timeoutMs: 30000,
        requiresAuditLog: false,
    }),
    realtime: Object.freeze({
        maxRequests: 300,
        windowMs: 60000,
        circuitFailureThreshold: 3,
        circuitResetTimeoutMs: 10000,
        maxRetries: 5,
        initialRetryDelayMs: 100,
        maxRetryDelayMs: 2000,
        timeoutMs: 5000,
        requiresAuditLog: false,
    }),
    sync: Object.freeze({
        maxRequests: 30,
        windowMs: 60000,
        circuitFailureThreshold: 5,
        circuitResetTimeoutMs: 60000,
        maxRetries: 5,
        initialRetryDelayMs: 2000,
        maxRetryDelayMs: 60000,
        timeoutMs: 60000,
        requiresAuditLog: false,
    }),
    relaxed: Object.freeze({
        maxRequests: 200,
        windowMs: 60000,
        circuitFailureThreshold: 10,
        circuitResetTimeoutMs: 15000,
        maxRetries: 3,
        initialRetryDelayMs: 500,
        maxRetryDelayMs: 10000,
        timeoutMs: 20000,
        requiresAuditLog: false,
    }),
});

export function isRpcPreset(name: string): name is RpcPreset {
    return Object.prototype.hasOwnProperty.call(RPC_PRESETS, name);
}

/**
 * Build the config for a preset, with optional field overrides
 */
export function presetConfig(preset: RpcPreset, overrides: Partial<RpcConfig> = {}): Readonly<RpcConfig> {
    if (Object.keys(overrides).length === 0) return RPC_PRESETS[preset];
    return Object.freeze({ ...RPC_PRESETS[preset], ...overrides });
}

/**
 * Load the startup function table shipped in config/defaults
 */
export function loadDefaultFunctions(): RpcFunctionEntry[] {
    const raw: unknown = require('../../config/defaults/rpc-functions.json');
    return RpcFunctionFileSchema.parse(raw).functions;
}

/**
 * Process-wide map of RPC function name to tuning bundle
 *
 * Lookups read an immutable snapshot. Every registration builds a new map
 * and swaps it in, so a reader never observes a half-applied update.
 */
export class RpcConfigRegistry {
    private snapshot: ReadonlyMap<string, Readonly<RpcConfig>>;
    private readonly startup: ReadonlyMap<string, Readonly<RpcConfig>>;
    private fallbackPreset: RpcPreset = 'normal';

    constructor(entries: RpcFunctionEntry[] = []) {
        const initial = new Map<string, Readonly<RpcConfig>>();
        for (const entry of entries) {
            initial.set(entry.name, entryConfig(entry));
        }
        this.startup = initial;
        this.snapshot = initial;
    }

    /**
     * Registry seeded with the shipped function table
     */
    public static withDefaults(): RpcConfigRegistry {
        const entries = loadDefaultFunctions();
        logger.debug(`Loaded ${entries.length} default RPC function mappings`);
        return new RpcConfigRegistry(entries);
    }

    /**
     * Config for a function. Unregistered names get the fallback preset.
     */
    public getConfig(name: string): Readonly<RpcConfig> {
        return this.snapshot.get(name) ?? RPC_PRESETS[this.fallbackPreset];
    }

    public requiresAuditLog(name: string): boolean {
        return this.getConfig(name).requiresAuditLog;
    }

    public has(name: string): boolean {
        return this.snapshot.has(name);
    }

    public list(): RegisteredRpcFunction[] {
        return [...this.snapshot.entries()]
            .map(([name, config]) => ({ name, config }))
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    /**
     * Register or replace a function's config
     * @throws ResilienceConfigError when the config breaks an invariant
     */
    public register(name: string, config: RpcConfig): void {
        if (!name) {
            throw new ResilienceConfigError('RPC function name must not be empty');
        }

        const result = RpcConfigSchema.safeParse(config);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
            throw new ResilienceConfigError(`Invalid RPC config for '${name}': ${issues}`);
        }

        this.swap(next => next.set(name, Object.freeze(result.data)));
        logger.info(`Registered RPC config for ${name}`);
    }

    public registerPreset(name: string, preset: RpcPreset, overrides: Partial<RpcConfig> = {}): void {
        this.register(name, { ...RPC_PRESETS[preset], ...overrides });
    }

    /**
     * Drop a runtime registration. Names from the startup table go back to
     * their startup config.
     */
    public unregister(name: string): boolean {
        if (!this.snapshot.has(name)) return false;

        const original = this.startup.get(name);
        this.swap(next => {
            if (original) {
                next.set(name, original);
            } else {
                next.delete(name);
            }
        });
        logger.info(`Unregistered RPC config for ${name}`);
        return true;
    }

    public getFallbackPreset(): RpcPreset {
        return this.fallbackPreset;
    }

    public setFallbackPreset(preset: RpcPreset): void {
        this.fallbackPreset = preset;
    }

    private swap(mutate: (next: Map<string, Readonly<RpcConfig>>) => void): void {
        const next = new Map(this.snapshot);
        mutate(next);
        this.snapshot = next;
    }
}

function entryConfig(entry: RpcFunctionEntry): Readonly<RpcConfig> {
    return entry.requiresAuditLog === undefined
        ? RPC_PRESETS[entry.preset]
        : presetConfig(entry.preset, { requiresAuditLog: entry.requiresAuditLog });
}

/**
 * Retry delay for an attempt, inside the config's delay envelope
 */
export function retryDelayFor(
    config: RpcConfig,
    attempt: number,
    strategy: BackoffStrategy = BackoffStrategy.EXPONENTIAL_WITH_JITTER,
    random: RandomSource = Math.random
): number {
    return calculateBackoff(attempt, config.initialRetryDelayMs, config.maxRetryDelayMs, strategy, random);
}

/**
 * Circuit thresholds for a function, taking the remaining fields from a base
 * circuit config
 */
export function circuitConfigFor(
    config: RpcConfig,
    base: CircuitBreakerConfig = CIRCUIT_PRESETS.default
): CircuitBreakerConfig {
    return {
        ...base,
        failureThreshold: config.circuitFailureThreshold,
        resetTimeoutSeconds: config.circuitResetTimeoutMs / 1000,
    };
}

export * from './types.js';
