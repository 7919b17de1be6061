import { z } from 'zod';
import { BackoffStrategy } from '../services/backoff/types.js';
import { RPC_PRESET_NAMES } from '../services/registry/index.js';

/**
 * Schema for a per-function override
 */
export const FunctionOverrideSchema = z.object({
    /** RPC function name */
    name: z.string().min(1),
    /** Preset the function is mapped to */
    preset: z.enum(RPC_PRESET_NAMES),
    /** Force audit logging on or off */
    requiresAuditLog: z.boolean().optional(),
    /** Individual fields replacing the preset values */
    maxRequests: z.number().int().min(1).optional(),
    windowMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(0).optional(),
    timeoutMs: z.number().int().positive().optional(),
});

export type FunctionOverride = z.infer<typeof FunctionOverrideSchema>;

/**
 * Schema for full application configuration
 */
export const AppConfigSchema = z.object({
    /** Preset for functions that are not registered */
    fallbackPreset: z.enum(RPC_PRESET_NAMES).default('normal'),
    /** Function mappings applied over the shipped table */
    functions: z.array(FunctionOverrideSchema).default([]),
    /** Circuit fields the RPC presets do not carry */
    circuitPreset: z.enum(['default', 'sensitive', 'tolerant']).default('default'),
    retry: z.object({
        preset: z.enum(['default', 'aggressive', 'conservative', 'noRetry', 'rateLimitAware']).default('default'),
        /** Overrides the preset strategy */
        strategy: z.nativeEnum(BackoffStrategy).optional(),
        /** Retries allowed per window across all functions (0 = unlimited) */
        budget: z.number().int().min(0).default(0),
    }).default({}),
    health: z.object({
        /** Samples kept by the connection monitor */
        maxSamples: z.number().int().min(1).default(50),
        /** Samples older than this are dropped (ms) */
        maxSampleAgeMs: z.number().int().min(1000).default(300000),
        /** Score lost at a 100% error rate */
        maxErrorPenalty: z.number().min(0).max(100).default(70),
    }).default({}),
    /** Limit shared by every function; null disables it */
    globalRateLimit: z.object({
        maxRequests: z.number().int().min(1),
        windowMs: z.number().int().positive(),
    }).nullable().default({ maxRequests: 300, windowMs: 60000 }),
    /** How often to poll for config changes (ms) */
    configPollIntervalMs: z.number().int().min(10000).default(60000),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Default configuration when no remote config is available
 */
export const DEFAULT_CONFIG: AppConfig = {
    fallbackPreset: 'normal',
    functions: [],
    circuitPreset: 'default',
    retry: {
        preset: 'default',
        budget: 0,
    },
    health: {
        maxSamples: 50,
        maxSampleAgeMs: 300000,
        maxErrorPenalty: 70,
    },
    globalRateLimit: {
        maxRequests: 300,
        windowMs: 60000,
    },
    configPollIntervalMs: 60000,
};
