import { EventEmitter } from 'events';
import { createRequire } from 'module';
import { AppConfig, AppConfigSchema, DEFAULT_CONFIG, FunctionOverride } from './schema.js';
import { RpcConfig, RpcConfigRegistry } from '../services/registry/index.js';
import { logger } from '../utils/logger.js';

const require = createRequire(import.meta.url);

export interface ConfigChange {
    previous: AppConfig;
    current: AppConfig;
    addedFunctions: string[];
    removedFunctions: string[];
}

/**
 * ConfigLoader: Dynamic configuration management with hot-reload
 *
 * Features:
 * - Reads configuration from RESILIENCE_CONFIG (inline JSON or URL)
 * - Polls a URL for changes at configurable intervals
 * - Validates config with Zod schemas
 * - Emits 'config:changed' event on updates
 * - Fallback to local defaults if no remote config provided
 */
export class ConfigLoader extends EventEmitter {
    private config: AppConfig;
    private configSource: string | null;
    private pollTimer: NodeJS.Timeout | null = null;
    private lastConfigHash: string = '';

    constructor(source: string | null = process.env.RESILIENCE_CONFIG || null) {
        super();
        this.configSource = source;
        this.config = DEFAULT_CONFIG;
    }

    /**
     * Get current configuration
     */
    public getConfig(): AppConfig {
        return this.config;
    }

    /**
     * Initialize the config loader and start polling
     */
    public async initialize(): Promise<void> {
        if (!this.configSource) {
            logger.info('RESILIENCE_CONFIG not set, loading local default configuration');
            this.loadDefaultConfig();
            return;
        }

        if (this.isInlineJson()) {
            logger.info('RESILIENCE_CONFIG detected as JSON string, parsing directly');
            try {
                const rawData: unknown = JSON.parse(this.configSource);
                this.apply(AppConfigSchema.parse(rawData), rawData);
                logger.info(`Loaded configuration from environment JSON: ${this.config.functions.length} function overrides`);
            } catch (error) {
                logger.error(`Failed to parse JSON from RESILIENCE_CONFIG: ${error}`);
                this.loadDefaultConfig();
            }
            return;
        }

        logger.info(`Loading configuration from URL: ${this.configSource}`);
        await this.loadRemoteConfig();
        this.startPolling();
    }

    /**
     * Force a config reload
     */
    public async refresh(): Promise<boolean> {
        if (!this.configSource || this.isInlineJson()) {
            logger.info('Refreshed local config (no-op when using defaults/env-json)');
            return true;
        }

        return this.loadRemoteConfig();
    }

    /**
     * Stop polling and cleanup
     */
    public stop(): void {
        if (this.pollTimer) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }
    }

    private isInlineJson(): boolean {
        return this.configSource !== null && this.configSource.trim().startsWith('{');
    }

    private loadDefaultConfig(): void {
        try {
            const rawData: unknown = require('./defaults/config.json');
            this.apply(AppConfigSchema.parse(rawData), rawData);
            logger.info('Loaded local default configuration');
        } catch (error) {
            logger.warn(`Failed to load valid default configuration: ${error}. Using built-in defaults.`);
        }
    }

    /**
     * Fetch and validate remote configuration
     */
    private async loadRemoteConfig(): Promise<boolean> {
        if (!this.configSource) return false;

        try {
            const controller = new AbortController();
            const timeout = setTimeout(() => controller.abort(), 10000);

            const response = await fetch(this.configSource, {
                signal: controller.signal,
                headers: {
                    'Accept': 'application/json',
                    'User-Agent': 'lifeline-resilience/1.0',
                },
            });

            clearTimeout(timeout);

            if (!response.ok) {
                throw new Error(`HTTP ${response.status}: ${response.statusText}`);
            }

            const rawData: unknown = await response.json();
            if (this.hashConfig(rawData) === this.lastConfigHash) {
                logger.debug('Config unchanged, skipping update');
                return true;
            }

            this.apply(AppConfigSchema.parse(rawData), rawData);
            logger.info(`Configuration loaded successfully: ${this.config.functions.length} function overrides`);
            return true;
        } catch (error) {
            if (error instanceof Error) {
                logger.error(`Failed to load remote config: ${error.message}`);
            }
            return false;
        }
    }

    private apply(validated: AppConfig, rawData: unknown): void {
        const previous = this.config;
        this.config = validated;
        this.lastConfigHash = this.hashConfig(rawData);

        const change: ConfigChange = {
            previous,
            current: validated,
            addedFunctions: diffNames(validated.functions, previous.functions),
            removedFunctions: diffNames(previous.functions, validated.functions),
        };
        this.emit('config:changed', change);
    }

    /**
     * Start polling for config changes
     */
    private startPolling(): void {
        const interval = this.config.configPollIntervalMs;
        logger.info(`Starting config polling every ${interval / 1000}s`);

        this.pollTimer = setInterval(() => {
            void this.loadRemoteConfig();
        }, interval);
    }

    private hashConfig(data: unknown): string {
        return JSON.stringify(data);
    }
}

function diffNames(from: FunctionOverride[], against: FunctionOverride[]): string[] {
    const known = new Set(against.map(f => f.name));
    return from.filter(f => !known.has(f.name)).map(f => f.name);
}

/**
 * Push a configuration into the RPC registry. Functions dropped since the
 * previous configuration go back to their startup mapping.
 */
export function applyConfig(registry: RpcConfigRegistry, config: AppConfig, removedFunctions: string[] = []): void {
    registry.setFallbackPreset(config.fallbackPreset);

    for (const name of removedFunctions) {
        registry.unregister(name);
    }

    for (const fn of config.functions) {
        registry.registerPreset(fn.name, fn.preset, overridesOf(fn));
    }
}

function overridesOf(fn: FunctionOverride): Partial<RpcConfig> {
    const overrides: Partial<RpcConfig> = {};
    if (fn.requiresAuditLog !== undefined) overrides.requiresAuditLog = fn.requiresAuditLog;
    if (fn.maxRequests !== undefined) overrides.maxRequests = fn.maxRequests;
    if (fn.windowMs !== undefined) overrides.windowMs = fn.windowMs;
    if (fn.maxRetries !== undefined) overrides.maxRetries = fn.maxRetries;
    if (fn.timeoutMs !== undefined) overrides.timeoutMs = fn.timeoutMs;
    return overrides;
}

export * from './schema.js';
