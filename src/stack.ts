import { AppConfig, applyConfig } from './config/index.js';
import { BackoffStrategy } from './services/backoff/index.js';
import { CircuitBreakerRegistry, CircuitBreakerConfig, getCircuitBreakerConfig } from './services/circuit/index.js';
import { ConnectionMonitor, DEFAULT_HEALTH_THRESHOLDS } from './services/health/index.js';
import { RateLimiterRegistry } from './services/rate-limiter/index.js';
import { RpcConfigRegistry, circuitConfigFor } from './services/registry/index.js';
import { getRetryConfig, RetryBudget } from './services/retry/index.js';
import { ResilientRpcClient, AuditSink } from './services/rpc-client/index.js';

/**
 * Every stateful component, sharing one clock
 */
export interface ResilienceStack {
    registry: RpcConfigRegistry;
    circuits: CircuitBreakerRegistry;
    rateLimiter: RateLimiterRegistry;
    monitor: ConnectionMonitor;
    client: ResilientRpcClient;
    /** Circuit thresholds for a function under the configured circuit preset */
    circuitConfigFor(functionName: string): CircuitBreakerConfig;
}

export interface StackOptions {
    registry?: RpcConfigRegistry;
    auditSink?: AuditSink;
    connectionType?: string;
    now?: () => number;
}

export function retryStrategyOf(config: AppConfig): BackoffStrategy {
    return config.retry.strategy ?? getRetryConfig(config.retry.preset).strategy;
}

/**
 * Build the components from a validated configuration
 */
export function createResilienceStack(config: AppConfig, options: StackOptions = {}): ResilienceStack {
    const now = options.now ?? Date.now;
    const circuitBase = getCircuitBreakerConfig(config.circuitPreset);

    const registry = options.registry ?? RpcConfigRegistry.withDefaults();
    applyConfig(registry, config);

    const circuits = new CircuitBreakerRegistry(circuitBase, now);
    const rateLimiter = new RateLimiterRegistry(now);
    const monitor = new ConnectionMonitor({
        maxSamples: config.health.maxSamples,
        maxSampleAgeMs: config.health.maxSampleAgeMs,
        thresholds: { ...DEFAULT_HEALTH_THRESHOLDS, maxErrorPenalty: config.health.maxErrorPenalty },
        connectionType: options.connectionType,
        now,
    });

    const client = new ResilientRpcClient({
        registry,
        circuits,
        rateLimiter,
        globalRateLimit: config.globalRateLimit,
        circuitBase,
        retryBudget: config.retry.budget > 0 ? new RetryBudget(config.retry.budget, 60000, now) : undefined,
        monitor,
        auditSink: options.auditSink,
        strategy: retryStrategyOf(config),
        now,
    });

    return {
        registry,
        circuits,
        rateLimiter,
        monitor,
        client,
        circuitConfigFor: (functionName: string) => circuitConfigFor(registry.getConfig(functionName), circuitBase),
    };
}
