import type { BackoffStrategy, RandomSource } from '../backoff/types.js';
import type { CircuitBreakerConfig } from '../circuit/types.js';
import type { CircuitBreakerRegistry } from '../circuit/index.js';
import type { RequestDeduplicator } from '../dedup/index.js';
import type { ConnectionMonitor } from '../health/monitor.js';
import type { RateLimiterRegistry } from '../rate-limiter/index.js';
import type { RpcConfigRegistry } from '../registry/index.js';
import type { RpcConfig } from '../registry/types.js';
import type { RetryBudget } from '../retry/budget.js';
import type { ResilienceError } from '../../utils/errors.js';

/**
 * Performs one attempt of the remote call. The signal aborts when the
 * attempt times out.
 */
export type RpcInvoke<T> = (signal: AbortSignal, attempt: number) => Promise<T>;

export interface RpcDedupe<T> {
    key: string;
    via: RequestDeduplicator<RpcResult<T>>;
}

export interface RpcCallOptions<T = unknown> {
    /** Replaces the registry config for this call */
    config?: RpcConfig;
    /** Recorded in audit entries */
    params?: unknown;
    /** Join an identical call already in flight instead of sending another */
    dedupe?: RpcDedupe<T>;
}

export interface RpcResult<T> {
    success: boolean;
    data: T | null;
    error: ResilienceError | null;
    /** Short id shared by every log line and audit entry of the call */
    requestId: string;
    durationMs: number;
    /** Attempts made after the first */
    retryCount: number;
}

export type AuditOutcome = 'requested' | 'succeeded' | 'failed';

export interface AuditEntry {
    requestId: string;
    functionName: string;
    outcome: AuditOutcome;
    params: unknown;
    timestamp: Date;
    error?: string;
}

export type AuditSink = (entry: AuditEntry) => void | Promise<void>;

export interface GlobalRateLimit {
    maxRequests: number;
    windowMs: number;
}

export interface BatchCall<T> {
    functionName: string;
    invoke: RpcInvoke<T>;
    options?: RpcCallOptions<T>;
}

export interface ResilientRpcClientOptions {
    registry?: RpcConfigRegistry;
    circuits?: CircuitBreakerRegistry;
    rateLimiter?: RateLimiterRegistry;
    /** Limit shared by every function; null disables it (default: 300/min) */
    globalRateLimit?: GlobalRateLimit | null;
    /** Circuit fields the RPC config does not carry (default: 'default' preset) */
    circuitBase?: CircuitBreakerConfig;
    retryBudget?: RetryBudget;
    monitor?: ConnectionMonitor;
    auditSink?: AuditSink;
    strategy?: BackoffStrategy;
    random?: RandomSource;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}
