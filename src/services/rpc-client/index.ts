import { randomUUID } from 'crypto';
import { BackoffStrategy, RandomSource } from '../backoff/index.js';
import { CircuitBreakerRegistry, CircuitBreakerConfig, CircuitMetrics, CIRCUIT_PRESETS } from '../circuit/index.js';
import { ConnectionMonitor } from '../health/monitor.js';
import { RateLimiterRegistry, RateLimiterStatus } from '../rate-limiter/index.js';
import { RpcConfigRegistry, RpcConfig, circuitConfigFor } from '../registry/index.js';
import { shouldRetry, RetryBudget, RetryDecision } from '../retry/index.js';
import {
    AuditEntry,
    AuditOutcome,
    AuditSink,
    BatchCall,
    GlobalRateLimit,
    ResilientRpcClientOptions,
    RpcCallOptions,
    RpcInvoke,
    RpcResult,
} from './types.js';
import {
    CircuitOpenError,
    RateLimitError,
    ResilienceError,
    RpcCallError,
    RpcStatusError,
    RpcTimeoutError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('RpcClient');

export const GLOBAL_RATE_LIMIT_KEY = '__global__';

const DEFAULT_GLOBAL_RATE_LIMIT: GlobalRateLimit = { maxRequests: 300, windowMs: 60000 };

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ECONNABORTED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'ENETUNREACH',
    'EHOSTUNREACH',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

/**
 * How a thrown error maps onto the retry policy
 */
export type FailureClass =
    | { kind: 'status'; statusCode: number; retryAfterMs?: number }
    | { kind: 'network' }
    | { kind: 'fatal' };

/**
 * Classify an error thrown by an attempt. Status errors keep their code,
 * timeouts and connection-level errors count as network failures, and
 * anything else is a bug or a rejected request that retrying won't fix.
 */
export function classifyFailure(error: unknown): FailureClass {
    if (error instanceof RpcStatusError) {
        return { kind: 'status', statusCode: error.statusCode, retryAfterMs: error.retryAfterMs };
    }
    if (error instanceof RpcTimeoutError) {
        return { kind: 'network' };
    }
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        return { kind: 'network' };
    }
    if (hasNetworkCode(error) || (error instanceof Error && hasNetworkCode(error.cause))) {
        return { kind: 'network' };
    }
    return { kind: 'fatal' };
}

function hasNetworkCode(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && typeof error.code === 'string'
        && NETWORK_ERROR_CODES.has(error.code);
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * RPC client composing every resilience policy around a caller-supplied
 * transport
 *
 * Features:
 * - Per-function tuning from the RPC config registry
 * - Circuit breaker check before the first attempt and before each retry
 * - Global and per-function sliding-window rate limits
 * - Optional coalescing of identical in-flight calls
 * - Per-attempt timeout with abort signal
 * - Retry with backoff inside the function's delay envelope, honouring
 *   Retry-After and an optional shared retry budget
 * - Audit entries for functions that require them
 */
export class ResilientRpcClient {
    private readonly registry: RpcConfigRegistry;
    private readonly circuits: CircuitBreakerRegistry;
    private readonly rateLimiter: RateLimiterRegistry;
    private readonly globalRateLimit: GlobalRateLimit | null;
    private readonly circuitBase: CircuitBreakerConfig;
    private readonly retryBudget: RetryBudget | null;
    private readonly monitor: ConnectionMonitor | null;
    private readonly auditSink: AuditSink | null;
    private readonly strategy: BackoffStrategy;
    private readonly random: RandomSource;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;

    constructor(options: ResilientRpcClientOptions = {}) {
        this.now = options.now ?? Date.now;
        this.registry = options.registry ?? RpcConfigRegistry.withDefaults();
        this.circuits = options.circuits ?? new CircuitBreakerRegistry(CIRCUIT_PRESETS.default, this.now);
        this.rateLimiter = options.rateLimiter ?? new RateLimiterRegistry(this.now);
        this.globalRateLimit = options.globalRateLimit === undefined
            ? DEFAULT_GLOBAL_RATE_LIMIT
            : options.globalRateLimit;
        this.circuitBase = options.circuitBase ?? CIRCUIT_PRESETS.default;
        this.retryBudget = options.retryBudget ?? null;
        this.monitor = options.monitor ?? null;
        this.auditSink = options.auditSink ?? null;
        this.strategy = options.strategy ?? BackoffStrategy.EXPONENTIAL_WITH_JITTER;
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    }

    /**
     * Call a remote function with every policy applied. Never throws;
     * failures come back in the result. Calls sharing a dedupe key while one
     * is in flight get that call's result, request id included.
     */
    public call<T>(functionName: string, invoke: RpcInvoke<T>, options: RpcCallOptions<T> = {}): Promise<RpcResult<T>> {
        const { dedupe } = options;
        if (dedupe) {
            return dedupe.via.run(dedupe.key, () => this.execute(functionName, invoke, options));
        }
        return this.execute(functionName, invoke, options);
    }

    /**
     * Run several calls concurrently; results keep the input order
     */
    public batch<T>(calls: Array<BatchCall<T>>): Promise<Array<RpcResult<T>>> {
        return Promise.all(calls.map(c => this.call(c.functionName, c.invoke, c.options)));
    }

    public getHealthStatus(): Record<string, CircuitMetrics> {
        return this.circuits.getAllMetrics();
    }

    public getRateLimiterStatus(): Record<string, RateLimiterStatus> {
        return this.rateLimiter.getAllStatus();
    }

    public resetCircuit(functionName: string): boolean {
        return this.circuits.reset(functionName);
    }

    public resetAll(): void {
        this.circuits.resetAll();
        this.rateLimiter.resetAll();
        this.retryBudget?.reset();
        logger.info('All circuits and rate limiters reset');
    }

    private async execute<T>(functionName: string, invoke: RpcInvoke<T>, options: RpcCallOptions<T>): Promise<RpcResult<T>> {
        const config = options.config ?? this.registry.getConfig(functionName);
        const requestId = randomUUID().slice(0, 8);
        const startedAt = this.now();

        if (config.requiresAuditLog) {
            await this.audit(requestId, functionName, 'requested', options.params);
        }

        const result = await this.admitAndRun(requestId, functionName, invoke, config, startedAt);

        if (config.requiresAuditLog) {
            await this.audit(
                requestId,
                functionName,
                result.success ? 'succeeded' : 'failed',
                options.params,
                result.error?.message
            );
        }

        return result;
    }

    /**
     * Rate limits are checked before the circuit and recorded after it, so
     * a call refused by either one consumes neither a limiter slot nor a
     * half-open probe.
     */
    private async admitAndRun<T>(
        requestId: string,
        functionName: string,
        invoke: RpcInvoke<T>,
        config: RpcConfig,
        startedAt: number
    ): Promise<RpcResult<T>> {
        const circuitConfig = circuitConfigFor(config, this.circuitBase);

        const limited = this.checkRateLimit(functionName, config);
        if (limited) {
            logger.warn(`[${requestId}] Rate limited for ${limited.functionName}, wait ${limited.waitTimeMs}ms`);
            return this.fail(requestId, startedAt, 0, limited);
        }

        const check = this.circuits.tryAcquire(functionName, circuitConfig);
        if (!check.allowed) {
            logger.warn(`[${requestId}] Circuit open for ${functionName}, wait ${check.waitTimeMs ?? 0}ms`);
            return this.fail(requestId, startedAt, 0, new CircuitOpenError(functionName, check.waitTimeMs));
        }

        this.recordRateLimit(functionName, config);
        return this.executeWithRetry(requestId, functionName, invoke, config, circuitConfig, startedAt);
    }

    private checkRateLimit(functionName: string, config: RpcConfig): RateLimitError | null {
        const global = this.globalRateLimit;
        if (global && !this.rateLimiter.hasCapacity(GLOBAL_RATE_LIMIT_KEY, global.maxRequests, global.windowMs)) {
            return new RateLimitError(GLOBAL_RATE_LIMIT_KEY, this.rateLimiter.getWaitTimeMs(GLOBAL_RATE_LIMIT_KEY));
        }
        if (!this.rateLimiter.hasCapacity(functionName, config.maxRequests, config.windowMs)) {
            return new RateLimitError(functionName, this.rateLimiter.getWaitTimeMs(functionName));
        }
        return null;
    }

    private recordRateLimit(functionName: string, config: RpcConfig): void {
        const global = this.globalRateLimit;
        if (global) {
            this.rateLimiter.tryAcquire(GLOBAL_RATE_LIMIT_KEY, global.maxRequests, global.windowMs);
        }
        this.rateLimiter.tryAcquire(functionName, config.maxRequests, config.windowMs);
    }

    private async executeWithRetry<T>(
        requestId: string,
        functionName: string,
        invoke: RpcInvoke<T>,
        config: RpcConfig,
        circuitConfig: CircuitBreakerConfig,
        startedAt: number
    ): Promise<RpcResult<T>> {
        const maxAttempts = config.maxRetries + 1;

        for (let attempt = 0; ; attempt++) {
            if (attempt > 0) {
                const check = this.circuits.tryAcquire(functionName, circuitConfig);
                if (!check.allowed) {
                    logger.warn(`[${requestId}] Circuit opened during retries for ${functionName}`);
                    return this.fail(requestId, startedAt, attempt, new CircuitOpenError(functionName, check.waitTimeMs));
                }
            }

            const attemptStart = this.now();
            try {
                logger.debug(`[${requestId}] Calling ${functionName} (attempt ${attempt + 1})`);
                const data = await this.runAttempt(functionName, invoke, config.timeoutMs, attempt);

                this.circuits.recordResult(functionName, true);
                this.monitor?.recordSample({ latencyMs: this.now() - attemptStart, success: true });
                logger.debug(`[${requestId}] ${functionName} succeeded`);

                return {
                    success: true,
                    data,
                    error: null,
                    requestId,
                    durationMs: this.now() - startedAt,
                    retryCount: attempt,
                };
            } catch (error) {
                const message = errorMessage(error);
                this.circuits.recordResult(functionName, false, message);
                this.monitor?.recordSample({ latencyMs: null, success: false });

                const decision = this.decide(error, attempt, maxAttempts, config);
                if (!decision.shouldRetry) {
                    logger.error(`[${requestId}] ${functionName} failed permanently: ${message} (${decision.reason})`);
                    return this.fail(
                        requestId,
                        startedAt,
                        attempt,
                        new RpcCallError(functionName, decision.reason, attempt + 1, error)
                    );
                }

                logger.warn(
                    `[${requestId}] ${functionName} failed (attempt ${attempt + 1}), retrying in ${decision.delayMs}ms: ${message}`
                );
                await this.sleep(decision.delayMs);
            }
        }
    }

    private decide(error: unknown, attempt: number, maxAttempts: number, config: RpcConfig): RetryDecision {
        const failure = classifyFailure(error);
        if (failure.kind === 'fatal') {
            return { shouldRetry: false, delayMs: 0, reason: 'non-retryable error' };
        }

        const decision = shouldRetry(
            failure.kind === 'status' ? failure.statusCode : null,
            attempt,
            maxAttempts,
            {
                strategy: this.strategy,
                baseDelayMs: config.initialRetryDelayMs,
                maxDelayMs: config.maxRetryDelayMs,
                retryAfterMs: failure.kind === 'status' ? failure.retryAfterMs : undefined,
                random: this.random,
            }
        );

        if (decision.shouldRetry && this.retryBudget) {
            if (!this.retryBudget.canRetry()) {
                return { shouldRetry: false, delayMs: 0, reason: 'retry budget exhausted' };
            }
            this.retryBudget.recordRetry();
        }

        return decision;
    }

    private runAttempt<T>(functionName: string, invoke: RpcInvoke<T>, timeoutMs: number, attempt: number): Promise<T> {
        const controller = new AbortController();

        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new RpcTimeoutError(functionName, timeoutMs));
                controller.abort();
            }, timeoutMs);

            void Promise.resolve()
                .then(() => invoke(controller.signal, attempt))
                .then(
                    value => {
                        clearTimeout(timer);
                        resolve(value);
                    },
                    (error: unknown) => {
                        clearTimeout(timer);
                        reject(error);
                    }
                );
        });
    }

    private fail<T>(requestId: string, startedAt: number, retryCount: number, error: ResilienceError): RpcResult<T> {
        return {
            success: false,
            data: null,
            error,
            requestId,
            durationMs: this.now() - startedAt,
            retryCount,
        };
    }

    private async audit(
        requestId: string,
        functionName: string,
        outcome: AuditOutcome,
        params: unknown,
        error?: string
    ): Promise<void> {
        const entry: AuditEntry = {
            requestId,
            functionName,
            outcome,
            params,
            timestamp: new Date(this.now()),
            ...(error !== undefined ? { error } : {}),
        };

        if (!this.auditSink) {
            logger.info(`AUDIT [${requestId}] ${functionName} ${outcome}`);
            return;
        }

        try {
            await this.auditSink(entry);
        } catch (sinkError) {
            logger.warn(`[${requestId}] Failed to write audit entry: ${errorMessage(sinkError)}`);
        }
    }
}

export * from './types.js';
