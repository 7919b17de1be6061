export type RpcPreset = 'strict' | 'normal' | 'bulk' | 'realtime' | 'sync' | 'relaxed';

/**
 * Tuning bundle for one logical RPC function
 */
export interface RpcConfig {
    /** Requests allowed per window */
    maxRequests: number;
    windowMs: number;
    circuitFailureThreshold: number;
    circuitResetTimeoutMs: number;
    /** Retries after the first attempt (0 = single attempt) */
    maxRetries: number;
    initialRetryDelayMs: number;
    maxRetryDelayMs: number;
    /** Per-attempt timeout */
    timeoutMs: number;
    /** Invocations must be recorded in the audit trail */
    requiresAuditLog: boolean;
}

export interface RpcFunctionEntry {
    name: string;
    preset: RpcPreset;
    requiresAuditLog?: boolean;
}

export interface RegisteredRpcFunction {
    name: string;
    config: Readonly<RpcConfig>;
}
