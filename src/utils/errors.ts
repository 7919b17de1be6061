/**
 * Error codes raised by the resilience engine
 */
export const ResilienceErrorCodes = {
    INVALID_CONFIG: 'INVALID_CONFIG',
    CIRCUIT_OPEN: 'CIRCUIT_OPEN',
    RATE_LIMITED: 'RATE_LIMITED',
    HTTP_STATUS: 'HTTP_STATUS',
    TIMEOUT: 'TIMEOUT',
    RPC_FAILED: 'RPC_FAILED',
} as const;

export type ResilienceErrorCode = (typeof ResilienceErrorCodes)[keyof typeof ResilienceErrorCodes];

export class ResilienceError extends Error {
    constructor(
        message: string,
        public readonly code: ResilienceErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ResilienceError';
    }
}

/**
 * Programming error: a policy was built with impossible parameters.
 * Never raised for values coming from the shipped presets.
 */
export class ResilienceConfigError extends ResilienceError {
    constructor(message: string) {
        super(message, ResilienceErrorCodes.INVALID_CONFIG);
        this.name = 'ResilienceConfigError';
    }
}

export class CircuitOpenError extends ResilienceError {
    constructor(
        public readonly functionName: string,
        public readonly waitTimeMs: number | null
    ) {
        super(
            waitTimeMs === null
                ? `Circuit open for '${functionName}'`
                : `Circuit open for '${functionName}', retry in ${waitTimeMs}ms`,
            ResilienceErrorCodes.CIRCUIT_OPEN
        );
        this.name = 'CircuitOpenError';
    }
}

export class RateLimitError extends ResilienceError {
    constructor(
        public readonly functionName: string,
        public readonly waitTimeMs: number
    ) {
        super(`Rate limit exceeded for '${functionName}', retry in ${waitTimeMs}ms`, ResilienceErrorCodes.RATE_LIMITED);
        this.name = 'RateLimitError';
    }
}

/**
 * Thrown by transports when the server answered with a non-2xx status.
 */
export class RpcStatusError extends ResilienceError {
    constructor(
        public readonly statusCode: number,
        message?: string,
        public readonly retryAfterMs?: number
    ) {
        super(message ?? `HTTP ${statusCode}`, ResilienceErrorCodes.HTTP_STATUS);
        this.name = 'RpcStatusError';
    }
}

export class RpcTimeoutError extends ResilienceError {
    constructor(
        public readonly functionName: string,
        public readonly timeoutMs: number
    ) {
        super(`${functionName} timed out after ${timeoutMs}ms`, ResilienceErrorCodes.TIMEOUT);
        this.name = 'RpcTimeoutError';
    }
}

export class RpcCallError extends ResilienceError {
    constructor(
        public readonly functionName: string,
        public readonly reason: string,
        public readonly attempts: number,
        cause?: unknown
    ) {
        super(`${functionName} failed after ${attempts} attempt(s): ${reason}`, ResilienceErrorCodes.RPC_FAILED, { cause });
        this.name = 'RpcCallError';
    }
}
