import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { calculateBackoff, parseBackoffStrategy, BackoffStrategy } from '../services/backoff/index.js';
import { evaluateCircuitState, getCircuitBreakerConfig } from '../services/circuit/index.js';
import { evaluateConnectionHealth } from '../services/health/index.js';
import { getRetryConfig, shouldRetry } from '../services/retry/index.js';
import { ConfigLoader } from '../config/index.js';
import { ResilienceStack, retryStrategyOf } from '../stack.js';
import { ResilienceError } from '../utils/errors.js';

export interface McpServices {
    stack: ResilienceStack;
    config: ConfigLoader;
}

export function textResult(data: unknown, isError = false) {
    return {
        content: [{
            type: 'text' as const,
            text: typeof data === 'string' ? data : JSON.stringify(data, null, 2),
        }],
        ...(isError ? { isError: true } : {}),
    };
}

const STRATEGY_NAMES = Object.values(BackoffStrategy).join(', ');

/**
 * Register MCP tools
 */
export function registerTools(server: McpServer, services: McpServices) {
    const { stack } = services;

    // 1. calculate-backoff - Delay before the next attempt
    server.tool(
        'calculate-backoff',
        {
            attempt: z.number().int().min(0).describe('Zero-based attempt counter'),
            baseDelayMs: z.number().min(0).describe('Base delay in milliseconds'),
            maxDelayMs: z.number().min(0).describe('Upper bound for the delay'),
            strategy: z.string().default(BackoffStrategy.EXPONENTIAL_WITH_JITTER).describe(`One of: ${STRATEGY_NAMES}`),
        },
        async ({ attempt, baseDelayMs, maxDelayMs, strategy }) => {
            const parsed = parseBackoffStrategy(strategy);
            if (!parsed) {
                return textResult(`Unknown strategy '${strategy}'. Expected one of: ${STRATEGY_NAMES}`, true);
            }

            try {
                const delayMs = calculateBackoff(attempt, baseDelayMs, maxDelayMs, parsed);
                return textResult({ attempt, strategy: parsed, delayMs });
            } catch (error) {
                if (error instanceof ResilienceError) {
                    return textResult(error.message, true);
                }
                throw error;
            }
        }
    );

    // 2. evaluate-retry - Retry decision for a failed attempt
    server.tool(
        'evaluate-retry',
        {
            statusCode: z.number().int().nullable().describe('HTTP status, or null when no response arrived'),
            currentAttempt: z.number().int().min(0).describe('Zero-based index of the failed attempt'),
            functionName: z.string().optional().describe('Use this RPC function\'s retry envelope'),
            retryAfterMs: z.number().min(0).optional().describe('Server-requested delay (Retry-After)'),
        },
        async ({ statusCode, currentAttempt, functionName, retryAfterMs }) => {
            const appConfig = services.config.getConfig();
            const strategy = retryStrategyOf(appConfig);

            if (functionName) {
                const rpc = stack.registry.getConfig(functionName);
                const decision = shouldRetry(statusCode, currentAttempt, rpc.maxRetries + 1, {
                    strategy,
                    baseDelayMs: rpc.initialRetryDelayMs,
                    maxDelayMs: rpc.maxRetryDelayMs,
                    retryAfterMs,
                });
                return textResult({ functionName, maxAttempts: rpc.maxRetries + 1, ...decision });
            }

            const retry = getRetryConfig(appConfig.retry.preset);
            const decision = shouldRetry(statusCode, currentAttempt, retry.maxAttempts, {
                strategy,
                baseDelayMs: retry.baseDelayMs,
                maxDelayMs: retry.maxDelayMs,
                retryOnUnknown: retry.retryOnUnknown,
                retryAfterMs,
            });
            return textResult({ preset: appConfig.retry.preset, maxAttempts: retry.maxAttempts, ...decision });
        }
    );

    // 3. evaluate-circuit - Stateless evaluation over serialized state
    server.tool(
        'evaluate-circuit',
        {
            serializedState: z.string().optional().describe('State returned by a previous evaluation; omit for a new circuit'),
            preset: z.string().optional().describe('Circuit preset: default, sensitive or tolerant'),
        },
        async ({ serializedState, preset }) => {
            const decision = evaluateCircuitState(serializedState, {
                config: getCircuitBreakerConfig(preset ?? services.config.getConfig().circuitPreset),
            });
            return textResult(decision);
        }
    );

    // 4. record-outcome - Feed a call result into the live circuit for a function
    server.tool(
        'record-outcome',
        {
            functionName: z.string().min(1).describe('RPC function name'),
            success: z.boolean().describe('Whether the call succeeded'),
            error: z.string().optional().describe('Failure description'),
        },
        async ({ functionName, success, error }) => {
            stack.circuits.getOrCreate(functionName, stack.circuitConfigFor(functionName));
            stack.circuits.recordResult(functionName, success, error);
            return textResult(stack.circuits.getMetrics(functionName));
        }
    );

    // 5. evaluate-connection-health - Score a connection from raw figures
    server.tool(
        'evaluate-connection-health',
        {
            errorRate: z.number().describe('Share of failed requests, 0 to 1'),
            averageLatencyMs: z.number().nullable().describe('Mean latency, or null when unknown'),
            connectionType: z.string().nullable().describe('wifi, cellular, ethernet, unknown or none'),
        },
        async ({ errorRate, averageLatencyMs, connectionType }) => {
            return textResult(evaluateConnectionHealth(errorRate, averageLatencyMs, connectionType));
        }
    );

    // 6. record-connection-sample - Feed the rolling connection monitor
    server.tool(
        'record-connection-sample',
        {
            success: z.boolean().describe('Whether the request succeeded'),
            latencyMs: z.number().min(0).nullable().default(null).describe('Observed latency'),
            connectionType: z.string().optional().describe('Current connection type, if it changed'),
        },
        async ({ success, latencyMs, connectionType }) => {
            if (connectionType !== undefined) {
                stack.monitor.setConnectionType(connectionType);
            }
            return textResult(stack.monitor.recordSample({ latencyMs, success }));
        }
    );

    // 7. get-rpc-config - Effective tuning for a function
    server.tool(
        'get-rpc-config',
        {
            functionName: z.string().min(1).describe('RPC function name'),
        },
        async ({ functionName }) => {
            return textResult({
                functionName,
                registered: stack.registry.has(functionName),
                config: stack.registry.getConfig(functionName),
            });
        }
    );

    // 8. reset-circuit - Reset circuit breaker for a function
    server.tool(
        'reset-circuit',
        {
            functionName: z.string().describe('RPC function name to reset'),
        },
        async ({ functionName }) => {
            if (stack.client.resetCircuit(functionName)) {
                return textResult(`Circuit breaker for '${functionName}' has been reset.`);
            }
            return textResult(`No circuit breaker exists for '${functionName}'.`, true);
        }
    );

    // 9. refresh-config - Force config reload
    server.tool(
        'refresh-config',
        {},
        async () => {
            const success = await services.config.refresh();
            if (success) {
                return textResult('Configuration successfully reloaded.');
            }
            return textResult('Failed to reload configuration. Check server logs.', true);
        }
    );
}
