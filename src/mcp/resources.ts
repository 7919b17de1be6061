import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { McpServices } from './tools.js';

function jsonContents(uri: string, data: unknown) {
    return {
        contents: [
            {
                uri,
                mimeType: 'application/json',
                text: JSON.stringify(data, null, 2),
            },
        ],
    };
}

/**
 * Register MCP resources
 */
export function registerResources(server: McpServer, services: McpServices) {
    const { stack } = services;

    // 1. resilience://registry - Every registered RPC function
    server.resource(
        'rpc-registry',
        'resilience://registry',
        {
            description: 'Registered RPC functions with their effective tuning',
            mimeType: 'application/json',
        },
        async () => jsonContents('resilience://registry', {
            fallbackPreset: stack.registry.getFallbackPreset(),
            functions: stack.registry.list(),
        })
    );

    // 2. resilience://rpc/{functionName} - One function's tuning and live state
    server.resource(
        'rpc-function',
        new ResourceTemplate('resilience://rpc/{functionName}', { list: undefined }),
        {
            description: 'Tuning, circuit and rate limit state of one RPC function',
            mimeType: 'application/json',
        },
        async (uri, { functionName }) => {
            if (typeof functionName !== 'string') {
                throw new Error('Invalid function name');
            }

            return jsonContents(uri.href, {
                functionName,
                registered: stack.registry.has(functionName),
                config: stack.registry.getConfig(functionName),
                circuit: stack.circuits.getMetrics(functionName),
                rateLimit: stack.rateLimiter.getStatus(functionName),
            });
        }
    );

    // 3. resilience://circuits - Circuit breaker health
    server.resource(
        'circuits',
        'resilience://circuits',
        {
            description: 'State and call statistics of every circuit breaker',
            mimeType: 'application/json',
        },
        async () => jsonContents('resilience://circuits', {
            summary: stack.circuits.getSummary(),
            circuits: stack.client.getHealthStatus(),
        })
    );

    // 4. resilience://rate-limits - Sliding window usage
    server.resource(
        'rate-limits',
        'resilience://rate-limits',
        {
            description: 'Current usage of every rate limit window',
            mimeType: 'application/json',
        },
        async () => jsonContents('resilience://rate-limits', stack.client.getRateLimiterStatus())
    );

    // 5. health://connection - Rolling connection health
    server.resource(
        'connection-health',
        'health://connection',
        {
            description: 'Connection health evaluated over recent samples',
            mimeType: 'application/json',
        },
        async () => jsonContents('health://connection', {
            ...stack.monitor.evaluate(),
            sampleCount: stack.monitor.getSampleCount(),
            deferBackgroundTraffic: stack.monitor.shouldDeferBackgroundTraffic(),
        })
    );

    // 6. config://current - View current configuration
    server.resource(
        'config-current',
        'config://current',
        {
            description: 'Current active configuration',
            mimeType: 'application/json',
        },
        async () => jsonContents('config://current', services.config.getConfig())
    );
}
