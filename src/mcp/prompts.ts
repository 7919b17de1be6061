import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { McpServices } from './tools.js';

/**
 * Register MCP prompts
 */
export function registerPrompts(server: McpServer, services: McpServices) {
    // 1. diagnose-connectivity
    server.prompt(
        'diagnose-connectivity',
        {},
        () => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text: `Diagnose the current state of the client's network resilience.

Read these resources first:
- 'health://connection' for the rolling connection health
- 'resilience://circuits' for circuit breaker states
- 'resilience://rate-limits' for rate limit usage

Then report:
1. Whether background traffic should be deferred, and why.
2. Every RPC function whose circuit is OPEN or HALF-OPEN, with its last error.
3. Functions close to their rate limit (remaining below 10% of maxRequests).
4. Concrete next steps (for example "reset the circuit for X once the backend recovers" via 'reset-circuit').`,
                    },
                },
            ],
        })
    );

    // 2. tune-rpc-function
    server.prompt(
        'tune-rpc-function',
        {
            functionName: z.string().describe('RPC function to review (e.g. "get_nearby_posts")'),
        },
        ({ functionName }) => {
            const config = services.stack.registry.getConfig(functionName);
            return {
                messages: [
                    {
                        role: 'user',
                        content: {
                            type: 'text',
                            text: `Review the resilience tuning of the RPC function "${functionName}".

Current config:
${JSON.stringify(config, null, 2)}

Read 'resilience://rpc/${functionName}' for its live circuit and rate limit state, and use 'evaluate-retry' with functionName "${functionName}" to check how it reacts to 429, 503 and network failures.

Then recommend:
1. Whether its preset (strict, normal, bulk, realtime, sync, relaxed) fits its traffic.
2. Any change to maxRetries, the retry delay envelope or timeoutMs, with the reason.
3. Whether it should require audit logging.`,
                        },
                    },
                ],
            };
        }
    );
}
