import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ConfigLoader, ConfigChange, applyConfig } from '../config/index.js';
import { createResilienceStack, ResilienceStack } from '../stack.js';
import { createLogger } from '../utils/logger.js';
import { registerResources } from './resources.js';
import { registerTools } from './tools.js';
import { registerPrompts } from './prompts.js';

const logger = createLogger('LifelineServer');

/**
 * Lifeline MCP Server
 *
 * Orchestrates:
 * - ConfigLoader (Configuration)
 * - Resilience stack (registry, circuits, rate limits, connection health)
 * - MCP Interface (Resources, Tools, Prompts)
 */
export class LifelineServer {
    private server: McpServer;
    private configLoader: ConfigLoader;
    private stack: ResilienceStack | null = null;

    constructor(configLoader: ConfigLoader = new ConfigLoader()) {
        this.configLoader = configLoader;
        this.server = new McpServer({
            name: 'lifeline-resilience',
            version: '1.0.0',
        });
    }

    /**
     * Load configuration, build the stack and register all MCP capabilities
     */
    public async initialize(): Promise<ResilienceStack> {
        if (this.stack) return this.stack;

        await this.configLoader.initialize();
        const stack = createResilienceStack(this.configLoader.getConfig());
        this.stack = stack;

        const services = { stack, config: this.configLoader };
        registerResources(this.server, services);
        registerTools(this.server, services);
        registerPrompts(this.server, services);

        this.setupEventListeners(stack);
        return stack;
    }

    /**
     * Setup internal event orchestration
     */
    private setupEventListeners(stack: ResilienceStack): void {
        this.configLoader.on('config:changed', ({ current, addedFunctions, removedFunctions }: ConfigChange) => {
            logger.info(`Configuration updated: +${addedFunctions.length} / -${removedFunctions.length} function overrides`);
            applyConfig(stack.registry, current, removedFunctions);
        });

        stack.circuits.on('circuit:opened', ({ key, reason }: { key: string; reason: string }) => {
            logger.warn(`Circuit Breaker OPEN for ${key}: ${reason}`);
        });

        stack.circuits.on('circuit:closed', ({ key }: { key: string }) => {
            logger.info(`Circuit Breaker CLOSED (Recovered) for ${key}`);
        });

        stack.monitor.on('health:changed', ({ from, to }: { from: string; to: string }) => {
            logger.warn(`Connection health changed: ${from} -> ${to}`);
        });
    }

    /**
     * Start the server on the given transport (stdio by default)
     */
    public async start(transport: Transport = new StdioServerTransport()): Promise<void> {
        await this.initialize();
        await this.server.connect(transport);
        logger.info('Lifeline MCP Server running');
    }

    public async stop(): Promise<void> {
        this.configLoader.stop();
        await this.server.close();
    }
}
