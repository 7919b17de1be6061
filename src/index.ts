#!/usr/bin/env node
import { LifelineServer } from './mcp/server.js';
import { logger } from './utils/logger.js';

/**
 * Application Entry Point
 */
async function main() {
    const server = new LifelineServer();

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        server.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error('Error during shutdown:', error);
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
        logger.error('Uncaught Exception:', error);
        process.exit(1);
    });

    await server.start();
}

main().catch((error) => {
    logger.error('Fatal error during startup:', error);
    process.exit(1);
});
