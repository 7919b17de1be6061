import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, context, ...metadata }) => {
    const scope = typeof context === 'string' ? ` (${context})` : '';
    let msg = `${timestamp} [${level}]${scope}: ${message}`;

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

/**
 * Root logger for the resilience engine
 *
 * Every level goes to stderr: stdout is reserved for the MCP stdio transport.
 * Level comes from LOG_LEVEL (default: info).
 */
export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'debug'],
            format: combine(
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
    ],
});

/**
 * Create a child logger tagged with a component name
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}
