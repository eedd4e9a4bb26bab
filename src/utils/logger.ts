import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

/**
 * Log line format: `<time> [level]: [Context] message {metadata}`
 */
const logFormat = printf(({ level, message, timestamp, context, ...metadata }) => {
    let msg = `${timestamp} [${level}]: `;

    if (typeof context === 'string') {
        msg += `[${context}] `;
    }
    msg += String(message);

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

/**
 * Root winston logger for the watcher
 *
 * - Colourised console output, errors and warnings on stderr
 * - Base level from LOG_LEVEL (default `info`), raised with setLogLevel()
 */
export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn'],
            format: combine(
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
    ],
});

/**
 * Change the level of the root logger (child loggers follow it)
 */
export function setLogLevel(level: string): void {
    logger.level = level;
}

/**
 * Create a child logger with a specific context
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}
