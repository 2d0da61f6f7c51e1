import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Logs go to stderr so stdout stays free for reports and JSON output.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup, before any pipeline work.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * Before `initLogger()` runs this is a plain JSON logger whose level comes
 * from PAPERSCOUT_LOG_LEVEL (default "info"), so library use and tests need no setup.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino(
            { level: process.env['PAPERSCOUT_LOG_LEVEL'] ?? 'info' },
            pino.destination(2)
        );
    }
    return loggerInstance;
}
