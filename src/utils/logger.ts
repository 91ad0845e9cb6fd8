import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup. Modules fetch the logger with
 * `getLogger()` at call time, so they pick up the new instance.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ name: 'litsynth', level });
    } else {
        loggerInstance = pino({
            name: 'litsynth',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger: info level, or silent
 * under the test runner.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = process.env['VITEST']
            ? pino({ name: 'litsynth', level: 'silent' })
            : initLogger({ level: 'info' });
    }
    return loggerInstance;
}
