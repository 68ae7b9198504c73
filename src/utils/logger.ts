import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel | 'silent';
    /** One JSON object per line instead of pino-pretty output */
    jsonLogs?: boolean;
    /** Write JSON lines here instead of stdout */
    destination?: pino.DestinationStream;
}

let loggerInstance: pino.Logger | null = null;

function baseOptions(level: LogLevel | 'silent'): pino.LoggerOptions {
    return {
        level,
        base: { service: 'ai-research-hub' },
        // Errors are logged under `err` so the stack and message survive
        serializers: { err: pino.stdSerializers.err },
    };
}

/**
 * Replace the process logger. The server and each CLI command call this
 * once, after the config is resolved.
 */
export function initLogger(options: LoggerOptions = {}): pino.Logger {
    const { level = 'info', jsonLogs = false, destination } = options;

    if (destination) {
        loggerInstance = pino(baseOptions(level), destination);
    } else if (jsonLogs || level === 'silent') {
        loggerInstance = pino(baseOptions(level));
    } else {
        loggerInstance = pino({
            ...baseOptions(level),
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,service',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * The process logger. Before `initLogger` runs it is an info logger,
 * or a silent one under Vitest.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: process.env['VITEST'] ? 'silent' : 'info' });
    }
    return loggerInstance;
}

/**
 * Drop the configured logger so the next `getLogger()` builds a default one.
 */
export function resetLogger(): void {
    loggerInstance = null;
}
