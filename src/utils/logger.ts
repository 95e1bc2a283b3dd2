import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Process-wide logger, configured once by the CLI via `initLogger()`.
 * Library code calls `getLogger()` and never configures output itself.
 */
let loggerInstance: pino.Logger | null = null;

export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level, base: { app: 'hecorpus' } });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance, creating an info-level one on first use.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}

/**
 * Child logger bound to one stage run, so every line carries stage and runId.
 */
export function getRunLogger(stage: string, runId: number): pino.Logger {
    return getLogger().child({ stage, runId });
}
