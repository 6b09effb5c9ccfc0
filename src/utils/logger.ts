import type { LogConfig } from '../types/config.types.js';
import { getRunId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    runId?: string;
    batchIndex?: number;
    pageNumber?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = LogConfig['level'];

/**
 * Creates a Pino-backed logger.
 * The active run ID is injected into every entry.
 *
 * Structured JSON by default; `structured: false` routes through pino-pretty.
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        }),
    });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        runId: meta?.runId ?? getRunId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}
