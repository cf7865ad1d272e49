import type { LogConfig } from '../types/config.types.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    documentId?: string;
    filename?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Creates a Pino logger instance
 * Automatically injects correlation ID into all log entries
 *
 * Structured JSON by default; pino-pretty when `structured` is false.
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
                },
            },
        }),
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const entryMeta = meta ?? {};

        if (config.customLogger) {
            config.customLogger(level, message, entryMeta);
            return;
        }

        pinoLogger[level](entryMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

/**
 * Logger that adds `bindings` to every entry; explicit meta wins
 */
export function withContext(logger: Logger, bindings: LogMeta): Logger {
    const merge = (meta?: LogMeta): LogMeta => ({ ...bindings, ...meta });
    return {
        debug: (message: string, meta?: LogMeta) => logger.debug(message, merge(meta)),
        info: (message: string, meta?: LogMeta) => logger.info(message, merge(meta)),
        warn: (message: string, meta?: LogMeta) => logger.warn(message, merge(meta)),
        error: (message: string, meta?: LogMeta) => logger.error(message, merge(meta)),
    };
}
