import { trace } from '@opentelemetry/api';
import { loadConfig } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: LogLevel;
    service: string;
    message: string;
    traceId?: string;
    spanId?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, error?: unknown, meta?: LogMeta): void;
}

export interface LoggerOptions {
    service: string;
    level: LogLevel;
}

const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

function getTraceContext(): { traceId?: string; spanId?: string } {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
        const ctx = activeSpan.spanContext();
        return {
            traceId: ctx.traceId,
            spanId: ctx.spanId
        };
    }
    return {};
}

export function createLogger({ service, level: minLevel }: LoggerOptions): Logger {
    const shouldLog = (level: LogLevel): boolean => levels[level] >= levels[minLevel];

    const formatLog = (level: LogLevel, message: string, meta?: LogMeta): string => {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            service,
            message,
            ...getTraceContext(),
            ...meta
        };
        return JSON.stringify(entry);
    };

    return {
        debug(message, meta) {
            if (shouldLog('debug')) {
                console.log(formatLog('debug', message, meta));
            }
        },

        info(message, meta) {
            if (shouldLog('info')) {
                console.log(formatLog('info', message, meta));
            }
        },

        warn(message, meta) {
            if (shouldLog('warn')) {
                console.warn(formatLog('warn', message, meta));
            }
        },

        error(message, error, meta) {
            if (shouldLog('error')) {
                const errorMeta: LogMeta = { ...meta };
                if (error instanceof Error) {
                    errorMeta.error = {
                        name: error.name,
                        message: error.message,
                        stack: error.stack
                    };
                } else if (error) {
                    errorMeta.error = String(error);
                }
                console.error(formatLog('error', message, errorMeta));
            }
        }
    };
}

const config = loadConfig();

export const logger: Logger = createLogger({
    service: config.serviceName,
    level: config.logLevel
});
