import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the engine. Every call
 * takes the structured fields first and the message second, pino style.
 */
export interface ILogger {
    info(data: object, message?: string): void;
    error(data: object, message?: string): void;
    warn(data: object, message?: string): void;
    debug(data: object, message?: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the interview evaluation engine: API requests, judging,
 * aggregation and lifecycle transitions.
 */
export const logger: ILogger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'production' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Error fields for a structured log line.
 */
export function errorFields(error: unknown): { error: string; kind?: string } {
    if (error instanceof Error) {
        const kind = 'kind' in error && typeof error.kind === 'string' ? error.kind : undefined;
        return kind ? { error: error.message, kind } : { error: error.message };
    }
    return { error: String(error) };
}
