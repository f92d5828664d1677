import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured fields come first, the human-readable message second.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const prettyTransport = {
    target: 'pino-pretty',
    options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false
    }
};

/**
 * Logger Configuration
 *
 * JSON logger for the evidence matching service. Carries the audit counts
 * of each pipeline stage (dropped duplicates, downgraded matches, artifact paths).
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test' ? undefined : prettyTransport,
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Message of an unknown thrown value, for structured log fields.
 */
export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
