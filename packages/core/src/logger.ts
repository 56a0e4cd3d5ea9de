/**
 * Logger seam
 *
 * The server never configures logging itself; callers inject a logger
 * (for instance `getLogger()` from `@portico/otel`).
 *
 * @module logger
 */

export type LogAttributes = Record<string, string | number | boolean | undefined>;

export interface ServerLogger {
    debug(message: string, attributes?: LogAttributes): void;
    info(message: string, attributes?: LogAttributes): void;
    warn(message: string, attributes?: LogAttributes): void;
    error(message: string, attributes?: LogAttributes): void;
}

const noop = (): void => {};

export const noopLogger: ServerLogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};

/**
 * Wrap a logger so every record also carries `attributes`.
 * Attributes passed at the call site win.
 */
export function withAttributes(logger: ServerLogger, attributes: LogAttributes): ServerLogger {
    const merge = (callAttributes?: LogAttributes): LogAttributes => (callAttributes ? { ...attributes, ...callAttributes } : attributes);

    return {
        debug(message, callAttributes?) {
            logger.debug(message, merge(callAttributes));
        },
        info(message, callAttributes?) {
            logger.info(message, merge(callAttributes));
        },
        warn(message, callAttributes?) {
            logger.warn(message, merge(callAttributes));
        },
        error(message, callAttributes?) {
            logger.error(message, merge(callAttributes));
        },
    };
}

/**
 * Exception attributes following the OpenTelemetry `exception.*` conventions
 */
export function errorAttributes(error: unknown): LogAttributes {
    if (error instanceof Error) {
        return {
            "exception.type": error.name,
            "exception.message": error.message,
            "exception.stacktrace": error.stack,
        };
    }
    return { "exception.type": typeof error, "exception.message": String(error) };
}
