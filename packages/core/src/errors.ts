/**
 * Server error types
 *
 * Both errors are fatal and raised before any connection is served.
 *
 * @module errors
 */

/**
 * Invalid combination of server or serve() options.
 */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

/**
 * The listening socket could not be bound or adopted.
 *
 * `code` is the OS error code (EADDRINUSE, EACCES, ENOTFOUND, ...) when
 * the failure came from the system.
 */
export class BindError extends Error {
    readonly address: string;
    readonly code: string | undefined;

    constructor(address: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot listen on ${address}: ${reason}`, { cause });
        this.name = "BindError";
        this.address = address;
        this.code = systemErrorCode(cause);
    }
}

function systemErrorCode(error: unknown): string | undefined {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}
