/**
 * TLS configuration utilities
 *
 * @module TLSConfig
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { cwd } from "node:process";
import type { SecureContext } from "node:tls";
import { createSecureContext } from "node:tls";
import env from "env-var";
import { ConfigError } from "./errors.ts";
import type { TLSOptions } from "./types.ts";

/**
 * Get TLS directory path
 *
 * `TLS_DIR_PATH` when set, the working directory otherwise.
 */
export function getTLSPath(): string {
    return env.get("TLS_DIR_PATH").default(cwd()).asString();
}

/**
 * Read TLS certificates from configuration
 *
 * @param options - TLS options
 * @returns TLS key and cert buffers
 */
export function readTLSCertificates(options: TLSOptions = {}): {
    key: Buffer;
    cert: Buffer;
} {
    const { keyPath, certPath, dirPath } = options;

    // If explicit paths provided, use them (resolve to absolute paths)
    if (keyPath && certPath) {
        return {
            key: readFileSync(resolve(keyPath)),
            cert: readFileSync(resolve(certPath)),
        };
    }

    // Otherwise use dirPath (or default TLS path)
    const resolvedDir = resolve(dirPath ?? getTLSPath());

    return {
        key: readFileSync(resolve(resolvedDir, "server.key")),
        cert: readFileSync(resolve(resolvedDir, "server.crt")),
    };
}

/**
 * Load certificates and build the server secure context.
 *
 * Runs at server construction so a broken TLS setup fails before the
 * first client connects.
 *
 * @throws ConfigError when the files are missing or unusable
 */
export function loadSecureContext(options: TLSOptions): SecureContext {
    try {
        return createSecureContext(readTLSCertificates(options));
    } catch (error) {
        throw new ConfigError(`Invalid TLS configuration: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
}
