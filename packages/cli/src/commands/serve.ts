/**
 * Serve command
 *
 * Starts a portico server with the reference EchoHandler. Defaults come
 * from the environment (see `@portico/core/config`); flags override them.
 *
 * @module commands/serve
 */

import type { Server } from "@portico/core";
import { createServer, errorAttributes, parseEnvConfig } from "@portico/core";
import type { LogLevel } from "@portico/otel";
import { ATTR_REJECTION_REASON, createConnectionMetrics, getLogger, getMeter, shutdownProvider } from "@portico/otel";
import { defineCommand } from "citty";
import { DEFAULT_BANNER, withBanner } from "../handlers/EchoHandler.ts";

/**
 * Resolved options for the serve pipeline.
 */
export interface ServeCommandOptions {
    host: string;
    port: number;
    backlog: number;
    maxCons: number;
    maxConsPerIp: number;
    workers: number;
    timeout: number | undefined;
    handleInterrupt: boolean;
    tls: boolean;
    tlsDir: string | undefined;
    banner: string;
    logLevel: LogLevel;
}

/**
 * Raw command-line flags, as citty hands them over.
 */
export interface ServeArgs {
    host?: string | undefined;
    port?: string | undefined;
    backlog?: string | undefined;
    "max-cons"?: string | undefined;
    "max-cons-per-ip"?: string | undefined;
    workers?: string | undefined;
    timeout?: string | undefined;
    tls?: boolean | undefined;
    "tls-dir"?: string | undefined;
    banner?: string | undefined;
}

/**
 * Merge flags over the environment and validate the result.
 *
 * @throws ZodError when a value is out of range
 */
export function resolveServeOptions(args: ServeArgs, env: Record<string, string | undefined> = process.env): ServeCommandOptions {
    const overrides = definedEntries({
        LISTEN: args.host,
        PORT: args.port,
        BACKLOG: args.backlog,
        MAX_CONS: args["max-cons"],
        MAX_CONS_PER_IP: args["max-cons-per-ip"],
        WORKER_PROCESSES: args.workers,
        LOOP_TIMEOUT_MS: args.timeout,
        TLS_ENABLED: args.tls ? "true" : undefined,
        TLS_DIR_PATH: args["tls-dir"],
    });
    const config = parseEnvConfig({ ...env, ...overrides });

    return {
        host: config.LISTEN,
        port: config.PORT,
        backlog: config.BACKLOG,
        maxCons: config.MAX_CONS,
        maxConsPerIp: config.MAX_CONS_PER_IP,
        workers: config.WORKER_PROCESSES,
        timeout: config.LOOP_TIMEOUT_MS,
        handleInterrupt: config.HANDLE_INTERRUPT,
        tls: config.TLS_ENABLED,
        tlsDir: config.TLS_DIR_PATH,
        banner: args.banner ?? DEFAULT_BANNER,
        logLevel: config.LOG_LEVEL,
    };
}

/**
 * Run the server until it is interrupted or fails.
 *
 * Startup failures are logged and turn into a non-zero exit code; the
 * server is always shut down afterwards.
 */
export async function executeServe(options: ServeCommandOptions): Promise<void> {
    const logger = getLogger("portico", { minLevel: options.logLevel });
    let server: Server | undefined;

    try {
        server = await createServer({
            address: { host: options.host, port: options.port },
            handler: withBanner(options.banner),
            backlog: options.backlog,
            maxCons: options.maxCons,
            maxConsPerIp: options.maxConsPerIp,
            tls: options.tls ? { dirPath: options.tlsDir } : undefined,
            logger,
        });

        const connectionMetrics = createConnectionMetrics(getMeter());
        // Rejected connections hold a slot until their reply is flushed
        server.on("connection", () => {
            connectionMetrics.accepted.add(1);
            connectionMetrics.active.add(1);
        });
        server.on("rejected", (_handler, _address, reason) => {
            connectionMetrics.rejected.add(1, { [ATTR_REJECTION_REASON]: reason });
            connectionMetrics.active.add(1);
        });
        server.on("fault", () => {
            connectionMetrics.faults.add(1);
        });
        server.on("disconnect", () => {
            connectionMetrics.active.add(-1);
        });

        logger.info(`Starting portico on port ${server.address?.port ?? options.port}`);
        await server.serve({
            timeout: options.timeout,
            handleInterrupt: options.handleInterrupt,
            workerProcesses: options.workers,
        });
    } catch (error) {
        logger.error(`Error starting server: ${error instanceof Error ? error.message : String(error)}`, errorAttributes(error));
        process.exitCode = 1;
    } finally {
        await server?.shutdown();
        logger.info("Stopping portico");
        await shutdownProvider();
    }
}

export const serveCommand = defineCommand({
    meta: {
        name: "serve",
        description: "Accept connections and answer them with the reference echo handler",
    },
    args: {
        host: {
            type: "string",
            description: "Address to bind (default: LISTEN or 0.0.0.0)",
        },
        port: {
            type: "string",
            description: "Port to bind (default: PORT or 2121)",
        },
        backlog: {
            type: "string",
            description: "Accept queue depth (default: BACKLOG or 100)",
        },
        "max-cons": {
            type: "string",
            description: "Maximum simultaneous connections, 0 = unlimited (default: MAX_CONS or 512)",
        },
        "max-cons-per-ip": {
            type: "string",
            description: "Maximum connections per address, 0 = unlimited (default: MAX_CONS_PER_IP or 0)",
        },
        workers: {
            type: "string",
            description: "Pre-forked worker processes, 1 = inline, 0 = one per CPU (default: WORKER_PROCESSES or 1)",
        },
        timeout: {
            type: "string",
            description: "Loop iteration timeout in milliseconds",
        },
        tls: {
            type: "boolean",
            description: "Terminate TLS with server.key/server.crt",
        },
        "tls-dir": {
            type: "string",
            description: "Directory holding server.key and server.crt (default: TLS_DIR_PATH or cwd)",
        },
        banner: {
            type: "string",
            description: "Greeting sent to every client",
        },
    },
    async run({ args }) {
        await executeServe(
            resolveServeOptions({
                host: args.host,
                port: args.port,
                backlog: args.backlog,
                "max-cons": args["max-cons"],
                "max-cons-per-ip": args["max-cons-per-ip"],
                workers: args.workers,
                timeout: args.timeout,
                tls: args.tls,
                "tls-dir": args["tls-dir"],
                banner: args.banner,
            }),
        );
    },
});

function definedEntries(record: Record<string, string | undefined>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}
