/**
 * Public API types for Server
 *
 * @module types
 */

import type { EventEmitter } from "node:events";
import type { AddressInfo, Server as NetServer, Socket } from "node:net";
import type { SecureContext } from "node:tls";
import type { ServerLogger } from "./logger.ts";
import type { ProcessPool } from "./ProcessPool.ts";

// =============================================================================
// CHANNELS
// =============================================================================

/**
 * A handle registered with the event loop for as long as its socket is live.
 */
export interface Channel {
    readonly closed: boolean;

    /**
     * Tear the channel down. Must be idempotent and must unregister the
     * channel from its loop.
     */
    close(): void;
}

/**
 * Countable registry of active channels plus the loop lifecycle.
 */
export interface EventLoop extends Iterable<Channel> {
    /** Number of registered channels */
    readonly size: number;

    readonly closed: boolean;

    register(channel: Channel): void;
    unregister(channel: Channel): void;

    /**
     * Run the loop.
     *
     * Blocking: resolves once {@link EventLoop.stop} or {@link EventLoop.close} is called.
     * Non-blocking: resolves after one iteration of at most `timeout` milliseconds.
     */
    loop(timeout?: number, blocking?: boolean): Promise<void>;

    /** End the current `loop()` call without closing any channel */
    stop(): void;

    /** Close every registered channel and end the current `loop()` call */
    close(): void;
}

// =============================================================================
// HANDLERS
// =============================================================================

/**
 * What a connection handler sees of the server that created it.
 */
export interface HandlerHost {
    readonly logger: ServerLogger;

    /** Set when the server terminates TLS on accepted sockets */
    readonly secureContext: SecureContext | null;

    /**
     * Give back the admission slot held by `handler`.
     *
     * Handlers call this from their close path. Calling it more than once,
     * or for a handler that never got a slot, is a no-op.
     */
    releaseConnection(handler: ConnectionHandler): void;
}

/**
 * Protocol handler for one accepted connection.
 *
 * The handler registers itself with the loop in its constructor and
 * unregisters in {@link Channel.close}.
 */
export interface ConnectionHandler extends Channel {
    /** False when the socket was already gone at construction time */
    readonly connected: boolean;

    /** Protocol entry point; a throw or a rejected promise is routed to {@link handleError} */
    handle(): void | Promise<void>;

    handleError(error: unknown): void;

    /** Too many connections in total */
    handleMaxCons(): void;

    /** Too many connections from this address */
    handleMaxConsPerIp(): void;
}

export type HandlerClass = new (socket: Socket, server: HandlerHost, loop: EventLoop) => ConnectionHandler;

// =============================================================================
// SERVER API
// =============================================================================

/**
 * Address to resolve and bind
 */
export interface ListenAddress {
    /**
     * @default "0.0.0.0"
     */
    host?: string;
    port: number;
}

/**
 * An already bound file descriptor inherited from the parent process
 */
export interface InheritedSocket {
    fd: number;
}

export type ListenTarget = ListenAddress | InheritedSocket | NetServer;

/**
 * TLS configuration options
 */
export interface TLSOptions {
    /**
     * Path to TLS key file
     */
    keyPath?: string;

    /**
     * Path to TLS certificate file
     */
    certPath?: string;

    /**
     * TLS directory path (alternative to keyPath/certPath)
     * Will look for server.key and server.crt in this directory
     */
    dirPath?: string;
}

/**
 * Server state constants
 *
 * Note: Using const object instead of enum for native TypeScript compatibility
 */
export const ServerState = {
    /** Server object exists, nothing bound yet */
    CREATED: "created",
    /** Listener bound, not serving yet */
    BOUND: "bound",
    /** Event loop running */
    SERVING: "serving",
    /** Channels and listener are being closed */
    STOPPING: "stopping",
    /** Terminal */
    CLOSED: "closed",
} as const;

export type ServerState = (typeof ServerState)[keyof typeof ServerState];

/**
 * Lifecycle event names
 */
export const LifecycleEvent = {
    BOUND: "bound",
    SERVING: "serving",
    CONNECTION: "connection",
    REJECTED: "rejected",
    FAULT: "fault",
    DISCONNECT: "disconnect",
    STOPPING: "stopping",
    CLOSE: "close",
    ERROR: "error",
} as const;

export type LifecycleEvent = (typeof LifecycleEvent)[keyof typeof LifecycleEvent];

export type RejectionReason = "max_cons" | "max_cons_per_ip";

export type ConcurrencyModel = { readonly kind: "inline" } | { readonly kind: "prefork"; readonly workers: number };

/**
 * Server configuration options for createServer()
 */
export interface CreateServerOptions {
    /**
     * Address to bind, an inherited descriptor, or a listening net.Server to adopt
     */
    address: ListenTarget;

    /**
     * Handler class instantiated for every accepted connection
     */
    handler: HandlerClass;

    /**
     * Event loop owning the channels; a new IOLoop when omitted
     */
    loop?: EventLoop;

    /**
     * Depth of the kernel accept queue
     * @default 100
     */
    backlog?: number;

    /**
     * Maximum simultaneous connections, 0 for unlimited
     * @default 512
     */
    maxCons?: number;

    /**
     * Maximum simultaneous connections from one address, 0 for unlimited
     * @default 0
     */
    maxConsPerIp?: number;

    /**
     * Terminate TLS on every accepted socket
     */
    tls?: TLSOptions;

    /**
     * Diagnostics sink; no-op when omitted
     */
    logger?: ServerLogger;

    /**
     * Worker pool used when serve() pre-forks; node:cluster backed when omitted
     */
    processPool?: ProcessPool;
}

/**
 * Options for {@link Server.serve}
 */
export interface ServeOptions {
    /**
     * Upper bound, in milliseconds, of one non-blocking loop iteration
     */
    timeout?: number;

    /**
     * Run until shutdown (true) or for a single iteration (false)
     * @default true
     */
    blocking?: boolean;

    /**
     * Turn SIGINT/SIGTERM into an orderly shutdown and log start/stop
     * @default true
     */
    handleInterrupt?: boolean;

    /**
     * Number of pre-forked worker processes. 1 serves inline; 0 or a
     * negative number means one per available CPU.
     * @default 1
     */
    workerProcesses?: number;

    /**
     * Signals treated as an interrupt
     * @default ["SIGTERM", "SIGINT"]
     */
    signals?: NodeJS.Signals[];
}

/**
 * Listening server with explicit lifecycle control
 *
 * @example
 * ```typescript
 * import { createServer } from '@portico/core';
 *
 * const server = await createServer({
 *   address: { host: '127.0.0.1', port: 2121 },
 *   handler: EchoHandler,
 *   maxCons: 256,
 * });
 *
 * server.on('rejected', (_handler, address, reason) => console.warn(address, reason));
 *
 * await server.serve();
 * ```
 */
export interface Server extends EventEmitter {
    /**
     * Accept and dispatch connections.
     *
     * @throws ConfigError on an invalid combination of options
     * @throws Error if the server is closed
     */
    serve(options?: ServeOptions): Promise<void>;

    /**
     * Close every live connection and the listener without waiting
     */
    closeAll(): void;

    /**
     * Close every live connection and wait for the listener to be released
     */
    shutdown(): Promise<void>;

    /**
     * Bound address, null once closed or in a pre-fork primary
     */
    readonly address: AddressInfo | null;

    readonly state: ServerState;

    /** Concurrency model chosen by the last serve() call */
    readonly model: ConcurrencyModel | null;

    /** Channels currently registered with the loop */
    readonly connectionCount: number;

    readonly loop: EventLoop;

    readonly maxCons: number;
    readonly maxConsPerIp: number;

    /** Number of live connections recorded for `address` */
    connectionsFrom(address: string): number;

    on(event: "bound", listener: (address: AddressInfo | null) => void): this;
    on(event: "serving", listener: (model: ConcurrencyModel) => void): this;
    on(event: "connection", listener: (handler: ConnectionHandler, address: string) => void): this;
    on(event: "rejected", listener: (handler: ConnectionHandler, address: string, reason: RejectionReason) => void): this;
    on(event: "fault", listener: (handler: ConnectionHandler, address: string, error: unknown) => void): this;
    on(event: "disconnect", listener: (handler: ConnectionHandler, address: string) => void): this;
    on(event: "stopping", listener: () => void): this;
    on(event: "close", listener: () => void): this;
    on(event: "error", listener: (error: Error) => void): this;

    once(event: "bound", listener: (address: AddressInfo | null) => void): this;
    once(event: "serving", listener: (model: ConcurrencyModel) => void): this;
    once(event: "connection", listener: (handler: ConnectionHandler, address: string) => void): this;
    once(event: "rejected", listener: (handler: ConnectionHandler, address: string, reason: RejectionReason) => void): this;
    once(event: "fault", listener: (handler: ConnectionHandler, address: string, error: unknown) => void): this;
    once(event: "disconnect", listener: (handler: ConnectionHandler, address: string) => void): this;
    once(event: "stopping", listener: () => void): this;
    once(event: "close", listener: () => void): this;
    once(event: "error", listener: (error: Error) => void): this;
}
