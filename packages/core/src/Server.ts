/**
 * Server implementation with explicit lifecycle
 *
 * created -> bound -> serving -> stopping -> closed
 *
 * @module Server
 */

import { EventEmitter } from "node:events";
import type { AddressInfo, Socket } from "node:net";
import type { SecureContext } from "node:tls";
import { AdmissionController } from "./AdmissionController.ts";
import { ConnectionDispatcher } from "./ConnectionDispatcher.ts";
import { ConfigError } from "./errors.ts";
import { IOLoop } from "./IOLoop.ts";
import { ListenerManager } from "./ListenerManager.ts";
import { errorAttributes, noopLogger, withAttributes } from "./logger.ts";
import type { ServerLogger } from "./logger.ts";
import { ProcessPool } from "./ProcessPool.ts";
import { loadSecureContext } from "./TLSConfig.ts";
import type { ConcurrencyModel, ConnectionHandler, CreateServerOptions, EventLoop, HandlerClass, HandlerHost, ServeOptions, Server } from "./types.ts";
import { LifecycleEvent, ServerState } from "./types.ts";

export const DEFAULT_BACKLOG = 100;
export const DEFAULT_MAX_CONS = 512;
export const DEFAULT_MAX_CONS_PER_IP = 0;

const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Server implementation class
 *
 * Internal implementation of the Server interface.
 * Use createServer() factory function to create instances.
 */
class ServerImpl extends EventEmitter implements Server, HandlerHost {
    // =========================================================================
    // Private state
    // =========================================================================

    private _state: ServerState = ServerState.CREATED;
    private _model: ConcurrencyModel | null = null;
    private readonly _options: CreateServerOptions;
    private readonly _handlerClass: HandlerClass;
    private readonly _backlog: number;
    private readonly _admission: AdmissionController;
    private readonly _dispatcher: ConnectionDispatcher;
    private readonly _listener = new ListenerManager();
    private readonly _pool: ProcessPool;
    /** Sockets accepted before serve() started, in accept order */
    private readonly _pending: Socket[] = [];
    private readonly _signalHandlers: Map<NodeJS.Signals, () => void> = new Map();
    private _closePromise: Promise<void> | null = null;
    /** Supervision of pre-forked workers, set in the primary only */
    private _poolRun: Promise<void> | null = null;
    private _looping = false;

    readonly loop: EventLoop;
    readonly logger: ServerLogger;
    readonly secureContext: SecureContext | null;

    // =========================================================================
    // Constructor
    // =========================================================================

    constructor(options: CreateServerOptions) {
        super();
        this._options = options;
        this._handlerClass = options.handler;

        const baseLogger = options.logger ?? noopLogger;
        this._pool = options.processPool ?? new ProcessPool({ logger: withAttributes(baseLogger, { "process.pid": process.pid }) });
        this.logger = withAttributes(baseLogger, {
            "process.pid": process.pid,
            "worker.id": this._pool.isWorker ? this._pool.workerId : undefined,
        });

        this._backlog = options.backlog ?? DEFAULT_BACKLOG;
        if (!Number.isInteger(this._backlog) || this._backlog < 1) {
            throw new ConfigError(`backlog must be a positive integer, got ${this._backlog}`);
        }

        this._admission = new AdmissionController({
            maxCons: options.maxCons ?? DEFAULT_MAX_CONS,
            maxConsPerIp: options.maxConsPerIp ?? DEFAULT_MAX_CONS_PER_IP,
        });

        // Broken TLS material should fail here, not on the first client
        this.secureContext = options.tls ? loadSecureContext(options.tls) : null;

        this.loop = options.loop ?? new IOLoop({ logger: this.logger });
        this._dispatcher = new ConnectionDispatcher({
            handler: this._handlerClass,
            host: this,
            loop: this.loop,
            admission: this._admission,
            logger: this.logger,
            observer: {
                accepted: (handler, address) => this.emit(LifecycleEvent.CONNECTION, handler, address),
                rejected: (handler, address, reason) => this.emit(LifecycleEvent.REJECTED, handler, address, reason),
                fault: (handler, address, error) => this.emit(LifecycleEvent.FAULT, handler, address, error),
                released: (handler, address) => this.emit(LifecycleEvent.DISCONNECT, handler, address),
            },
        });
    }

    // =========================================================================
    // State properties
    // =========================================================================

    get address(): AddressInfo | null {
        return this._listener.address;
    }

    get state(): ServerState {
        return this._state;
    }

    get model(): ConcurrencyModel | null {
        return this._model;
    }

    get connectionCount(): number {
        return this.loop.size;
    }

    get maxCons(): number {
        return this._admission.maxCons;
    }

    get maxConsPerIp(): number {
        return this._admission.maxConsPerIp;
    }

    connectionsFrom(address: string): number {
        return this._admission.count(address);
    }

    releaseConnection(handler: ConnectionHandler): void {
        this._dispatcher.release(handler);
    }

    // =========================================================================
    // Lifecycle methods
    // =========================================================================

    async bind(): Promise<void> {
        if (this._state !== ServerState.CREATED) {
            throw new Error(`Cannot bind server: current state is "${this._state}", expected "${ServerState.CREATED}"`);
        }

        try {
            await this._listener.listen(
                this._options.address,
                { backlog: this._backlog },
                {
                    connection: (socket) => this._onConnection(socket),
                    error: (error) => this._onListenerError(error),
                },
            );
        } catch (error) {
            this._state = ServerState.CLOSED;
            this.loop.close();
            throw error;
        }

        this._state = ServerState.BOUND;
        this.emit(LifecycleEvent.BOUND, this.address);
    }

    async serve(options: ServeOptions = {}): Promise<void> {
        const { timeout, blocking = true, handleInterrupt = true, workerProcesses = 1, signals = DEFAULT_SIGNALS } = options;

        if (this._state !== ServerState.BOUND && this._state !== ServerState.SERVING) {
            throw new Error(`Cannot serve: current state is "${this._state}", expected "${ServerState.BOUND}"`);
        }
        if (this._looping) {
            throw new Error("Cannot serve: server is already serving");
        }

        const prefork = workerProcesses !== 1 && this._pool.supported;
        if (prefork && !blocking) {
            throw new ConfigError("'workerProcesses' and 'blocking' are mutually exclusive");
        }

        const log = handleInterrupt && blocking;

        if (prefork && !this._pool.isWorker) {
            this._looping = true;
            try {
                await this._servePrimary(ProcessPool.resolveWorkerCount(workerProcesses), log, handleInterrupt, signals);
            } finally {
                this._looping = false;
            }
            return;
        }

        if (this._state === ServerState.BOUND) {
            this._model = prefork ? { kind: "prefork", workers: ProcessPool.resolveWorkerCount(workerProcesses) } : { kind: "inline" };
            // In a worker the primary already logged the configuration
            if (log && !this._pool.isWorker) {
                this._logStart(false);
            }
            this._state = ServerState.SERVING;
            if (log) {
                this.logger.info(`>>> starting server on ${formatAddress(this.address)}, pid=${process.pid} <<<`);
            }
            this.emit(LifecycleEvent.SERVING, this._model);
            this._drainPending();
        }

        this._looping = true;
        try {
            if (handleInterrupt) {
                this._installSignalHandlers(signals, (signal) => {
                    this.logger.info("received interrupt signal", { signal });
                    this.loop.stop();
                });
            }
            await this.loop.loop(timeout, blocking);
        } finally {
            this._looping = false;
            this._removeSignalHandlers();
        }

        if (log && this._state === ServerState.SERVING) {
            this.logger.info(`>>> shutting down server, ${this.connectionCount} socket(s), pid=${process.pid} <<<`);
            await this.shutdown();
        }
    }

    shutdown(): Promise<void> {
        if (this._closePromise) {
            return this._closePromise;
        }

        this._state = ServerState.STOPPING;
        this.emit(LifecycleEvent.STOPPING);

        this._closePromise = (async () => {
            this._removeSignalHandlers();
            this._destroyPending();
            this.loop.close();
            this._listener.destroyAllSockets();
            try {
                await this._listener.close();
                await this._stopWorkers();
            } finally {
                this._state = ServerState.CLOSED;
                this.emit(LifecycleEvent.CLOSE);
            }
        })();

        return this._closePromise;
    }

    closeAll(): void {
        this.shutdown().catch((error: unknown) => {
            this.logger.error("Error while closing listener", errorAttributes(error));
        });
    }

    // =========================================================================
    // Private methods
    // =========================================================================

    private async _servePrimary(workers: number, log: boolean, handleInterrupt: boolean, signals: NodeJS.Signals[]): Promise<void> {
        if (!isBindableAddress(this._options.address)) {
            throw new ConfigError("Pre-forking needs a host/port address; an adopted listener cannot be shared with workers");
        }

        this._model = { kind: "prefork", workers };
        if (log) {
            this._logStart(true);
        }

        // Workers bind the same address through the cluster primary
        this._destroyPending();
        await this._listener.close();
        if (this._closePromise) {
            await this._closePromise;
            return;
        }

        this._state = ServerState.SERVING;
        this.emit(LifecycleEvent.SERVING, this._model);

        if (handleInterrupt) {
            this._installSignalHandlers(signals, (signal) => {
                this.logger.info("received interrupt signal", { signal });
                this._pool.signal(signal);
            });
        }

        this._poolRun = this._pool.run(workers);
        try {
            await this._poolRun;
        } finally {
            this._removeSignalHandlers();
            if (log) {
                this.logger.info(`>>> shutting down server, ${workers} worker(s), pid=${process.pid} <<<`);
            }
            await this.shutdown();
        }
    }

    private async _stopWorkers(): Promise<void> {
        const running = this._poolRun;
        if (!running) return;

        this._pool.signal("SIGTERM");
        // A pool failure is reported by serve()
        await Promise.allSettled([running]);
    }

    private _onConnection(socket: Socket): void {
        switch (this._state) {
            case ServerState.SERVING:
                this._dispatcher.dispatch(socket, socket.remoteAddress);
                break;
            case ServerState.BOUND:
                this._pending.push(socket);
                break;
            default:
                socket.destroy();
        }
    }

    private _drainPending(): void {
        for (const socket of this._pending.splice(0)) {
            this._dispatcher.dispatch(socket, socket.remoteAddress);
        }
    }

    private _destroyPending(): void {
        for (const socket of this._pending.splice(0)) {
            socket.destroy();
        }
    }

    private _onListenerError(error: Error): void {
        this.logger.error("Listener error, closing server", errorAttributes(error));
        if (this.listenerCount(LifecycleEvent.ERROR) > 0) {
            this.emit(LifecycleEvent.ERROR, error);
        }
        this.closeAll();
    }

    private _logStart(prefork: boolean): void {
        this.logger.info(`concurrency model: ${prefork ? "prefork + " : ""}async`);
        this.logger.debug(`loop: ${this.loop.constructor.name}`);
        this.logger.debug(`handler: ${this._handlerClass.name}`);
        this.logger.debug(`max connections: ${this.maxCons || "unlimited"}`);
        this.logger.debug(`max connections per ip: ${this.maxConsPerIp || "unlimited"}`);
        this.logger.debug(`backlog: ${this._backlog}`);
        this.logger.debug(`transport: ${this.secureContext ? "tls" : "plain"}`);
    }

    private _installSignalHandlers(signals: NodeJS.Signals[], onSignal: (signal: NodeJS.Signals) => void): void {
        for (const signal of signals) {
            const handler = () => onSignal(signal);
            this._signalHandlers.set(signal, handler);
            process.on(signal, handler);
        }
    }

    private _removeSignalHandlers(): void {
        for (const [signal, handler] of this._signalHandlers) {
            process.removeListener(signal, handler);
        }
        this._signalHandlers.clear();
    }
}

function isBindableAddress(target: CreateServerOptions["address"]): boolean {
    return "port" in target && typeof target.port === "number";
}

function formatAddress(address: AddressInfo | null): string {
    if (!address) return "unknown";
    return address.family === "IPv6" ? `[${address.address}]:${address.port}` : `${address.address}:${address.port}`;
}

/**
 * Create a server and bind its listening socket
 *
 * Binding happens here so that a bad address, a port in use or a missing
 * permission is reported before anything is served.
 *
 * @param options - Server configuration options
 * @returns Bound server; call serve() to start dispatching connections
 * @throws BindError when the listener cannot be bound or adopted
 * @throws ConfigError on invalid limits, backlog or TLS material
 *
 * @example
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { getLogger } from '@portico/otel';
 *
 * const server = await createServer({
 *   address: { port: 2121 },
 *   handler: EchoHandler,
 *   maxConsPerIp: 4,
 *   logger: getLogger('portico'),
 * });
 *
 * await server.serve({ workerProcesses: 4 });
 * ```
 */
export async function createServer(options: CreateServerOptions): Promise<Server> {
    const server = new ServerImpl(options);
    await server.bind();
    return server;
}
