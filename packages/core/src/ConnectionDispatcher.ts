/**
 * Connection Dispatcher
 *
 * Turns an accepted socket into a running handler, or into a capacity
 * rejection. Nothing thrown here reaches the accept path: a broken
 * handler or a bookkeeping bug costs one connection, never the server.
 *
 * @module ConnectionDispatcher
 */

import type { Socket } from "node:net";
import type { AdmissionController } from "./AdmissionController.ts";
import { errorAttributes } from "./logger.ts";
import type { ServerLogger } from "./logger.ts";
import type { ConnectionHandler, EventLoop, HandlerClass, HandlerHost, RejectionReason } from "./types.ts";

/**
 * Callbacks fired as connections move through dispatch
 */
export interface DispatchObserver {
    accepted?(handler: ConnectionHandler, address: string): void;
    rejected?(handler: ConnectionHandler, address: string, reason: RejectionReason): void;
    fault?(handler: ConnectionHandler, address: string, error: unknown): void;
    released?(handler: ConnectionHandler, address: string): void;
}

export interface DispatcherOptions {
    handler: HandlerClass;
    host: HandlerHost;
    loop: EventLoop;
    admission: AdmissionController;
    logger: ServerLogger;
    observer?: DispatchObserver;
}

const UNKNOWN_ADDRESS = "unknown";

export class ConnectionDispatcher {
    private readonly _handlerClass: HandlerClass;
    private readonly _host: HandlerHost;
    private readonly _loop: EventLoop;
    private readonly _admission: AdmissionController;
    private readonly _logger: ServerLogger;
    private readonly _observer: DispatchObserver;

    /** Handlers holding an admission slot, with the address they hold it for */
    private readonly _slots = new Map<ConnectionHandler, string>();

    constructor(options: DispatcherOptions) {
        this._handlerClass = options.handler;
        this._host = options.host;
        this._loop = options.loop;
        this._admission = options.admission;
        this._logger = options.logger;
        this._observer = options.observer ?? {};
    }

    /**
     * Dispatch one accepted socket.
     *
     * @returns the handler when it was handed to handle() and did not fail
     *   synchronously, otherwise undefined
     */
    dispatch(socket: Socket, remoteAddress: string | undefined): ConnectionHandler | undefined {
        let handler: ConnectionHandler | undefined;
        let address: string | undefined;

        try {
            handler = new this._handlerClass(socket, this._host, this._loop);
            if (!handler.connected) {
                return undefined;
            }

            address = remoteAddress ?? UNKNOWN_ADDRESS;
            this._admission.record(address);
            this._slots.set(handler, address);

            // The handler registered itself, so the loop size already
            // includes this connection.
            if (!this._admission.shouldAcceptMore(this._loop.size)) {
                this._observer.rejected?.(handler, address, "max_cons");
                handler.handleMaxCons();
                return undefined;
            }

            if (this._admission.perAddressExceeded(address)) {
                this._observer.rejected?.(handler, address, "max_cons_per_ip");
                handler.handleMaxConsPerIp();
                return undefined;
            }

            this._observer.accepted?.(handler, address);
            return this._run(handler, address) ? handler : undefined;
        } catch (error) {
            this._dispatchFailed(error, socket, handler, address ?? remoteAddress);
            return undefined;
        }
    }

    /**
     * Free the admission slot held by `handler`. Idempotent.
     */
    release(handler: ConnectionHandler): void {
        const address = this._slots.get(handler);
        if (address === undefined) return;

        this._slots.delete(handler);
        this._admission.release(address);
        this._observer.released?.(handler, address);
    }

    /**
     * @returns false when handle() threw synchronously
     */
    private _run(handler: ConnectionHandler, address: string): boolean {
        let result: void | Promise<void>;
        try {
            result = handler.handle();
        } catch (error) {
            this._fault(handler, address, error);
            return false;
        }

        if (result instanceof Promise) {
            result.catch((error: unknown) => {
                try {
                    this._fault(handler, address, error);
                } catch (bug) {
                    this._dispatchFailed(bug, undefined, handler, address);
                }
            });
        }
        return true;
    }

    private _fault(handler: ConnectionHandler, address: string, error: unknown): void {
        this._logger.warn("Handler fault", { "network.peer.address": address, ...errorAttributes(error) });
        this._observer.fault?.(handler, address, error);
        handler.handleError(error);
    }

    private _dispatchFailed(error: unknown, socket: Socket | undefined, handler: ConnectionHandler | undefined, address: string | undefined): void {
        this._logger.error("Unhandled error while dispatching connection", {
            "network.peer.address": address,
            handler: this._handlerClass.name,
            ...errorAttributes(error),
        });

        if (handler) {
            try {
                handler.close();
            } catch (closeError) {
                this._logger.error("Error while closing handler", { "network.peer.address": address, ...errorAttributes(closeError) });
            }
            this.release(handler);
            return;
        }

        // No handler means no slot was recorded; only the raw socket is left.
        socket?.destroy();
    }
}
