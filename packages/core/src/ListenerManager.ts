/**
 * Listener Manager
 *
 * Owns the listening socket: bind or adopt it, hand accepted sockets to the
 * server, track raw sockets for forced teardown, release it on close.
 *
 * @module ListenerManager
 */

import type { AddressInfo, Server as NetServer, Socket } from "node:net";
import { createServer as createNetServer } from "node:net";
import { BindError } from "./errors.ts";
import type { ListenTarget } from "./types.ts";

export interface ListenerCallbacks {
    connection(socket: Socket): void;
    /** Listener failure after a successful bind */
    error(error: Error): void;
}

export interface ListenConfig {
    backlog: number;
}

const DEFAULT_HOST = "0.0.0.0";

export class ListenerManager {
    private _server: NetServer | null = null;
    private readonly _sockets: Set<Socket> = new Set();

    /**
     * The address the listener is bound to
     */
    get address(): AddressInfo | null {
        const address = this._server?.listening ? this._server.address() : null;
        return address && typeof address === "object" ? address : null;
    }

    /**
     * Bind, or adopt, the listening socket.
     *
     * Target kinds:
     * - `{ host, port }`: resolve and bind with the configured backlog
     * - `{ fd }`: listen on an inherited, already bound descriptor
     * - `net.Server`: adopt a server that is already listening
     *
     * @throws BindError when the socket cannot be bound or adopted
     */
    async listen(target: ListenTarget, config: ListenConfig, callbacks: ListenerCallbacks): Promise<void> {
        if (this._server) {
            throw new Error("Listener already bound");
        }

        if (isNetServer(target)) {
            if (!target.listening) {
                throw new BindError("server", new Error("adopted server is not listening"));
            }
            this._attach(target, callbacks);
            return;
        }

        const server = createNetServer();
        const label = "fd" in target ? `fd:${target.fd}` : `${target.host ?? DEFAULT_HOST}:${target.port}`;

        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => {
                reject(new BindError(label, error));
            };
            server.once("error", onError);

            try {
                const onListening = () => {
                    server.removeListener("error", onError);
                    resolve();
                };
                if ("fd" in target) {
                    server.listen({ fd: target.fd, backlog: config.backlog }, onListening);
                } else {
                    server.listen({ host: target.host ?? DEFAULT_HOST, port: target.port, backlog: config.backlog }, onListening);
                }
            } catch (error) {
                server.removeListener("error", onError);
                reject(new BindError(label, error));
            }
        });

        this._attach(server, callbacks);
    }

    /**
     * Stop accepting and release the listening socket.
     * Resolves once every tracked socket is gone as well.
     */
    async close(): Promise<void> {
        const server = this._server;
        if (!server?.listening) return;

        await new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    /**
     * Forcefully destroy every accepted socket still open
     */
    destroyAllSockets(): void {
        for (const socket of this._sockets) {
            socket.destroy();
        }
        this._sockets.clear();
    }

    private _attach(server: NetServer, callbacks: ListenerCallbacks): void {
        this._server = server;

        server.on("connection", (socket: Socket) => {
            this._sockets.add(socket);
            socket.once("close", () => {
                this._sockets.delete(socket);
            });
            callbacks.connection(socket);
        });
        server.on("error", (error: Error) => callbacks.error(error));
    }
}

function isNetServer(target: ListenTarget): target is NetServer {
    return "listen" in target && typeof target.listen === "function";
}
