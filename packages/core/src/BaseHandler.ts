/**
 * Base class for protocol handlers
 *
 * Takes care of the channel bookkeeping every handler needs: registering
 * with the loop, the connected flag, TLS wrapping, capacity rejection
 * replies and an idempotent close path that gives the admission slot back.
 * Subclasses implement handle().
 *
 * @module BaseHandler
 */

import type { Socket } from "node:net";
import { createTransport } from "./channels.ts";
import type { Transport } from "./channels.ts";
import { errorAttributes, withAttributes } from "./logger.ts";
import type { ServerLogger } from "./logger.ts";
import type { ConnectionHandler, EventLoop, HandlerHost } from "./types.ts";

export abstract class BaseHandler implements ConnectionHandler {
    /** Reply sent before closing when the server is full */
    maxConsReply = "421 Too many connections. Service temporarily unavailable.";

    /** Reply sent before closing when the client address is over its limit */
    maxConsPerIpReply = "421 Too many connections from the same IP address.";

    readonly server: HandlerHost;
    readonly loop: EventLoop;
    readonly transport: Transport;
    readonly remoteAddress: string | undefined;
    readonly remotePort: number | undefined;

    protected readonly logger: ServerLogger;

    private readonly _connected: boolean;
    private _closed = false;

    constructor(socket: Socket, server: HandlerHost, loop: EventLoop) {
        this.server = server;
        this.loop = loop;
        this.remoteAddress = socket.remoteAddress;
        this.remotePort = socket.remotePort;
        this.logger = withAttributes(server.logger, {
            "network.peer.address": this.remoteAddress,
            "network.peer.port": this.remotePort,
        });

        // A peer that reset before we got here has no remote address
        this._connected = !socket.destroyed && this.remoteAddress !== undefined;
        this.transport = createTransport(socket, this._connected ? server.secureContext : null);

        if (!this._connected) {
            this._closed = true;
            socket.destroy();
            return;
        }

        const stream = this.transport.socket;
        stream.on("error", (error) => this._onSocketError(error));
        stream.on("close", () => this.close());
        if (stream !== socket) {
            socket.on("error", (error) => this._onSocketError(error));
        }

        loop.register(this);
    }

    get connected(): boolean {
        return this._connected;
    }

    get closed(): boolean {
        return this._closed;
    }

    /**
     * The socket to read from and write to (the TLS socket when secure)
     */
    get socket(): Socket {
        return this.transport.socket;
    }

    abstract handle(): void | Promise<void>;

    handleError(error: unknown): void {
        this.logger.debug("Closing connection after error", errorAttributes(error));
        this.close();
    }

    handleMaxCons(): void {
        this.respond(this.maxConsReply);
        this.closeWhenDone();
    }

    handleMaxConsPerIp(): void {
        this.respond(this.maxConsPerIpReply);
        this.closeWhenDone();
    }

    /**
     * Write one CRLF-terminated reply line
     */
    respond(line: string): void {
        if (this._closed) return;
        this.socket.write(`${line}\r\n`);
    }

    /**
     * Flush pending output, then close
     */
    closeWhenDone(): void {
        if (this._closed) return;
        this.socket.end();
    }

    close(): void {
        if (this._closed) return;
        this._closed = true;

        this.loop.unregister(this);
        this.server.releaseConnection(this);
        this.socket.destroy();
        this.onClose();
    }

    /**
     * Called once after the channel is closed
     */
    protected onClose(): void {}

    private _onSocketError(error: Error): void {
        try {
            this.handleError(error);
        } catch (handlerError) {
            this.logger.error("Error in handleError()", errorAttributes(handlerError));
            this.close();
        }
    }
}
