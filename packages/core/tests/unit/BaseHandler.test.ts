/**
 * BaseHandler tests
 *
 * Handlers are built around the server side of a real loopback connection.
 */

import assert from "node:assert";
import type { Server as NetServer, Socket } from "node:net";
import { createServer as createNetServer } from "node:net";
import { afterEach, beforeEach, describe, it, mock } from "node:test";
import { BaseHandler } from "../../src/BaseHandler.ts";
import { IOLoop } from "../../src/IOLoop.ts";
import { noopLogger } from "../../src/logger.ts";
import type { ConnectionHandler, HandlerHost } from "../../src/types.ts";
import { LineClient, waitFor } from "../helpers/line-client.ts";

class TestHandler extends BaseHandler {
    closeHooks = 0;

    handle(): void {
        this.respond("220 hello");
    }

    protected override onClose(): void {
        this.closeHooks += 1;
    }
}

describe("BaseHandler", () => {
    let listener: NetServer;
    let port: number;
    let clients: LineClient[];
    let loop: IOLoop;
    let host: HandlerHost & { releaseConnection: ReturnType<typeof mock.fn<(handler: ConnectionHandler) => void>> };

    async function accept(): Promise<{ socket: Socket; client: LineClient }> {
        const accepted = new Promise<Socket>((resolve) => listener.once("connection", resolve));
        const client = await LineClient.connect(port);
        clients.push(client);
        return { socket: await accepted, client };
    }

    beforeEach(async () => {
        clients = [];
        loop = new IOLoop();
        host = { logger: noopLogger, secureContext: null, releaseConnection: mock.fn<(handler: ConnectionHandler) => void>() };
        listener = createNetServer();
        await new Promise<void>((resolve) => listener.listen(0, "127.0.0.1", () => resolve()));
        const address = listener.address();
        assert.ok(address && typeof address === "object");
        port = address.port;
    });

    afterEach(async () => {
        for (const client of clients) {
            client.destroy();
        }
        loop.close();
        await new Promise<void>((resolve) => listener.close(() => resolve()));
    });

    it("should register a connected handler with the loop", async () => {
        const { socket } = await accept();

        const handler = new TestHandler(socket, host, loop);

        assert.strictEqual(handler.connected, true);
        assert.strictEqual(handler.closed, false);
        assert.strictEqual(handler.remoteAddress, "127.0.0.1");
        assert.strictEqual(handler.transport.kind, "plain");
        assert.strictEqual(loop.size, 1);
    });

    it("should write CRLF-terminated replies", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        handler.handle();
        handler.respond("200 second");

        assert.strictEqual(await client.next(), "220 hello");
        assert.strictEqual(await client.next(), "200 second");
    });

    it("should not register when the socket is already gone", async () => {
        const { socket } = await accept();
        socket.destroy();

        const handler = new TestHandler(socket, host, loop);

        assert.strictEqual(handler.connected, false);
        assert.strictEqual(handler.closed, true);
        assert.strictEqual(loop.size, 0);
    });

    it("should reply and close on handleMaxCons", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        handler.handleMaxCons();

        assert.strictEqual(await client.next(), "421 Too many connections. Service temporarily unavailable.");
        assert.strictEqual(await client.next(), null);
        await waitFor(() => handler.closed);
        assert.strictEqual(loop.size, 0);
        assert.strictEqual(host.releaseConnection.mock.callCount(), 1);
    });

    it("should reply and close on handleMaxConsPerIp", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        handler.handleMaxConsPerIp();

        assert.strictEqual(await client.next(), "421 Too many connections from the same IP address.");
        await waitFor(() => handler.closed);
    });

    it("should use overridden rejection replies", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);
        handler.maxConsReply = "421 Busy.";

        handler.handleMaxCons();

        assert.strictEqual(await client.next(), "421 Busy.");
    });

    it("should close once the peer disconnects", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        client.destroy();

        await waitFor(() => handler.closed);
        assert.strictEqual(loop.size, 0);
        assert.strictEqual(handler.closeHooks, 1);
    });

    it("should close idempotently", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        handler.close();
        handler.close();
        await client.closed;

        assert.strictEqual(handler.closeHooks, 1);
        assert.strictEqual(host.releaseConnection.mock.callCount(), 1);
        assert.deepStrictEqual(host.releaseConnection.mock.calls[0]?.arguments, [handler]);
    });

    it("should close on handleError", async () => {
        const { socket, client } = await accept();
        const handler = new TestHandler(socket, host, loop);

        handler.handleError(new Error("protocol violation"));

        assert.strictEqual(handler.closed, true);
        assert.strictEqual(await client.next(), null);
    });
});
