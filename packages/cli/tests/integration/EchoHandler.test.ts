/**
 * Integration tests for the reference echo handler
 *
 * A real portico server on 127.0.0.1 serves EchoHandler to loopback clients.
 */

import assert from "node:assert";
import { afterEach, describe, it } from "node:test";
import type { HandlerClass, Server } from "@portico/core";
import { createServer } from "@portico/core";
import { LineClient } from "../../../core/tests/helpers/line-client.ts";
import { EchoHandler, MAX_LINE_LENGTH, withBanner } from "../../src/handlers/EchoHandler.ts";

describe("EchoHandler", () => {
    let server: Server | undefined;
    let serving: Promise<void> | undefined;
    let clients: LineClient[] = [];

    async function start(handler: HandlerClass = EchoHandler, maxCons = 0): Promise<number> {
        server = await createServer({ address: { host: "127.0.0.1", port: 0 }, handler, maxCons });
        serving = server.serve({ handleInterrupt: false });
        const port = server.address?.port;
        assert.ok(port);
        return port;
    }

    async function connect(port: number): Promise<LineClient> {
        const client = await LineClient.connect(port);
        clients.push(client);
        return client;
    }

    afterEach(async () => {
        for (const client of clients) {
            client.destroy();
        }
        await server?.shutdown();
        await serving;
        server = undefined;
        serving = undefined;
        clients = [];
    });

    it("should greet with the default banner", async () => {
        const client = await connect(await start());

        assert.strictEqual(await client.next(), "220 portico ready.");
    });

    it("should greet with a custom banner", async () => {
        const client = await connect(await start(withBanner("edge ready.")));

        assert.strictEqual(await client.next(), "220 edge ready.");
    });

    it("should echo each line", async () => {
        const client = await connect(await start());
        await client.next();

        client.send("hello world");
        client.send("");

        assert.strictEqual(await client.next(), "200 hello world");
        assert.strictEqual(await client.next(), "200 ");
    });

    it("should join lines split across packets and accept bare LF", async () => {
        const client = await connect(await start());
        await client.next();

        client.socket.write("par");
        await new Promise((resolve) => setTimeout(resolve, 10));
        client.socket.write("tial\r\nbare\n");

        assert.strictEqual(await client.next(), "200 partial");
        assert.strictEqual(await client.next(), "200 bare");
    });

    it("should say goodbye on QUIT and close", async () => {
        const client = await connect(await start());
        await client.next();

        client.socket.write("quit\r\nnever echoed\r\n");

        assert.strictEqual(await client.next(), "221 Goodbye.");
        assert.strictEqual(await client.next(), null);
    });

    it("should drop clients sending overlong lines", async () => {
        const client = await connect(await start());
        await client.next();

        client.socket.write("x".repeat(MAX_LINE_LENGTH + 1));

        assert.strictEqual(await client.next(), "500 Line too long.");
        assert.strictEqual(await client.next(), null);
    });

    it("should answer over-capacity clients with 421 instead of the banner", async () => {
        const port = await start(EchoHandler, 1);
        const first = await connect(port);
        assert.strictEqual(await first.next(), "220 portico ready.");

        const second = await connect(port);

        assert.strictEqual(await second.next(), "421 Too many connections. Service temporarily unavailable.");
        assert.strictEqual(await second.next(), null);
    });
});
