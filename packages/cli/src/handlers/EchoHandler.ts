/**
 * Reference line handler
 *
 * Greets with `220 <banner>`, answers every line with `200 <line>` and
 * `QUIT` with `221 Goodbye.`. Enough protocol to exercise the server
 * front end end to end.
 *
 * @module handlers/EchoHandler
 */

import type { HandlerClass } from "@portico/core";
import { BaseHandler } from "@portico/core";

export const DEFAULT_BANNER = "portico ready.";

/** Longest line accepted before the connection is dropped */
export const MAX_LINE_LENGTH = 2048;

export class EchoHandler extends BaseHandler {
    banner = DEFAULT_BANNER;

    private _buffer = "";
    private _finished = false;

    handle(): void {
        this.socket.setEncoding("utf8");
        this.socket.on("data", (chunk: string) => this._onData(chunk));
        this.respond(`220 ${this.banner}`);
    }

    private _onData(chunk: string): void {
        if (this._finished) return;
        this._buffer += chunk;

        let newline = this._buffer.indexOf("\n");
        while (newline !== -1) {
            const line = this._buffer.slice(0, newline).replace(/\r$/, "");
            this._buffer = this._buffer.slice(newline + 1);
            if (!this._onLine(line)) return;
            newline = this._buffer.indexOf("\n");
        }

        if (this._buffer.length > MAX_LINE_LENGTH) {
            this._finish("500 Line too long.");
        }
    }

    /**
     * @returns false once the session is over
     */
    private _onLine(line: string): boolean {
        if (line.trim().toUpperCase() === "QUIT") {
            this._finish("221 Goodbye.");
            return false;
        }
        this.respond(`200 ${line}`);
        return true;
    }

    /**
     * Send the last reply and stop reading
     */
    private _finish(reply: string): void {
        this._finished = true;
        this._buffer = "";
        this.respond(reply);
        this.closeWhenDone();
    }
}

/**
 * EchoHandler subclass greeting with a custom banner
 */
export function withBanner(text: string): HandlerClass {
    return class extends EchoHandler {
        override banner = text;
    };
}
