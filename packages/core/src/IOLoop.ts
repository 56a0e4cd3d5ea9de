/**
 * Channel registry around Node's own event loop
 *
 * Node already multiplexes socket readiness; IOLoop only keeps the set of
 * live channels so the server can count and close them, and gives serve()
 * something to wait on.
 *
 * @module IOLoop
 */

import { errorAttributes, noopLogger } from "./logger.ts";
import type { ServerLogger } from "./logger.ts";
import type { Channel, EventLoop } from "./types.ts";

export interface IOLoopOptions {
    logger?: ServerLogger;
}

export class IOLoop implements EventLoop {
    private readonly _channels = new Set<Channel>();
    private readonly _logger: ServerLogger;
    private _closed = false;
    private _wake: (() => void) | null = null;

    constructor(options: IOLoopOptions = {}) {
        this._logger = options.logger ?? noopLogger;
    }

    get size(): number {
        return this._channels.size;
    }

    get closed(): boolean {
        return this._closed;
    }

    /**
     * Whether a loop() call is in progress
     */
    get running(): boolean {
        return this._wake !== null;
    }

    [Symbol.iterator](): Iterator<Channel> {
        return this._channels.values();
    }

    register(channel: Channel): void {
        if (this._closed) {
            throw new Error("Cannot register channel: loop is closed");
        }
        this._channels.add(channel);
    }

    unregister(channel: Channel): void {
        this._channels.delete(channel);
    }

    loop(timeout?: number, blocking = true): Promise<void> {
        if (this._closed) {
            return Promise.resolve();
        }
        if (this._wake) {
            return Promise.reject(new Error("Cannot run loop: loop is already running"));
        }

        return new Promise<void>((resolve) => {
            let timer: ReturnType<typeof globalThis.setTimeout> | undefined;

            this._wake = () => {
                if (timer !== undefined) {
                    globalThis.clearTimeout(timer);
                }
                this._wake = null;
                resolve();
            };

            if (!blocking) {
                const wake = this._wake;
                timer = globalThis.setTimeout(wake, Math.max(0, timeout ?? 0));
            }
        });
    }

    stop(): void {
        this._wake?.();
    }

    close(): void {
        if (this._closed) return;
        this._closed = true;

        // close() unregisters, so iterate over a snapshot
        for (const channel of [...this._channels]) {
            try {
                channel.close();
            } catch (error) {
                this._logger.error("Error while closing channel", errorAttributes(error));
            }
        }
        this._channels.clear();
        this.stop();
    }
}
