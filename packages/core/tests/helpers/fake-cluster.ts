/**
 * In-process stand-in for node:cluster so tests never fork.
 */

import assert from "node:assert";
import type { ClusterAdapter, WorkerExitListener, WorkerProcess } from "../../src/ProcessPool.ts";

export class FakeWorker implements WorkerProcess {
    readonly signals: string[] = [];

    constructor(
        readonly id: number,
        private readonly _onKill: (worker: FakeWorker, signal: string) => void,
    ) {}

    kill(signal = "SIGTERM"): void {
        this.signals.push(signal);
        this._onKill(this, signal);
    }
}

export class FakeCluster implements ClusterAdapter {
    isPrimary = true;
    workerId: number | undefined = undefined;
    /** Report an exit by that signal as soon as a worker is killed */
    exitOnKill = false;
    readonly forked: FakeWorker[] = [];
    /** Invoked on every fork() */
    onFork: (worker: FakeWorker) => void = () => {};
    private readonly _listeners = new Set<WorkerExitListener>();

    fork(): FakeWorker {
        const worker = new FakeWorker(this.forked.length + 1, (killed, signal) => {
            if (this.exitOnKill) {
                this.exit(killed.id, null, signal);
            }
        });
        this.forked.push(worker);
        this.onFork(worker);
        return worker;
    }

    onExit(listener: WorkerExitListener): () => void {
        this._listeners.add(listener);
        return () => {
            this._listeners.delete(listener);
        };
    }

    get listenerCount(): number {
        return this._listeners.size;
    }

    exit(id: number, code: number | null, signal: string | null = null): void {
        const worker = this.forked[id - 1];
        assert.ok(worker, `no worker ${id}`);
        for (const listener of [...this._listeners]) {
            listener(worker, code, signal);
        }
    }
}
