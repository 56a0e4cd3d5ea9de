/**
 * Pre-fork worker pool
 *
 * Each worker is a full, independent copy of the inline model: it re-runs
 * the entry script, binds through the cluster primary and serves with its
 * own loop and its own admission counters. Nothing is shared, so the
 * primary only spawns, supervises and forwards signals.
 *
 * @module ProcessPool
 */

import cluster from "node:cluster";
import type { Worker } from "node:cluster";
import { availableParallelism } from "node:os";
import { noopLogger } from "./logger.ts";
import type { ServerLogger } from "./logger.ts";

export interface WorkerProcess {
    readonly id: number;
    kill(signal?: string): void;
}

export type WorkerExitListener = (worker: WorkerProcess, code: number | null, signal: string | null) => void;

/**
 * The slice of node:cluster the pool depends on
 */
export interface ClusterAdapter {
    readonly isPrimary: boolean;
    readonly workerId: number | undefined;
    fork(): WorkerProcess;
    /** @returns a function removing the listener */
    onExit(listener: WorkerExitListener): () => void;
}

export function createClusterAdapter(): ClusterAdapter {
    return {
        get isPrimary() {
            return cluster.isPrimary;
        },
        get workerId() {
            return cluster.worker?.id;
        },
        fork() {
            return cluster.fork();
        },
        onExit(listener) {
            const onExit = (worker: Worker, code: number, signal: string) => listener(worker, code, signal);
            cluster.on("exit", onExit);
            return () => {
                cluster.removeListener("exit", onExit);
            };
        },
    };
}

export interface ProcessPoolOptions {
    cluster?: ClusterAdapter;
    /**
     * Abnormal worker exits tolerated over the pool's lifetime
     * @default 100
     */
    maxRestarts?: number;
    logger?: ServerLogger;
    platform?: NodeJS.Platform;
}

export class ProcessPool {
    private readonly _cluster: ClusterAdapter;
    private readonly _maxRestarts: number;
    private readonly _logger: ServerLogger;
    private readonly _platform: NodeJS.Platform;
    private readonly _workers = new Set<WorkerProcess>();
    private _stopping = false;
    private _running = false;

    constructor(options: ProcessPoolOptions = {}) {
        this._cluster = options.cluster ?? createClusterAdapter();
        this._maxRestarts = options.maxRestarts ?? 100;
        this._logger = options.logger ?? noopLogger;
        this._platform = options.platform ?? process.platform;
    }

    /**
     * Number of workers for a requested count: 0, negative or undefined
     * means one per available CPU.
     */
    static resolveWorkerCount(requested: number | undefined): number {
        if (requested === undefined || requested <= 0) {
            return availableParallelism();
        }
        return requested;
    }

    get supported(): boolean {
        return this._platform !== "win32";
    }

    get isWorker(): boolean {
        return !this._cluster.isPrimary;
    }

    get workerId(): number | undefined {
        return this._cluster.workerId;
    }

    /**
     * Live workers
     */
    get size(): number {
        return this._workers.size;
    }

    /**
     * Fork `count` workers and supervise them.
     *
     * Workers exiting with a signal or a non-zero status are replaced until
     * the restart budget is spent. Resolves once every worker has exited.
     *
     * @throws Error when called from a worker, or when too many workers died
     */
    run(count: number): Promise<void> {
        if (this.isWorker) {
            return Promise.reject(new Error("Cannot fork worker processes from a worker"));
        }
        if (this._running) {
            return Promise.reject(new Error("Worker pool is already running"));
        }
        if (!Number.isInteger(count) || count < 1) {
            return Promise.reject(new Error(`Invalid worker count: ${count}`));
        }
        this._running = true;
        this._stopping = false;

        return new Promise<void>((resolve, reject) => {
            let restarts = 0;

            const finish = (error?: Error) => {
                removeListener();
                this._running = false;
                this._workers.clear();
                if (error) reject(error);
                else resolve();
            };

            const removeListener = this._cluster.onExit((worker, code, signal) => {
                if (!this._workers.delete(worker)) return;

                const abnormal = signal !== null || (code ?? 0) !== 0;
                if (signal !== null) {
                    this._logger.warn(`worker ${worker.id} killed by signal ${signal}`);
                } else if (abnormal) {
                    this._logger.warn(`worker ${worker.id} exited with status ${code}`);
                } else {
                    this._logger.info(`worker ${worker.id} exited normally`);
                }

                if (abnormal && !this._stopping) {
                    restarts += 1;
                    if (restarts > this._maxRestarts) {
                        this.signal("SIGTERM");
                        finish(new Error(`Too many worker restarts (${restarts - 1}), giving up`));
                        return;
                    }
                    this._spawn();
                    return;
                }

                if (this._workers.size === 0) {
                    finish();
                }
            });

            this._logger.info(`starting ${count} worker processes`);
            for (let i = 0; i < count; i++) {
                this._spawn();
            }
        });
    }

    /**
     * Forward a signal to every live worker and stop replacing them
     */
    signal(signal: NodeJS.Signals): void {
        this._stopping = true;
        for (const worker of this._workers) {
            worker.kill(signal);
        }
    }

    private _spawn(): void {
        const worker = this._cluster.fork();
        this._workers.add(worker);
        this._logger.debug(`forked worker ${worker.id}`);
    }
}
