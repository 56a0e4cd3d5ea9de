/**
 * Admission control
 *
 * Decides whether a freshly accepted connection may proceed. The global
 * check is inclusive (`size <= maxCons`, counted after the accept) while the
 * per-address check is exclusive (`count > maxConsPerIp`); both boundaries
 * are part of the observable contract.
 *
 * @module AdmissionController
 */

import { ConfigError } from "./errors.ts";

export interface AdmissionLimits {
    /** 0 = unlimited */
    maxCons: number;
    /** 0 = unlimited */
    maxConsPerIp: number;
}

export class AdmissionController {
    readonly maxCons: number;
    readonly maxConsPerIp: number;

    /** address -> live connection count */
    private readonly _counts = new Map<string, number>();
    private _size = 0;

    constructor(limits: AdmissionLimits) {
        assertLimit("maxCons", limits.maxCons);
        assertLimit("maxConsPerIp", limits.maxConsPerIp);
        this.maxCons = limits.maxCons;
        this.maxConsPerIp = limits.maxConsPerIp;
    }

    /**
     * Total number of recorded connections
     */
    get size(): number {
        return this._size;
    }

    count(address: string): number {
        return this._counts.get(address) ?? 0;
    }

    record(address: string): void {
        this._counts.set(address, this.count(address) + 1);
        this._size += 1;
    }

    /**
     * Remove one occurrence of `address`.
     *
     * @returns false when the address was not recorded
     */
    release(address: string): boolean {
        const n = this._counts.get(address);
        if (n === undefined) return false;

        if (n <= 1) {
            this._counts.delete(address);
        } else {
            this._counts.set(address, n - 1);
        }
        this._size -= 1;
        return true;
    }

    shouldAcceptMore(registrySize: number): boolean {
        if (!this.maxCons) return true;
        return registrySize <= this.maxCons;
    }

    perAddressExceeded(address: string): boolean {
        if (!this.maxConsPerIp) return false;
        return this.count(address) > this.maxConsPerIp;
    }
}

function assertLimit(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
    }
}
