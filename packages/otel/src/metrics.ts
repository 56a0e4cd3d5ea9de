/**
 * Connection metrics for OpenTelemetry
 *
 * Counters describing what the server front end does with accepted
 * connections.
 *
 * @module metrics
 */

import type { Counter, Meter, UpDownCounter } from "@opentelemetry/api";

export const ATTR_REJECTION_REASON = "portico.rejection.reason";

/**
 * Pre-configured connection metric instruments
 */
export interface ConnectionMetrics {
    /** Connections handed to the protocol handler */
    accepted: Counter;
    /** Connections turned away by admission control, by reason */
    rejected: Counter;
    /** Faults raised by protocol handlers */
    faults: Counter;
    /** Connections currently holding an admission slot */
    active: UpDownCounter;
}

/**
 * Creates connection metric instruments from the given meter
 *
 * - `portico.connections.accepted`
 * - `portico.connections.rejected` (attribute `portico.rejection.reason`: `max_cons` | `max_cons_per_ip`)
 * - `portico.connections.faults`
 * - `portico.connections.active`
 *
 * @param meter - OpenTelemetry Meter instance to create instruments from
 *
 * @example
 * ```typescript
 * import { createConnectionMetrics, getMeter } from '@portico/otel';
 *
 * const connectionMetrics = createConnectionMetrics(getMeter());
 *
 * server.on('rejected', (_handler, _address, reason) => {
 *   connectionMetrics.rejected.add(1, { 'portico.rejection.reason': reason });
 * });
 * ```
 */
export function createConnectionMetrics(meter: Meter): ConnectionMetrics {
    const accepted = meter.createCounter("portico.connections.accepted", {
        description: "Connections handed to the protocol handler",
        unit: "{connection}",
    });

    const rejected = meter.createCounter("portico.connections.rejected", {
        description: "Connections rejected by admission control",
        unit: "{connection}",
    });

    const faults = meter.createCounter("portico.connections.faults", {
        description: "Faults raised by protocol handlers",
        unit: "{fault}",
    });

    const active = meter.createUpDownCounter("portico.connections.active", {
        description: "Connections currently holding an admission slot",
        unit: "{connection}",
    });

    return { accepted, rejected, faults, active };
}
