/**
 * @portico/otel
 *
 * OpenTelemetry logging and metrics for portico.
 *
 * @module @portico/otel
 */

// Logger
export { getLogger } from "./logger.ts";
export type { LogLevel, Logger, LoggerOptions } from "./logger.ts";

// Provider management
export { getMeter, getProvider, initProvider, shutdownProvider } from "./provider.ts";
export type { ProviderOptions } from "./provider.ts";

// Metrics
export { ATTR_REJECTION_REASON, createConnectionMetrics } from "./metrics.ts";
export type { ConnectionMetrics } from "./metrics.ts";

// Configuration
export { ExporterType, getCollectorOptions, getMetricExportInterval, getOTLPSettings, getServiceMetadata } from "./config.ts";
export type { CollectorOptions, OTLPSettings } from "./config.ts";
