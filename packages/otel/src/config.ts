/**
 * OpenTelemetry configuration module
 *
 * Provides environment-based configuration for OTLP exporters.
 *
 * @module config
 */

import env from "env-var";

/**
 * Available exporter types
 *
 * - CONSOLE: Outputs telemetry to stdout
 * - OTLP_HTTP: Sends telemetry via OTLP/HTTP protocol
 * - NONE: Disables telemetry export
 */
export const ExporterType = {
    CONSOLE: "console",
    OTLP_HTTP: "otlp/http",
    NONE: "none",
} as const;

export type ExporterType = (typeof ExporterType)[keyof typeof ExporterType];

const EXPORTER_TYPES = [ExporterType.CONSOLE, ExporterType.OTLP_HTTP, ExporterType.NONE] as const;

/**
 * OTLP settings for metrics and logs
 */
export interface OTLPSettings {
    metrics: ExporterType;
    logs: ExporterType;
}

/**
 * Collector endpoint options
 */
export interface CollectorOptions {
    concurrencyLimit: number;
    url: string | undefined;
}

/**
 * Gets OTLP exporter settings from environment variables
 *
 * Environment variables:
 * - OTEL_METRICS_EXPORTER: Metric exporter type (console|otlp/http|none), console by default
 * - OTEL_LOGS_EXPORTER: Logs exporter type (console|otlp/http|none), console by default
 *
 * @returns OTLP settings object
 */
export function getOTLPSettings(): OTLPSettings {
    return {
        metrics: env.get("OTEL_METRICS_EXPORTER").default(ExporterType.CONSOLE).asEnum(EXPORTER_TYPES),
        logs: env.get("OTEL_LOGS_EXPORTER").default(ExporterType.CONSOLE).asEnum(EXPORTER_TYPES),
    };
}

/**
 * Gets collector endpoint options from environment variables
 *
 * Environment variables:
 * - OTEL_EXPORTER_OTLP_ENDPOINT: Collector endpoint URL
 *
 * @returns Collector options object
 */
export function getCollectorOptions(): CollectorOptions {
    const replaceRule = /\/$/;
    return {
        concurrencyLimit: 10,
        url: env.get("OTEL_EXPORTER_OTLP_ENDPOINT").asString()?.replace(replaceRule, ""),
    };
}

/**
 * Gets metric export interval from environment variables
 *
 * Environment variables:
 * - OTEL_METRIC_EXPORT_INTERVAL: Interval between metric exports in ms (default: 10000)
 */
export function getMetricExportInterval(): number {
    return env.get("OTEL_METRIC_EXPORT_INTERVAL").default("10000").asIntPositive();
}

/**
 * Gets service metadata from environment variables
 *
 * Uses OTEL_SERVICE_NAME as primary source, falls back to npm_package_name.
 *
 * @returns Service name and version
 */
export function getServiceMetadata(): { name: string; version: string } {
    return {
        name: process.env.OTEL_SERVICE_NAME || process.env.npm_package_name || "portico",
        version: process.env.npm_package_version || "0.0.0",
    };
}
