/**
 * OpenTelemetry Provider
 *
 * Manages OpenTelemetry providers for metrics and logs with explicit
 * lifecycle control.
 *
 * @module provider
 */

import type { Meter } from "@opentelemetry/api";
import { DiagConsoleLogger, DiagLogLevel, diag, metrics } from "@opentelemetry/api";
import type { Logger } from "@opentelemetry/api-logs";
import { logs } from "@opentelemetry/api-logs";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import type { Resource } from "@opentelemetry/resources";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { ConsoleLogRecordExporter, LoggerProvider, SimpleLogRecordProcessor } from "@opentelemetry/sdk-logs";
import { ConsoleMetricExporter, MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { CollectorOptions, OTLPSettings } from "./config.ts";
import { ExporterType, getCollectorOptions, getMetricExportInterval, getOTLPSettings, getServiceMetadata } from "./config.ts";

/**
 * Options for initializing the OpenTelemetry provider
 */
export interface ProviderOptions {
    /** Override service name (defaults to OTEL_SERVICE_NAME or npm_package_name) */
    serviceName?: string;
    /** Override service version (defaults to npm_package_version) */
    serviceVersion?: string;
    /** Override OTLP exporter settings (defaults to env-based config) */
    settings?: Partial<OTLPSettings>;
}

/**
 * OpenTelemetry Provider
 *
 * Supports console, OTLP/HTTP and no-op exporters for metrics and logs,
 * based on environment configuration or explicit options.
 */
class OtelProvider {
    readonly meter: Meter;
    readonly logger: Logger;

    private meterProvider?: MeterProvider;
    private loggerProvider?: LoggerProvider;

    private readonly settings: OTLPSettings;
    private readonly collectorOptions: CollectorOptions;
    private readonly serviceName: string;
    private readonly serviceVersion: string;

    constructor(options?: ProviderOptions) {
        // Set diagnostic logger to ERROR level
        diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

        // Load configuration from environment, apply overrides
        const envSettings = getOTLPSettings();
        this.settings = {
            metrics: options?.settings?.metrics ?? envSettings.metrics,
            logs: options?.settings?.logs ?? envSettings.logs,
        };

        this.collectorOptions = getCollectorOptions();

        const metadata = getServiceMetadata();
        this.serviceName = options?.serviceName ?? metadata.name;
        this.serviceVersion = options?.serviceVersion ?? metadata.version;

        this.meter = this.createMeter();
        this.logger = this.createLogger();
    }

    private resource(): Resource {
        return resourceFromAttributes({
            [ATTR_SERVICE_NAME]: this.serviceName,
            [ATTR_SERVICE_VERSION]: this.serviceVersion,
        });
    }

    private exporterOptions(path: string): { concurrencyLimit: number; url?: string } {
        const { concurrencyLimit, url } = this.collectorOptions;
        // Without an endpoint the exporter falls back to its own default
        return url ? { concurrencyLimit, url: `${url}${path}` } : { concurrencyLimit };
    }

    /**
     * Create and configure meter provider
     *
     * @returns Meter instance
     */
    private createMeter(): Meter {
        // If metrics are disabled, use no-op meter from global API
        if (this.settings.metrics === ExporterType.NONE) {
            return metrics.getMeter(this.serviceName, this.serviceVersion);
        }

        const metricExporter =
            this.settings.metrics === ExporterType.OTLP_HTTP
                ? new OTLPMetricExporter(this.exporterOptions("/v1/metrics"))
                : new ConsoleMetricExporter();

        this.meterProvider = new MeterProvider({
            resource: this.resource(),
            readers: [
                new PeriodicExportingMetricReader({
                    exporter: metricExporter,
                    exportIntervalMillis: getMetricExportInterval(),
                }),
            ],
        });

        // Set global meter provider
        metrics.setGlobalMeterProvider(this.meterProvider);

        return metrics.getMeter(this.serviceName, this.serviceVersion);
    }

    /**
     * Create and configure logger provider
     *
     * @returns Logger instance
     */
    private createLogger(): Logger {
        // If logging is disabled, use no-op logger from global API
        if (this.settings.logs === ExporterType.NONE) {
            return logs.getLogger(this.serviceName, this.serviceVersion);
        }

        const logExporter =
            this.settings.logs === ExporterType.OTLP_HTTP
                ? new OTLPLogExporter(this.exporterOptions("/v1/logs"))
                : new ConsoleLogRecordExporter();

        this.loggerProvider = new LoggerProvider({
            resource: this.resource(),
            processors: [new SimpleLogRecordProcessor(logExporter)],
        });

        // Set global logger provider
        logs.setGlobalLoggerProvider(this.loggerProvider);

        return this.loggerProvider.getLogger(this.serviceName, this.serviceVersion);
    }

    /**
     * Flush and shut down the metric and log providers
     */
    async shutdown(): Promise<void> {
        await this.meterProvider?.shutdown();
        await this.loggerProvider?.shutdown();
        metrics.disable();
        logs.disable();
    }
}

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let provider: OtelProvider | undefined;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Initialize the OpenTelemetry provider with explicit options.
 *
 * Must be called before any telemetry is emitted if custom configuration
 * is needed. Throws if already initialized -- call {@link shutdownProvider}
 * first to re-initialize.
 *
 * @param options - Optional provider configuration overrides
 * @throws Error if provider is already initialized
 */
export function initProvider(options?: ProviderOptions): void {
    if (provider !== undefined) {
        throw new Error("OTel provider already initialized. Call shutdownProvider() first.");
    }
    provider = new OtelProvider(options);
}

/**
 * Get the current OpenTelemetry provider.
 *
 * If not yet initialized, lazily creates a provider with default
 * (environment-based) options.
 */
export function getProvider(): OtelProvider {
    if (provider === undefined) {
        provider = new OtelProvider();
    }
    return provider;
}

/**
 * The provider's Meter, creating the provider on first use.
 */
export function getMeter(): Meter {
    return getProvider().meter;
}

/**
 * Gracefully shutdown the provider and release resources.
 *
 * After shutdown, subsequent calls to {@link getProvider} will create
 * a fresh provider. If no provider exists, this is a no-op.
 */
export async function shutdownProvider(): Promise<void> {
    if (provider === undefined) {
        return;
    }
    await provider.shutdown();
    provider = undefined;
}
