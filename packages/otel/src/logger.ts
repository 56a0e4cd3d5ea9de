import type { AnyValueMap, LogRecord } from "@opentelemetry/api-logs";
import { SeverityNumber } from "@opentelemetry/api-logs";
import { getProvider } from "./provider.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
    defaultAttributes?: AnyValueMap;
    /** Records below this level are dropped. Defaults to "debug" (keep everything). */
    minLevel?: LogLevel;
}

export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
    emit(record: LogRecord): void;
}

const LEVEL_SEVERITY: Record<LogLevel, SeverityNumber> = {
    debug: SeverityNumber.DEBUG,
    info: SeverityNumber.INFO,
    warn: SeverityNumber.WARN,
    error: SeverityNumber.ERROR,
};

export function getLogger(name = "portico", options?: LoggerOptions): Logger {
    const otelLogger = getProvider().logger;
    const defaultAttrs = options?.defaultAttributes;
    const threshold = LEVEL_SEVERITY[options?.minLevel ?? "debug"];

    function buildAttributes(callAttributes?: AnyValueMap): AnyValueMap {
        const base: AnyValueMap = { "logger.name": name, ...defaultAttrs };
        return callAttributes ? { ...base, ...callAttributes } : base;
    }

    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        if (severityNumber < threshold) return;
        otelLogger.emit({
            severityNumber,
            severityText,
            body: message,
            attributes: buildAttributes(attributes),
        });
    }

    return {
        info(message, attributes?) {
            emitLog(SeverityNumber.INFO, "INFO", message, attributes);
        },
        warn(message, attributes?) {
            emitLog(SeverityNumber.WARN, "WARN", message, attributes);
        },
        error(message, attributes?) {
            emitLog(SeverityNumber.ERROR, "ERROR", message, attributes);
        },
        debug(message, attributes?) {
            emitLog(SeverityNumber.DEBUG, "DEBUG", message, attributes);
        },
        emit(record) {
            otelLogger.emit(record);
        },
    };
}
