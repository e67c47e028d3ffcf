/**
 * Structured logger over the OpenTelemetry logs API
 *
 * @module logger
 */

import type { AnyValueMap, LogRecord } from "@opentelemetry/api-logs";
import { SeverityNumber } from "@opentelemetry/api-logs";
import { getProvider } from "./provider.ts";

export interface LoggerOptions {
    defaultAttributes?: AnyValueMap;
}

export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
    emit(record: LogRecord): void;
}

/**
 * Create a named logger.
 *
 * The provider is looked up on every emit, so loggers created at module
 * load pick up a provider installed later with initProvider().
 *
 * @example
 * ```typescript
 * const logger = getLogger("albgate.guard", { defaultAttributes: { region: "eu-west-2" } });
 * logger.info("request denied", { reason: "expired_token" });
 * ```
 */
export function getLogger(name: string, options?: LoggerOptions): Logger {
    const defaultAttrs = options?.defaultAttributes;

    function buildAttributes(callAttributes?: AnyValueMap): AnyValueMap {
        const base: AnyValueMap = { "logger.name": name, ...defaultAttrs };
        return callAttributes ? { ...base, ...callAttributes } : base;
    }

    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        getProvider().logger.emit({
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
            getProvider().logger.emit(record);
        },
    };
}
