/**
 * OpenTelemetry configuration module
 *
 * Provides environment-based configuration for the OTLP log exporter.
 *
 * @module config
 */

import env from "env-var";

/**
 * Available exporter types
 *
 * - CONSOLE: Outputs log records to stdout
 * - OTLP_HTTP: Sends log records via OTLP/HTTP protocol
 * - OTLP_GRPC: Sends log records via OTLP/gRPC protocol
 * - NONE: Disables log export
 */
export const ExporterType = {
    CONSOLE: "console",
    OTLP_HTTP: "otlp/http",
    OTLP_GRPC: "otlp/grpc",
    NONE: "none",
} as const;

export type ExporterType = (typeof ExporterType)[keyof typeof ExporterType];

const EXPORTER_TYPES: ExporterType[] = Object.values(ExporterType);

/**
 * Collector endpoint options
 */
export interface CollectorOptions {
    concurrencyLimit: number;
    url: string | undefined;
}

/**
 * Gets the log exporter type from the environment
 *
 * Environment variables:
 * - OTEL_LOGS_EXPORTER: Logs exporter type (console|otlp/http|otlp/grpc|none)
 *
 * Unset means console.
 */
export function getLogsExporter(): ExporterType {
    return env.get("OTEL_LOGS_EXPORTER").asEnum(EXPORTER_TYPES) ?? ExporterType.CONSOLE;
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
 * Gets service metadata from environment variables
 *
 * Uses OTEL_SERVICE_NAME as primary source, falls back to npm_package_name.
 */
export function getServiceMetadata(): { name: string; version: string } {
    return {
        name: process.env.OTEL_SERVICE_NAME || process.env.npm_package_name || "albgate",
        version: process.env.npm_package_version || "0.0.0",
    };
}
