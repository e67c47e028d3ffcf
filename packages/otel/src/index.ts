/**
 * @albgate/otel
 *
 * OpenTelemetry logging for albgate.
 *
 * @module @albgate/otel
 */

// Logger
export { getLogger } from "./logger.ts";
export type { Logger, LoggerOptions } from "./logger.ts";

// Provider management
export { getProvider, initProvider, shutdownProvider } from "./provider.ts";
export type { ProviderOptions } from "./provider.ts";

// Config
export { ExporterType, getCollectorOptions, getLogsExporter, getServiceMetadata } from "./config.ts";
export type { CollectorOptions } from "./config.ts";
