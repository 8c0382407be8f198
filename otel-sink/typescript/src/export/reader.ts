/**
 * Exporter selection
 *
 * Builds the one metric reader a sink exports through. Export intervals are
 * fixed; they are not part of the sink configuration.
 *
 * @module export/reader
 */

import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import type { MetricReader, PushMetricExporter } from '@opentelemetry/sdk-metrics';
import { ExporterTypes } from '../types/index.js';
import type { SinkConfig } from '../types/index.js';
import type { Logger } from '../observability/index.js';
import { ConfigurationError } from '../errors/index.js';
import { FileMetricExporter } from './file-exporter.js';

/**
 * Export interval of the OTLP reader (60 seconds, the SDK default)
 */
export const OTLP_EXPORT_INTERVAL_MS = 60000;

/**
 * Export timeout of the OTLP reader (30 seconds)
 */
export const OTLP_EXPORT_TIMEOUT_MS = 30000;

/**
 * Export interval of the file reader (5 seconds)
 */
export const FILE_EXPORT_INTERVAL_MS = 5000;

/**
 * Create the push exporter for the configured backend.
 *
 * @throws ConfigurationError for a File exporter without a path
 */
export function createMetricExporter(config: SinkConfig, logger: Logger): PushMetricExporter {
  switch (config.exporterType) {
    case ExporterTypes.Otlp:
      return new OTLPMetricExporter({ url: config.otlpExportEndpoint });
    case ExporterTypes.File: {
      const filePath = config.filePath?.trim();
      if (!filePath) {
        throw ConfigurationError.missingFilePath();
      }
      return new FileMetricExporter({ filePath, logger });
    }
    default: {
      const unsupported: never = config.exporterType;
      throw ConfigurationError.unsupportedExporterType(String(unsupported));
    }
  }
}

/**
 * Create the periodic reader wrapping the configured exporter.
 */
export function createMetricReader(config: SinkConfig, logger: Logger): MetricReader {
  const exporter = createMetricExporter(config, logger);
  const isFile = config.exporterType === ExporterTypes.File;
  const interval = isFile ? FILE_EXPORT_INTERVAL_MS : OTLP_EXPORT_INTERVAL_MS;

  return new PeriodicExportingMetricReader({
    exporter,
    exportIntervalMillis: interval,
    exportTimeoutMillis: Math.min(interval, OTLP_EXPORT_TIMEOUT_MS),
  });
}
