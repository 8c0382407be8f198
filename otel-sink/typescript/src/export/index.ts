/**
 * Metric export backends
 *
 * @module export
 */

export { FileMetricExporter, formatMetricsBlock } from './file-exporter.js';
export type { FileMetricExporterOptions } from './file-exporter.js';
export {
  createMetricExporter,
  createMetricReader,
  OTLP_EXPORT_INTERVAL_MS,
  OTLP_EXPORT_TIMEOUT_MS,
  FILE_EXPORT_INTERVAL_MS,
} from './reader.js';
