/**
 * Default configuration values for the OpenTelemetry sink
 */

import { ExporterTypes } from '../types/index.js';
import type { SinkConfig } from '../types/index.js';

/**
 * Default OTLP endpoint, to be scraped through an OpenTelemetry collector
 */
export const DEFAULT_OTLP_ENDPOINT = 'http://localhost:9464/metrics';

/**
 * Name of the infrastructure config section the sink reads
 */
export const CONFIG_SECTION = 'LoadTest.Sinks.Otel';

/**
 * Default configuration values
 */
export const DEFAULT_SINK_CONFIG: SinkConfig = {
  exporterType: ExporterTypes.Otlp,
  otlpExportEndpoint: DEFAULT_OTLP_ENDPOINT,
  customTags: [],
};

/**
 * Apply default values to a partial configuration
 *
 * @param config - Partial configuration to apply defaults to
 * @returns Configuration with defaults applied
 */
export function applyDefaults(config: Partial<SinkConfig>): SinkConfig {
  return {
    exporterType: config.exporterType ?? DEFAULT_SINK_CONFIG.exporterType,
    otlpExportEndpoint: config.otlpExportEndpoint ?? DEFAULT_SINK_CONFIG.otlpExportEndpoint,
    filePath: config.filePath,
    customTags: config.customTags ?? DEFAULT_SINK_CONFIG.customTags,
  };
}
