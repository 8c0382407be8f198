/**
 * Environment variable configuration for the OpenTelemetry sink
 */

import { isExporterType } from '../types/index.js';
import type { CustomTag, SinkConfig } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Parse custom tags from an environment variable string
 *
 * Expected format: "key1:value1,key2:value2". Order is kept; pairs
 * without a colon or with an empty key are skipped.
 */
function parseCustomTags(tagsString: string): CustomTag[] {
  const tags: CustomTag[] = [];

  for (const pair of tagsString.split(',')) {
    const trimmedPair = pair.trim();
    if (!trimmedPair) {
      continue;
    }

    const colonIndex = trimmedPair.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const key = trimmedPair.substring(0, colonIndex).trim();
    const value = trimmedPair.substring(colonIndex + 1).trim();

    if (key) {
      tags.push({ key, value });
    }
  }

  return tags;
}

/**
 * Create a partial configuration from environment variables
 *
 * Reads:
 * - LOADTEST_OTEL_SINK_EXPORTER_TYPE - Exporter type (Otlp or File)
 * - OTEL_EXPORTER_OTLP_METRICS_ENDPOINT - OTLP metrics endpoint
 * - LOADTEST_OTEL_SINK_FILE_PATH - File exporter destination
 * - LOADTEST_OTEL_SINK_CUSTOM_TAGS - Custom tags as comma-separated key:value pairs
 *
 * The result is meant to be passed to the sink constructor.
 *
 * @throws ConfigurationError if the exporter type is not supported
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Partial<SinkConfig> {
  let config: Partial<SinkConfig> = {};

  const exporterType = env.LOADTEST_OTEL_SINK_EXPORTER_TYPE;
  if (exporterType) {
    if (!isExporterType(exporterType)) {
      throw ConfigurationError.unsupportedExporterType(exporterType);
    }
    config = { ...config, exporterType };
  }

  const endpoint = env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT;
  if (endpoint) {
    config = { ...config, otlpExportEndpoint: endpoint };
  }

  const filePath = env.LOADTEST_OTEL_SINK_FILE_PATH;
  if (filePath) {
    config = { ...config, filePath };
  }

  const customTags = env.LOADTEST_OTEL_SINK_CUSTOM_TAGS;
  if (customTags) {
    config = { ...config, customTags: parseCustomTags(customTags) };
  }

  return config;
}
