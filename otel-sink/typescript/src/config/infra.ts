/**
 * Binding of the sink configuration from an infrastructure config tree.
 *
 * Keys use the PascalCase names of the JSON config file:
 *
 * ```json
 * {
 *   "LoadTest.Sinks.Otel": {
 *     "ExporterType": "File",
 *     "FilePath": "./reports/metrics.txt",
 *     "CustomTags": [{ "Key": "environment", "Value": "staging" }]
 *   }
 * }
 * ```
 */

import { z } from 'zod';
import type { InfraConfig, SinkConfig } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { CONFIG_SECTION, DEFAULT_SINK_CONFIG, applyDefaults } from './defaults.js';
import { validateConfig } from './validation.js';

const infraSectionSchema = z.object({
  ExporterType: z.string().optional(),
  OtlpExportEndpoint: z.string().optional(),
  FilePath: z.string().optional(),
  CustomTags: z
    .array(
      z.object({
        Key: z.string(),
        Value: z.coerce.string(),
      })
    )
    .optional(),
});

const RECOGNIZED_KEYS = Object.keys(infraSectionSchema.shape);

/**
 * True when a partial configuration sets at least one field. An empty
 * partial, such as the one built from an environment without sink
 * variables, does not override the infrastructure config.
 */
function hasExplicitFields(config: Partial<SinkConfig>): boolean {
  return Object.values(config).some((value) => value !== undefined);
}

function isConfigTree(value: unknown): value is InfraConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the recognized keys of a config tree into an unvalidated
 * configuration candidate. Unrelated keys are ignored.
 */
export function bindInfraSection(section: InfraConfig): unknown {
  const result = infraSectionSchema.safeParse(section);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid sink configuration section: ${issues.join('; ')}`, {
      issues,
    });
  }

  const bound = result.data;
  return {
    exporterType: bound.ExporterType ?? DEFAULT_SINK_CONFIG.exporterType,
    otlpExportEndpoint: bound.OtlpExportEndpoint ?? DEFAULT_SINK_CONFIG.otlpExportEndpoint,
    filePath: bound.FilePath,
    customTags: (bound.CustomTags ?? []).map((tag) => ({ key: tag.Key, value: tag.Value })),
  };
}

/**
 * Resolve the configuration the sink runs with.
 *
 * An explicit configuration with any field set wins. Otherwise the
 * `LoadTest.Sinks.Otel` section of the infrastructure config is used, then
 * its root when the root carries any recognized key, then the defaults.
 *
 * @throws ConfigurationError if the resolved configuration is invalid
 */
export function resolveSinkConfig(
  explicit: Partial<SinkConfig> | undefined,
  infraConfig?: InfraConfig
): SinkConfig {
  if (explicit && hasExplicitFields(explicit)) {
    return validateConfig(applyDefaults(explicit));
  }

  const section = infraConfig?.[CONFIG_SECTION];
  if (isConfigTree(section)) {
    return validateConfig(bindInfraSection(section));
  }

  if (infraConfig && RECOGNIZED_KEYS.some((key) => key in infraConfig)) {
    return validateConfig(bindInfraSection(infraConfig));
  }

  return validateConfig(DEFAULT_SINK_CONFIG);
}
