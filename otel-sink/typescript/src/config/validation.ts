/**
 * Configuration validation for the OpenTelemetry sink
 */

import { z } from 'zod';
import { EXPORTER_TYPES, ExporterTypes } from '../types/index.js';
import type { CustomTag, SinkConfig } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { RESERVED_LABEL_KEYS } from '../tags/index.js';

/**
 * Zod schema for a resolved configuration.
 */
const sinkConfigSchema = z.object({
  exporterType: z.enum(EXPORTER_TYPES),
  otlpExportEndpoint: z.string().url(),
  filePath: z.string().optional(),
  customTags: z.array(
    z.object({
      key: z.string().min(1),
      value: z.string(),
    })
  ),
});

/**
 * Custom tags may neither reuse a label the sink emits itself nor repeat
 * a key, otherwise the emitted label set carries duplicate keys.
 */
function validateCustomTags(customTags: readonly CustomTag[]): void {
  const seen = new Set<string>();
  for (const tag of customTags) {
    if (RESERVED_LABEL_KEYS.has(tag.key)) {
      throw ConfigurationError.reservedTagKey(tag.key);
    }
    if (seen.has(tag.key)) {
      throw ConfigurationError.duplicateTagKey(tag.key);
    }
    seen.add(tag.key);
  }
}

/**
 * Validate a sink configuration
 *
 * Accepts untyped input so that values bound from an infrastructure
 * config tree go through the same checks as programmatic ones.
 *
 * @param input - Candidate configuration
 * @returns The validated configuration
 * @throws ConfigurationError if validation fails
 */
export function validateConfig(input: unknown): SinkConfig {
  const result = sinkConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid sink configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  const config = result.data;

  if (config.exporterType === ExporterTypes.File && !config.filePath?.trim()) {
    throw ConfigurationError.missingFilePath();
  }

  validateCustomTags(config.customTags);

  return config;
}
