/**
 * Sink configuration types.
 *
 * @module types/config
 */

/**
 * Supported exporter backends.
 */
export const EXPORTER_TYPES = ['Otlp', 'File'] as const;

export type ExporterType = (typeof EXPORTER_TYPES)[number];

/**
 * Named exporter types.
 */
export const ExporterTypes = {
  /** Push metrics over OTLP/HTTP */
  Otlp: 'Otlp',
  /** Append metrics to a text file */
  File: 'File',
} as const satisfies Record<ExporterType, ExporterType>;

/**
 * Type guard for exporter type strings.
 */
export function isExporterType(value: string): value is ExporterType {
  return EXPORTER_TYPES.some((type) => type === value);
}

/**
 * A key/value pair attached to every metric the sink emits.
 */
export interface CustomTag {
  readonly key: string;
  readonly value: string;
}

/**
 * Resolved sink configuration.
 */
export interface SinkConfig {
  /** Exporter backend */
  readonly exporterType: ExporterType;
  /** OTLP endpoint the metrics are pushed to */
  readonly otlpExportEndpoint: string;
  /** Destination file; required for the File exporter */
  readonly filePath?: string;
  /** Tags appended to every emitted label set, in order */
  readonly customTags: readonly CustomTag[];
}
