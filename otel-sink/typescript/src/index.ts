/**
 * loadtest-otel-sink
 *
 * Reporting sink that forwards load-test statistics to OpenTelemetry:
 * - Ordered label sets built from test identity, custom tags and
 *   scenario/step names
 * - Scenario and step statistics mapped onto a fixed instrument set
 * - OTLP push or append-to-file export
 *
 * @example
 * ```typescript
 * import { OtelSink, configFromEnvironment } from 'loadtest-otel-sink';
 *
 * const sink = new OtelSink(configFromEnvironment());
 * await sink.init(context, infraConfig);
 * ```
 */

// =============================================================================
// Types
// =============================================================================
export type {
  OperationType,
  NodeType,
  TestInfo,
  NodeInfo,
  SinkContext,
  ScenarioStartInfo,
  SessionStartInfo,
  RequestStats,
  LatencyStats,
  MeasurementStats,
  StepStats,
  LoadSimulationStats,
  ScenarioStats,
  NodeStats,
  CounterStats,
  GaugeStats,
  MetricStats,
  InfraConfig,
  ReportingSink,
  ExporterType,
  CustomTag,
  SinkConfig,
} from './types/index.js';
export { EXPORTER_TYPES, ExporterTypes, isExporterType } from './types/index.js';

// =============================================================================
// Sink
// =============================================================================
export { OtelSink } from './sink/index.js';
export type { SinkState } from './sink/index.js';

// =============================================================================
// Configuration
// =============================================================================
export {
  DEFAULT_OTLP_ENDPOINT,
  CONFIG_SECTION,
  DEFAULT_SINK_CONFIG,
  applyDefaults,
  validateConfig,
  bindInfraSection,
  resolveSinkConfig,
  configFromEnvironment,
} from './config/index.js';

// =============================================================================
// Labels, instruments and mapping
// =============================================================================
export {
  LabelKeys,
  TEST_IDENTITY_LABEL_COUNT,
  RESERVED_LABEL_KEYS,
  resolveTestIdentity,
  buildBaseLabels,
  buildScenarioLabels,
  buildStepLabels,
  buildMetricLabels,
  toAttributes,
} from './tags/index.js';
export type { Label, LabelSet, TestIdentity } from './tags/index.js';

export { METER_NAME, InstrumentNames, createSinkInstruments } from './instruments/index.js';
export type { InstrumentName, SinkInstruments } from './instruments/index.js';

export { MetricMapper } from './mapping/index.js';

// =============================================================================
// Export
// =============================================================================
export {
  FileMetricExporter,
  formatMetricsBlock,
  createMetricExporter,
  createMetricReader,
  OTLP_EXPORT_INTERVAL_MS,
  OTLP_EXPORT_TIMEOUT_MS,
  FILE_EXPORT_INTERVAL_MS,
} from './export/index.js';
export type { FileMetricExporterOptions } from './export/index.js';

// =============================================================================
// Errors and logging
// =============================================================================
export {
  OtelSinkError,
  ConfigurationError,
  MissingContextError,
  ExportError,
  isOtelSinkError,
  isErrorCategory,
} from './errors/index.js';
export type { ErrorCategory } from './errors/index.js';

export { LogLevel, ConsoleLogger, NoopLogger, InMemoryLogger } from './observability/index.js';
export type { Logger, LogEntry, ConsoleLoggerOptions } from './observability/index.js';
