/**
 * Type definitions for the OpenTelemetry sink.
 *
 * @module types
 */

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
} from './host.js';

export { EXPORTER_TYPES, ExporterTypes, isExporterType } from './config.js';
export type { ExporterType, CustomTag, SinkConfig } from './config.js';
