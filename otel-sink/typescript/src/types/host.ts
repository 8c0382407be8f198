/**
 * Host framework contracts.
 *
 * The load-testing framework drives the sink through these shapes. They are
 * plain value records produced by the framework and consumed read-only here.
 *
 * @module types/host
 */

import type { Logger } from '../observability/index.js';

/**
 * Operation a cluster node is currently executing.
 */
export type OperationType =
  | 'None'
  | 'Init'
  | 'WarmUp'
  | 'Bombing'
  | 'Stop'
  | 'Complete'
  | 'Error';

/**
 * Role of the node inside a test cluster.
 */
export type NodeType = 'SingleNode' | 'Coordinator' | 'Agent';

/**
 * Identity of the running test session.
 */
export interface TestInfo {
  readonly sessionId: string;
  readonly testSuite: string;
  readonly testName: string;
  readonly clusterId: string;
}

/**
 * Information about the node the sink runs on.
 */
export interface NodeInfo {
  readonly currentOperation: OperationType;
  readonly nodeType: NodeType;
  readonly coresCount: number;
}

/**
 * Context handed to the sink at initialization.
 */
export interface SinkContext {
  /** Test identity; absent when the host has not started a session yet */
  readonly testInfo?: TestInfo;
  /** Host logger; a console logger is used when omitted */
  readonly logger?: Logger;
  /** Returns the current node info, or undefined outside a session */
  getNodeInfo(): NodeInfo | undefined;
}

export interface ScenarioStartInfo {
  readonly scenarioName: string;
  readonly sortIndex: number;
}

/**
 * Passed to the sink when a session starts.
 */
export interface SessionStartInfo {
  readonly scenarios: readonly ScenarioStartInfo[];
}

export interface RequestStats {
  readonly count: number;
  readonly rps: number;
}

/**
 * Latency percentiles in milliseconds.
 */
export interface LatencyStats {
  readonly percent50: number;
  readonly percent75: number;
  readonly percent95: number;
  readonly percent99: number;
}

/**
 * Outcome statistics for either the successful or the failed requests.
 */
export interface MeasurementStats {
  readonly request: RequestStats;
  readonly latency: LatencyStats;
}

export interface StepStats {
  readonly stepName: string;
  readonly ok: MeasurementStats;
  readonly fail: MeasurementStats;
}

export interface LoadSimulationStats {
  readonly simulationName: string;
  /** Current target of the load simulation (copies or rate) */
  readonly value: number;
}

/**
 * Statistics of one scenario. When `stepStats` is non-empty the figures are
 * reported per step rather than per scenario.
 */
export interface ScenarioStats {
  readonly scenarioName: string;
  readonly ok: MeasurementStats;
  readonly fail: MeasurementStats;
  readonly stepStats: readonly StepStats[];
  readonly loadSimulationStats: LoadSimulationStats;
}

/**
 * Final statistics of a node.
 */
export interface NodeStats {
  readonly scenarioStats: readonly ScenarioStats[];
}

export interface CounterStats {
  readonly scenarioName: string;
  readonly metricName: string;
  readonly unitOfMeasure: string;
  readonly value: number;
}

export interface GaugeStats {
  readonly scenarioName: string;
  readonly metricName: string;
  readonly unitOfMeasure: string;
  readonly value: number;
}

/**
 * User-defined metrics reported during a run.
 */
export interface MetricStats {
  readonly counters: readonly CounterStats[];
  readonly gauges: readonly GaugeStats[];
}

/**
 * Untyped infrastructure configuration tree, e.g. a parsed JSON config file.
 */
export type InfraConfig = Readonly<Record<string, unknown>>;

/**
 * Lifecycle contract the host framework calls, in order:
 * init, start, save* (repeated), saveFinalStats, stop.
 */
export interface ReportingSink {
  readonly sinkName: string;
  init(context: SinkContext, infraConfig?: InfraConfig): Promise<void>;
  start(sessionInfo: SessionStartInfo): Promise<void>;
  saveRealtimeStats(stats: readonly ScenarioStats[]): Promise<void>;
  saveRealtimeMetrics(metrics: MetricStats): Promise<void>;
  saveFinalStats(stats: NodeStats): Promise<void>;
  stop(): Promise<void>;
  dispose(): void;
}
