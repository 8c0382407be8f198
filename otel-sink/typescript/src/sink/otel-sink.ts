/**
 * OpenTelemetry reporting sink.
 *
 * @module sink/otel-sink
 */

import { MeterProvider } from '@opentelemetry/sdk-metrics';
import type {
  CustomTag,
  InfraConfig,
  MetricStats,
  NodeStats,
  ReportingSink,
  ScenarioStats,
  SessionStartInfo,
  SinkConfig,
  SinkContext,
} from '../types/index.js';
import { resolveSinkConfig, DEFAULT_SINK_CONFIG } from '../config/index.js';
import { ConfigurationError, MissingContextError, toError } from '../errors/index.js';
import { createMetricReader } from '../export/index.js';
import { METER_NAME, createSinkInstruments } from '../instruments/index.js';
import { MetricMapper } from '../mapping/index.js';
import { ConsoleLogger, NoopLogger } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import { buildBaseLabels, resolveTestIdentity } from '../tags/index.js';
import type { LabelSet } from '../tags/index.js';

/**
 * Lifecycle state of a sink.
 */
export type SinkState = 'uninitialized' | 'configured' | 'running' | 'stopping' | 'stopped';

interface ActiveSink {
  readonly context: SinkContext;
  readonly meterProvider: MeterProvider;
  readonly mapper: MetricMapper;
}

/**
 * Sink exporting load-test statistics as OpenTelemetry metrics, either
 * pushed over OTLP or appended to a file.
 *
 * @example
 * ```typescript
 * const sink = new OtelSink({
 *   exporterType: 'File',
 *   filePath: './reports/metrics.txt',
 *   customTags: [{ key: 'environment', value: 'staging' }],
 * });
 *
 * await sink.init(context);
 * await sink.start(sessionInfo);
 * await sink.saveRealtimeStats(scenarioStats);
 * await sink.saveFinalStats(nodeStats);
 * await sink.stop();
 * ```
 */
export class OtelSink implements ReportingSink {
  readonly sinkName = METER_NAME;

  private readonly explicitConfig?: Partial<SinkConfig>;
  private config: SinkConfig = DEFAULT_SINK_CONFIG;
  private logger: Logger = new NoopLogger();
  private active?: ActiveSink;
  private state: SinkState = 'uninitialized';

  /**
   * @param config - Programmatic configuration. When omitted, `init` reads
   *   it from the infrastructure config.
   */
  constructor(config?: Partial<SinkConfig>) {
    this.explicitConfig = config;
  }

  /**
   * Custom tags attached to every emitted metric.
   */
  get customTags(): readonly CustomTag[] {
    return this.config.customTags;
  }

  get currentState(): SinkState {
    return this.state;
  }

  /**
   * Resolve the configuration and build the exporter pipeline. Allowed
   * before the first `init` and after `stop`.
   *
   * @throws ConfigurationError when the sink is already initialized or the
   *   configuration is invalid
   */
  async init(context: SinkContext, infraConfig?: InfraConfig): Promise<void> {
    if (this.state !== 'uninitialized' && this.state !== 'stopped') {
      throw ConfigurationError.alreadyInitialized(this.state);
    }

    this.logger = (context.logger ?? new ConsoleLogger()).child({ sink: this.sinkName });

    const config = resolveSinkConfig(this.explicitConfig, infraConfig);
    this.logger.info('Initializing sink', { config });

    const reader = createMetricReader(config, this.logger);
    const meterProvider = new MeterProvider({ readers: [reader] });
    const instruments = createSinkInstruments(meterProvider.getMeter(METER_NAME));

    this.config = config;
    this.active = {
      context,
      meterProvider,
      mapper: new MetricMapper(instruments, config.customTags),
    };
    this.state = 'configured';

    this.logger.info('Configured sink successfully', { exporterType: config.exporterType });
  }

  async start(_sessionInfo: SessionStartInfo): Promise<void> {
    const active = this.require('start');
    if (!active) return;

    const nodeInfo = active.context.getNodeInfo();
    if (!nodeInfo) {
      throw MissingContextError.nodeInfo();
    }

    active.mapper.mapStart(this.baseLabels(active), nodeInfo.coresCount);
  }

  async saveRealtimeStats(stats: readonly ScenarioStats[]): Promise<void> {
    this.saveScenarioStats('saveRealtimeStats', stats);
  }

  async saveFinalStats(stats: NodeStats): Promise<void> {
    this.saveScenarioStats('saveFinalStats', stats.scenarioStats);
  }

  async saveRealtimeMetrics(metrics: MetricStats): Promise<void> {
    const active = this.require('saveRealtimeMetrics');
    if (!active) return;

    active.mapper.mapRealtimeMetrics(metrics);
  }

  /**
   * Flush pending measurements, then shut the exporter down. Calling it
   * again, or before `init`, does nothing.
   */
  async stop(): Promise<void> {
    const active = this.active;
    if (!active) return;
    this.active = undefined;
    this.state = 'stopping';

    await active.meterProvider.forceFlush();
    await active.meterProvider.shutdown();
    this.state = 'stopped';

    this.logger.info('Stopped sink');
  }

  /**
   * Release the exporter without waiting for a flush. Safe to call
   * repeatedly.
   */
  dispose(): void {
    const active = this.active;
    if (!active) return;
    this.active = undefined;
    this.state = 'stopped';

    active.meterProvider.shutdown().catch((error: unknown) => {
      this.logger.error('Failed to shut down meter provider', {
        error: toError(error).message,
      });
    });
  }

  private saveScenarioStats(hook: string, stats: readonly ScenarioStats[]): void {
    const active = this.require(hook);
    if (!active) return;

    active.mapper.mapScenarioStats(this.baseLabels(active), stats);
  }

  private baseLabels(active: ActiveSink): LabelSet {
    return buildBaseLabels(resolveTestIdentity(active.context), this.config.customTags);
  }

  /**
   * Returns the active sink for an emitting hook, or undefined once the sink
   * is stopping or stopped.
   *
   * @throws MissingContextError when called before init
   */
  private require(hook: string): ActiveSink | undefined {
    if (this.state === 'stopping' || this.state === 'stopped') {
      this.logger.debug('Ignoring call after stop', { hook });
      return undefined;
    }

    const active = this.active;
    if (!active) {
      throw MissingContextError.notInitialized(hook);
    }

    this.state = 'running';
    return active;
  }
}
