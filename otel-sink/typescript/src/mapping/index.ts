/**
 * Mapping of load-test statistics onto the sink instruments.
 *
 * @module mapping
 */

import type {
  CounterStats,
  CustomTag,
  GaugeStats,
  MeasurementStats,
  MetricStats,
  ScenarioStats,
} from '../types/index.js';
import type { SinkInstruments } from '../instruments/index.js';
import {
  buildMetricLabels,
  buildScenarioLabels,
  buildStepLabels,
  toAttributes,
} from '../tags/index.js';
import type { LabelSet } from '../tags/index.js';

/**
 * Translates statistics records into instrument updates.
 */
export class MetricMapper {
  constructor(
    private readonly instruments: SinkInstruments,
    private readonly customTags: readonly CustomTag[]
  ) {}

  /**
   * Record the one-off node figures at test start.
   *
   * @param labels - Base labels, without scenario or step
   */
  mapStart(labels: LabelSet, coresCount: number): void {
    const attributes = toAttributes(labels);
    this.instruments.nodeCount.record(1, attributes);
    this.instruments.cpuCount.record(coresCount, attributes);
  }

  /**
   * Map user-defined counters, then gauges.
   */
  mapRealtimeMetrics(metrics: MetricStats): void {
    for (const counter of metrics.counters) {
      this.mapCounter(counter);
    }

    for (const gauge of metrics.gauges) {
      this.mapGauge(gauge);
    }
  }

  mapCounter(counter: CounterStats): void {
    const labels = buildMetricLabels(
      this.customTags,
      counter.scenarioName,
      counter.metricName,
      counter.unitOfMeasure,
      counter.value
    );
    this.instruments.totalRequestsCount.add(counter.value, toAttributes(labels));
  }

  mapGauge(gauge: GaugeStats): void {
    const labels = buildMetricLabels(
      this.customTags,
      gauge.scenarioName,
      gauge.metricName,
      gauge.unitOfMeasure,
      gauge.value
    );
    this.instruments.usersCount.record(gauge.value, toAttributes(labels));
  }

  /**
   * Map every scenario of a stats snapshot.
   *
   * @param base - Base labels of the running test
   */
  mapScenarioStats(base: LabelSet, stats: readonly ScenarioStats[]): void {
    for (const scenario of stats) {
      this.mapScenarioOrStep(base, scenario);
    }
  }

  /**
   * A scenario without step breakdowns is recorded once at scenario level;
   * otherwise each step is recorded on its own and the scenario totals are
   * skipped.
   *
   * @returns Number of records written
   */
  mapScenarioOrStep(base: LabelSet, scenario: ScenarioStats): number {
    const usersCount = scenario.loadSimulationStats.value;

    if (scenario.stepStats.length === 0) {
      const labels = buildScenarioLabels(base, scenario.scenarioName);
      this.recordStats(labels, usersCount, scenario.ok, scenario.fail);
      return 1;
    }

    for (const step of scenario.stepStats) {
      const labels = buildStepLabels(base, scenario.scenarioName, step.stepName);
      this.recordStats(labels, usersCount, step.ok, step.fail);
    }
    return scenario.stepStats.length;
  }

  /**
   * Record one ok/fail bundle.
   *
   * Each latency histogram gets four observations per call, one per
   * percentile (p50, p75, p95, p99), since raw latency samples are not
   * available. Dashboards depend on this shape.
   */
  recordStats(
    labels: LabelSet,
    usersCount: number,
    ok: MeasurementStats,
    fail: MeasurementStats
  ): void {
    const attributes = toAttributes(labels);
    const {
      usersCount: usersGauge,
      totalRps,
      successfulRps,
      failedRps,
      totalRequestsCount,
      successfulRequestsCount,
      failedRequestsCount,
      successfulLatency,
      failedLatency,
    } = this.instruments;

    usersGauge.record(usersCount, attributes);

    totalRps.record(ok.request.rps + fail.request.rps, attributes);
    successfulRps.record(ok.request.rps, attributes);
    failedRps.record(fail.request.rps, attributes);

    totalRequestsCount.add(ok.request.count + fail.request.count, attributes);
    successfulRequestsCount.add(ok.request.count, attributes);
    failedRequestsCount.add(fail.request.count, attributes);

    successfulLatency.record(ok.latency.percent50, attributes);
    successfulLatency.record(ok.latency.percent75, attributes);
    successfulLatency.record(ok.latency.percent95, attributes);
    successfulLatency.record(ok.latency.percent99, attributes);

    failedLatency.record(fail.latency.percent50, attributes);
    failedLatency.record(fail.latency.percent75, attributes);
    failedLatency.record(fail.latency.percent95, attributes);
    failedLatency.record(fail.latency.percent99, attributes);
  }
}
