/**
 * Tests for MetricMapper.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricMapper } from '../index.js';
import { InstrumentNames } from '../../instruments/index.js';
import { buildBaseLabels, buildScenarioLabels } from '../../tags/index.js';
import type { LabelSet } from '../../tags/index.js';
import type { CustomTag } from '../../types/index.js';
import {
  RecordingInstruments,
  createCounterStatsFixture,
  createGaugeStatsFixture,
  createMeasurementStats,
  createScenarioStatsFixture,
  createStepStatsFixture,
} from '../../testing/index.js';

const customTags: CustomTag[] = [{ key: 'environment', value: 'staging' }];

const base: LabelSet = buildBaseLabels(
  {
    sessionId: 'session-1',
    currentOperation: 'Bombing',
    nodeType: 'SingleNode',
    testSuite: 'suite',
    testName: 'test',
    clusterId: 'cluster-1',
  },
  customTags
);

describe('MetricMapper', () => {
  let instruments: RecordingInstruments;
  let mapper: MetricMapper;

  beforeEach(() => {
    instruments = new RecordingInstruments();
    mapper = new MetricMapper(instruments, customTags);
  });

  describe('recordStats', () => {
    it('should record total, successful and failed request counts', () => {
      mapper.recordStats(
        buildScenarioLabels(base, 'checkout'),
        10,
        createMeasurementStats(100, 0),
        createMeasurementStats(5, 0)
      );

      expect(instruments.valuesOf(InstrumentNames.TOTAL_REQUESTS_COUNT)).toEqual([105]);
      expect(instruments.valuesOf(InstrumentNames.SUCCESSFUL_REQUESTS_COUNT)).toEqual([100]);
      expect(instruments.valuesOf(InstrumentNames.FAILED_REQUESTS_COUNT)).toEqual([5]);
    });

    it('should record total, successful and failed rps', () => {
      mapper.recordStats(
        buildScenarioLabels(base, 'checkout'),
        10,
        createMeasurementStats(0, 12.5),
        createMeasurementStats(0, 2.5)
      );

      expect(instruments.valuesOf(InstrumentNames.TOTAL_RPS)).toEqual([15]);
      expect(instruments.valuesOf(InstrumentNames.SUCCESSFUL_RPS)).toEqual([12.5]);
      expect(instruments.valuesOf(InstrumentNames.FAILED_RPS)).toEqual([2.5]);
    });

    it('should record the users count from the load simulation', () => {
      mapper.recordStats(
        buildScenarioLabels(base, 'checkout'),
        250,
        createMeasurementStats(),
        createMeasurementStats()
      );

      expect(instruments.valuesOf(InstrumentNames.USERS_COUNT)).toEqual([250]);
    });

    it('should record four latency observations per histogram, one per percentile', () => {
      mapper.recordStats(
        buildScenarioLabels(base, 'checkout'),
        10,
        createMeasurementStats(1, 1, [10, 20, 40, 80]),
        createMeasurementStats(1, 1, [300, 450, 900, 1200])
      );

      expect(instruments.valuesOf(InstrumentNames.SUCCESSFUL_REQUEST_LATENCY)).toEqual([
        10, 20, 40, 80,
      ]);
      expect(instruments.valuesOf(InstrumentNames.FAILED_REQUEST_LATENCY)).toEqual([
        300, 450, 900, 1200,
      ]);
    });

    it('should update the instruments in a fixed order', () => {
      mapper.recordStats(
        buildScenarioLabels(base, 'checkout'),
        10,
        createMeasurementStats(),
        createMeasurementStats()
      );

      expect(instruments.getMeasurements().map((m) => m.instrument)).toEqual([
        InstrumentNames.USERS_COUNT,
        InstrumentNames.TOTAL_RPS,
        InstrumentNames.SUCCESSFUL_RPS,
        InstrumentNames.FAILED_RPS,
        InstrumentNames.TOTAL_REQUESTS_COUNT,
        InstrumentNames.SUCCESSFUL_REQUESTS_COUNT,
        InstrumentNames.FAILED_REQUESTS_COUNT,
        InstrumentNames.SUCCESSFUL_REQUEST_LATENCY,
        InstrumentNames.SUCCESSFUL_REQUEST_LATENCY,
        InstrumentNames.SUCCESSFUL_REQUEST_LATENCY,
        InstrumentNames.SUCCESSFUL_REQUEST_LATENCY,
        InstrumentNames.FAILED_REQUEST_LATENCY,
        InstrumentNames.FAILED_REQUEST_LATENCY,
        InstrumentNames.FAILED_REQUEST_LATENCY,
        InstrumentNames.FAILED_REQUEST_LATENCY,
      ]);
    });
  });

  describe('mapScenarioOrStep', () => {
    it('should record once at scenario level when there are no steps', () => {
      const written = mapper.mapScenarioOrStep(
        base,
        createScenarioStatsFixture({ scenarioName: 'browse' })
      );

      const users = instruments.getMeasurementsFor(InstrumentNames.USERS_COUNT);
      expect(written).toBe(1);
      expect(users).toHaveLength(1);
      expect(users[0].attributes).toEqual({
        session_id: 'session-1',
        current_operation: 'bombing',
        node_type: 'SingleNode',
        test_suite: 'suite',
        test_name: 'test',
        cluster_id: 'cluster-1',
        environment: 'staging',
        scenario_name: 'browse',
      });
    });

    it('should record once per step and never at scenario level', () => {
      const scenario = createScenarioStatsFixture({
        scenarioName: 'checkout',
        ok: createMeasurementStats(1000),
        stepStats: [
          createStepStatsFixture({ stepName: 'login', ok: createMeasurementStats(10) }),
          createStepStatsFixture({ stepName: 'cart', ok: createMeasurementStats(20) }),
          createStepStatsFixture({ stepName: 'pay', ok: createMeasurementStats(30) }),
        ],
      });

      const written = mapper.mapScenarioOrStep(base, scenario);

      expect(written).toBe(3);
      expect(instruments.valuesOf(InstrumentNames.SUCCESSFUL_REQUESTS_COUNT)).toEqual([
        10, 20, 30,
      ]);
      const stepNames = instruments
        .getMeasurementsFor(InstrumentNames.USERS_COUNT)
        .map((m) => [m.attributes['scenario_name'], m.attributes['step_name']]);
      expect(stepNames).toEqual([
        ['checkout', 'login'],
        ['checkout', 'cart'],
        ['checkout', 'pay'],
      ]);
    });

    it('should use the scenario load simulation value for every step', () => {
      mapper.mapScenarioOrStep(
        base,
        createScenarioStatsFixture({
          loadSimulationStats: { simulationName: 'ramping_inject', value: 42 },
          stepStats: [createStepStatsFixture(), createStepStatsFixture({ stepName: 'other' })],
        })
      );

      expect(instruments.valuesOf(InstrumentNames.USERS_COUNT)).toEqual([42, 42]);
    });
  });

  describe('mapScenarioStats', () => {
    it('should map every scenario', () => {
      mapper.mapScenarioStats(base, [
        createScenarioStatsFixture({ scenarioName: 'a', ok: createMeasurementStats(1) }),
        createScenarioStatsFixture({ scenarioName: 'b', ok: createMeasurementStats(2) }),
      ]);

      expect(instruments.valuesOf(InstrumentNames.SUCCESSFUL_REQUESTS_COUNT)).toEqual([1, 2]);
    });

    it('should record nothing for an empty snapshot', () => {
      mapper.mapScenarioStats(base, []);

      expect(instruments.getMeasurements()).toEqual([]);
    });
  });

  describe('mapStart', () => {
    it('should record node count 1 and the CPU count with base labels', () => {
      mapper.mapStart(base, 16);

      expect(instruments.valuesOf(InstrumentNames.NODE_COUNT)).toEqual([1]);
      expect(instruments.valuesOf(InstrumentNames.CPU_COUNT)).toEqual([16]);
      const [cpu] = instruments.getMeasurementsFor(InstrumentNames.CPU_COUNT);
      expect(Object.keys(cpu.attributes)).toHaveLength(7);
      expect(cpu.attributes['scenario_name']).toBeUndefined();
    });
  });

  describe('realtime metrics', () => {
    it('should add a counter value to the total requests counter', () => {
      mapper.mapCounter(
        createCounterStatsFixture({
          scenarioName: 'checkout',
          metricName: 'items-processed',
          unitOfMeasure: 'items',
          value: 7,
        })
      );

      const [measurement] = instruments.getMeasurementsFor(InstrumentNames.TOTAL_REQUESTS_COUNT);
      expect(measurement.value).toBe(7);
      expect(measurement.attributes).toEqual({
        environment: 'staging',
        scenario_name: 'checkout',
        metric_name: 'items-processed',
        unit: 'items',
        value: 7,
      });
    });

    it('should record a gauge value on the users count gauge', () => {
      mapper.mapGauge(createGaugeStatsFixture({ metricName: 'memory', value: 512 }));

      const [measurement] = instruments.getMeasurementsFor(InstrumentNames.USERS_COUNT);
      expect(measurement.kind).toBe('gauge');
      expect(measurement.value).toBe(512);
      expect(measurement.attributes['metric_name']).toBe('memory');
    });

    it('should map counters before gauges', () => {
      mapper.mapRealtimeMetrics({
        gauges: [createGaugeStatsFixture({ value: 2 })],
        counters: [createCounterStatsFixture({ value: 1 }), createCounterStatsFixture({ value: 3 })],
      });

      expect(instruments.getMeasurements().map((m) => [m.instrument, m.value])).toEqual([
        [InstrumentNames.TOTAL_REQUESTS_COUNT, 1],
        [InstrumentNames.TOTAL_REQUESTS_COUNT, 3],
        [InstrumentNames.USERS_COUNT, 2],
      ]);
    });
  });
});
