/**
 * Test fixtures for load-test statistics
 *
 * @module testing/fixtures
 */

import type {
  CounterStats,
  GaugeStats,
  MeasurementStats,
  NodeInfo,
  ScenarioStats,
  SinkContext,
  StepStats,
  TestInfo,
} from '../types/index.js';
import { InMemoryLogger } from '../observability/index.js';

/**
 * Create measurement stats; latency is given as [p50, p75, p95, p99]
 */
export function createMeasurementStats(
  count = 0,
  rps = 0,
  latency: readonly [number, number, number, number] = [0, 0, 0, 0]
): MeasurementStats {
  const [percent50, percent75, percent95, percent99] = latency;
  return {
    request: { count, rps },
    latency: { percent50, percent75, percent95, percent99 },
  };
}

export function createStepStatsFixture(overrides?: Partial<StepStats>): StepStats {
  return {
    stepName: 'test-step',
    ok: createMeasurementStats(),
    fail: createMeasurementStats(),
    ...overrides,
  };
}

export function createScenarioStatsFixture(overrides?: Partial<ScenarioStats>): ScenarioStats {
  return {
    scenarioName: 'test-scenario',
    ok: createMeasurementStats(),
    fail: createMeasurementStats(),
    stepStats: [],
    loadSimulationStats: { simulationName: 'keep_constant', value: 10 },
    ...overrides,
  };
}

export function createCounterStatsFixture(overrides?: Partial<CounterStats>): CounterStats {
  return {
    scenarioName: 'test-scenario',
    metricName: 'custom-counter',
    unitOfMeasure: 'items',
    value: 1,
    ...overrides,
  };
}

export function createGaugeStatsFixture(overrides?: Partial<GaugeStats>): GaugeStats {
  return {
    scenarioName: 'test-scenario',
    metricName: 'custom-gauge',
    unitOfMeasure: 'MB',
    value: 1,
    ...overrides,
  };
}

export function createTestInfoFixture(overrides?: Partial<TestInfo>): TestInfo {
  return {
    sessionId: 'session-1',
    testSuite: 'test-suite',
    testName: 'test-name',
    clusterId: 'cluster-1',
    ...overrides,
  };
}

export function createNodeInfoFixture(overrides?: Partial<NodeInfo>): NodeInfo {
  return {
    currentOperation: 'Bombing',
    nodeType: 'SingleNode',
    coresCount: 8,
    ...overrides,
  };
}

export interface TestContext {
  context: SinkContext;
  logger: InMemoryLogger;
}

/**
 * Create a sink context backed by an in-memory logger. Pass `null` to leave
 * node info or test info out.
 */
export function createTestContext(options?: {
  testInfo?: TestInfo | null;
  nodeInfo?: NodeInfo | null;
}): TestContext {
  const logger = new InMemoryLogger();
  const testInfo =
    options?.testInfo === null ? undefined : (options?.testInfo ?? createTestInfoFixture());
  const nodeInfo =
    options?.nodeInfo === null ? undefined : (options?.nodeInfo ?? createNodeInfoFixture());

  return {
    context: {
      testInfo,
      logger,
      getNodeInfo: () => nodeInfo,
    },
    logger,
  };
}
