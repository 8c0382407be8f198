/**
 * Label construction for emitted measurements.
 *
 * Every measurement carries an ordered label set: the six test-identity
 * labels, then the configured custom tags, then the scenario and step names
 * where the call site has them. Each call site builds exactly the set it
 * needs.
 *
 * @module tags
 */

import type { Attributes } from '@opentelemetry/api';
import type { CustomTag, NodeType, OperationType, SinkContext } from '../types/index.js';
import { MissingContextError } from '../errors/index.js';

/**
 * A single label of a measurement.
 */
export interface Label {
  readonly key: string;
  readonly value: string | number;
}

/**
 * Ordered labels attached to one measurement.
 */
export type LabelSet = readonly Label[];

/**
 * Label keys emitted by the sink.
 */
export const LabelKeys = {
  SessionId: 'session_id',
  CurrentOperation: 'current_operation',
  NodeType: 'node_type',
  TestSuite: 'test_suite',
  TestName: 'test_name',
  ClusterId: 'cluster_id',
  ScenarioName: 'scenario_name',
  StepName: 'step_name',
  MetricName: 'metric_name',
  Unit: 'unit',
  Value: 'value',
} as const;

/**
 * Number of test-identity labels leading every scenario/step label set.
 */
export const TEST_IDENTITY_LABEL_COUNT = 6;

/**
 * Keys a custom tag must not use.
 */
export const RESERVED_LABEL_KEYS: ReadonlySet<string> = new Set(Object.values(LabelKeys));

/**
 * Identity of the running test, captured from the host context.
 */
export interface TestIdentity {
  readonly sessionId: string;
  readonly currentOperation: OperationType;
  readonly nodeType: NodeType;
  readonly testSuite: string;
  readonly testName: string;
  readonly clusterId: string;
}

/**
 * Read the test identity out of the host context.
 *
 * @throws MissingContextError when node info or test info is unavailable
 */
export function resolveTestIdentity(context: SinkContext): TestIdentity {
  const nodeInfo = context.getNodeInfo();
  if (!nodeInfo) {
    throw MissingContextError.nodeInfo();
  }

  const testInfo = context.testInfo;
  if (!testInfo) {
    throw MissingContextError.testInfo();
  }

  return {
    sessionId: testInfo.sessionId,
    currentOperation: nodeInfo.currentOperation,
    nodeType: nodeInfo.nodeType,
    testSuite: testInfo.testSuite,
    testName: testInfo.testName,
    clusterId: testInfo.clusterId,
  };
}

function customTagLabels(customTags: readonly CustomTag[]): Label[] {
  return customTags.map((tag) => ({ key: tag.key, value: tag.value }));
}

/**
 * Test-identity labels followed by the custom tags. Used as is at test
 * start, where no scenario is running yet.
 */
export function buildBaseLabels(identity: TestIdentity, customTags: readonly CustomTag[]): LabelSet {
  return [
    { key: LabelKeys.SessionId, value: identity.sessionId },
    { key: LabelKeys.CurrentOperation, value: identity.currentOperation.toLowerCase() },
    { key: LabelKeys.NodeType, value: identity.nodeType },
    { key: LabelKeys.TestSuite, value: identity.testSuite },
    { key: LabelKeys.TestName, value: identity.testName },
    { key: LabelKeys.ClusterId, value: identity.clusterId },
    ...customTagLabels(customTags),
  ];
}

/**
 * Base labels plus the scenario name.
 */
export function buildScenarioLabels(base: LabelSet, scenarioName: string): LabelSet {
  return [...base, { key: LabelKeys.ScenarioName, value: scenarioName }];
}

/**
 * Base labels plus the scenario and step names.
 */
export function buildStepLabels(base: LabelSet, scenarioName: string, stepName: string): LabelSet {
  return [
    ...base,
    { key: LabelKeys.ScenarioName, value: scenarioName },
    { key: LabelKeys.StepName, value: stepName },
  ];
}

/**
 * Labels of a user-defined realtime metric. The numeric value is carried as
 * a label as well as being the measurement itself.
 */
export function buildMetricLabels(
  customTags: readonly CustomTag[],
  scenarioName: string,
  metricName: string,
  unit: string,
  value: number
): LabelSet {
  return [
    ...customTagLabels(customTags),
    { key: LabelKeys.ScenarioName, value: scenarioName },
    { key: LabelKeys.MetricName, value: metricName },
    { key: LabelKeys.Unit, value: unit },
    { key: LabelKeys.Value, value },
  ];
}

/**
 * Convert a label set into OpenTelemetry attributes. A later label with the
 * same key overwrites an earlier one.
 */
export function toAttributes(labels: LabelSet): Attributes {
  const attributes: Attributes = {};
  for (const label of labels) {
    attributes[label.key] = label.value;
  }
  return attributes;
}
