/**
 * Instrument set the sink records into.
 *
 * Instrument names are stable identifiers that dashboards query; they do
 * not change between versions.
 *
 * @module instruments
 */

import type { Counter, Gauge, Histogram, Meter } from '@opentelemetry/api';

/**
 * Name of the meter all instruments belong to. Doubles as the sink name.
 */
export const METER_NAME = 'loadtest.sinks.otel';

/**
 * Instrument names
 */
export const InstrumentNames = {
  USERS_COUNT: 'loadtest.users.count',
  CPU_COUNT: 'loadtest.node.cpu.count',
  NODE_COUNT: 'loadtest.node.count',
  TOTAL_REQUESTS_COUNT: 'loadtest.requests.total',
  SUCCESSFUL_REQUESTS_COUNT: 'loadtest.requests.success',
  FAILED_REQUESTS_COUNT: 'loadtest.requests.fail',
  TOTAL_RPS: 'loadtest.rps.total',
  SUCCESSFUL_RPS: 'loadtest.rps.success',
  FAILED_RPS: 'loadtest.rps.fail',
  SUCCESSFUL_REQUEST_LATENCY: 'loadtest.latency.success',
  FAILED_REQUEST_LATENCY: 'loadtest.latency.fail',
} as const;

export type InstrumentName = (typeof InstrumentNames)[keyof typeof InstrumentNames];

/**
 * The fixed instruments the mapper writes to.
 */
export interface SinkInstruments {
  readonly usersCount: Gauge;
  readonly cpuCount: Gauge;
  readonly nodeCount: Gauge;
  readonly totalRequestsCount: Counter;
  readonly successfulRequestsCount: Counter;
  readonly failedRequestsCount: Counter;
  readonly totalRps: Gauge;
  readonly successfulRps: Gauge;
  readonly failedRps: Gauge;
  readonly successfulLatency: Histogram;
  readonly failedLatency: Histogram;
}

/**
 * Create the instrument set on the given meter.
 */
export function createSinkInstruments(meter: Meter): SinkInstruments {
  return {
    usersCount: meter.createGauge(InstrumentNames.USERS_COUNT, {
      description: 'Current target of the load simulation',
      unit: '{user}',
    }),
    cpuCount: meter.createGauge(InstrumentNames.CPU_COUNT, {
      description: 'Number of CPU cores on the node',
      unit: '{cpu}',
    }),
    nodeCount: meter.createGauge(InstrumentNames.NODE_COUNT, {
      description: 'Number of nodes taking part in the test',
      unit: '{node}',
    }),
    totalRequestsCount: meter.createCounter(InstrumentNames.TOTAL_REQUESTS_COUNT, {
      description: 'Total number of requests',
      unit: '{request}',
    }),
    successfulRequestsCount: meter.createCounter(InstrumentNames.SUCCESSFUL_REQUESTS_COUNT, {
      description: 'Number of successful requests',
      unit: '{request}',
    }),
    failedRequestsCount: meter.createCounter(InstrumentNames.FAILED_REQUESTS_COUNT, {
      description: 'Number of failed requests',
      unit: '{request}',
    }),
    totalRps: meter.createGauge(InstrumentNames.TOTAL_RPS, {
      description: 'Total requests per second',
      unit: '{request}/s',
    }),
    successfulRps: meter.createGauge(InstrumentNames.SUCCESSFUL_RPS, {
      description: 'Successful requests per second',
      unit: '{request}/s',
    }),
    failedRps: meter.createGauge(InstrumentNames.FAILED_RPS, {
      description: 'Failed requests per second',
      unit: '{request}/s',
    }),
    successfulLatency: meter.createHistogram(InstrumentNames.SUCCESSFUL_REQUEST_LATENCY, {
      description: 'Latency percentiles of successful requests',
      unit: 'ms',
    }),
    failedLatency: meter.createHistogram(InstrumentNames.FAILED_REQUEST_LATENCY, {
      description: 'Latency percentiles of failed requests',
      unit: 'ms',
    }),
  };
}
