/**
 * File exporter
 *
 * Appends a human-readable text block per export cycle. Meant for
 * inspection and debugging, not for re-ingestion.
 *
 * @module export/file-exporter
 */

import { appendFileSync } from 'fs';
import type { Attributes } from '@opentelemetry/api';
import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import { DataPointType } from '@opentelemetry/sdk-metrics';
import type { MetricData, PushMetricExporter, ResourceMetrics } from '@opentelemetry/sdk-metrics';
import type { Logger } from '../observability/index.js';
import { ExportError, toError } from '../errors/index.js';

function formatTags(attributes: Attributes): string {
  return Object.entries(attributes)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(', ');
}

function formatDataPointValues(metric: MetricData): string[] {
  switch (metric.dataPointType) {
    case DataPointType.SUM:
      return metric.dataPoints.map(
        (point) => `Sum: ${point.value} | Tags: ${formatTags(point.attributes)}`
      );
    case DataPointType.GAUGE:
      return metric.dataPoints.map(
        (point) => `Gauge: ${point.value} | Tags: ${formatTags(point.attributes)}`
      );
    case DataPointType.HISTOGRAM:
      return metric.dataPoints.map(
        (point) =>
          `Histogram - Count: ${point.value.count}, Sum: ${point.value.sum ?? 0} | Tags: ${formatTags(point.attributes)}`
      );
    case DataPointType.EXPONENTIAL_HISTOGRAM:
      return metric.dataPoints.map(
        (point) =>
          `ExponentialHistogram - Count: ${point.value.count}, Sum: ${point.value.sum ?? 0} | Tags: ${formatTags(point.attributes)}`
      );
  }
}

/**
 * Render one export cycle.
 *
 * ```text
 * [2024-05-01T10:00:00.000Z] Metrics Export:
 *   Metric: loadtest.requests.total (Total number of requests)
 *   Data Points:
 *     - Sum: 105 | Tags: session_id=s-1, scenario_name=checkout
 *   Metrics exported
 * ```
 */
export function formatMetricsBlock(resourceMetrics: ResourceMetrics, now: Date): string {
  const lines: string[] = [`[${now.toISOString()}] Metrics Export:`];

  for (const scopeMetrics of resourceMetrics.scopeMetrics) {
    for (const metric of scopeMetrics.metrics) {
      const descriptor = metric.descriptor;
      lines.push(`  Metric: ${descriptor.name} (${descriptor.description})`);
      lines.push('  Data Points:');
      for (const point of formatDataPointValues(metric)) {
        lines.push(`    - ${point}`);
      }
      lines.push('  Metrics exported');
    }
  }

  return lines.join('\n') + '\n';
}

export interface FileMetricExporterOptions {
  /** Destination file; created on first export when missing */
  filePath: string;
  logger: Logger;
  /** Clock used for block headers */
  now?: () => Date;
}

/**
 * Push exporter appending metric snapshots to a text file.
 *
 * Writes are synchronous and best-effort: a failure is logged and reported
 * as a failed export; whatever was appended before it stays in the file.
 * Concurrent exports are not serialized.
 */
export class FileMetricExporter implements PushMetricExporter {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private isShutdown = false;

  constructor(options: FileMetricExporterOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  export(metrics: ResourceMetrics, resultCallback: (result: ExportResult) => void): void {
    if (this.isShutdown) {
      resultCallback({ code: ExportResultCode.FAILED, error: ExportError.exporterShutdown() });
      return;
    }

    try {
      appendFileSync(this.filePath, formatMetricsBlock(metrics, this.now()), 'utf8');
      resultCallback({ code: ExportResultCode.SUCCESS });
    } catch (error) {
      const exportError = ExportError.fileWriteFailed(this.filePath, toError(error));
      this.logger.error(exportError.message, { filePath: this.filePath });
      resultCallback({ code: ExportResultCode.FAILED, error: exportError });
    }
  }

  async forceFlush(): Promise<void> {
    // appends are synchronous, nothing is buffered
  }

  async shutdown(): Promise<void> {
    this.isShutdown = true;
  }
}
