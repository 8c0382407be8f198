/**
 * Export errors.
 *
 * Reported through the exporter result and logged; never thrown into the
 * test run.
 */

import { OtelSinkError } from './base.js';

export class ExportError extends OtelSinkError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: Error }) {
    super({
      category: 'export',
      message,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'ExportError';
  }

  static fileWriteFailed(filePath: string, cause: Error): ExportError {
    return new ExportError(`Error exporting metrics to file: ${cause.message}`, {
      details: { filePath },
      cause,
    });
  }

  static exporterShutdown(): ExportError {
    return new ExportError('Exporter has been shut down');
  }
}
