/**
 * Error classes for the OpenTelemetry sink.
 */

export { OtelSinkError, isOtelSinkError, isErrorCategory, toError } from './base.js';
export type { ErrorCategory } from './base.js';

export { ConfigurationError } from './configuration.js';
export { MissingContextError } from './context.js';
export { ExportError } from './export.js';
