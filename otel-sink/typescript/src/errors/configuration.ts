/**
 * Configuration errors.
 *
 * Raised while resolving and validating the sink configuration. They abort
 * initialization.
 */

import { OtelSinkError } from './base.js';

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigurationError extends OtelSinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'configuration',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }

  /**
   * File exporter selected without a destination path
   */
  static missingFilePath(): ConfigurationError {
    return new ConfigurationError(
      'FilePath must be specified when using File exporter.',
      { field: 'filePath' }
    );
  }

  /**
   * Exporter type outside the supported set
   */
  static unsupportedExporterType(exporterType: string): ConfigurationError {
    return new ConfigurationError(`Unsupported exporter type: ${exporterType}`, {
      field: 'exporterType',
      value: exporterType,
    });
  }

  /**
   * Custom tag key that collides with a label the sink emits itself
   */
  static reservedTagKey(key: string): ConfigurationError {
    return new ConfigurationError(
      `Custom tag key '${key}' is reserved by the sink`,
      { field: 'customTags', key }
    );
  }

  /**
   * Custom tag key listed more than once
   */
  static duplicateTagKey(key: string): ConfigurationError {
    return new ConfigurationError(`Custom tag key '${key}' is configured more than once`, {
      field: 'customTags',
      key,
    });
  }

  /**
   * Sink initialized again while its exporter is still live
   */
  static alreadyInitialized(state: string): ConfigurationError {
    return new ConfigurationError(`Sink is already initialized (state: ${state})`, {
      field: 'state',
      value: state,
    });
  }
}
