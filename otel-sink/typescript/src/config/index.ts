/**
 * Configuration module for the OpenTelemetry sink
 */

export {
  DEFAULT_OTLP_ENDPOINT,
  CONFIG_SECTION,
  DEFAULT_SINK_CONFIG,
  applyDefaults,
} from './defaults.js';
export { validateConfig } from './validation.js';
export { bindInfraSection, resolveSinkConfig } from './infra.js';
export { configFromEnvironment } from './env.js';
