export { OtelSink } from './otel-sink.js';
export type { SinkState } from './otel-sink.js';
