/**
 * Observability module exports
 *
 * @module observability
 */

// Interfaces and types
export type {
  MetricLabels,
  Counter,
  Histogram,
  HistogramBucket,
  IMetricsSink,
  IMetricsCollector,
} from './interfaces.js';

// Metric catalog
export {
  RPC_METRICS,
  RPC_METRIC_DEFINITIONS,
  IDENTITY_LABELS,
  NoopMetricsSink,
  isRpcMetricName,
  withNamespace,
} from './metrics.js';
export type { RpcMetricName, MetricDefinition } from './metrics.js';

// Implementations
export { MetricsCollector } from './MetricsCollector.js';
export type { MetricsCollectorOptions } from './MetricsCollector.js';
export { PrometheusMetricsSink } from './PrometheusMetricsSink.js';
export type { PrometheusMetricsSinkOptions } from './PrometheusMetricsSink.js';
export { InstrumentedClient } from './InstrumentedClient.js';
export type { InstrumentedClientOptions, BodyValidator } from './InstrumentedClient.js';
