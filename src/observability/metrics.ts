/**
 * Metric catalog shared by every sink
 *
 * @module observability/metrics
 */

import type { IMetricsSink, MetricLabels } from './interfaces.js';

/**
 * Metric names, before the optional namespace prefix
 */
export const RPC_METRICS = {
  RPC_REQUEST: 'rpc_request',
  HTTP_RPC_REQUESTS: 'http_rpc_requests',
  RESPONSE_SECONDS: 'http_rpc_response_seconds',
  REQUEST_PAYLOAD_BYTES: 'http_rpc_request_payload_bytes',
  RESPONSE_PAYLOAD_BYTES: 'http_rpc_response_payload_bytes',
  BATCH_SIZE: 'http_rpc_batch_size',
} as const;

export type RpcMetricName = (typeof RPC_METRICS)[keyof typeof RPC_METRICS];

export interface MetricDefinition {
  type: 'counter' | 'histogram';
  help: string;
  labelNames: readonly string[];
  buckets?: readonly number[];
}

/**
 * Labels every metric carries
 */
export const IDENTITY_LABELS = ['network', 'layer', 'chain_id', 'provider'] as const;

const LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];
const PAYLOAD_BUCKETS = [128, 512, 1024, 4096, 16384, 65536, 262144, 1048576, 4194304, 16777216];
const BATCH_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

export const RPC_METRIC_DEFINITIONS: Readonly<Record<RpcMetricName, MetricDefinition>> = {
  [RPC_METRICS.RPC_REQUEST]: {
    type: 'counter',
    help: 'Total number of RPC requests, one per JSON-RPC method or REST path template.',
    labelNames: [...IDENTITY_LABELS, 'method', 'result', 'rpc_error_code'],
  },
  [RPC_METRICS.HTTP_RPC_REQUESTS]: {
    type: 'counter',
    help: 'Counts total HTTP requests used by any layer (EL, CL, or other).',
    labelNames: [...IDENTITY_LABELS, 'batched', 'response_code', 'result'],
  },
  [RPC_METRICS.RESPONSE_SECONDS]: {
    type: 'histogram',
    help: 'Distribution of RPC response times (in seconds).',
    labelNames: IDENTITY_LABELS,
    buckets: LATENCY_BUCKETS,
  },
  [RPC_METRICS.REQUEST_PAYLOAD_BYTES]: {
    type: 'histogram',
    help: 'Distribution of request payload sizes (bytes) of RPC calls.',
    labelNames: IDENTITY_LABELS,
    buckets: PAYLOAD_BUCKETS,
  },
  [RPC_METRICS.RESPONSE_PAYLOAD_BYTES]: {
    type: 'histogram',
    help: 'Distribution of response payload sizes (bytes) of RPC calls.',
    labelNames: IDENTITY_LABELS,
    buckets: PAYLOAD_BUCKETS,
  },
  [RPC_METRICS.BATCH_SIZE]: {
    type: 'histogram',
    help: 'Distribution of how many JSON-RPC calls are bundled in each HTTP request (batch size).',
    labelNames: IDENTITY_LABELS,
    buckets: BATCH_BUCKETS,
  },
};

export function isRpcMetricName(name: string): name is RpcMetricName {
  return Object.prototype.hasOwnProperty.call(RPC_METRIC_DEFINITIONS, name);
}

/**
 * Joins the namespace and the metric name the way Prometheus clients do
 */
export function withNamespace(namespace: string, name: string): string {
  return namespace ? `${namespace}_${name}` : name;
}

/**
 * Sink used when no backend is configured
 */
export class NoopMetricsSink implements IMetricsSink {
  incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void {}

  observeHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}
}
