import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { PrometheusMetricsSink } from './PrometheusMetricsSink';
import { ConfigurationService } from '../config/ConfigurationService';
import { RPC_METRICS } from './metrics';

const IDENTITY = { network: 'ethereum', layer: 'el', chain_id: '1', provider: 'example.org' };

describe('PrometheusMetricsSink', () => {
  let registry: Registry;
  let sink: PrometheusMetricsSink;

  beforeEach(() => {
    registry = new Registry();
    sink = new PrometheusMetricsSink({ registry, namespace: 'test' });
  });

  it('should register catalog counters under the namespace', async () => {
    const labels = { ...IDENTITY, method: 'eth_call', result: 'success', rpc_error_code: '' };
    sink.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, labels);
    sink.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, labels);

    const metric = await registry.getSingleMetric('test_rpc_request')?.get();

    expect(metric?.help).toBe('Total number of RPC requests, one per JSON-RPC method or REST path template.');
    expect(metric?.values).toHaveLength(1);
    expect(metric?.values[0]).toMatchObject({ value: 2, labels });
  });

  it('should accept an omitted method label', async () => {
    sink.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, { ...IDENTITY, result: 'fail', rpc_error_code: '' });

    const metric = await registry.getSingleMetric('test_rpc_request')?.get();

    expect(metric?.values[0]).toMatchObject({
      value: 1,
      labels: { ...IDENTITY, result: 'fail', rpc_error_code: '' },
    });
  });

  it('should observe histograms with catalog buckets', async () => {
    sink.observeHistogram(RPC_METRICS.BATCH_SIZE, 3, IDENTITY);

    const metric = await registry.getSingleMetric('test_http_rpc_batch_size')?.get();
    const sum = metric?.values.find((v) => v.metricName === 'test_http_rpc_batch_size_sum');
    const count = metric?.values.find((v) => v.metricName === 'test_http_rpc_batch_size_count');
    const buckets = metric?.values.filter((v) => v.metricName === 'test_http_rpc_batch_size_bucket');

    expect(sum?.value).toBe(3);
    expect(count?.value).toBe(1);
    expect(buckets).toHaveLength(11);
  });

  it('should register unknown metrics with their first label names', async () => {
    sink.incrementCounter('custom_events', 5, { kind: 'ping' });

    const metric = await registry.getSingleMetric('test_custom_events')?.get();

    expect(metric?.values[0]).toMatchObject({ value: 5, labels: { kind: 'ping' } });
  });

  it('should default the namespace from configuration', () => {
    const configured = new PrometheusMetricsSink({
      registry,
      config: new ConfigurationService(undefined, { METRICS_NAMESPACE: 'lido' }),
    });

    configured.incrementCounter(RPC_METRICS.HTTP_RPC_REQUESTS, 1, {
      ...IDENTITY,
      batched: 'false',
      response_code: '200',
      result: 'success',
    });

    expect(registry.getSingleMetric('lido_http_rpc_requests')).toBeDefined();
  });

  it('should expose its registry', () => {
    expect(sink.getRegistry()).toBe(registry);
  });
});
