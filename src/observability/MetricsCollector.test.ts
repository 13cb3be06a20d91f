/**
 * Unit tests for MetricsCollector
 *
 * @module observability/MetricsCollector.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector } from './MetricsCollector';
import { ConfigurationService } from '../config/ConfigurationService';
import { RPC_METRICS } from './metrics';

describe('MetricsCollector', () => {
  let collector: MetricsCollector;

  beforeEach(() => {
    collector = new MetricsCollector({ config: new ConfigurationService(undefined, {}) });
  });

  describe('Counter', () => {
    it('should accumulate increments per label set', () => {
      collector.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, { method: 'eth_call' });
      collector.incrementCounter(RPC_METRICS.RPC_REQUEST, 2, { method: 'eth_call' });
      collector.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, { method: 'eth_chainId' });

      expect(collector.getCounters().size).toBe(2);
      expect(collector.getCounterValue(RPC_METRICS.RPC_REQUEST, { method: 'eth_call' })).toBe(3);
      expect(collector.getCounterValue(RPC_METRICS.RPC_REQUEST)).toBe(4);
    });

    it('should treat label order as irrelevant', () => {
      collector.incrementCounter('requests', 1, { a: '1', b: '2' });
      collector.incrementCounter('requests', 1, { b: '2', a: '1' });

      expect(collector.getCounters().size).toBe(1);
    });

    it('should default the increment to one', () => {
      collector.incrementCounter('requests');

      expect(collector.getCounterValue('requests')).toBe(1);
    });
  });

  describe('Histogram', () => {
    it('should track count, sum and catalog buckets', () => {
      collector.observeHistogram(RPC_METRICS.BATCH_SIZE, 3, { provider: 'a.io' });
      collector.observeHistogram(RPC_METRICS.BATCH_SIZE, 12, { provider: 'a.io' });

      const [histogram] = [...collector.getHistograms().values()];
      expect(histogram.count).toBe(2);
      expect(histogram.sum).toBe(15);
      expect(histogram.buckets.slice(0, 5)).toEqual([
        { le: 1, count: 0 },
        { le: 2, count: 0 },
        { le: 5, count: 1 },
        { le: 10, count: 1 },
        { le: 20, count: 2 },
      ]);
      expect(collector.getObservations(RPC_METRICS.BATCH_SIZE, { provider: 'a.io' })).toEqual([3, 12]);
    });

    it('should use default buckets outside the catalog', () => {
      collector.observeHistogram('custom_ms', 7);

      const [histogram] = [...collector.getHistograms().values()];
      expect(histogram.buckets[0]).toEqual({ le: 5, count: 0 });
      expect(histogram.buckets[1]).toEqual({ le: 10, count: 1 });
    });

    it('should count observations matching a label subset', () => {
      collector.observeHistogram(RPC_METRICS.RESPONSE_SECONDS, 0.1, { provider: 'a.io', layer: 'el' });
      collector.observeHistogram(RPC_METRICS.RESPONSE_SECONDS, 0.2, { provider: 'b.io', layer: 'el' });

      expect(collector.getObservationCount(RPC_METRICS.RESPONSE_SECONDS, { layer: 'el' })).toBe(2);
      expect(collector.getObservationCount(RPC_METRICS.RESPONSE_SECONDS, { provider: 'b.io' })).toBe(1);
    });
  });

  it('should reset all metrics', () => {
    collector.incrementCounter('requests');
    collector.observeHistogram('custom_ms', 1);

    collector.reset();

    expect(collector.getCounters().size).toBe(0);
    expect(collector.getHistograms().size).toBe(0);
    expect(collector.getObservations('custom_ms', {})).toEqual([]);
  });

  describe('Prometheus export', () => {
    it('should prefix names with the namespace', () => {
      const namespaced = new MetricsCollector({ namespace: 'lido' });
      namespaced.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, { method: 'eth_call', result: 'success' });

      expect(namespaced.exportPrometheus().split('\n')).toEqual([
        '# TYPE lido_rpc_request counter',
        'lido_rpc_request{method="eth_call",result="success"} 1',
      ]);
    });

    it('should default the namespace from configuration', () => {
      const configured = new MetricsCollector({ config: new ConfigurationService(undefined, { METRICS_NAMESPACE: 'lido' }) });
      configured.incrementCounter('requests');

      expect(configured.exportPrometheus().split('\n')).toEqual(['# TYPE lido_requests counter', 'lido_requests 1']);
    });

    it('should write one TYPE line per metric family', () => {
      collector.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, { provider: 'a.io' });
      collector.incrementCounter(RPC_METRICS.HTTP_RPC_REQUESTS, 1, { provider: 'a.io' });
      collector.incrementCounter(RPC_METRICS.RPC_REQUEST, 2, { provider: 'b.io' });

      expect(collector.exportPrometheus().split('\n')).toEqual([
        '# TYPE rpc_request counter',
        'rpc_request{provider="a.io"} 1',
        'rpc_request{provider="b.io"} 2',
        '# TYPE http_rpc_requests counter',
        'http_rpc_requests{provider="a.io"} 1',
      ]);
    });

    it('should group histogram series of one family', () => {
      collector.observeHistogram('custom_ms', 7, { provider: 'a.io' });
      collector.observeHistogram('custom_ms', 70, { provider: 'b.io' });

      const lines = collector.exportPrometheus().split('\n');
      expect(lines.filter((line) => line.startsWith('# TYPE'))).toEqual(['# TYPE custom_ms histogram']);
      expect(lines).toContain('custom_ms_count{provider="a.io"} 1');
      expect(lines).toContain('custom_ms_sum{provider="b.io"} 70');
    });

    it('should export histogram series', () => {
      collector.observeHistogram(RPC_METRICS.BATCH_SIZE, 3, { provider: 'a.io' });

      const lines = collector.exportPrometheus().split('\n');
      expect(lines[0]).toBe('# TYPE http_rpc_batch_size histogram');
      expect(lines).toContain('http_rpc_batch_size_bucket{provider="a.io",le="2"} 0');
      expect(lines).toContain('http_rpc_batch_size_bucket{provider="a.io",le="5"} 1');
      expect(lines).toContain('http_rpc_batch_size_bucket{provider="a.io",le="+Inf"} 1');
      expect(lines).toContain('http_rpc_batch_size_sum{provider="a.io"} 3');
      expect(lines).toContain('http_rpc_batch_size_count{provider="a.io"} 1');
    });

    it('should escape label values', () => {
      collector.incrementCounter('requests', 1, { path: 'a"b\\c' });

      expect(collector.exportPrometheus()).toContain('requests{path="a\\"b\\\\c"} 1');
    });
  });
});
