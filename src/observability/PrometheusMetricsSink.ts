/**
 * prom-client backed metrics sink
 *
 * @module observability/PrometheusMetricsSink
 */

import { Counter, Histogram, Registry, register as defaultRegistry } from 'prom-client';
import { ConfigurationService } from '../config/ConfigurationService.js';
import type { IMetricsSink, MetricLabels } from './interfaces.js';
import { RPC_METRIC_DEFINITIONS, isRpcMetricName, withNamespace } from './metrics.js';

export interface PrometheusMetricsSinkOptions {
  /** Registry to register into, prom-client's global registry by default */
  registry?: Registry;
  /** Prefix for every metric name, the configured METRICS_NAMESPACE by default */
  namespace?: string;
  config?: ConfigurationService;
}

/**
 * Creates prom-client metrics on first use. Catalog metrics get their
 * declared help text, label names and buckets; other names are registered
 * with the label names of their first observation.
 */
export class PrometheusMetricsSink implements IMetricsSink {
  private readonly registry: Registry;
  private readonly namespace: string;
  private readonly counters = new Map<string, Counter<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();

  constructor(options: PrometheusMetricsSinkOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.namespace = options.namespace
      ?? (options.config ?? ConfigurationService.getInstance()).getMetricsNamespace();
  }

  incrementCounter(name: string, value: number = 1, labels: MetricLabels = {}): void {
    this.getCounter(name, labels).inc(labels, value);
  }

  observeHistogram(name: string, value: number, labels: MetricLabels = {}): void {
    this.getHistogram(name, labels).observe(labels, value);
  }

  getRegistry(): Registry {
    return this.registry;
  }

  private getCounter(name: string, labels: MetricLabels): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) return existing;

    const definition = isRpcMetricName(name) ? RPC_METRIC_DEFINITIONS[name] : undefined;
    const counter = new Counter({
      name: withNamespace(this.namespace, name),
      help: definition?.help ?? name,
      labelNames: definition ? [...definition.labelNames] : Object.keys(labels),
      registers: [this.registry],
    });
    this.counters.set(name, counter);
    return counter;
  }

  private getHistogram(name: string, labels: MetricLabels): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) return existing;

    const definition = isRpcMetricName(name) ? RPC_METRIC_DEFINITIONS[name] : undefined;
    const histogram = new Histogram({
      name: withNamespace(this.namespace, name),
      help: definition?.help ?? name,
      labelNames: definition ? [...definition.labelNames] : Object.keys(labels),
      ...(definition?.buckets ? { buckets: [...definition.buckets] } : {}),
      registers: [this.registry],
    });
    this.histograms.set(name, histogram);
    return histogram;
  }
}
