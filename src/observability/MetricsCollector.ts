/**
 * Metrics collector implementation
 *
 * @module observability/MetricsCollector
 * @see interfaces.ts for IMetricsCollector contract
 */

import type {
  IMetricsCollector,
  MetricLabels,
  Counter,
  Histogram,
  HistogramBucket,
} from './interfaces.js';
import { ConfigurationService } from '../config/ConfigurationService.js';
import { RPC_METRIC_DEFINITIONS, isRpcMetricName, withNamespace } from './metrics.js';

/**
 * Buckets for histograms outside the RPC catalog
 */
const DEFAULT_HISTOGRAM_BUCKETS = [
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000,
];

/**
 * Series grouped into metric families, in first-seen order
 */
function groupByName<T extends { name: string }>(series: Iterable<T>): Map<string, T[]> {
  const families = new Map<string, T[]>();
  for (const entry of series) {
    const family = families.get(entry.name);
    if (family) {
      family.push(entry);
    } else {
      families.set(entry.name, [entry]);
    }
  }
  return families;
}

export interface MetricsCollectorOptions {
  /** Prefix applied on export, the configured METRICS_NAMESPACE by default */
  namespace?: string;
  config?: ConfigurationService;
}

/**
 * In-memory metrics sink
 * Keeps counters and histograms keyed by name and label set.
 *
 * For tests and development only: every histogram observation is kept, so
 * memory grows with traffic. Production processes use PrometheusMetricsSink.
 */
export class MetricsCollector implements IMetricsCollector {
  private readonly counters: Map<string, Counter>;
  private readonly histograms: Map<string, Histogram>;
  private readonly histogramValues: Map<string, number[]>;
  private readonly namespace: string;

  constructor(options: MetricsCollectorOptions = {}) {
    this.counters = new Map();
    this.histograms = new Map();
    this.histogramValues = new Map();
    this.namespace = options.namespace
      ?? (options.config ?? ConfigurationService.getInstance()).getMetricsNamespace();
  }

  /**
   * Increments a counter metric
   *
   * @param name - Metric name
   * @param value - Value to add (default 1)
   * @param labels - Optional labels
   */
  incrementCounter(name: string, value: number = 1, labels: MetricLabels = {}): void {
    const key = this.getMetricKey(name, labels);
    const existing = this.counters.get(key);

    if (existing) {
      existing.value += value;
    } else {
      this.counters.set(key, {
        name,
        value,
        labels: { ...labels },
      });
    }
  }

  /**
   * Records a histogram observation
   *
   * @param name - Metric name
   * @param value - Observed value
   * @param labels - Optional labels
   */
  observeHistogram(name: string, value: number, labels: MetricLabels = {}): void {
    const key = this.getMetricKey(name, labels);

    const values = this.histogramValues.get(key) || [];
    values.push(value);
    this.histogramValues.set(key, values);

    const sum = values.reduce((acc, v) => acc + v, 0);
    const count = values.length;
    const buckets = this.calculateHistogramBuckets(name, values);

    this.histograms.set(key, {
      name,
      sum,
      count,
      buckets,
      labels: { ...labels },
    });
  }

  getCounters(): Map<string, Counter> {
    return new Map(this.counters);
  }

  getHistograms(): Map<string, Histogram> {
    return new Map(this.histograms);
  }

  /**
   * Sums every counter series of a metric whose labels include `match`
   */
  getCounterValue(name: string, match: MetricLabels = {}): number {
    let total = 0;
    for (const counter of this.counters.values()) {
      if (counter.name === name && this.labelsMatch(counter.labels, match)) {
        total += counter.value;
      }
    }
    return total;
  }

  /**
   * Counts the observations of a histogram whose labels include `match`
   */
  getObservationCount(name: string, match: MetricLabels = {}): number {
    let total = 0;
    for (const histogram of this.histograms.values()) {
      if (histogram.name === name && this.labelsMatch(histogram.labels, match)) {
        total += histogram.count;
      }
    }
    return total;
  }

  /**
   * Raw observed values of one histogram series
   */
  getObservations(name: string, labels: MetricLabels): number[] {
    return [...(this.histogramValues.get(this.getMetricKey(name, labels)) ?? [])];
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.histogramValues.clear();
  }

  /**
   * Exports metrics in Prometheus format
   *
   * @returns Prometheus-formatted metrics string
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    for (const [metric, series] of groupByName(this.counters.values())) {
      const name = withNamespace(this.namespace, metric);
      lines.push(`# TYPE ${name} counter`);
      for (const counter of series) {
        lines.push(`${name}${this.formatLabels(counter.labels)} ${counter.value}`);
      }
    }

    for (const [metric, series] of groupByName(this.histograms.values())) {
      const name = withNamespace(this.namespace, metric);
      lines.push(`# TYPE ${name} histogram`);

      for (const histogram of series) {
        for (const bucket of histogram.buckets) {
          const bucketLabels = { ...histogram.labels, le: bucket.le.toString() };
          lines.push(`${name}_bucket${this.formatLabels(bucketLabels)} ${bucket.count}`);
        }

        const infLabels = { ...histogram.labels, le: '+Inf' };
        lines.push(`${name}_bucket${this.formatLabels(infLabels)} ${histogram.count}`);
        lines.push(`${name}_sum${this.formatLabels(histogram.labels)} ${histogram.sum}`);
        lines.push(`${name}_count${this.formatLabels(histogram.labels)} ${histogram.count}`);
      }
    }

    return lines.join('\n');
  }

  private labelsMatch(labels: MetricLabels, match: MetricLabels): boolean {
    return Object.entries(match).every(([key, value]) => labels[key] === value);
  }

  /**
   * Generates unique metric key from name and labels
   */
  private getMetricKey(name: string, labels: MetricLabels): string {
    const sortedLabels = Object.keys(labels)
      .sort()
      .map((key) => `${key}="${labels[key]}"`)
      .join(',');

    return sortedLabels ? `${name}{${sortedLabels}}` : name;
  }

  private formatLabels(labels: MetricLabels): string {
    const entries = Object.entries(labels);

    if (entries.length === 0) {
      return '';
    }

    const formatted = entries
      .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
      .join(',');

    return `{${formatted}}`;
  }

  private calculateHistogramBuckets(name: string, values: number[]): HistogramBucket[] {
    const bounds = isRpcMetricName(name)
      ? RPC_METRIC_DEFINITIONS[name].buckets ?? DEFAULT_HISTOGRAM_BUCKETS
      : DEFAULT_HISTOGRAM_BUCKETS;

    return bounds.map((le) => ({
      le,
      count: values.filter((v) => v <= le).length,
    }));
  }
}
