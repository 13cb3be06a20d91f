/**
 * Observability component interfaces and types
 *
 * @module observability/interfaces
 */

/**
 * Labels for metric categorization.
 * A label left out of the object is an omitted dimension.
 */
export interface MetricLabels {
  [key: string]: string;
}

/**
 * Counter metric - monotonically increasing value
 */
export interface Counter {
  name: string;
  value: number;
  labels: MetricLabels;
}

/**
 * Histogram bucket for distribution tracking
 */
export interface HistogramBucket {
  /**
   * Upper bound for this bucket (less than or equal)
   */
  le: number;

  /**
   * Count of observations in this bucket
   */
  count: number;
}

/**
 * Histogram metric - tracks distribution of values
 */
export interface Histogram {
  name: string;
  sum: number;
  count: number;
  buckets: HistogramBucket[];
  labels: MetricLabels;
}

/**
 * Pluggable destination for counter and histogram observations.
 * Implementations must not throw on unknown metric names.
 */
export interface IMetricsSink {
  /**
   * Increments a counter metric
   *
   * @param name - Metric name
   * @param value - Value to add (default 1)
   * @param labels - Optional labels
   */
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;

  /**
   * Records a histogram observation
   *
   * @param name - Metric name
   * @param value - Observed value
   * @param labels - Optional labels
   */
  observeHistogram(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * In-process sink that keeps what it observes
 */
export interface IMetricsCollector extends IMetricsSink {
  /**
   * Gets all counter metrics
   *
   * @returns Map of metric key to counter
   */
  getCounters(): Map<string, Counter>;

  /**
   * Gets all histogram metrics
   *
   * @returns Map of metric key to histogram
   */
  getHistograms(): Map<string, Histogram>;

  /**
   * Resets all metrics to initial state
   */
  reset(): void;

  /**
   * Exports metrics in Prometheus text format
   */
  exportPrometheus(): string;
}
