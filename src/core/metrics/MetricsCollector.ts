/**
 * Metric type
 */
export type MetricType = 'counter' | 'gauge' | 'histogram';

/**
 * Metric labels
 */
export type Labels = Record<string, string>;

interface ScalarSeries {
  labels: Labels;
  value: number;
}

interface HistogramSeries {
  labels: Labels;
  sum: number;
  count: number;
  /** Cumulative counts, aligned with the entry's bounds plus +Inf */
  buckets: number[];
}

type MetricEntry =
  | { type: 'counter' | 'gauge'; help: string; series: Map<string, ScalarSeries> }
  | { type: 'histogram'; help: string; bounds: number[]; series: Map<string, HistogramSeries> };

/**
 * Default latency buckets, in seconds
 */
export const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/**
 * Metric names recorded by relaykit endpoints
 */
export const METRIC = {
  RPC_CLIENT_CALLS: 'relaykit_rpc_client_calls_total',
  RPC_CLIENT_DURATION: 'relaykit_rpc_client_call_duration_seconds',
  RPC_SERVER_REQUESTS: 'relaykit_rpc_server_requests_total',
  MESSAGES_PUBLISHED: 'relaykit_messages_published_total',
  MESSAGES_RECEIVED: 'relaykit_messages_received_total',
  SERIALIZATION_ERRORS: 'relaykit_serialization_errors_total',
  BRIDGE_RELAYED: 'relaykit_bridge_relayed_total',
} as const;

/**
 * MetricsCollector provides zero-dependency metrics collection
 *
 * Collects counters, gauges, and histograms with label support and renders
 * them in the Prometheus text format.
 *
 * @example
 * ```typescript
 * const metrics = new MetricsCollector();
 *
 * metrics.incrementCounter('relaykit_messages_published_total', { topic: 'sensors.temp' });
 * metrics.observeHistogram('relaykit_rpc_client_call_duration_seconds', { address: 'sum' }, 0.012);
 *
 * console.log(metrics.toPrometheus());
 * ```
 */
export class MetricsCollector {
  private static globalInstance: MetricsCollector | null = null;

  private metrics = new Map<string, MetricEntry>();

  /**
   * Process-wide collector used by endpoints that were given none
   */
  static global(): MetricsCollector {
    if (!MetricsCollector.globalInstance) {
      MetricsCollector.globalInstance = new MetricsCollector();
    }
    return MetricsCollector.globalInstance;
  }

  static resetGlobal(): void {
    MetricsCollector.globalInstance = null;
  }

  incrementCounter(name: string, labels: Labels = {}, value: number = 1): void {
    const series = this.scalar(name, 'counter', labels);
    series.value += value;
  }

  setGauge(name: string, labels: Labels = {}, value: number): void {
    this.scalar(name, 'gauge', labels).value = value;
  }

  observeHistogram(name: string, labels: Labels = {}, value: number, buckets = DEFAULT_BUCKETS): void {
    let entry = this.metrics.get(name);

    if (!entry) {
      entry = {
        type: 'histogram',
        help: 'Histogram of values',
        bounds: [...buckets].sort((a, b) => a - b),
        series: new Map(),
      };
      this.metrics.set(name, entry);
    }

    if (entry.type !== 'histogram') {
      throw new Error(`Metric ${name} already exists with type ${entry.type}, cannot change to histogram`);
    }

    const key = this.labelsToKey(labels);
    let series = entry.series.get(key);

    if (!series) {
      series = { labels, sum: 0, count: 0, buckets: Array.from({ length: entry.bounds.length + 1 }, () => 0) };
      entry.series.set(key, series);
    }

    series.sum += value;
    series.count++;
    for (let i = 0; i < entry.bounds.length; i++) {
      if (value <= entry.bounds[i]) series.buckets[i]++;
    }
    series.buckets[entry.bounds.length]++;
  }

  setHelp(name: string, help: string): void {
    const entry = this.metrics.get(name);
    if (entry) {
      entry.help = help;
    }
  }

  /**
   * Current value of a counter or gauge series, or the observation count of
   * a histogram series. Undefined when the series was never written.
   */
  getValue(name: string, labels: Labels = {}): number | undefined {
    const entry = this.metrics.get(name);
    const key = this.labelsToKey(labels);

    if (!entry) return undefined;
    if (entry.type === 'histogram') return entry.series.get(key)?.count;
    return entry.series.get(key)?.value;
  }

  reset(): void {
    this.metrics.clear();
  }

  /**
   * Export metrics in Prometheus text format
   */
  toPrometheus(): string {
    const lines: string[] = [];

    for (const [name, entry] of this.metrics) {
      lines.push(`# HELP ${name} ${entry.help}`, `# TYPE ${name} ${entry.type}`);

      if (entry.type === 'histogram') {
        for (const series of entry.series.values()) {
          const bounds = [...entry.bounds.map(String), '+Inf'];
          bounds.forEach((le, i) => {
            lines.push(`${name}_bucket${this.formatLabels({ ...series.labels, le })} ${series.buckets[i]}`);
          });
          lines.push(`${name}_sum${this.formatLabels(series.labels)} ${series.sum}`);
          lines.push(`${name}_count${this.formatLabels(series.labels)} ${series.count}`);
        }
      } else {
        for (const series of entry.series.values()) {
          lines.push(`${name}${this.formatLabels(series.labels)} ${series.value}`);
        }
      }

      lines.push('');
    }

    return lines.join('\n').trimEnd();
  }

  private scalar(name: string, type: 'counter' | 'gauge', labels: Labels): ScalarSeries {
    let entry = this.metrics.get(name);

    if (!entry) {
      entry = { type, help: type === 'counter' ? 'Total count' : 'Current value', series: new Map() };
      this.metrics.set(name, entry);
    }

    if (entry.type === 'histogram' || entry.type !== type) {
      throw new Error(`Metric ${name} already exists with type ${entry.type}, cannot change to ${type}`);
    }

    const key = this.labelsToKey(labels);
    let series = entry.series.get(key);

    if (!series) {
      series = { labels, value: 0 };
      entry.series.set(key, series);
    }

    return series;
  }

  private labelsToKey(labels: Labels): string {
    return Object.keys(labels)
      .sort()
      .map((key) => `${key}=${labels[key]}`)
      .join(',');
  }

  private formatLabels(labels: Labels): string {
    const entries = Object.entries(labels);
    if (entries.length === 0) return '';

    // `le` goes last, the way Prometheus clients print bucket lines
    const formatted = entries
      .sort(([a], [b]) => (a === 'le' ? 1 : b === 'le' ? -1 : a.localeCompare(b)))
      .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
      .join(',');

    return `{${formatted}}`;
  }
}
