import { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { Tags, Telemetry } from "./telemetry.js";

export interface PrometheusTelemetryOptions {
  registry?: Registry;
  /** Prepended to every metric name, e.g. "myapp_". */
  prefix?: string;
  /** Histogram buckets in milliseconds for timings. */
  timingBuckets?: number[];
}

const DEFAULT_TIMING_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

type Metric = Counter<string> | Gauge<string> | Histogram<string>;

interface Registered<M extends Metric> {
  metric: M;
  labelNames: string[];
}

/**
 * Telemetry backed by prom-client. Metrics are registered lazily on first use; the
 * label set of a metric is fixed by its first observation, later observations fill
 * missing labels with "" and drop unknown ones.
 */
export class PrometheusTelemetry implements Telemetry {
  readonly registry: Registry;
  private readonly prefix: string;
  private readonly timingBuckets: number[];

  private readonly counters = new Map<string, Registered<Counter<string>>>();
  private readonly gauges = new Map<string, Registered<Gauge<string>>>();
  private readonly histograms = new Map<string, Registered<Histogram<string>>>();

  constructor(opts: PrometheusTelemetryOptions = {}) {
    this.registry = opts.registry ?? new Registry();
    this.prefix = opts.prefix ?? "";
    this.timingBuckets = opts.timingBuckets ?? DEFAULT_TIMING_BUCKETS;
  }

  incr(name: string, tags: Tags = {}): void {
    this.count(name, 1, tags);
  }

  count(name: string, value: number, tags: Tags = {}): void {
    const c = this.counter(name, tags);
    c.metric.inc(labelsFor(c.labelNames, tags), value);
  }

  timing(name: string, durationMs: number, tags: Tags = {}): void {
    const h = this.histogram_(`${name}_ms`, tags, this.timingBuckets);
    h.metric.observe(labelsFor(h.labelNames, tags), durationMs);
  }

  histogram(name: string, value: number, tags: Tags = {}): void {
    const h = this.histogram_(name, tags, undefined);
    h.metric.observe(labelsFor(h.labelNames, tags), value);
  }

  gauge(name: string, value: number, tags: Tags = {}): void {
    let g = this.gauges.get(name);
    if (!g) {
      const labelNames = Object.keys(tags).sort();
      g = {
        metric: new Gauge({ name: this.metricName(name), help: name, labelNames, registers: [this.registry] }),
        labelNames,
      };
      this.gauges.set(name, g);
    }
    g.metric.set(labelsFor(g.labelNames, tags), value);
  }

  private counter(name: string, tags: Tags): Registered<Counter<string>> {
    let c = this.counters.get(name);
    if (!c) {
      const labelNames = Object.keys(tags).sort();
      c = {
        metric: new Counter({ name: this.metricName(name), help: name, labelNames, registers: [this.registry] }),
        labelNames,
      };
      this.counters.set(name, c);
    }
    return c;
  }

  private histogram_(name: string, tags: Tags, buckets: number[] | undefined): Registered<Histogram<string>> {
    let h = this.histograms.get(name);
    if (!h) {
      const labelNames = Object.keys(tags).sort();
      h = {
        metric: new Histogram({
          name: this.metricName(name),
          help: name,
          labelNames,
          registers: [this.registry],
          ...(buckets ? { buckets } : {}),
        }),
        labelNames,
      };
      this.histograms.set(name, h);
    }
    return h;
  }

  private metricName(name: string): string {
    return toMetricName(this.prefix + name);
  }
}

/** "http.client.request.time" -> "http_client_request_time" */
export function toMetricName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_:]/g, "_");
  return /^[a-zA-Z_:]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

function labelsFor(labelNames: string[], tags: Tags): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const l of labelNames) labels[l] = tags[l] ?? "";
  return labels;
}
