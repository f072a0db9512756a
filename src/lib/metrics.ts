/**
 * Request Metrics
 *
 * Counts completed requests and observes their latency, keyed by method and
 * route pattern. Rendered in the Prometheus text exposition format.
 *
 * - http_requests_total{method,path,status}      counter
 * - http_request_duration_seconds{method,path}   histogram
 */

/** Default Prometheus client buckets, in seconds. */
export const DEFAULT_LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export interface RequestObservation {
  method: string;
  path: string;
  statusCode: number;
  durationSeconds: number;
}

export interface RequestCountSample {
  method: string;
  path: string;
  status: number;
  count: number;
}

export interface LatencySample {
  method: string;
  path: string;
  /** Cumulative count per bucket upper bound, same order as the buckets. */
  buckets: number[];
  sum: number;
  count: number;
}

export interface MetricsSnapshot {
  requests: RequestCountSample[];
  latency: LatencySample[];
}

interface LatencySeries {
  method: string;
  path: string;
  bucketCounts: number[];
  sum: number;
  count: number;
}

export class RequestMetrics {
  private readonly counts = new Map<string, RequestCountSample>();
  private readonly latency = new Map<string, LatencySeries>();

  constructor(private readonly buckets: number[] = DEFAULT_LATENCY_BUCKETS) {}

  record(observation: RequestObservation): void {
    const { method, path, statusCode } = observation;
    const durationSeconds = Math.max(0, observation.durationSeconds);

    const countKey = `${method} ${path} ${statusCode}`;
    const counter = this.counts.get(countKey);
    if (counter) {
      counter.count += 1;
    } else {
      this.counts.set(countKey, { method, path, status: statusCode, count: 1 });
    }

    const latencyKey = `${method} ${path}`;
    const series = this.latency.get(latencyKey) ?? this.createSeries(latencyKey, method, path);
    this.buckets.forEach((bound, idx) => {
      if (durationSeconds <= bound) {
        series.bucketCounts[idx] += 1;
      }
    });
    series.sum += durationSeconds;
    series.count += 1;
  }

  private createSeries(key: string, method: string, path: string): LatencySeries {
    const series: LatencySeries = { method, path, bucketCounts: this.buckets.map(() => 0), sum: 0, count: 0 };
    this.latency.set(key, series);
    return series;
  }

  snapshot(): MetricsSnapshot {
    return {
      requests: [...this.counts.values()].map((sample) => ({ ...sample })),
      latency: [...this.latency.values()].map((series) => ({
        method: series.method,
        path: series.path,
        buckets: [...series.bucketCounts],
        sum: series.sum,
        count: series.count,
      })),
    };
  }

  render(): string {
    const lines: string[] = [
      '# HELP http_requests_total Total HTTP requests by method, path and status.',
      '# TYPE http_requests_total counter',
    ];

    for (const sample of this.counts.values()) {
      lines.push(
        `http_requests_total{${labels({ method: sample.method, path: sample.path, status: String(sample.status) })}} ${sample.count}`
      );
    }

    lines.push(
      '# HELP http_request_duration_seconds HTTP request latency by method and path.',
      '# TYPE http_request_duration_seconds histogram'
    );

    for (const series of this.latency.values()) {
      const base = { method: series.method, path: series.path };
      this.buckets.forEach((bound, idx) => {
        lines.push(
          `http_request_duration_seconds_bucket{${labels({ ...base, le: String(bound) })}} ${series.bucketCounts[idx]}`
        );
      });
      lines.push(`http_request_duration_seconds_bucket{${labels({ ...base, le: '+Inf' })}} ${series.count}`);
      lines.push(`http_request_duration_seconds_sum{${labels(base)}} ${series.sum}`);
      lines.push(`http_request_duration_seconds_count{${labels(base)}} ${series.count}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function labels(values: Record<string, string>): string {
  return Object.entries(values)
    .map(([name, value]) => `${name}="${escapeLabelValue(value)}"`)
    .join(',');
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}
