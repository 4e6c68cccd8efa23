import diagnosticsChannel from 'node:diagnostics_channel';

export interface RequestSample {
  readonly code: string;
  readonly handler: string;
  readonly method: string;
  readonly durationSeconds: number;
  /** Declared request body size, 0 when the client sent no Content-Length. */
  readonly requestBytes: number;
  readonly responseBytes: number;
}

type SampleLabels = Pick<RequestSample, 'code' | 'handler' | 'method'>;

/** Receives one sample per completed request. */
export interface MetricsSink {
  observe(sample: RequestSample): void;
}

export const DEFAULT_DURATION_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export const DEFAULT_SIZE_BUCKETS: readonly number[] = [
  200, 500, 1_000, 5_000, 10_000, 50_000, 100_000, 500_000, 1_000_000,
];

const requestChannel = diagnosticsChannel.channel('logged-http.request');

function publishRequestSample(sample: RequestSample): void {
  if (!requestChannel.hasSubscribers) return;
  try {
    requestChannel.publish(sample);
  } catch {
    // Avoid crashing the publisher if a subscriber throws.
  }
}

class Histogram {
  private readonly counts: number[];
  private total = 0;
  private observations = 0;

  constructor(private readonly bounds: readonly number[]) {
    this.counts = bounds.map(() => 0);
  }

  observe(value: number): void {
    const index = this.bounds.findIndex((bound) => value <= bound);
    if (index !== -1) this.counts[index] = (this.counts[index] ?? 0) + 1;
    this.total += value;
    this.observations += 1;
  }

  render(name: string, labels: string): string[] {
    const lines: string[] = [];
    let cumulative = 0;
    this.bounds.forEach((bound, index) => {
      cumulative += this.counts[index] ?? 0;
      lines.push(`${name}_bucket{${labels},le="${bound}"} ${cumulative}`);
    });
    lines.push(`${name}_bucket{${labels},le="+Inf"} ${this.observations}`);
    lines.push(`${name}_sum{${labels}} ${this.total}`);
    lines.push(`${name}_count{${labels}} ${this.observations}`);
    return lines;
  }
}

interface Series {
  readonly labels: string;
  requests: number;
  readonly duration: Histogram;
  readonly requestSize: Histogram;
  readonly responseSize: Histogram;
}

function escapeLabelValue(value: string): string {
  return value
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('\n', '\\n');
}

function formatLabels(sample: SampleLabels): string {
  return [
    `code="${escapeLabelValue(sample.code)}"`,
    `handler="${escapeLabelValue(sample.handler)}"`,
    `method="${escapeLabelValue(sample.method)}"`,
  ].join(',');
}

/**
 * Request counter plus latency and request/response size histograms keyed
 * by status code, handler and method, rendered in the Prometheus text
 * format.
 */
export class RequestMetrics implements MetricsSink {
  private readonly series = new Map<string, Series>();

  constructor(
    private readonly durationBuckets: readonly number[] = DEFAULT_DURATION_BUCKETS,
    private readonly sizeBuckets: readonly number[] = DEFAULT_SIZE_BUCKETS
  ) {}

  observe(sample: RequestSample): void {
    const labels = formatLabels(sample);
    let series = this.series.get(labels);
    if (!series) {
      series = {
        labels,
        requests: 0,
        duration: new Histogram(this.durationBuckets),
        requestSize: new Histogram(this.sizeBuckets),
        responseSize: new Histogram(this.sizeBuckets),
      };
      this.series.set(labels, series);
    }

    series.requests += 1;
    series.duration.observe(sample.durationSeconds);
    series.requestSize.observe(sample.requestBytes);
    series.responseSize.observe(sample.responseBytes);

    publishRequestSample(sample);
  }

  requestCount(code: string, handler: string, method: string): number {
    const labels = formatLabels({ code, handler, method });
    return this.series.get(labels)?.requests ?? 0;
  }

  render(): string {
    const all = [...this.series.values()];
    const lines = [
      '# HELP http_requests_total Total number of HTTP requests made.',
      '# TYPE http_requests_total counter',
      ...all.map((s) => `http_requests_total{${s.labels}} ${s.requests}`),
      '# HELP http_request_duration_seconds The HTTP request latencies in seconds.',
      '# TYPE http_request_duration_seconds histogram',
      ...all.flatMap((s) =>
        s.duration.render('http_request_duration_seconds', s.labels)
      ),
      '# HELP http_request_size_bytes The HTTP request sizes in bytes.',
      '# TYPE http_request_size_bytes histogram',
      ...all.flatMap((s) =>
        s.requestSize.render('http_request_size_bytes', s.labels)
      ),
      '# HELP http_response_size_bytes The HTTP response sizes in bytes.',
      '# TYPE http_response_size_bytes histogram',
      ...all.flatMap((s) =>
        s.responseSize.render('http_response_size_bytes', s.labels)
      ),
    ];
    return `${lines.join('\n')}\n`;
  }
}
