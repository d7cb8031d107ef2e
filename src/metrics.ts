/**
 * Prometheus counters for the webhook, rendered in the text exposition format.
 */

export const METRICS = {
  ADMISSION_REQUESTS_TOTAL: 'webhook_admission_requests_total',
  HTTP_ERRORS_TOTAL: 'webhook_http_errors_total',
} as const;

export type MetricName = (typeof METRICS)[keyof typeof METRICS];

interface Counter {
  value: number;
  labels: Record<string, string>;
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, Counter>>();

  incrementCounter(name: MetricName, labels: Record<string, string> = {}, value = 1): void {
    let series = this.counters.get(name);
    if (!series) {
      series = new Map();
      this.counters.set(name, series);
    }

    const labelKey = this.getLabelKey(labels);
    const counter = series.get(labelKey);
    if (counter) {
      counter.value += value;
    } else {
      series.set(labelKey, { value, labels: { ...labels } });
    }
  }

  getCounter(name: MetricName, labels: Record<string, string> = {}): number {
    return this.counters.get(name)?.get(this.getLabelKey(labels))?.value ?? 0;
  }

  generatePrometheusMetrics(): string {
    const lines: string[] = [];
    this.counters.forEach((series, name) => {
      lines.push(`# TYPE ${name} counter`);
      series.forEach((counter) => {
        lines.push(`${name}${this.formatLabels(counter.labels)} ${counter.value}`);
      });
    });
    return lines.join('\n') + '\n';
  }

  private getLabelKey(labels: Record<string, string>): string {
    return JSON.stringify(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
  }

  private formatLabels(labels: Record<string, string>): string {
    const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
    if (entries.length === 0) return '';

    const formatted = entries
      .map(([key, value]) => {
        const escaped = value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
        return `${key}="${escaped}"`;
      })
      .join(',');

    return `{${formatted}}`;
  }
}
