/**
 * Prometheus Metrics Service
 * Exposes engine metrics in Prometheus format
 */

import { structuredLogger } from './logger.js';

interface Counter {
  name: string;
  help: string;
  values: Map<string, number>;
}

interface Gauge {
  name: string;
  help: string;
  values: Map<string, number>;
}

interface Histogram {
  name: string;
  help: string;
  buckets: number[];
  values: Map<string, { sum: number; count: number; buckets: number[] }>;
}

class MetricsService {
  private counters: Map<string, Counter> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.initializeMetrics();
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.registerCounter('http_requests_total', 'Total HTTP requests');
    this.registerHistogram('http_request_duration_seconds', 'HTTP request duration', [0.01, 0.05, 0.1, 0.5, 1, 5]);

    // Feed metrics
    this.registerCounter('venue_events_total', 'Venue events by outcome');
    this.registerCounter('venue_gaps_total', 'Sequence gaps detected');
    this.registerCounter('venue_reconnects_total', 'Reconnect attempts');
    this.registerGauge('venue_up', 'Venue status (1=UP, 0.5=RESYNCING/RECONNECTING, 0=DOWN)');

    // Opportunity metrics
    this.registerCounter('opportunities_detected_total', 'Opportunities detected');
    this.registerCounter('opportunities_vetoed_total', 'Opportunities vetoed by risk');
    this.registerHistogram('risk_evaluation_seconds', 'Risk evaluation duration', [0.05, 0.1, 0.25, 0.5, 1, 2]);

    // Execution metrics
    this.registerCounter('executions_total', 'Execution outcomes');
    this.registerCounter('submissions_rejected_total', 'Submissions rejected before dispatch');
    this.registerGauge('locks_held', 'Resource keys currently locked');
    this.registerHistogram('execution_seconds', 'Signing collaborator round-trip', [0.25, 0.5, 1, 2, 5, 15]);

    // Process
    this.registerGauge('uptime_seconds', 'Service uptime in seconds');
    this.registerGauge('websocket_connections', 'Active WebSocket connections');
  }

  private registerCounter(name: string, help: string): void {
    this.counters.set(name, { name, help, values: new Map() });
  }

  private registerGauge(name: string, help: string): void {
    this.gauges.set(name, { name, help, values: new Map() });
  }

  private registerHistogram(name: string, help: string, buckets: number[]): void {
    this.histograms.set(name, { name, help, buckets, values: new Map() });
  }

  private getLabelKey(labels: Record<string, string>): string {
    return Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
  }

  /**
   * Increment a counter
   */
  incCounter(name: string, labels: Record<string, string> = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    if (!counter) return;

    const key = this.getLabelKey(labels);
    counter.values.set(key, (counter.values.get(key) ?? 0) + value);
  }

  /**
   * Set a gauge value
   */
  setGauge(name: string, value: number, labels: Record<string, string> = {}): void {
    const gauge = this.gauges.get(name);
    if (!gauge) return;

    gauge.values.set(this.getLabelKey(labels), value);
  }

  /**
   * Observe a histogram value
   */
  observeHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.histograms.get(name);
    if (!histogram) return;

    const key = this.getLabelKey(labels);
    const existing = histogram.values.get(key) ?? {
      sum: 0,
      count: 0,
      buckets: new Array<number>(histogram.buckets.length).fill(0),
    };

    existing.sum += value;
    existing.count += 1;

    for (let i = 0; i < histogram.buckets.length; i++) {
      if (value <= histogram.buckets[i]) {
        existing.buckets[i] += 1;
      }
    }

    histogram.values.set(key, existing);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(name)?.values.get(this.getLabelKey(labels)) ?? 0;
  }

  recordHttpRequest(method: string, path: string, status: number, durationMs: number): void {
    const normalizedPath = this.normalizePath(path);
    this.incCounter('http_requests_total', { method, path: normalizedPath, status: status.toString() });
    this.observeHistogram('http_request_duration_seconds', durationMs / 1000, { method, path: normalizedPath });
  }

  /**
   * Normalize path for metrics (remove UUIDs, addresses)
   */
  private normalizePath(path: string): string {
    return path
      .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
      .replace(/0x[a-fA-F0-9]{40}/g, ':address')
      .replace(/\/\d+/g, '/:num');
  }

  /**
   * Generate Prometheus format output
   */
  getMetrics(): string {
    this.setGauge('uptime_seconds', process.uptime());

    const lines: string[] = [];

    for (const [name, counter] of this.counters) {
      lines.push(`# HELP ${name} ${counter.help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [labels, value] of counter.values) {
        lines.push(`${name}${labels ? `{${labels}}` : ''} ${value}`);
      }
    }

    for (const [name, gauge] of this.gauges) {
      lines.push(`# HELP ${name} ${gauge.help}`);
      lines.push(`# TYPE ${name} gauge`);
      for (const [labels, value] of gauge.values) {
        lines.push(`${name}${labels ? `{${labels}}` : ''} ${value}`);
      }
    }

    for (const [name, histogram] of this.histograms) {
      lines.push(`# HELP ${name} ${histogram.help}`);
      lines.push(`# TYPE ${name} histogram`);
      for (const [labels, data] of histogram.values) {
        const labelPrefix = labels ? `${labels},` : '';
        for (let i = 0; i < histogram.buckets.length; i++) {
          lines.push(`${name}_bucket{${labelPrefix}le="${histogram.buckets[i]}"} ${data.buckets[i]}`);
        }
        lines.push(`${name}_bucket{${labelPrefix}le="+Inf"} ${data.count}`);
        lines.push(`${name}_sum${labels ? `{${labels}}` : ''} ${data.sum}`);
        lines.push(`${name}_count${labels ? `{${labels}}` : ''} ${data.count}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Get metrics as JSON (for API)
   */
  getMetricsJson(): Record<string, unknown> {
    const engine = structuredLogger.getMetrics();

    return {
      opportunities: {
        found: engine.opportunitiesFound,
        vetoed: engine.opportunitiesVetoed,
      },
      executions: {
        submitted: engine.executionsSubmitted,
        settled: engine.executionsSettled,
        failed: engine.executionsFailed,
        settleRate: engine.settleRate,
      },
      lastEventTime: engine.lastEventTime,
      uptime: process.uptime(),
    };
  }
}

export const metricsService = new MetricsService();
