/**
 * Request, error and cache metrics, exported as JSON or in the Prometheus text format
 */

import { METRICS_CONSTANTS } from "../config/constants.ts";
import type { MemoryCacheStats } from "../cache/memory.ts";
import type { CacheTotalMetricRow } from "../db/schema.ts";

type Labels = Record<string, string | number>;

interface Sample {
  labels?: Labels;
  value: string | number;
}

interface RequestSeries {
  labels: { method: string; route: string; status: number };
  /** Cumulative counts, one per bound of METRICS_CONSTANTS.HISTOGRAM_BUCKETS, then +Inf */
  buckets: number[];
  sum: number;
  count: number;
}

/**
 * Snapshots read from other modules at export time
 */
export interface MetricsSources {
  memoryCache: MemoryCacheStats;
  cacheTotals: CacheTotalMetricRow[];
}

export interface HistogramSummary {
  sum: number;
  count: number;
  avg: number;
}

export interface MetricsSnapshot {
  uptime_seconds: number;
  requests_total: number;
  request_duration: Record<string, HistogramSummary>;
  errors_total: Record<string, number>;
  memory_cache: MemoryCacheStats;
  responses_in_cache_total: CacheTotalMetricRow[];
}

const BUCKET_BOUNDS: readonly number[] = [...METRICS_CONSTANTS.HISTOGRAM_BUCKETS, Infinity];

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function formatLabels(labels: Labels | undefined): string {
  if (!labels) return "";
  const pairs = Object.entries(labels).map(([name, value]) => `${name}="${escapeLabel(String(value))}"`);
  return `{${pairs.join(",")}}`;
}

/**
 * One metric family: HELP and TYPE lines, then its samples. Empty families are left out.
 */
function family(
  name: string,
  help: string,
  type: "counter" | "gauge" | "histogram",
  samples: readonly (Sample & { suffix?: string })[]
): string[] {
  if (samples.length === 0) return [];
  return [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} ${type}`,
    ...samples.map((sample) => `${name}${sample.suffix ?? ""}${formatLabels(sample.labels)} ${sample.value}`),
    "",
  ];
}

export class MetricsCollector {
  private requests = new Map<string, RequestSeries>();
  private errors = new Map<string, number>();
  private startTime = Date.now();

  recordRequest(method: string, route: string, status: number, durationMs: number): void {
    if (!METRICS_CONSTANTS.ENABLE_METRICS) return;

    const key = `${method} ${route} ${status}`;
    const series = this.requests.get(key) ?? {
      labels: { method, route, status },
      buckets: BUCKET_BOUNDS.map(() => 0),
      sum: 0,
      count: 0,
    };
    this.requests.set(key, series);

    const seconds = durationMs / 1000;
    series.sum += seconds;
    series.count++;
    BUCKET_BOUNDS.forEach((bound, i) => {
      if (seconds <= bound) series.buckets[i]++;
    });
  }

  /**
   * Counts an error response by its X-Error-Code
   */
  recordError(errorCode: string): void {
    if (!METRICS_CONSTANTS.ENABLE_METRICS) return;
    this.errors.set(errorCode, (this.errors.get(errorCode) ?? 0) + 1);
  }

  private uptimeSeconds(): number {
    return (Date.now() - this.startTime) / 1000;
  }

  getMetrics(sources: MetricsSources): MetricsSnapshot {
    const requestDuration: Record<string, HistogramSummary> = {};
    let requestsTotal = 0;
    for (const [key, series] of this.requests) {
      requestDuration[key] = {
        sum: series.sum,
        count: series.count,
        avg: series.count > 0 ? series.sum / series.count : 0,
      };
      requestsTotal += series.count;
    }

    return {
      uptime_seconds: this.uptimeSeconds(),
      requests_total: requestsTotal,
      request_duration: requestDuration,
      errors_total: Object.fromEntries(this.errors),
      memory_cache: sources.memoryCache,
      responses_in_cache_total: sources.cacheTotals,
    };
  }

  getPrometheusMetrics(sources: MetricsSources): string {
    const series = [...this.requests.values()];

    const durationSamples = series.flatMap(({ labels, buckets, sum, count }) => [
      ...BUCKET_BOUNDS.map((bound, i) => ({
        suffix: "_bucket",
        labels: { ...labels, le: bound === Infinity ? "+Inf" : String(bound) },
        value: buckets[i],
      })),
      { suffix: "_sum", labels, value: sum.toFixed(6) },
      { suffix: "_count", labels, value: count },
    ]);

    return [
      ...family("process_uptime_seconds", "Time since process started", "gauge", [
        { value: this.uptimeSeconds().toFixed(3) },
      ]),
      ...family(
        "http_requests_total",
        "Total number of handled HTTP requests",
        "counter",
        series.map(({ labels, count }) => ({ labels, value: count }))
      ),
      ...family("http_request_duration_seconds", "HTTP request duration", "histogram", durationSamples),
      ...family(
        "errors_total",
        "Total number of error responses by error code",
        "counter",
        [...this.errors].map(([code, count]) => ({ labels: { error_code: code }, value: count }))
      ),
      ...family("memory_cache_hits_total", "Aggregate cache hits", "counter", [{ value: sources.memoryCache.hits }]),
      ...family("memory_cache_misses_total", "Aggregate cache misses", "counter", [
        { value: sources.memoryCache.misses },
      ]),
      ...family("memory_cache_entries", "Aggregate cache entries", "gauge", [{ value: sources.memoryCache.size }]),
      ...family(
        "responses_in_cache_total",
        "Number of cached responses by kind, status and error code",
        "gauge",
        sources.cacheTotals.map((row) => ({
          labels: { kind: row.kind, http_status: row.http_status, error_code: row.error_code },
          value: row.total,
        }))
      ),
    ].join("\n");
  }

  reset(): void {
    this.requests = new Map();
    this.errors = new Map();
    this.startTime = Date.now();
  }
}

export const metricsCollector = new MetricsCollector();
