/**
 * Prometheus metrics middleware + collector.
 *
 * Prometheus text format, written by hand.
 * Collects:
 * - http_requests_total (counter, by method + status + path)
 * - http_request_duration_seconds (histogram, by method + path)
 * - named business counters (strongbox_objects_total, strongbox_ledger_dropped_total)
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

type Labels = Readonly<Record<string, string>>;

interface CounterEntry {
  readonly labels: Labels;
  count: number;
}

interface HistogramEntry {
  readonly labels: Labels;
  sum: number;
  count: number;
  readonly buckets: Map<number, number>; // le → count
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export class MetricsCollector {
  private readonly _requests = new Map<string, CounterEntry>();
  private readonly _durations = new Map<string, HistogramEntry>();
  private readonly _buckets: readonly number[];

  /** name → labels-key → entry */
  private readonly _namedCounters = new Map<string, Map<string, CounterEntry>>();
  private readonly _help = new Map<string, string>();

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  /**
   * Record an HTTP request.
   */
  recordRequest(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ): void {
    bump(this._requests, { method, path, status: String(status) });

    const labels = { method, path };
    const key = labelsKey(labels);
    const durationSec = durationMs / 1000;
    let hist = this._durations.get(key);
    if (hist === undefined) {
      hist = {
        labels,
        sum: 0,
        count: 0,
        buckets: new Map(this._buckets.map((b) => [b, 0])),
      };
      this._durations.set(key, hist);
    }
    hist.sum += durationSec;
    hist.count++;
    for (const le of this._buckets) {
      if (durationSec <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  /**
   * Set the HELP line for a named counter.
   */
  describe(name: string, help: string): void {
    this._help.set(name, help);
  }

  /**
   * Increment a named counter with arbitrary labels.
   *
   * Used for business metrics like strongbox_objects_total{action="upload"}.
   */
  incrementCounter(name: string, labels: Labels = {}): void {
    let metric = this._namedCounters.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._namedCounters.set(name, metric);
    }
    bump(metric, labels);
  }

  /**
   * Current value of a named counter, 0 if never incremented.
   */
  counterValue(name: string, labels: Labels = {}): number {
    return this._namedCounters.get(name)?.get(labelsKey(labels))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests");
    lines.push("# TYPE http_requests_total counter");
    for (const entry of this._requests.values()) {
      lines.push(`http_requests_total${formatLabels(entry.labels)} ${entry.count}`);
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const hist of this._durations.values()) {
      for (const [le, count] of hist.buckets) {
        lines.push(
          `http_request_duration_seconds_bucket${formatLabels({ ...hist.labels, le: String(le) })} ${count}`,
        );
      }
      lines.push(
        `http_request_duration_seconds_bucket${formatLabels({ ...hist.labels, le: "+Inf" })} ${hist.count}`,
      );
      lines.push(`http_request_duration_seconds_sum${formatLabels(hist.labels)} ${hist.sum}`);
      lines.push(`http_request_duration_seconds_count${formatLabels(hist.labels)} ${hist.count}`);
    }

    for (const [name, entries] of this._namedCounters) {
      lines.push(`# HELP ${name} ${this._help.get(name) ?? "Business metric counter"}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of entries.values()) {
        lines.push(`${name}${formatLabels(labels)} ${count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    this._namedCounters.clear();
  }
}

// ─── Label helpers ──────────────────────────────────────────────────

function sortedEntries(labels: Labels): [string, string][] {
  return Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
}

function labelsKey(labels: Labels): string {
  return sortedEntries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function bump(entries: Map<string, CounterEntry>, labels: Labels): void {
  const key = labelsKey(labels);
  const entry = entries.get(key);
  if (entry !== undefined) {
    entry.count++;
  } else {
    entries.set(key, { labels: { ...labels }, count: 1 });
  }
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/**
 * `{a="1",b="2"}` in key order, or "" when there are no labels.
 */
export function formatLabels(labels: Labels): string {
  const entries = sortedEntries(labels);
  if (entries.length === 0) {
    return "";
  }
  return `{${entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(",")}}`;
}

// =============================================================================
// Middleware
// =============================================================================

const OBJECT_PATH = /^\/api\/v1\/objects\/[^/]+/;

/**
 * Collapse object ids so each route is one series.
 */
export function normalizePath(path: string): string {
  return path.replace(OBJECT_PATH, "/api/v1/objects/:objectId");
}

/**
 * Create metrics collection middleware.
 *
 * Records method, normalized path, status, and duration for every request.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(
      c.req.method,
      normalizePath(c.req.path),
      c.res.status,
      durationMs,
    );
  };
}
