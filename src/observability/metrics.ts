import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
  /** Bytes received per second of transfer time; 0 before any transfer finished. */
  bytesPerSecond: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  /** Returns a stop function; each call records and returns the elapsed time. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    const count = (name: MetricCounterName): number => this.counters.get(name) ?? 0;
    return {
      pages_crawled: count("pages_crawled"),
      periods_discovered: count("periods_discovered"),
      resources_resolved: count("resources_resolved"),
      resources_omitted: count("resources_omitted"),
      transfers_completed: count("transfers_completed"),
      transfers_skipped: count("transfers_skipped"),
      transfers_failed: count("transfers_failed"),
      transfer_retries: count("transfer_retries"),
      bytes_downloaded: count("bytes_downloaded"),
    };
  }

  snapshot(): MetricsSnapshot {
    const counters = this.getCounters();
    const timers: Record<MetricTimerName, TimerSummary> = {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      transfer_ms: this.summarize("transfer_ms"),
    };
    const transferMs = timers.transfer_ms.totalMs;
    const bytesPerSecond = transferMs > 0 ? Math.round((counters.bytes_downloaded * 1000) / transferMs) : 0;
    return { counters, timers, bytesPerSecond };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", { ...this.snapshot() });
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, totalMs: 0, minMs: 0, maxMs: 0, avgMs: 0 };
    }

    const totalMs = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      totalMs,
      minMs: Math.min(...values),
      maxMs: Math.max(...values),
      avgMs: Number((totalMs / values.length).toFixed(2)),
    };
  }
}
