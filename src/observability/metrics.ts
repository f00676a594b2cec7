import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSummary {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, HistogramSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      links_ok: this.counters.get("links_ok") ?? 0,
      links_failed: this.counters.get("links_failed") ?? 0,
      resolve_retries: this.counters.get("resolve_retries") ?? 0,
      transfer_restarts: this.counters.get("transfer_restarts") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      resolve_ms: this.summarize("resolve_ms"),
      transfer_ms: this.summarize("transfer_ms"),
    };
  }

  summary(): MetricsSummary {
    return {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    };
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
