export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  url?: string;
  module?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName = "links_ok" | "links_failed" | "resolve_retries" | "transfer_restarts";

export type MetricTimerName = "resolve_ms" | "transfer_ms";
