export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  period?: string;
  resource?: string;
  url?: string;
  pageUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "periods_discovered"
  | "resources_resolved"
  | "resources_omitted"
  | "transfers_completed"
  | "transfers_skipped"
  | "transfers_failed"
  | "transfer_retries"
  | "bytes_downloaded";

export type MetricTimerName = "page_fetch_ms" | "transfer_ms";
