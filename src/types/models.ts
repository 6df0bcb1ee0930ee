export interface Period {
  readonly label: string;
  readonly catalogUrl: string;
}

export interface ResourceDescriptor {
  readonly name: string;
  readonly downloadUrl: string;
  readonly format?: string;
  readonly declaredSizeBytes?: number;
  readonly title?: string;
  readonly sourcePageUrl?: string;
}

export type ErrorKind = "fetch" | "parse" | "transient" | "terminal" | "size_mismatch" | "io" | "cancelled";

export type TransferStatus = "completed" | "skipped" | "failed";

export interface TransferOutcome {
  readonly resource: ResourceDescriptor;
  readonly period: Period;
  readonly status: TransferStatus;
  readonly bytesWritten: number;
  readonly attempts: number;
  readonly error?: ErrorKind;
  readonly errorMessage?: string;
  readonly resumedFromBytes?: number;
  readonly durationMs?: number;
}

export interface RunSummary {
  downloaded: number;
  skipped: number;
  failed: number;
}

export interface TransferProgress {
  name: string;
  bytesSoFar: number;
  totalBytes?: number;
  elapsedMs: number;
}
