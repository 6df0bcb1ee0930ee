import type { LogLevel } from "../observability/types";

export type OnExistingMode = "prompt" | "skip" | "overwrite";

export interface AppConfig {
  catalogUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxPages: number;
  maxPageAttempts: number;
  maxTransferAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  transferConcurrency: number;
  progressIntervalMs: number;
  outputDir: string;
  manifestFileName: string;
  onExisting: OnExistingMode;
  logLevel: LogLevel;
  periodLinkPattern: string;
  resourceSectionKeywords: string[];
  exploreLinkPattern: string;
  downloadExtensions: string[];
  downloadHostHints: string[];
}

export type ConfigOverrides = Partial<AppConfig>;
