import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LogLevel } from "../observability/types";
import type { AppConfig, ConfigOverrides, OnExistingMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  catalogUrl: "https://dadosabertos.tse.jus.br/dataset/?groups=candidatos",
  userAgent: "dataset-harvester/1.0 (bulk download of open election data)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 60_000,
  maxPages: 50,
  maxPageAttempts: 3,
  maxTransferAttempts: 3,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 10_000,
  transferConcurrency: 1,
  progressIntervalMs: 2_000,
  outputDir: "dados-tse",
  manifestFileName: "failed_downloads.txt",
  onExisting: "prompt",
  logLevel: "info",
  periodLinkPattern: "Candidatos\\D{0,10}((?:19|20)\\d{2})",
  resourceSectionKeywords: ["dados", "recursos"],
  exploreLinkPattern: "explorar|explore|ir para recurso|go to resource",
  downloadExtensions: [".zip", ".csv", ".pdf", ".txt", ".xlsx", ".xls", ".jpg", ".jpeg"],
  downloadHostHints: ["cdn.tse.jus.br"],
};

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
const ON_EXISTING_MODES = ["prompt", "skip", "overwrite"] as const;

const ConfigFileSchema = z
  .object({
    catalogUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    maxPages: z.number().int().positive(),
    maxPageAttempts: z.number().int().positive(),
    maxTransferAttempts: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    retryMaxDelayMs: z.number().int().nonnegative(),
    transferConcurrency: z.number().int().positive(),
    progressIntervalMs: z.number().int().nonnegative(),
    outputDir: z.string().min(1),
    manifestFileName: z.string().min(1),
    onExisting: z.enum(ON_EXISTING_MODES),
    logLevel: z.enum(LOG_LEVELS),
    periodLinkPattern: z.string().min(1),
    resourceSectionKeywords: z.array(z.string().min(1)),
    exploreLinkPattern: z.string().min(1),
    downloadExtensions: z.array(z.string().min(1)),
    downloadHostHints: z.array(z.string()),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? fallback;
}

export function toOnExistingMode(value: string | undefined, fallback: OnExistingMode): OnExistingMode {
  return ON_EXISTING_MODES.find((mode) => mode === value?.trim().toLowerCase()) ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    ...merged,
    catalogUrl: env.CATALOG_URL ?? merged.catalogUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    maxPageAttempts: toInt(env.MAX_PAGE_ATTEMPTS, merged.maxPageAttempts),
    maxTransferAttempts: toInt(env.MAX_TRANSFER_ATTEMPTS, merged.maxTransferAttempts),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    retryMaxDelayMs: toInt(env.RETRY_MAX_DELAY_MS, merged.retryMaxDelayMs),
    transferConcurrency: toInt(env.TRANSFER_CONCURRENCY, merged.transferConcurrency),
    progressIntervalMs: toInt(env.PROGRESS_INTERVAL_MS, merged.progressIntervalMs),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    onExisting: toOnExistingMode(env.ON_EXISTING, merged.onExisting),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
