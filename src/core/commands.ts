import fs from "node:fs";
import path from "node:path";
import type { Prompter } from "../cli/prompt";
import type { AppConfig } from "../config";
import { discoverPeriods, resolveResources, sanitizeFileName } from "../crawl";
import {
  ConflictPolicy,
  ConflictSession,
  TransferManager,
  ensureWritableDirectory,
  runDownloader,
} from "../download";
import type { DownloaderDeps, TransferWorkItem } from "../download";
import { RunLedger, readManifest, toManifestRecord, writeManifest } from "../ledger";
import type { ManifestRecord } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { parsePeriodSelection } from "../selection";
import type { Period, ResourceDescriptor, RunSummary, TransferProgress } from "../types";
import { CancelledError, FetchError, ParseError, errorMessage } from "./errors";
import type { FetchFn } from "./fetch";
import type { HttpDeps } from "./http";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  prompter?: Prompter;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
}

export interface DownloadOptions {
  /** Selection expression; when absent the prompter asks for one. */
  selection?: string;
}

function httpDeps(ctx: CommandContext, component: string): HttpDeps {
  return {
    config: ctx.config,
    logger: ctx.logger.child(component),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
    signal: ctx.signal,
  };
}

function requirePrompter(ctx: CommandContext): Prompter {
  if (!ctx.prompter) {
    throw new Error("interactive input is required but no prompter is available");
  }
  return ctx.prompter;
}

function manifestPath(config: AppConfig): string {
  return path.join(path.resolve(config.outputDir), config.manifestFileName);
}

async function selectPeriods(ctx: CommandContext, periods: Period[], selection?: string): Promise<Period[]> {
  if (selection === undefined) {
    return requirePrompter(ctx).selectPeriods(periods);
  }
  const result = parsePeriodSelection(selection, periods.length);
  if (!result.ok) {
    throw new Error(`Invalid period selection: ${result.reason}`);
  }
  return result.indices.map((index) => periods[index]);
}

function createPipeline(ctx: CommandContext, ledger: RunLedger): DownloaderDeps {
  const session = ConflictSession.fromMode(ctx.config.onExisting);
  const policy = new ConflictPolicy((existing) => requirePrompter(ctx).chooseConflict(existing));
  const transfers = new TransferManager({
    config: ctx.config,
    logger: ctx.logger.child("transfer"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
  });
  return {
    config: ctx.config,
    logger: ctx.logger.child("downloader"),
    metrics: ctx.metrics,
    ledger,
    policy,
    session,
    transfers,
    signal: ctx.signal,
    onProgress: ctx.onProgress,
  };
}

export async function runList(ctx: CommandContext): Promise<Period[]> {
  ctx.logger.info("list_start", { catalogUrl: ctx.config.catalogUrl });
  const periods = await discoverPeriods(ctx.config.catalogUrl, httpDeps(ctx, "catalog"));
  periods.forEach((period, index) => {
    console.log(`${String(index + 1).padStart(3, " ")}. ${period.label}  ${period.catalogUrl}`);
  });
  ctx.logger.info("list_complete", { periods: periods.length });
  return periods;
}

/**
 * Discovers the catalog, lets the user pick periods, then resolves and
 * transfers every resource of each picked period in order. The ledger is
 * finalized on every exit path, including aborts.
 */
export async function runDownload(ctx: CommandContext, options: DownloadOptions = {}): Promise<RunSummary> {
  const { config } = ctx;
  const baseDir = path.resolve(config.outputDir);
  const ledger = new RunLedger(manifestPath(config), ctx.logger.child("ledger"));
  ctx.logger.info("download_start", { catalogUrl: config.catalogUrl, baseDir, onExisting: config.onExisting });

  try {
    const periods = await discoverPeriods(config.catalogUrl, httpDeps(ctx, "catalog"));
    if (periods.length === 0) {
      ctx.logger.warn("download_no_periods", { catalogUrl: config.catalogUrl });
      return ledger.summary;
    }

    const selected = await selectPeriods(ctx, periods, options.selection);
    ctx.logger.info("download_periods_selected", { periods: selected.map((period) => period.label) });
    await ensureWritableDirectory(baseDir);

    const pipeline = createPipeline(ctx, ledger);
    const resolverDeps = httpDeps(ctx, "resolver");

    for (const [index, period] of selected.entries()) {
      if (ctx.signal?.aborted) {
        ctx.logger.warn("download_interrupted", { remainingPeriods: selected.length - index });
        break;
      }

      ctx.logger.info("period_start", { period: period.label, position: index + 1, of: selected.length });
      const periodDir = path.join(baseDir, sanitizeFileName(period.label));
      await ensureWritableDirectory(periodDir);

      let resources: ResourceDescriptor[];
      try {
        resources = await resolveResources(period, resolverDeps);
      } catch (error) {
        if (error instanceof FetchError || error instanceof ParseError) {
          ctx.logger.error("period_resolve_failed", {
            period: period.label,
            pageUrl: period.catalogUrl,
            errorKind: error.kind,
            error: errorMessage(error),
          });
          continue;
        }
        if (error instanceof CancelledError) {
          break;
        }
        throw error;
      }

      if (resources.length === 0) {
        ctx.logger.info("period_no_resources", { period: period.label });
        continue;
      }

      const items: TransferWorkItem[] = resources.map((resource) => ({
        period,
        resource,
        destinationPath: path.join(periodDir, resource.name),
      }));
      await runDownloader(pipeline, items);
      ctx.logger.info("period_complete", { period: period.label, ...ledger.summary });
    }
  } finally {
    const summary = await ledger.finalize();
    ctx.logger.info("run_summary", {
      ...summary,
      attempted: ledger.attempted,
      interrupted: ctx.signal?.aborted ?? false,
    });
  }

  return ledger.summary;
}

function toWorkItem(record: ManifestRecord, baseDir: string, catalogUrl: string): TransferWorkItem {
  const period: Period = Object.freeze({ label: record.period, catalogUrl });
  const name = sanitizeFileName(record.fileName);
  return {
    period,
    resource: Object.freeze({ name, downloadUrl: record.url }),
    destinationPath: path.join(baseDir, sanitizeFileName(record.period), name),
  };
}

/**
 * Replays the failure manifest of an earlier run. The manifest is removed on a
 * clean replay and otherwise rewritten with what still failed plus anything an
 * interrupt kept from being attempted.
 */
export async function runRetry(ctx: CommandContext): Promise<RunSummary> {
  const { config } = ctx;
  const baseDir = path.resolve(config.outputDir);
  const sourcePath = manifestPath(config);

  if (!fs.existsSync(sourcePath)) {
    ctx.logger.info("retry_nothing_to_do", { manifestPath: sourcePath });
    return { downloaded: 0, skipped: 0, failed: 0 };
  }

  const records = await readManifest(sourcePath);
  ctx.logger.info("retry_start", { manifestPath: sourcePath, records: records.length });

  const ledger = new RunLedger(sourcePath, ctx.logger.child("ledger"));
  const entries = records.map((record) => ({ record, item: toWorkItem(record, baseDir, config.catalogUrl) }));
  const items = entries.map((entry) => entry.item);
  let notStarted: TransferWorkItem[] = items;

  try {
    for (const directory of new Set(items.map((item) => path.dirname(item.destinationPath)))) {
      await ensureWritableDirectory(directory);
    }
    notStarted = await runDownloader(createPipeline(ctx, ledger), items);
  } finally {
    const summary = await ledger.finalize();
    const notStartedSet = new Set(notStarted);
    const pending = entries.filter((entry) => notStartedSet.has(entry.item)).map((entry) => entry.record);

    if (pending.length > 0) {
      await writeManifest(sourcePath, [...ledger.failedOutcomes.map(toManifestRecord), ...pending]);
    } else if (summary.failed === 0) {
      await fs.promises.rm(sourcePath, { force: true });
      ctx.logger.info("retry_manifest_cleared", { manifestPath: sourcePath });
    }
    ctx.logger.info("run_summary", {
      ...summary,
      attempted: ledger.attempted,
      notAttempted: pending.length,
      interrupted: ctx.signal?.aborted ?? false,
    });
  }

  return ledger.summary;
}
