import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { CancelledError, DestinationUnusableError, HarvestError, errorKindOf, errorMessage } from "../core/errors";
import type { RunLedger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import type { Period, ResourceDescriptor, TransferOutcome, TransferProgress } from "../types";
import type { ConflictPolicy, ConflictSession } from "./conflictPolicy";
import type { TransferManager } from "./transferManager";

export interface TransferWorkItem {
  period: Period;
  resource: ResourceDescriptor;
  destinationPath: string;
}

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  ledger: RunLedger;
  policy: ConflictPolicy;
  session: ConflictSession;
  transfers: TransferManager;
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. After the
 * first rejection no further items are started and that error is rethrown
 * once the running ones settle.
 */
async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const failure: { raised: boolean; error?: unknown } = { raised: false };
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (!failure.raised) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      try {
        await worker(items[current]);
      } catch (error) {
        if (!failure.raised) {
          failure.raised = true;
          failure.error = error;
        }
      }
    }
  });
  await Promise.all(slots);
  if (failure.raised) {
    throw failure.error;
  }
}

export async function ensureWritableDirectory(directory: string): Promise<void> {
  try {
    await fs.promises.mkdir(directory, { recursive: true });
    await fs.promises.access(directory, fs.constants.W_OK);
  } catch (error) {
    throw new DestinationUnusableError(directory, errorMessage(error), { cause: error });
  }
}

function skippedOutcome(item: TransferWorkItem): TransferOutcome {
  const outcome: TransferOutcome = {
    resource: item.resource,
    period: item.period,
    status: "skipped",
    bytesWritten: 0,
    attempts: 0,
  };
  return Object.freeze(outcome);
}

function failedBeforeTransfer(item: TransferWorkItem, error: HarvestError): TransferOutcome {
  const outcome: TransferOutcome = {
    resource: item.resource,
    period: item.period,
    status: "failed",
    bytesWritten: 0,
    attempts: 0,
    error: errorKindOf(error),
    errorMessage: errorMessage(error),
  };
  return Object.freeze(outcome);
}

/**
 * Conflict check, transfer and ledger entry for each work item. Returns the
 * items that were never started because the run was cancelled.
 */
export async function runDownloader(deps: DownloaderDeps, items: TransferWorkItem[]): Promise<TransferWorkItem[]> {
  const { config, logger, metrics, ledger, policy, session, transfers, signal } = deps;
  const started = new Set<TransferWorkItem>();

  await processWithConcurrency(items, config.transferConcurrency, async (item) => {
    if (signal?.aborted) {
      return;
    }
    started.add(item);
    const fields = { period: item.period.label, resource: item.resource.name };

    let action: "skip" | "overwrite";
    try {
      action = (await policy.decide(item.destinationPath, session)).action;
    } catch (error) {
      if (error instanceof CancelledError || !(error instanceof HarvestError)) {
        started.delete(item);
        throw error;
      }
      logger.error("conflict_check_failed", { ...fields, error: errorMessage(error) });
      metrics.incrementCounter("transfers_failed", 1);
      ledger.record(failedBeforeTransfer(item, error));
      return;
    }

    if (action === "skip") {
      logger.info("transfer_skipped", { ...fields, destinationPath: item.destinationPath });
      metrics.incrementCounter("transfers_skipped", 1);
      ledger.record(skippedOutcome(item));
      return;
    }

    const outcome = await transfers.transfer(item.resource, item.period, item.destinationPath, {
      signal,
      onProgress: deps.onProgress,
    });
    ledger.record(outcome);

    if (outcome.status === "failed" && outcome.error === "io") {
      // Throws when the directory itself is gone or read-only; that ends the run.
      await ensureWritableDirectory(path.dirname(item.destinationPath));
    }
  });

  return items.filter((item) => !started.has(item));
}
