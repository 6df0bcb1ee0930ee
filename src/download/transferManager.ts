import fs from "node:fs";
import path from "node:path";
import type { Response } from "undici";
import type { AppConfig } from "../config";
import {
  CancelledError,
  HarvestError,
  SizeMismatchError,
  TransferError,
  errorKindOf,
  errorMessage,
  toIOError,
} from "../core/errors";
import { defaultFetch, getFetchDispatcher } from "../core/fetch";
import type { FetchFn } from "../core/fetch";
import { backoffDelayMs, isRetriableStatus, sleep } from "../core/http";
import type { Logger, MetricsRegistry } from "../observability";
import type { Period, ResourceDescriptor, TransferOutcome, TransferProgress, TransferStatus } from "../types";

export interface TransferManagerDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export interface TransferOptions {
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
}

interface TransferState {
  readonly startedAt: number;
  bytesWritten: number;
  attempts: number;
}

export function stagingPathFor(destinationPath: string): string {
  return `${destinationPath}.part`;
}

async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw toIOError(error, filePath);
  }
}

async function onDisk<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toIOError(error, filePath);
  }
}

function contentRangeStart(response: Response): number | undefined {
  const match = response.headers.get("content-range")?.match(/^bytes\s+(\d+)-/i);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

function contentLength(response: Response): number | undefined {
  const raw = response.headers.get("content-length");
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Aborts the request when no bytes arrive for `idleMs`, or when the run's
 * signal fires.
 */
class IdleWatchdog {
  private readonly controller = new AbortController();
  private readonly idleMs: number;
  private timer: NodeJS.Timeout;
  readonly signal: AbortSignal;

  constructor(idleMs: number, runSignal?: AbortSignal) {
    this.idleMs = idleMs;
    this.signal = runSignal ? AbortSignal.any([this.controller.signal, runSignal]) : this.controller.signal;
    this.timer = this.arm();
  }

  touch(): void {
    clearTimeout(this.timer);
    this.timer = this.arm();
  }

  stop(): void {
    clearTimeout(this.timer);
  }

  private arm(): NodeJS.Timeout {
    return setTimeout(() => this.controller.abort(new Error(`no data for ${this.idleMs}ms`)), this.idleMs);
  }
}

export class TransferManager {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;

  constructor(deps: TransferManagerDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
  }

  async transfer(
    resource: ResourceDescriptor,
    period: Period,
    destinationPath: string,
    options: TransferOptions = {},
  ): Promise<TransferOutcome> {
    const stagingPath = stagingPathFor(destinationPath);
    const state: TransferState = { startedAt: Date.now(), bytesWritten: 0, attempts: 0 };
    const stopTimer = this.metrics.startTimer("transfer_ms");
    const fields = { period: period.label, resource: resource.name, url: resource.downloadUrl };
    let resumedFromBytes: number | undefined;

    const outcome = (status: TransferStatus, error?: unknown): TransferOutcome =>
      Object.freeze({
        resource,
        period,
        status,
        bytesWritten: state.bytesWritten,
        attempts: state.attempts,
        error: error === undefined ? undefined : errorKindOf(error),
        errorMessage: error === undefined ? undefined : errorMessage(error),
        resumedFromBytes,
        durationMs: stopTimer(),
      });

    try {
      const offset = await this.prepareStaging(destinationPath, stagingPath, resource.declaredSizeBytes);
      resumedFromBytes = offset > 0 ? offset : undefined;

      const finalSize = await this.runAttempts(resource, stagingPath, offset, state, options, fields);
      if (resource.declaredSizeBytes !== undefined && finalSize !== resource.declaredSizeBytes) {
        throw new SizeMismatchError(resource.declaredSizeBytes, finalSize);
      }

      await onDisk(destinationPath, () => fs.promises.rename(stagingPath, destinationPath));
      this.metrics.incrementCounter("transfers_completed", 1);
      const completed = outcome("completed");
      this.logger.info("transfer_completed", {
        ...fields,
        attempts: completed.attempts,
        bytesWritten: completed.bytesWritten,
        finalSize,
        durationMs: completed.durationMs,
      });
      return completed;
    } catch (error) {
      if (!(error instanceof HarvestError)) {
        throw error;
      }
      if (error instanceof SizeMismatchError) {
        // A staging file of the wrong size cannot seed a later resume.
        await fs.promises.rm(stagingPath, { force: true }).catch((rmError: unknown) => {
          this.logger.warn("transfer_staging_remove_failed", { ...fields, error: errorMessage(rmError) });
        });
      }

      this.metrics.incrementCounter("transfers_failed", 1);
      const failed = outcome("failed", error);
      this.logger.error("transfer_failed", {
        ...fields,
        attempts: failed.attempts,
        errorKind: failed.error,
        error: failed.errorMessage,
        stagingKept: !(error instanceof SizeMismatchError),
      });
      return failed;
    }
  }

  /**
   * Retries transient failures up to `maxTransferAttempts`. The resume offset
   * is tracked apart from the attempt counter: each retry continues from
   * whatever the staging file holds at that point.
   */
  private async runAttempts(
    resource: ResourceDescriptor,
    stagingPath: string,
    initialOffset: number,
    state: TransferState,
    options: TransferOptions,
    fields: Record<string, string>,
  ): Promise<number> {
    const maxAttempts = Math.max(1, this.config.maxTransferAttempts);
    let offset = initialOffset;

    for (let attempt = 1; ; attempt += 1) {
      if (options.signal?.aborted) {
        throw new CancelledError();
      }
      if (resource.declaredSizeBytes !== undefined && offset > 0 && offset >= resource.declaredSizeBytes) {
        return offset;
      }

      state.attempts = attempt;
      this.logger.info("transfer_attempt_start", { ...fields, attempt, offset });
      try {
        return await this.attempt(resource, stagingPath, offset, state, options);
      } catch (error) {
        const retrying = error instanceof TransferError && error.transient && attempt < maxAttempts;
        this.logger.warn("transfer_attempt_failed", {
          ...fields,
          attempt,
          retrying,
          errorKind: errorKindOf(error),
          error: errorMessage(error),
        });
        if (!retrying) {
          throw error;
        }

        this.metrics.incrementCounter("transfer_retries", 1);
        await sleep(backoffDelayMs(attempt, this.config.retryBaseDelayMs, this.config.retryMaxDelayMs), options.signal);
        offset = (await fileSize(stagingPath)) ?? 0;
      }
    }
  }

  /**
   * Moves an incomplete file out of the final path and returns the byte
   * offset to resume from. Resuming needs a known declared size.
   */
  private async prepareStaging(destinationPath: string, stagingPath: string, declared?: number): Promise<number> {
    await onDisk(path.dirname(destinationPath), () =>
      fs.promises.mkdir(path.dirname(destinationPath), { recursive: true }),
    );

    const staged = await fileSize(stagingPath);
    if (declared === undefined) {
      return 0;
    }

    if (staged === undefined) {
      const existing = await fileSize(destinationPath);
      if (existing !== undefined && existing > 0 && existing < declared) {
        await onDisk(destinationPath, () => fs.promises.rename(destinationPath, stagingPath));
        return existing;
      }
      return 0;
    }

    return staged < declared ? staged : 0;
  }

  private async attempt(
    resource: ResourceDescriptor,
    stagingPath: string,
    offset: number,
    state: TransferState,
    options: TransferOptions,
  ): Promise<number> {
    const watchdog = new IdleWatchdog(this.config.downloadTimeoutMs, options.signal);
    try {
      let response = await this.request(resource.downloadUrl, offset, watchdog, options.signal);

      if (response.status === 416 && offset > 0) {
        this.logger.warn("transfer_range_not_satisfiable", { resource: resource.name, offset });
        await response.body?.cancel();
        offset = 0;
        response = await this.request(resource.downloadUrl, 0, watchdog, options.signal);
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransferError(isRetriableStatus(response.status), `HTTP ${response.status}`, response.status);
      }

      const body = response.body;
      if (!body) {
        throw new TransferError(false, "response has no body", response.status);
      }

      let append = false;
      if (offset > 0) {
        if (response.status === 206) {
          const start = contentRangeStart(response);
          if (start !== undefined && start !== offset) {
            await body.cancel();
            throw new TransferError(false, `content-range starts at ${start}, expected ${offset}`, response.status);
          }
          append = true;
        } else {
          this.logger.warn("transfer_range_ignored", { resource: resource.name, offset, statusCode: response.status });
        }
      }

      const length = contentLength(response);
      const base = append ? offset : 0;
      const totalBytes = resource.declaredSizeBytes ?? (length !== undefined ? base + length : undefined);
      const handle = await onDisk(stagingPath, () => fs.promises.open(stagingPath, append ? "a" : "w"));
      const reader = body.getReader();
      let written = base;

      try {
        for (;;) {
          if (options.signal?.aborted) {
            throw new CancelledError();
          }

          let chunk: Uint8Array;
          try {
            const next = await reader.read();
            if (next.done) {
              break;
            }
            chunk = next.value;
          } catch (error) {
            throw this.networkFailure(error, options.signal);
          }

          watchdog.touch();
          await onDisk(stagingPath, () => handle.write(chunk));
          written += chunk.byteLength;
          state.bytesWritten += chunk.byteLength;
          this.metrics.incrementCounter("bytes_downloaded", chunk.byteLength);
          options.onProgress?.({
            name: resource.name,
            bytesSoFar: written,
            totalBytes,
            elapsedMs: Date.now() - state.startedAt,
          });
        }
      } catch (error) {
        await reader.cancel().catch((cancelError: unknown) => {
          this.logger.debug("transfer_body_cancel_failed", { resource: resource.name, error: errorMessage(cancelError) });
        });
        throw error;
      } finally {
        await onDisk(stagingPath, () => handle.close());
      }

      return written;
    } finally {
      watchdog.stop();
    }
  }

  private async request(url: string, offset: number, watchdog: IdleWatchdog, runSignal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      "user-agent": this.config.userAgent,
      accept: "*/*",
    };
    if (offset > 0) {
      headers.range = `bytes=${offset}-`;
    }

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers,
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: watchdog.signal,
        redirect: "follow",
      });
      watchdog.touch();
      return response;
    } catch (error) {
      throw this.networkFailure(error, runSignal);
    }
  }

  private networkFailure(error: unknown, runSignal?: AbortSignal): HarvestError {
    if (runSignal?.aborted) {
      return new CancelledError();
    }
    if (error instanceof HarvestError) {
      return error;
    }
    return new TransferError(true, errorMessage(error), undefined, { cause: error });
  }
}
