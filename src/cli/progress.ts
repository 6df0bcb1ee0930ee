import type { Logger } from "../observability";
import type { TransferProgress } from "../types";

/**
 * Turns per-chunk progress callbacks into `transfer_progress` log lines, at
 * most one per resource every `intervalMs`, plus one when a known total is
 * reached.
 */
export function createProgressReporter(
  logger: Logger,
  intervalMs: number,
  now: () => number = Date.now,
): (progress: TransferProgress) => void {
  const lastReported = new Map<string, number>();

  return (progress) => {
    const current = now();
    const finished = progress.totalBytes !== undefined && progress.bytesSoFar >= progress.totalBytes;
    const previous = lastReported.get(progress.name);
    if (!finished && previous !== undefined && current - previous < intervalMs) {
      return;
    }
    lastReported.set(progress.name, current);

    logger.info("transfer_progress", {
      resource: progress.name,
      bytesSoFar: progress.bytesSoFar,
      totalBytes: progress.totalBytes,
      percent:
        progress.totalBytes !== undefined && progress.totalBytes > 0
          ? Number(((progress.bytesSoFar / progress.totalBytes) * 100).toFixed(1))
          : undefined,
      elapsedMs: progress.elapsedMs,
    });
    if (finished) {
      lastReported.delete(progress.name);
    }
  };
}
