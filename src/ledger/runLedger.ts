import type { Logger } from "../observability";
import type { RunSummary, TransferOutcome } from "../types";
import { toManifestRecord, writeManifest } from "./manifest";

/**
 * Tallies transfer outcomes for one run. `record` is synchronous, so workers
 * sharing a ledger on the event loop cannot interleave inside it.
 */
export class RunLedger {
  private readonly manifestPath: string;
  private readonly logger: Logger;
  private readonly counts: RunSummary = { downloaded: 0, skipped: 0, failed: 0 };
  private readonly failures: TransferOutcome[] = [];
  private finalized?: Promise<RunSummary>;

  constructor(manifestPath: string, logger: Logger) {
    this.manifestPath = manifestPath;
    this.logger = logger;
  }

  record(outcome: TransferOutcome): void {
    if (this.finalized) {
      this.logger.warn("ledger_record_after_finalize", { period: outcome.period.label, resource: outcome.resource.name });
      return;
    }

    switch (outcome.status) {
      case "completed":
        this.counts.downloaded += 1;
        break;
      case "skipped":
        this.counts.skipped += 1;
        break;
      case "failed":
        this.counts.failed += 1;
        this.failures.push(outcome);
        break;
    }
  }

  get summary(): RunSummary {
    return { ...this.counts };
  }

  get failedOutcomes(): readonly TransferOutcome[] {
    return [...this.failures];
  }

  get attempted(): number {
    return this.counts.downloaded + this.counts.skipped + this.counts.failed;
  }

  /** Writes the failure manifest when anything failed. Safe to call twice. */
  finalize(): Promise<RunSummary> {
    if (!this.finalized) {
      this.finalized = this.writeOut();
    }
    return this.finalized;
  }

  private async writeOut(): Promise<RunSummary> {
    if (this.failures.length > 0) {
      await writeManifest(this.manifestPath, this.failures.map(toManifestRecord));
      this.logger.info("ledger_manifest_written", { manifestPath: this.manifestPath, failed: this.failures.length });
    }
    return this.summary;
  }
}
