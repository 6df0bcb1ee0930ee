import fs from "node:fs";
import path from "node:path";
import type { ErrorKind, TransferOutcome } from "../types";

export interface ManifestRecord {
  period: string;
  fileName: string;
  url: string;
  errorKind: ErrorKind;
}

const SEPARATOR = ", ";

const ERROR_KINDS: readonly ErrorKind[] = ["fetch", "parse", "transient", "terminal", "size_mismatch", "io", "cancelled"];

export function toManifestRecord(outcome: TransferOutcome): ManifestRecord {
  return {
    period: outcome.period.label,
    fileName: outcome.resource.name,
    url: outcome.resource.downloadUrl,
    errorKind: outcome.error ?? "terminal",
  };
}

export function formatManifestLine(record: ManifestRecord): string {
  return [record.period, record.fileName, record.url, record.errorKind].join(SEPARATOR);
}

/**
 * Inverse of `formatManifestLine`. The URL is whatever sits between the file
 * name and the trailing error kind, so a URL containing the separator still
 * parses.
 */
export function parseManifestLine(line: string): ManifestRecord | undefined {
  const trimmed = line.trim();
  const first = trimmed.indexOf(SEPARATOR);
  const second = first >= 0 ? trimmed.indexOf(SEPARATOR, first + SEPARATOR.length) : -1;
  const last = trimmed.lastIndexOf(SEPARATOR);
  if (first < 0 || second < 0 || last <= second) {
    return undefined;
  }

  const errorKind = ERROR_KINDS.find((kind) => kind === trimmed.slice(last + SEPARATOR.length));
  const url = trimmed.slice(second + SEPARATOR.length, last);
  if (!errorKind || !url) {
    return undefined;
  }

  return {
    period: trimmed.slice(0, first),
    fileName: trimmed.slice(first + SEPARATOR.length, second),
    url,
    errorKind,
  };
}

export async function writeManifest(manifestPath: string, records: ManifestRecord[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(manifestPath), { recursive: true });
  const tempPath = `${manifestPath}.tmp`;
  const content = records.map((record) => formatManifestLine(record)).join("\n") + "\n";
  await fs.promises.writeFile(tempPath, content, "utf-8");
  await fs.promises.rename(tempPath, manifestPath);
}

export async function readManifest(manifestPath: string): Promise<ManifestRecord[]> {
  const content = await fs.promises.readFile(manifestPath, "utf-8");
  const records: ManifestRecord[] = [];
  for (const line of content.split(/\r?\n/)) {
    const record = parseManifestLine(line);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
