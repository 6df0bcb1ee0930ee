import type { ErrorKind } from "../types";

export class HarvestError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class FetchError extends HarvestError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, statusCode?: number, options?: { cause?: unknown }) {
    super("fetch", message, options);
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ParseError extends HarvestError {
  constructor(message: string) {
    super("parse", message);
  }
}

export class TransferError extends HarvestError {
  readonly transient: boolean;
  readonly statusCode?: number;

  constructor(transient: boolean, message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(transient ? "transient" : "terminal", message, options);
    this.transient = transient;
    this.statusCode = statusCode;
  }
}

export class SizeMismatchError extends HarvestError {
  readonly expectedBytes: number;
  readonly actualBytes: number;

  constructor(expectedBytes: number, actualBytes: number) {
    super("size_mismatch", `expected ${expectedBytes} bytes, got ${actualBytes}`);
    this.expectedBytes = expectedBytes;
    this.actualBytes = actualBytes;
  }
}

export class IOError extends HarvestError {
  readonly code?: string;

  constructor(message: string, code: string | undefined, options?: { cause?: unknown }) {
    super("io", message, options);
    this.code = code;
  }
}

export class CancelledError extends HarvestError {
  constructor(message = "run cancelled") {
    super("cancelled", message);
  }
}

export class DestinationUnusableError extends HarvestError {
  readonly directory: string;

  constructor(directory: string, message: string, options?: { cause?: unknown }) {
    super("io", `destination directory unusable: ${directory}: ${message}`, options);
    this.directory = directory;
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toIOError(error: unknown, filePath: string): IOError {
  const code = errnoCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return new IOError(`${filePath}: ${message}`, code, { cause: error });
}

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof HarvestError) {
    return error.kind;
  }
  return "terminal";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
