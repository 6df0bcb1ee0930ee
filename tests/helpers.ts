import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ReadableStream } from "node:stream/web";
import { Headers, Response } from "undici";
import type { RequestInit } from "undici";
import { DEFAULT_CONFIG } from "../src/config";
import type { AppConfig } from "../src/config";
import type { FetchFn } from "../src/core/fetch";
import type { HttpDeps } from "../src/core/http";
import { Logger, MetricsRegistry } from "../src/observability";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    logLevel: "error",
    ...overrides,
  };
}

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "harvest_test", minLevel: "error" });
}

export function httpDeps(fetchFn: FetchFn, overrides: Partial<AppConfig> = {}): HttpDeps {
  return {
    config: testConfig(overrides),
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    fetchFn,
  };
}

export interface RecordedRequest {
  url: string;
  range?: string;
}

export type RouteHandler = (request: RecordedRequest) => Response;

/**
 * In-process stand-in for the network. Unknown URLs answer 404; every call is
 * recorded with its Range header.
 */
export function routedFetch(routes: Record<string, RouteHandler>): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (url: string, init?: RequestInit) => {
    const range = new Headers(init?.headers).get("range") ?? undefined;
    const request: RecordedRequest = { url, range };
    requests.push(request);
    const handler = routes[url];
    return handler ? handler(request) : new Response("not found", { status: 404 });
  };
  return { fetchFn, requests };
}

export function html(body: string): RouteHandler {
  return () => new Response(body, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function bytes(size: number, fill = 0x61): Uint8Array {
  return new Uint8Array(size).fill(fill);
}

/** Serves `payload`, honouring `Range: bytes=N-` with a 206. */
export function file(payload: Uint8Array): RouteHandler {
  return (request) => {
    const start = request.range ? Number.parseInt(request.range.replace(/^bytes=/, ""), 10) : 0;
    if (start > 0) {
      return new Response(payload.slice(start), {
        status: 206,
        headers: { "content-range": `bytes ${start}-${payload.length - 1}/${payload.length}` },
      });
    }
    return new Response(payload, { status: 200 });
  };
}

export function status(code: number): RouteHandler {
  return () => new Response(`status ${code}`, { status: code });
}

/** A 200 whose body delivers `first` and then fails mid-stream. */
export function brokenStream(first: Uint8Array): RouteHandler {
  return () => {
    let pulls = 0;
    const body = new ReadableStream<Uint8Array>(
      {
        pull(controller) {
          pulls += 1;
          if (pulls === 1) {
            controller.enqueue(first);
            return;
          }
          controller.error(new Error("connection reset"));
        },
      },
      { highWaterMark: 0 },
    );
    return new Response(body, { status: 200 });
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "dataset-harvester-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
