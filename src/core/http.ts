import type { AppConfig } from "../config";
import type { Logger, MetricsRegistry } from "../observability";
import { CancelledError, FetchError, errorMessage } from "./errors";
import { defaultFetch, getFetchDispatcher } from "./fetch";
import type { FetchFn } from "./fetch";

export interface HttpDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function withTimeout(timeoutMs: number, signal?: AbortSignal): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  return {
    signal: signal ? AbortSignal.any([controller.signal, signal]) : controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

async function fetchHtmlOnce(url: string, deps: HttpDeps): Promise<string> {
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const timer = withTimeout(deps.config.requestTimeoutMs, deps.signal);

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": deps.config.userAgent,
        accept: "text/html,application/xhtml+xml",
      },
      dispatcher: getFetchDispatcher(deps.config.ignoreHttpsErrors),
      signal: timer.signal,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(url, `HTTP ${response.status} while fetching ${url}`, response.status);
    }

    return await response.text();
  } finally {
    timer.clear();
  }
}

/**
 * GETs an HTML page, retrying network errors, timeouts, 429 and 5xx with
 * exponential backoff. Other 4xx statuses fail on the first attempt.
 */
export async function fetchHtml(url: string, deps: HttpDeps): Promise<string> {
  const { config, logger, metrics } = deps;
  const maxAttempts = Math.max(1, config.maxPageAttempts);

  for (let attempt = 1; ; attempt += 1) {
    if (deps.signal?.aborted) {
      throw new CancelledError();
    }

    const stopTimer = metrics.startTimer("page_fetch_ms");
    try {
      const html = await fetchHtmlOnce(url, deps);
      stopTimer();
      metrics.incrementCounter("pages_crawled", 1);
      return html;
    } catch (error) {
      const durationMs = stopTimer();
      if (deps.signal?.aborted) {
        throw new CancelledError();
      }

      const retriable = !(error instanceof FetchError) || error.statusCode === undefined || isRetriableStatus(error.statusCode);
      logger.warn("page_fetch_failed", { pageUrl: url, attempt, durationMs, retriable, error: errorMessage(error) });

      if (!retriable || attempt >= maxAttempts) {
        if (error instanceof FetchError) {
          throw error;
        }
        throw new FetchError(url, `Failed to fetch ${url}: ${errorMessage(error)}`, undefined, { cause: error });
      }

      await sleep(backoffDelayMs(attempt, config.retryBaseDelayMs, config.retryMaxDelayMs), deps.signal);
    }
  }
}
