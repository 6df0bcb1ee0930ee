import { CancelledError, errorMessage } from "../core/errors";
import { fetchHtml } from "../core/http";
import type { HttpDeps } from "../core/http";
import type { Period } from "../types";
import { extractNextPageUrl, extractPeriodLinks } from "./htmlParser";
import type { ParsedPeriodLink } from "./htmlParser";

/** Digit runs compare by value, so "2024" > "2010" and "10" > "2". */
export function comparePeriodLabelsDescending(a: string, b: string): number {
  return b.localeCompare(a, undefined, { numeric: true });
}

/** First occurrence of a label wins; result is newest first. */
export function toOrderedPeriods(links: ParsedPeriodLink[]): Period[] {
  const byLabel = new Map<string, Period>();
  for (const link of links) {
    if (!byLabel.has(link.label)) {
      byLabel.set(link.label, Object.freeze({ label: link.label, catalogUrl: link.url }));
    }
  }
  return [...byLabel.values()].sort((a, b) => comparePeriodLabelsDescending(a.label, b.label));
}

export async function discoverPeriods(catalogRootUrl: string, deps: HttpDeps): Promise<Period[]> {
  const { config, logger, metrics } = deps;
  const pattern = new RegExp(config.periodLinkPattern, "i");
  const visited = new Set<string>();
  const links: ParsedPeriodLink[] = [];
  let pageUrl: string | undefined = catalogRootUrl;
  let pageIndex = 0;

  while (pageUrl) {
    if (pageIndex >= config.maxPages) {
      logger.warn("catalog_max_pages_reached", { maxPages: config.maxPages, pageUrl });
      break;
    }
    if (visited.has(pageUrl)) {
      logger.warn("catalog_pagination_loop", { pageUrl });
      break;
    }
    visited.add(pageUrl);
    pageIndex += 1;

    logger.info("catalog_page_start", { pageUrl, page: pageIndex });

    let html: string;
    try {
      html = await fetchHtml(pageUrl, deps);
    } catch (error) {
      // The root page is the only one whose loss aborts the run.
      if (pageIndex === 1 || error instanceof CancelledError) {
        throw error;
      }
      logger.warn("catalog_page_fetch_failed", { pageUrl, page: pageIndex, error: errorMessage(error) });
      break;
    }

    let pageLinks: ParsedPeriodLink[] = [];
    let nextUrl: string | undefined;
    try {
      pageLinks = extractPeriodLinks(html, pageUrl, pattern);
      nextUrl = extractNextPageUrl(html, pageUrl);
    } catch (error) {
      logger.warn("catalog_page_parse_failed", { pageUrl, page: pageIndex, error: errorMessage(error) });
    }

    links.push(...pageLinks);
    logger.info("catalog_page_complete", { pageUrl, page: pageIndex, periodsOnPage: pageLinks.length });
    pageUrl = nextUrl;
  }

  const periods = toOrderedPeriods(links);
  metrics.incrementCounter("periods_discovered", periods.length);
  logger.info("catalog_discovered", { periods: periods.length, pagesVisited: pageIndex });
  return periods;
}
