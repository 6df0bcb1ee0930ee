import { FetchError, ParseError, errorMessage } from "../core/errors";
import { fetchHtml } from "../core/http";
import type { HttpDeps } from "../core/http";
import type { Period, ResourceDescriptor } from "../types";
import { extractDownloadLink, extractResourceItems, looksLikeFileUrl } from "./htmlParser";
import type { FileLinkHints, ParsedDownloadLink, ParsedResourceItem } from "./htmlParser";
import { buildResourceFileName, formatFromUrl, uniqueFileName } from "./naming";

async function followAffordance(item: ParsedResourceItem, hints: FileLinkHints, deps: HttpDeps): Promise<ParsedDownloadLink> {
  if (!item.affordanceUrl) {
    throw new ParseError(`no explore link for "${item.title}"`);
  }

  if (looksLikeFileUrl(item.affordanceUrl, hints)) {
    return { url: item.affordanceUrl };
  }

  const html = await fetchHtml(item.affordanceUrl, deps);
  const link = extractDownloadLink(html, item.affordanceUrl, hints);
  if (!link) {
    throw new ParseError(`no download link on resource page ${item.affordanceUrl}`);
  }
  return link;
}

/**
 * Resolves every resource listed on a period's detail page, in page order.
 * A page without a resources section yields an empty list. Items whose link
 * cannot be followed are dropped and logged.
 */
export async function resolveResources(period: Period, deps: HttpDeps): Promise<ResourceDescriptor[]> {
  const { config, logger, metrics } = deps;
  const hints: FileLinkHints = {
    extensions: config.downloadExtensions,
    hostHints: config.downloadHostHints,
  };

  const html = await fetchHtml(period.catalogUrl, deps);
  const items = extractResourceItems(html, period.catalogUrl, {
    ...hints,
    sectionKeywords: config.resourceSectionKeywords,
    explorePattern: new RegExp(config.exploreLinkPattern, "i"),
  });

  if (!items) {
    logger.warn("resource_section_missing", { period: period.label, pageUrl: period.catalogUrl });
    return [];
  }

  const usedNames = new Set<string>();
  const resources: ResourceDescriptor[] = [];

  for (const item of items) {
    let link: ParsedDownloadLink;
    try {
      link = await followAffordance(item, hints, deps);
    } catch (error) {
      if (!(error instanceof ParseError || error instanceof FetchError)) {
        throw error;
      }
      metrics.incrementCounter("resources_omitted", 1);
      logger.warn("resource_omitted", {
        period: period.label,
        resource: item.title,
        url: item.affordanceUrl,
        errorKind: error.kind,
        error: errorMessage(error),
      });
      continue;
    }

    const format = item.formatLabel ?? link.formatLabel ?? formatFromUrl(link.url);
    const name = uniqueFileName(buildResourceFileName(link.url, item.title, format), usedNames);
    resources.push(
      Object.freeze({
        name,
        downloadUrl: link.url,
        format,
        declaredSizeBytes: link.declaredSizeBytes ?? item.declaredSizeBytes,
        title: item.title,
        sourcePageUrl: item.affordanceUrl,
      }),
    );
  }

  metrics.incrementCounter("resources_resolved", resources.length);
  logger.info("resources_resolved", { period: period.label, found: items.length, resolved: resources.length });
  return resources;
}
