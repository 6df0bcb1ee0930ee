import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";

export interface ParsedPeriodLink {
  label: string;
  url: string;
}

export interface ParsedResourceItem {
  title: string;
  affordanceUrl?: string;
  formatLabel?: string;
  declaredSizeBytes?: number;
}

export interface ParsedDownloadLink {
  url: string;
  formatLabel?: string;
  declaredSizeBytes?: number;
}

export interface FileLinkHints {
  extensions: string[];
  hostHints: string[];
}

export interface ResourceSectionOptions extends FileLinkHints {
  sectionKeywords: string[];
  explorePattern: RegExp;
}

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function foldText(value: string): string {
  return value.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  const trimmed = href.trim().replace(/[.\s]+$/, "");
  if (!trimmed || trimmed.startsWith("#") || /^(javascript|mailto):/i.test(trimmed)) {
    return undefined;
  }
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function looksLikeFileUrl(url: string, hints: FileLinkHints): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  const pathname = parsed.pathname.toLowerCase();
  if (hints.extensions.some((extension) => pathname.endsWith(extension.toLowerCase()))) {
    return true;
  }
  return hints.hostHints.some((host) => host.length > 0 && parsed.hostname.toLowerCase() === host.toLowerCase());
}

/**
 * Parses a byte count that is stated exactly ("524288", "1.048.576 bytes").
 * Rounded human sizes such as "12.3 MB" are rejected.
 */
export function parseExactByteCount(text: string | undefined): number | undefined {
  if (!text) {
    return undefined;
  }
  const match = sanitizeText(text).match(/^(\d{1,3}(?:[.,\s]\d{3})+|\d+)\s*(?:bytes?|b)?$/i);
  if (!match) {
    return undefined;
  }
  const value = Number.parseInt(match[1].replace(/\D/g, ""), 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

function readTableValue($: CheerioAPI, label: RegExp): string | undefined {
  let found: string | undefined;
  $("tr").each((_, row) => {
    const header = sanitizeText($(row).find("th").first().text());
    if (label.test(header)) {
      found = sanitizeText($(row).find("td").first().text());
      return false;
    }
    return undefined;
  });
  return found;
}

export function extractPeriodLinks(html: string, pageUrl: string, pattern: RegExp): ParsedPeriodLink[] {
  const $ = load(html);
  const links: ParsedPeriodLink[] = [];

  $("a[href]").each((_, element) => {
    const text = sanitizeText($(element).text());
    const match = pattern.exec(text);
    if (!match) {
      return;
    }

    const url = normalizeUrl(pageUrl, $(element).attr("href") ?? "");
    if (!url) {
      return;
    }

    links.push({ label: match[1] ?? match[0], url });
  });

  return links;
}

export function extractNextPageUrl(html: string, pageUrl: string): string | undefined {
  const $ = load(html);

  const explicitNext =
    $("a[rel='next']").attr("href") ||
    $(".pagination a.next").attr("href") ||
    $(".pagination a:contains('»')").attr("href") ||
    $("a:contains('Próxima')").attr("href") ||
    $("nav.pagination a:contains('Next')").attr("href") ||
    $("a:contains('Older')").attr("href");

  if (explicitNext) {
    return normalizeUrl(pageUrl, explicitNext);
  }

  return undefined;
}

/**
 * Returns the resource items listed under the heading that names the
 * resources section, or `undefined` when no such heading exists.
 */
export function extractResourceItems(
  html: string,
  pageUrl: string,
  options: ResourceSectionOptions,
): ParsedResourceItem[] | undefined {
  const $ = load(html);
  const keywords = options.sectionKeywords.map(foldText);

  const heading = $("h1, h2, h3, h4")
    .filter((_, element) => {
      const text = foldText($(element).text());
      return keywords.every((keyword) => text.includes(keyword));
    })
    .first();

  if (heading.length === 0) {
    return undefined;
  }

  const enclosing = heading.closest("section, article");
  const container = enclosing.length > 0 ? enclosing : heading.parent();
  const items: ParsedResourceItem[] = [];

  container
    .find("li[class*='resource']")
    .filter((_, element) => $(element).parents("li[class*='resource']").length === 0)
    .each((_, element) => {
      const item = $(element);
      const titleElement = item.find(".heading").first();
      const titleAnchor = titleElement.length > 0 ? titleElement : item.find("a[href]").first();
      const formatElement = item.find(".format-label").first();
      const title = sanitizeText(
        titleAnchor.attr("title") ?? titleAnchor.clone().children(".format-label").remove().end().text(),
      );

      const candidates: string[] = [];
      const fileLinks: string[] = [];
      item.find("a[href]").each((__, anchor) => {
        const url = normalizeUrl(pageUrl, $(anchor).attr("href") ?? "");
        if (!url) {
          return;
        }
        if (options.explorePattern.test(sanitizeText($(anchor).text()))) {
          candidates.push(url);
        }
        if (looksLikeFileUrl(url, options)) {
          fileLinks.push(url);
        }
      });

      const affordanceUrl = candidates.find((url) => looksLikeFileUrl(url, options)) ?? candidates[0] ?? fileLinks[0];
      const formatLabel = sanitizeText(formatElement.attr("data-format") ?? formatElement.text());

      items.push({
        title,
        affordanceUrl,
        formatLabel: formatLabel ? formatLabel.toUpperCase() : undefined,
        declaredSizeBytes: parseExactByteCount(
          item.attr("data-size-bytes") ?? item.find("[data-size-bytes]").first().attr("data-size-bytes"),
        ),
      });
    });

  return items;
}

export function extractDownloadLink(html: string, pageUrl: string, hints: FileLinkHints): ParsedDownloadLink | undefined {
  const $ = load(html);

  let url = normalizeUrl(pageUrl, $("a.resource-url-analytics[href]").first().attr("href") ?? "");
  if (!url) {
    $("a[href]").each((_, anchor) => {
      const candidate = normalizeUrl(pageUrl, $(anchor).attr("href") ?? "");
      if (candidate && (looksLikeFileUrl(candidate, hints) || candidate.toLowerCase().includes("download"))) {
        url = candidate;
        return false;
      }
      return undefined;
    });
  }

  if (!url) {
    return undefined;
  }

  const formatLabel = readTableValue($, /^(formato|format)$/i);
  const declaredSizeBytes =
    parseExactByteCount($("[data-size-bytes]").first().attr("data-size-bytes")) ??
    parseExactByteCount(readTableValue($, /^(tamanho|size)$/i));

  return {
    url,
    formatLabel: formatLabel ? formatLabel.toUpperCase() : undefined,
    declaredSizeBytes,
  };
}
