import path from "node:path";

const MAX_NAME_LENGTH = 200;

export function sanitizeFileName(raw: string): string {
  const cleaned = raw
    .normalize("NFC")
    .replace(/[^\p{L}\p{N}._-]+/gu, "_")
    .replace(/_{2,}/g, "_")
    .replace(/^[._-]+/, "")
    .replace(/_+$/, "");
  return cleaned.slice(0, MAX_NAME_LENGTH) || "resource";
}

export function slugify(title: string): string {
  return title
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .trim()
    .replace(/[-\s]+/g, "-");
}

function decodedBaseName(url: string): string {
  const pathname = new URL(url).pathname;
  try {
    return path.posix.basename(decodeURIComponent(pathname));
  } catch {
    return path.posix.basename(pathname);
  }
}

export function formatFromUrl(url: string): string | undefined {
  const extension = path.posix.extname(new URL(url).pathname).slice(1);
  return extension ? extension.toUpperCase() : undefined;
}

/**
 * Prefers the file name carried by the URL; falls back to a slug of the
 * title with the format as extension.
 */
export function buildResourceFileName(downloadUrl: string, title: string, format: string | undefined): string {
  const baseName = decodedBaseName(downloadUrl);
  if (baseName.includes(".") && !baseName.startsWith(".")) {
    return sanitizeFileName(baseName);
  }
  const stem = slugify(title) || baseName || "resource";
  return sanitizeFileName(format ? `${stem}.${format.toLowerCase()}` : stem);
}

export function uniqueFileName(name: string, used: Set<string>): string {
  let candidate = name;
  const extension = path.posix.extname(name);
  const stem = extension ? name.slice(0, -extension.length) : name;
  for (let suffix = 2; used.has(candidate); suffix += 1) {
    candidate = `${stem}-${suffix}${extension}`;
  }
  used.add(candidate);
  return candidate;
}
