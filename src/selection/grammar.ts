export type SelectionResult = { ok: true; indices: number[] } | { ok: false; reason: string };

export type ConflictChoice = "s" | "o" | "sa" | "oa";

const CONFLICT_CHOICES: readonly ConflictChoice[] = ["s", "o", "sa", "oa"];

/**
 * Parses a period selection against a list of `count` entries shown newest
 * first. Returns zero-based indices in display order.
 *
 * Accepted forms: `all` / `a`, `last N` / `l N`, and comma-separated 1-based
 * indices such as `1,3,5`.
 */
export function parsePeriodSelection(input: string, count: number): SelectionResult {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    return { ok: false, reason: "empty selection" };
  }

  if (normalized === "all" || normalized === "a") {
    return { ok: true, indices: Array.from({ length: count }, (_, index) => index) };
  }

  const lastMatch = normalized.match(/^(?:last|l)\s+(\S+)$/);
  if (lastMatch) {
    const n = /^\d+$/.test(lastMatch[1]) ? Number.parseInt(lastMatch[1], 10) : Number.NaN;
    if (!Number.isSafeInteger(n) || n < 1) {
      return { ok: false, reason: `"last N" needs a positive integer, got "${lastMatch[1]}"` };
    }
    return { ok: true, indices: Array.from({ length: Math.min(n, count) }, (_, index) => index) };
  }

  if (!/^\d+(\s*,\s*\d+)*$/.test(normalized)) {
    return { ok: false, reason: `unrecognized selection "${input.trim()}"` };
  }

  const selected = new Set<number>();
  for (const part of normalized.split(",")) {
    const position = Number.parseInt(part.trim(), 10);
    if (position < 1 || position > count) {
      return { ok: false, reason: `index ${position} is outside 1-${count}` };
    }
    selected.add(position - 1);
  }
  return { ok: true, indices: [...selected].sort((a, b) => a - b) };
}

export function parseConflictChoice(input: string): ConflictChoice | undefined {
  const normalized = input.trim().toLowerCase();
  return CONFLICT_CHOICES.find((choice) => choice === normalized);
}
