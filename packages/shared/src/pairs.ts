/** `BASE/QUOTE:SETTLE`, e.g. `SOL/USDT:USDT`. */
export const PAIR_PATTERN = /^[A-Z0-9]+\/[A-Z0-9]+:[A-Z0-9]+$/;

export function normalizePair(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isValidPair(pair: string): boolean {
  return PAIR_PATTERN.test(pair);
}

/**
 * Upper-cases and validates every entry, keeping the first occurrence of duplicates.
 * Returns the first malformed entry (as given) instead of a list when one exists.
 */
export function normalizePairList(raw: readonly string[]): { ok: true; pairs: string[] } | { ok: false; invalid: string } {
  const seen = new Set<string>();
  const pairs: string[] = [];
  for (const entry of raw) {
    const pair = normalizePair(entry);
    if (!isValidPair(pair)) {
      return { ok: false, invalid: entry };
    }
    if (seen.has(pair)) continue;
    seen.add(pair);
    pairs.push(pair);
  }
  return { ok: true, pairs };
}
