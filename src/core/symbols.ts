/**
 * Stock code normalisation. Listed codes are 6 digits; shorter inputs are
 * zero-padded and anything else is rejected.
 */

export function normalizeSymbol(value: string): string | null {
  const digits = value.trim().replace(/\D/g, '');
  if (!digits || digits.length > 6) return null;
  return digits.padStart(6, '0');
}

export interface NormalizedSymbols {
  symbols: string[];
  rejected: string[];
}

/** Normalises and deduplicates, keeping first-seen order. */
export function normalizeSymbolList(inputs: string[]): NormalizedSymbols {
  const symbols: string[] = [];
  const rejected: string[] = [];
  const seen = new Set<string>();
  for (const raw of inputs) {
    for (const token of raw.split(',')) {
      const trimmed = token.trim();
      if (!trimmed) continue;
      const normalized = normalizeSymbol(trimmed);
      if (!normalized) {
        rejected.push(trimmed);
        continue;
      }
      if (!seen.has(normalized)) {
        seen.add(normalized);
        symbols.push(normalized);
      }
    }
  }
  return { symbols, rejected };
}

/** Deterministic truncation: ascending stock code, first `max` kept. */
export function applySymbolLimit(
  symbols: string[],
  max: number | null | undefined
): { symbols: string[]; truncated: boolean } {
  const sorted = [...symbols].sort();
  if (!max || max <= 0 || sorted.length <= max) {
    return { symbols: sorted, truncated: false };
  }
  return { symbols: sorted.slice(0, max), truncated: true };
}
