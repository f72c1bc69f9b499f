const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

/**
 * Parses counts as pages print them: "152,472", "1.2K", "27M".
 * Returns 0 for anything it cannot read.
 */
/** Largest count the storage columns hold (Postgres `int`). */
export const MAX_STORED_COUNT = 2_147_483_647;

export function parseCompactNumber(raw: string): number {
  const text = raw.toUpperCase().replace(/,/g, '').trim();
  const match = /^(\d+(?:\.\d+)?)\s*([KMB])?$/.exec(text);
  if (!match) {
    return 0;
  }
  const base = Number.parseFloat(match[1]);
  const multiplier = match[2] ? SUFFIX_MULTIPLIERS[match[2]] : 1;
  return Math.trunc(base * multiplier);
}

export function formatCompactNumber(value: number): string {
  if (value >= 1_000_000_000) return `${(value / 1_000_000_000).toFixed(1)}B`;
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
  return String(value);
}

/**
 * Parses a follower range filter such as "1k-10k" or "1m-5m".
 * Returns null when the text is not a two-sided range.
 */
export function parseFollowerRange(raw: string): { min: number; max: number } | null {
  const parts = raw.split('-');
  if (parts.length !== 2) {
    return null;
  }
  const [min, max] = parts.map((part) => parseCompactNumber(part));
  if (!/\d/.test(parts[0]) || !/\d/.test(parts[1]) || min > max) {
    return null;
  }
  return { min, max };
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function truncateText(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length - 3)}...` : text;
}

/** Stable, non-negative 32-bit FNV-1a hash. */
export function hashIdentifier(identifier: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < identifier.length; i++) {
    hash ^= identifier.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
