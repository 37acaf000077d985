/**
 * Name Normalization & Matching
 *
 * Deduplicates candidate names typed by players. Two names match when their
 * normalized forms are identical, or when both are long enough for fuzzy
 * comparison and their Levenshtein similarity reaches the threshold.
 *
 * Examples:
 * - "Robert Downey, Jr." → "robert downey jr"
 * - "Jimmy Carter" vs "Jimmy Carter Jr." → score 0.8, no match at 0.85
 */

import { distance } from 'fastest-levenshtein';

export interface NameMatchingConfig {
  similarityThreshold: number;
  minLengthForFuzzy: number;     // Shorter normalized names only match exactly
  suffixMap: Record<string, string>;
}

export interface NameMatchResult {
  isMatch: boolean;
  score: number;
  normalizedA: string;
  normalizedB: string;
  exactMatch: boolean;
}

export const DEFAULT_SUFFIX_MAP: Record<string, string> = {
  'jr.': 'jr',
  jr: 'jr',
  junior: 'jr',
  'sr.': 'sr',
  sr: 'sr',
  senior: 'sr',
  iii: '3',
  ii: '2',
};

export const DEFAULT_NAME_MATCHING_CONFIG: NameMatchingConfig = {
  similarityThreshold: 0.85,
  minLengthForFuzzy: 4,
  suffixMap: DEFAULT_SUFFIX_MAP,
};

// Everything but letters, digits, whitespace, apostrophes and hyphens
const PUNCTUATION = /[^\p{L}\p{N}\s'-]/gu;

/**
 * Normalize a name for comparison
 *
 * Lowercases, turns punctuation into spaces, collapses whitespace and
 * standardizes a trailing suffix token ("Jr.", "Junior" → "jr").
 */
export function normalizeName(
  name: string,
  config: NameMatchingConfig = DEFAULT_NAME_MATCHING_CONFIG
): string {
  const words = name.toLowerCase().replace(PUNCTUATION, ' ').split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return '';
  }

  const last = words[words.length - 1];
  const suffix = config.suffixMap[last];
  if (suffix !== undefined && words.length > 1) {
    words[words.length - 1] = suffix;
  }
  return words.join(' ');
}

/**
 * Levenshtein similarity in [0, 1]: 1 - distance / longer length
 */
export function calculateSimilarity(a: string, b: string): number {
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) {
    return 1;
  }
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  return 1 - distance(a, b) / maxLength;
}

export function matchNames(
  nameA: string,
  nameB: string,
  config: NameMatchingConfig = DEFAULT_NAME_MATCHING_CONFIG
): NameMatchResult {
  const normalizedA = normalizeName(nameA, config);
  const normalizedB = normalizeName(nameB, config);

  if (normalizedA !== '' && normalizedA === normalizedB) {
    return { isMatch: true, score: 1, normalizedA, normalizedB, exactMatch: true };
  }

  if (normalizedA.length < config.minLengthForFuzzy || normalizedB.length < config.minLengthForFuzzy) {
    return { isMatch: false, score: 0, normalizedA, normalizedB, exactMatch: false };
  }

  const score = calculateSimilarity(normalizedA, normalizedB);
  return {
    isMatch: score >= config.similarityThreshold,
    score,
    normalizedA,
    normalizedB,
    exactMatch: false,
  };
}

/**
 * Best match for `name` among `items`, or null when nothing reaches the
 * threshold. An exact match wins immediately; equal scores keep the earlier item.
 */
export function findBestMatch<T>(
  name: string,
  items: T[],
  getName: (item: T) => string,
  config: NameMatchingConfig = DEFAULT_NAME_MATCHING_CONFIG
): { item: T; result: NameMatchResult } | null {
  let best: { item: T; result: NameMatchResult } | null = null;

  for (const item of items) {
    const result = matchNames(name, getName(item), config);
    if (!result.isMatch) {
      continue;
    }
    if (result.exactMatch) {
      return { item, result };
    }
    if (!best || result.score > best.result.score) {
      best = { item, result };
    }
  }

  return best;
}
