import { DeckOptions, RandomSource, VocabEntry } from './types';
import { defaultRandom, shuffled } from './utils/random';

export function normalizeSessionLength(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.floor(value);
}

/**
 * An entry passes a non-empty filter when it shares at least one tag with it.
 * Uncategorized entries therefore only appear when no filter is active.
 */
export function matchesCategoryFilter(entry: VocabEntry, activeCategories: ReadonlySet<string>): boolean {
  if (activeCategories.size === 0) {
    return true;
  }
  return entry.categories.some((category) => activeCategories.has(category));
}

export function buildDeck(
  entries: readonly VocabEntry[],
  options: DeckOptions,
  random: RandomSource = defaultRandom,
): VocabEntry[] {
  const activeCategories = new Set(options.activeCategories);
  const filtered = entries.filter((entry) => matchesCategoryFilter(entry, activeCategories));
  const ordered = options.shuffle ? shuffled(filtered, random) : filtered;
  const limit = normalizeSessionLength(options.sessionLength);
  return limit > 0 && ordered.length > limit ? ordered.slice(0, limit) : ordered;
}
