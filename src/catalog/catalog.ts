import { CATEGORY_MAX_LENGTH, GENDERS, MEANING_MAX_LENGTH, WORD_MAX_LENGTH } from '../constants';
import { Gender, VocabEntry, VocabSeed } from '../types';
import { normalizeBoundedText, normalizeTagList } from '../utils/text';
import vocabulary from './vocabulary.json';

export interface VocabularyCatalog {
  readonly categories: readonly string[];
  all(): readonly VocabEntry[];
  byId(id: string): VocabEntry | undefined;
  byCategory(category: string): VocabEntry[];
}

export function isGender(value: unknown): value is Gender {
  return typeof value === 'string' && (GENDERS as readonly string[]).includes(value);
}

function catalogId(position: number): string {
  return `w${String(position + 1).padStart(3, '0')}`;
}

function normalizeSeed(seed: VocabSeed, position: number): VocabEntry | null {
  const word = normalizeBoundedText(seed.word, WORD_MAX_LENGTH);
  const meaning = normalizeBoundedText(seed.meaning, MEANING_MAX_LENGTH);
  const gender = normalizeBoundedText(seed.gender, WORD_MAX_LENGTH).toLowerCase();
  if (!word || !meaning || !isGender(gender)) {
    return null;
  }
  return Object.freeze({
    id: catalogId(position),
    word,
    meaning,
    gender,
    categories: Object.freeze(normalizeTagList(seed.categories, CATEGORY_MAX_LENGTH)),
  });
}

/**
 * Builds an immutable catalog. Ids follow the seed position, so a seed that is dropped
 * for missing text or an unknown gender does not shift the ids of the seeds after it.
 */
export function createCatalog(seeds: readonly VocabSeed[], categories: readonly string[] = []): VocabularyCatalog {
  const entries = Object.freeze(
    seeds
      .map((seed, position) => normalizeSeed(seed, position))
      .filter((entry): entry is VocabEntry => entry !== null),
  );
  const index = new Map(entries.map((entry) => [entry.id, entry]));

  const knownCategories = normalizeTagList([...categories], CATEGORY_MAX_LENGTH);
  for (const entry of entries) {
    for (const category of entry.categories) {
      if (!knownCategories.includes(category)) {
        knownCategories.push(category);
      }
    }
  }

  return {
    categories: Object.freeze(knownCategories),
    all: () => entries,
    byId: (id) => index.get(id),
    byCategory: (category) => entries.filter((entry) => entry.categories.includes(category)),
  };
}

export function loadDefaultCatalog(): VocabularyCatalog {
  return createCatalog(vocabulary.entries, vocabulary.categories);
}
