import { MEANING_OPTION_COUNT } from './constants';
import { Gender, RandomSource, VocabEntry } from './types';
import { defaultRandom, shuffled } from './utils/random';

export function isCorrectMeaning(entry: VocabEntry, choice: string): boolean {
  return choice === entry.meaning;
}

export function isCorrectGender(entry: VocabEntry, choice: Gender): boolean {
  return choice === entry.gender;
}

/**
 * Meaning choices for `target`: its own meaning plus distractor meanings drawn without
 * replacement from a shuffled copy of the deck, until `optionCount` distinct meanings are
 * collected or the deck runs out. The result is shuffled again so the correct answer has
 * no fixed slot.
 */
export function composeMeaningOptions(
  target: VocabEntry,
  deck: readonly VocabEntry[],
  random: RandomSource = defaultRandom,
  optionCount = MEANING_OPTION_COUNT,
): string[] {
  const wanted = Number.isFinite(optionCount) ? Math.max(1, Math.floor(optionCount)) : 1;
  const options = new Set<string>([target.meaning]);
  const pool = shuffled(deck, random);

  while (options.size < wanted) {
    const candidate = pool.pop();
    if (!candidate) {
      break;
    }
    if (candidate.meaning !== target.meaning) {
      options.add(candidate.meaning);
    }
  }

  return shuffled([...options], random);
}

