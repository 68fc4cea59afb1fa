import seedrandom from 'seedrandom';
import { createCatalog } from './catalog/catalog';
import { composeMeaningOptions, isCorrectGender, isCorrectMeaning } from './quiz';
import { VocabEntry } from './types';

function entriesFrom(meanings: string[]): readonly VocabEntry[] {
  return createCatalog(
    meanings.map((meaning, index) => ({ word: `слово-${index}`, meaning, gender: 'neuter' })),
  ).all();
}

describe('answer checks', () => {
  const [table] = createCatalog([{ word: 'стіл', meaning: 'table', gender: 'masculine' }]).all();

  it('compares meanings exactly', () => {
    expect(isCorrectMeaning(table, 'table')).toBe(true);
    expect(isCorrectMeaning(table, 'Table')).toBe(false);
  });

  it('compares genders exactly', () => {
    expect(isCorrectGender(table, 'masculine')).toBe(true);
    expect(isCorrectGender(table, 'feminine')).toBe(false);
  });
});

describe('composeMeaningOptions', () => {
  const deck = entriesFrom(['table', 'book', 'window', 'bread', 'tea', 'soup', 'knife']);

  it('offers four distinct meanings including the correct one', () => {
    const options = composeMeaningOptions(deck[0], deck, seedrandom('four-options'));

    expect(options).toHaveLength(4);
    expect(new Set(options).size).toBe(4);
    expect(options).toContain('table');
    expect(options.every((option) => deck.some((entry) => entry.meaning === option))).toBe(true);
  });

  it('returns every distinct meaning when the deck has fewer than four', () => {
    const small = entriesFrom(['table', 'book']);
    const options = composeMeaningOptions(small[0], small, seedrandom('small-deck'));

    expect([...options].sort()).toEqual(['book', 'table']);
  });

  it('returns the correct meaning alone for a single-card deck', () => {
    const single = entriesFrom(['table']);
    expect(composeMeaningOptions(single[0], single, seedrandom('single'))).toEqual(['table']);
  });

  it('never duplicates a meaning shared by several entries', () => {
    const repeated = entriesFrom(['table', 'table', 'book', 'book', 'sea']);
    const options = composeMeaningOptions(repeated[0], repeated, seedrandom('repeated'));

    expect([...options].sort()).toEqual(['book', 'sea', 'table']);
  });

  it('includes the target even when it is missing from the deck', () => {
    const outsider = entriesFrom(['outsider'])[0];
    const options = composeMeaningOptions(outsider, deck, seedrandom('outsider'));

    expect(options).toHaveLength(4);
    expect(options).toContain('outsider');
  });

  it('honors a custom option count and never goes below one', () => {
    expect(composeMeaningOptions(deck[0], deck, seedrandom('two'), 2)).toHaveLength(2);
    expect(composeMeaningOptions(deck[0], deck, seedrandom('zero'), 0)).toEqual(['table']);
  });

  it('draws distractors from the end of the shuffled pool', () => {
    // Every draw of 0.999999 keeps the shuffle an identity, so the pool pops from the back.
    const options = composeMeaningOptions(deck[0], deck, () => 0.999999);
    expect(options).toEqual(['table', 'knife', 'soup', 'tea']);
  });
});
