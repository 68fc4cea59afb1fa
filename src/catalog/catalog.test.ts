import { createCatalog, isGender, loadDefaultCatalog } from './catalog';

describe('vocabulary catalog', () => {
  it('assigns stable ids from seed position and keeps catalog order', () => {
    const catalog = createCatalog([
      { word: 'стіл', meaning: 'table', gender: 'masculine', categories: ['Objects', 'Home'] },
      { word: 'книга', meaning: 'book', gender: 'feminine', categories: ['Objects'] },
      { word: 'вікно', meaning: 'window', gender: 'neuter' },
    ]);

    expect(catalog.all().map((entry) => entry.id)).toEqual(['w001', 'w002', 'w003']);
    expect(catalog.all().map((entry) => entry.word)).toEqual(['стіл', 'книга', 'вікно']);
    expect(catalog.byId('w003')?.categories).toEqual([]);
  });

  it('drops seeds with blank text or unknown gender without shifting later ids', () => {
    const catalog = createCatalog([
      { word: '   ', meaning: 'nothing', gender: 'neuter' },
      { word: 'кіт', meaning: 'cat', gender: 'common' },
      { word: ' ніч ', meaning: ' night ', gender: 'Feminine' },
    ]);

    expect(catalog.all()).toEqual([
      { id: 'w003', word: 'ніч', meaning: 'night', gender: 'feminine', categories: [] },
    ]);
  });

  it('lists declared categories first and appends tags only seen on entries', () => {
    const catalog = createCatalog(
      [
        { word: 'суп', meaning: 'soup', gender: 'masculine', categories: ['Food'] },
        { word: 'поїзд', meaning: 'train', gender: 'masculine', categories: ['Transport'] },
      ],
      ['Food', 'Time'],
    );

    expect(catalog.categories).toEqual(['Food', 'Time', 'Transport']);
    expect(catalog.byCategory('Transport').map((entry) => entry.word)).toEqual(['поїзд']);
    expect(catalog.byCategory('Weather')).toEqual([]);
  });

  it('freezes entries so they cannot be mutated by consumers', () => {
    const catalog = createCatalog([{ word: 'море', meaning: 'sea', gender: 'neuter', categories: ['Nature'] }]);
    expect(Object.isFrozen(catalog.all()[0])).toBe(true);
    expect(Object.isFrozen(catalog.all())).toBe(true);
  });

  it('loads the bundled vocabulary with unique meanings and known genders', () => {
    const catalog = loadDefaultCatalog();
    const entries = catalog.all();

    expect(entries).toHaveLength(100);
    expect(entries[0]).toEqual({
      id: 'w001',
      word: 'стіл',
      meaning: 'table',
      gender: 'masculine',
      categories: ['Objects', 'Home'],
    });
    expect(new Set(entries.map((entry) => entry.meaning)).size).toBe(entries.length);
    expect(entries.every((entry) => isGender(entry.gender))).toBe(true);
    expect(catalog.categories).toHaveLength(13);
  });
});
