import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createModuleLogger } from '../logger';
import { createJsonFileStore, createMemoryStore } from './keyValueStore';
import { SETTINGS_KEY, SettingsStore } from './settingsRepository';

describe('memory store', () => {
  it('returns null for unknown keys and the stored value otherwise', async () => {
    const store = createMemoryStore({ seeded: 'yes' });

    expect(await store.getItem('missing')).toBeNull();
    expect(await store.getItem('seeded')).toBe('yes');

    await store.setItem('seeded', 'no');
    expect(await store.getItem('seeded')).toBe('no');
  });
});

describe('json file store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'quiz-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a missing file as empty', async () => {
    const store = createJsonFileStore(join(dir, 'settings.json'));
    expect(await store.getItem('anything')).toBeNull();
  });

  it('creates parent directories and keeps other keys when writing', async () => {
    const filePath = join(dir, 'nested', 'settings.json');
    const store = createJsonFileStore(filePath);

    await store.setItem('a', '1');
    await store.setItem('b', '2');

    expect(await store.getItem('a')).toBe('1');
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ a: '1', b: '2' });
  });

  it('applies queued writes in call order', async () => {
    const store = createJsonFileStore(join(dir, 'settings.json'));

    await Promise.all([store.setItem('key', 'first'), store.setItem('key', 'second')]);

    expect(await store.getItem('key')).toBe('second');
  });

  it('rejects reads of a corrupt file and replaces it on the next write', async () => {
    const filePath = join(dir, 'settings.json');
    await writeFile(filePath, '[1, 2, 3]', 'utf8');
    const log = createModuleLogger('store-test');
    const warn = jest.spyOn(log, 'warn').mockImplementation(() => undefined);
    const store = createJsonFileStore(filePath, log);

    await expect(store.getItem('key')).rejects.toThrow('does not hold a string map');
    await store.setItem('key', 'value');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ key: 'value' });
    expect(await store.getItem('key')).toBe('value');
  });

  it('saves settings again after the file was truncated mid-value', async () => {
    const filePath = join(dir, 'settings.json');
    await writeFile(filePath, `{"${SETTINGS_KEY}": "{`, 'utf8');
    const log = createModuleLogger('store-test');
    jest.spyOn(log, 'warn').mockImplementation(() => undefined);

    const settings = await SettingsStore.open(createJsonFileStore(filePath, log), log);
    expect(settings.get().activeCategories).toEqual([]);
    await settings.update({ activeCategories: ['Food'] });

    const reopened = await SettingsStore.open(createJsonFileStore(filePath, log), log);
    expect(reopened.get().activeCategories).toEqual(['Food']);
  });
});
