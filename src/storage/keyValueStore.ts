import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createModuleLogger, Logger } from '../logger';

const storageLogger = createModuleLogger('storage');

/** Async string store with the same shape as the storage the app persists settings through. */
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const values = new Map(Object.entries(initial));
  return {
    async getItem(key) {
      return values.get(key) ?? null;
    },
    async setItem(key, value) {
      values.set(key, value);
    },
  };
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((item) => typeof item === 'string');
}

async function readRaw(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return null;
    }
    throw err;
  }
}

function parseEntries(raw: string): Record<string, string> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return isStringRecord(parsed) ? parsed : null;
}

async function readEntries(filePath: string): Promise<Record<string, string>> {
  const raw = await readRaw(filePath);
  if (raw === null) {
    return {};
  }
  const entries = parseEntries(raw);
  if (!entries) {
    throw new Error(`Key-value file ${filePath} does not hold a string map`);
  }
  return entries;
}

/**
 * Store backed by one JSON object file. Writes are serialized and replace the file through a
 * rename so a crash mid-write leaves the previous contents in place. Reads reject on a corrupt
 * file; the next write replaces it with a map holding only the written key.
 */
export function createJsonFileStore(filePath: string, log: Logger = storageLogger): KeyValueStore {
  let pending: Promise<void> = Promise.resolve();

  const write = async (key: string, value: string) => {
    const raw = await readRaw(filePath);
    let entries: Record<string, string> | null = raw === null ? {} : parseEntries(raw);
    if (!entries) {
      log.warn({ filePath }, 'key-value file does not hold a string map, rewriting it');
      entries = {};
    }
    entries[key] = value;
    await mkdir(dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
    await rename(tempPath, filePath);
  };

  return {
    async getItem(key) {
      await pending;
      const entries = await readEntries(filePath);
      return Object.prototype.hasOwnProperty.call(entries, key) ? entries[key] : null;
    },
    setItem(key, value) {
      const run = pending.then(() => write(key, value));
      // A failed write must not block the writes queued after it.
      pending = run.catch(() => undefined);
      return run;
    },
  };
}
