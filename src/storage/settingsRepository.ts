import { CATEGORY_MAX_LENGTH, SESSION_LENGTH_MAX, SPEECH_RATE_MAX, SPEECH_RATE_MIN } from '../constants';
import { createModuleLogger, Logger } from '../logger';
import { QuizSettings } from '../types';
import { normalizeTagList } from '../utils/text';
import { KeyValueStore } from './keyValueStore';

export const SETTINGS_KEY = 'vocab-gender-quiz.settings.v1';

export const DEFAULT_SETTINGS: Readonly<QuizSettings> = Object.freeze({
  shuffleEnabled: true,
  sessionLength: 20,
  activeCategories: [],
  speechEnabled: true,
  speechRate: 0.5,
  hapticsEnabled: true,
  answerSoundsEnabled: true,
  showInstructions: true,
  hasSeenWelcome: false,
});

const settingsLogger = createModuleLogger('settings');

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function parseRuntimeFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!/^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 1) {
    return true;
  }
  if (value === 'false' || value === 0) {
    return false;
  }
  return fallback;
}

function asSessionLength(value: unknown, fallback: number): number {
  const parsed = parseRuntimeFiniteNumber(value);
  if (parsed === null || parsed < 0) {
    return fallback;
  }
  return clamp(Math.floor(parsed), 0, SESSION_LENGTH_MAX);
}

function asSpeechRate(value: unknown, fallback: number): number {
  const parsed = parseRuntimeFiniteNumber(value);
  return parsed === null ? fallback : clamp(parsed, SPEECH_RATE_MIN, SPEECH_RATE_MAX);
}

/** Field-by-field normalization: every invalid or missing field falls back on its own. */
export function normalizeSettings(raw: unknown, fallback: Readonly<QuizSettings> = DEFAULT_SETTINGS): QuizSettings {
  const source: Record<string, unknown> = raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};
  const categories = source.activeCategories;
  return {
    shuffleEnabled: asBoolean(source.shuffleEnabled, fallback.shuffleEnabled),
    sessionLength: asSessionLength(source.sessionLength, fallback.sessionLength),
    activeCategories: Array.isArray(categories)
      ? normalizeTagList(categories, CATEGORY_MAX_LENGTH)
      : [...fallback.activeCategories],
    speechEnabled: asBoolean(source.speechEnabled, fallback.speechEnabled),
    speechRate: asSpeechRate(source.speechRate, fallback.speechRate),
    hapticsEnabled: asBoolean(source.hapticsEnabled, fallback.hapticsEnabled),
    answerSoundsEnabled: asBoolean(source.answerSoundsEnabled, fallback.answerSoundsEnabled),
    showInstructions: asBoolean(source.showInstructions, fallback.showInstructions),
    hasSeenWelcome: asBoolean(source.hasSeenWelcome, fallback.hasSeenWelcome),
  };
}

export async function loadSettings(store: KeyValueStore, log: Logger = settingsLogger): Promise<QuizSettings> {
  let raw: string | null;
  try {
    raw = await store.getItem(SETTINGS_KEY);
  } catch (err) {
    log.warn({ err }, 'settings storage unavailable, using defaults');
    return normalizeSettings({});
  }
  if (raw === null) {
    return normalizeSettings({});
  }
  try {
    return normalizeSettings(JSON.parse(raw));
  } catch (err) {
    log.warn({ err }, 'stored settings are not valid JSON, using defaults');
    return normalizeSettings({});
  }
}

export async function saveSettings(store: KeyValueStore, settings: QuizSettings): Promise<void> {
  await store.setItem(SETTINGS_KEY, JSON.stringify(normalizeSettings(settings)));
}

/**
 * In-memory settings with write-through persistence. Reads are synchronous so the session
 * can consult the current values at every rebuild.
 */
export class SettingsStore {
  private current: QuizSettings;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: KeyValueStore,
    initial: Partial<QuizSettings> = {},
  ) {
    this.current = normalizeSettings(initial);
  }

  static async open(store: KeyValueStore, log: Logger = settingsLogger): Promise<SettingsStore> {
    return new SettingsStore(store, await loadSettings(store, log));
  }

  get(): QuizSettings {
    return { ...this.current, activeCategories: [...this.current.activeCategories] };
  }

  /**
   * Applies the patch immediately; the returned promise settles when it is persisted.
   * Saves run one at a time and each writes the newest values when its turn comes.
   */
  update(patch: Partial<QuizSettings>): Promise<void> {
    this.current = normalizeSettings({ ...this.current, ...patch }, this.current);
    const run = this.pending.then(() => saveSettings(this.store, this.current));
    // A failed save must not block the saves queued after it.
    this.pending = run.catch(() => undefined);
    return run;
  }
}
