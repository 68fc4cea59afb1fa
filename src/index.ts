export { createCatalog, isGender, loadDefaultCatalog } from './catalog/catalog';
export type { VocabularyCatalog } from './catalog/catalog';
export { CardStateStore, createCardState } from './cardState';
export { GENDERS } from './constants';
export { buildDeck, matchesCategoryFilter, normalizeSessionLength } from './deck';
export { createFeedbackSink, dispatchFeedback, silentSink, toUtteranceRate } from './feedback';
export type {
  FeedbackOutputs,
  FeedbackSettings,
  HapticsOutput,
  NotificationSink,
  SoundOutput,
  SpeechOutput,
} from './feedback';
export { useQuizSession } from './hooks';
export type { UseQuizSessionOptions } from './hooks';
export { createModuleLogger, logger } from './logger';
export { composeMeaningOptions, isCorrectGender, isCorrectMeaning } from './quiz';
export { QuizSession } from './session';
export type { QuizSessionOptions, QuizSnapshot } from './session';
export { createJsonFileStore, createMemoryStore } from './storage/keyValueStore';
export type { KeyValueStore } from './storage/keyValueStore';
export { DEFAULT_SETTINGS, loadSettings, normalizeSettings, saveSettings, SETTINGS_KEY, SettingsStore } from './storage/settingsRepository';
export { summarizeSession } from './summary';
export * from './types';
export { formatAccuracyText, formatPositionText, formatScoreText } from './utils/counter';
