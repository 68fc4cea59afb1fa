import { VocabularyCatalog } from './catalog/catalog';
import { CardStateStore } from './cardState';
import { BACK_HISTORY_LIMIT, CATEGORY_MAX_LENGTH, SCORE_STEP } from './constants';
import { buildDeck } from './deck';
import { dispatchFeedback, NotificationSink, silentSink } from './feedback';
import { createModuleLogger, Logger } from './logger';
import { composeMeaningOptions, isCorrectGender, isCorrectMeaning } from './quiz';
import { SettingsStore } from './storage/settingsRepository';
import { summarizeSession } from './summary';
import { CardPhase, Gender, QuizSettings, RandomSource, SessionSummary, VocabEntry } from './types';
import { formatPositionText, formatScoreText } from './utils/counter';
import { defaultRandom, shuffled } from './utils/random';
import { normalizeBoundedText } from './utils/text';

export interface QuizSessionOptions {
  catalog: VocabularyCatalog;
  settings: SettingsStore;
  sink?: NotificationSink;
  random?: RandomSource;
  logger?: Logger;
}

export interface QuizSnapshot {
  current: VocabEntry | null;
  currentIndex: number;
  deckSize: number;
  phase: CardPhase | null;
  meaningOptions: readonly string[];
  selectedMeaning?: string;
  selectedGender?: Gender;
  meaningCorrect?: boolean;
  genderCorrect?: boolean;
  score: number;
  totalAsked: number;
  scoreText: string;
  counterText: string;
  progress: number;
  canGoBack: boolean;
  showSummary: boolean;
  missedItems: readonly VocabEntry[];
  summary: SessionSummary;
  categories: readonly string[];
  activeCategories: readonly string[];
}

function sameCategorySet(left: readonly string[], right: readonly string[]): boolean {
  const leftSet = new Set(left);
  const rightSet = new Set(right);
  return leftSet.size === rightSet.size && [...leftSet].every((category) => rightSet.has(category));
}

/** Category order carries no meaning for the deck, so only membership is compared. */
function sameDeckSettings(left: QuizSettings, right: QuizSettings): boolean {
  return (
    left.shuffleEnabled === right.shuffleEnabled &&
    left.sessionLength === right.sessionLength &&
    sameCategorySet(left.activeCategories, right.activeCategories)
  );
}

/**
 * Drives one quiz session over a working deck. Each card is answered in two steps,
 * meaning then gender, and every correct step pays out at most once per card.
 *
 * Calls that do not apply to the current state (answering out of phase, navigating an
 * empty deck) are ignored and return `false`.
 */
export class QuizSession {
  private readonly catalog: VocabularyCatalog;
  private readonly settingsStore: SettingsStore;
  private readonly sink: NotificationSink;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private readonly cards = new CardStateStore();

  private deck: VocabEntry[] = [];
  private index = 0;
  private history: number[] = [];
  private scoreValue = 0;
  private asked = 0;
  private missed: VocabEntry[] = [];
  private summaryVisible = false;
  private options: string[] = [];

  constructor(options: QuizSessionOptions) {
    this.catalog = options.catalog;
    this.settingsStore = options.settings;
    this.sink = options.sink ?? silentSink;
    this.random = options.random ?? defaultRandom;
    this.log = options.logger ?? createModuleLogger('session');
    this.rebuildWorkingDeck();
  }

  get current(): VocabEntry | null {
    return this.deck[this.index] ?? null;
  }

  get currentIndex(): number {
    return this.index;
  }

  get workingDeck(): readonly VocabEntry[] {
    return [...this.deck];
  }

  get phase(): CardPhase | null {
    const entry = this.current;
    if (!entry) {
      return null;
    }
    return this.cards.peek(entry.id)?.phase ?? 'awaiting-meaning';
  }

  get meaningOptions(): readonly string[] {
    return [...this.options];
  }

  get score(): number {
    return this.scoreValue;
  }

  get totalAsked(): number {
    return this.asked;
  }

  get scoreText(): string {
    return formatScoreText(this.scoreValue, this.asked);
  }

  get counterText(): string {
    return formatPositionText(this.index, this.deck.length);
  }

  /** Position through the deck, counting half a card once the meaning is answered. */
  get progress(): number {
    const size = this.deck.length;
    if (size === 0) {
      return 0;
    }
    const base = this.index / size;
    switch (this.phase) {
      case 'awaiting-gender':
        return Math.min(1, base + 0.5 / size);
      case 'completed':
        return Math.min(1, base + 1 / size);
      default:
        return base;
    }
  }

  get canGoBack(): boolean {
    return this.history.length > 0;
  }

  get showSummary(): boolean {
    return this.summaryVisible;
  }

  get missedItems(): readonly VocabEntry[] {
    return [...this.missed];
  }

  get summary(): SessionSummary {
    return summarizeSession(this.asked, this.missed.length);
  }

  get settings(): QuizSettings {
    return this.settingsStore.get();
  }

  get categories(): readonly string[] {
    return this.catalog.categories;
  }

  get activeCategories(): readonly string[] {
    return this.settingsStore.get().activeCategories;
  }

  submitMeaning(choice: string): boolean {
    const entry = this.current;
    if (!entry) {
      return this.reject('submitMeaning', 'no current card');
    }
    const before = this.cards.getOrCreate(entry.id);
    if (before.phase !== 'awaiting-meaning') {
      return this.reject('submitMeaning', `card is ${before.phase}`);
    }

    const correct = isCorrectMeaning(entry, choice);
    const grant = correct && !before.meaningScored;
    this.cards.update(entry.id, (state) => {
      state.selectedMeaning = choice;
      state.meaningCorrect = correct;
      if (grant) {
        state.meaningScored = true;
      }
      state.phase = 'awaiting-gender';
    });

    if (grant) {
      this.scoreValue += SCORE_STEP;
      this.notify('notifyCorrect');
    } else if (!correct) {
      this.notify('notifyIncorrect');
    }
    return true;
  }

  submitGender(choice: Gender): boolean {
    const entry = this.current;
    if (!entry) {
      return this.reject('submitGender', 'no current card');
    }
    const before = this.cards.getOrCreate(entry.id);
    if (before.phase !== 'awaiting-gender') {
      return this.reject('submitGender', `card is ${before.phase}`);
    }

    const correct = isCorrectGender(entry, choice);
    const grant = correct && !before.genderScored;
    const after = this.cards.update(entry.id, (state) => {
      state.selectedGender = choice;
      state.genderCorrect = correct;
      if (grant) {
        state.genderScored = true;
      }
      state.phase = 'completed';
    });

    if (grant) {
      this.scoreValue += SCORE_STEP;
    }
    // Phases never regress, so a card passes this point once per deck.
    this.asked += 1;
    if (!(after.meaningCorrect === true && after.genderCorrect === true)) {
      this.recordMissed(entry);
    }

    if (grant) {
      this.notify('notifyCorrect');
    } else if (!correct) {
      this.notify('notifyIncorrect');
    }
    return true;
  }

  next(): boolean {
    if (this.deck.length === 0) {
      return this.reject('next', 'deck is empty');
    }
    if (this.history[this.history.length - 1] !== this.index) {
      this.history.push(this.index);
      if (this.history.length > BACK_HISTORY_LIMIT) {
        this.history.splice(0, this.history.length - BACK_HISTORY_LIMIT);
      }
    }
    if (this.index + 1 < this.deck.length) {
      this.index += 1;
    } else {
      this.summaryVisible = true;
    }
    this.primeCard();
    return true;
  }

  previous(): boolean {
    const previousIndex = this.history.pop();
    if (previousIndex === undefined) {
      return this.reject('previous', 'history is empty');
    }
    this.index = previousIndex;
    this.primeCard();
    return true;
  }

  /** Zeroes the score and lets already answered cards pay out again; answers stay visible. */
  resetScore(): void {
    this.scoreValue = 0;
    this.asked = 0;
    this.cards.clearScoreFlags();
  }

  rebuildWorkingDeck(): void {
    const settings = this.settingsStore.get();
    const deck = buildDeck(
      this.catalog.all(),
      {
        activeCategories: settings.activeCategories,
        shuffle: settings.shuffleEnabled,
        sessionLength: settings.sessionLength,
      },
      this.random,
    );
    this.startDeck(deck);
    this.log.info(
      {
        deckSize: deck.length,
        activeCategories: settings.activeCategories,
        shuffle: settings.shuffleEnabled,
        sessionLength: settings.sessionLength,
      },
      'working deck rebuilt',
    );
  }

  toggleCategory(category: string): boolean {
    const tag = normalizeBoundedText(category, CATEGORY_MAX_LENGTH);
    if (!tag) {
      return this.reject('toggleCategory', 'blank category');
    }
    const active = this.settingsStore.get().activeCategories;
    const nextActive = active.includes(tag) ? active.filter((item) => item !== tag) : [...active, tag];
    this.persistSettings({ activeCategories: nextActive });
    this.rebuildWorkingDeck();
    return true;
  }

  /** Applies a settings change; returns whether the deck had to be rebuilt for it. */
  updateSettings(patch: Partial<QuizSettings>): boolean {
    const before = this.settingsStore.get();
    this.persistSettings(patch);
    if (sameDeckSettings(before, this.settingsStore.get())) {
      return false;
    }
    this.rebuildWorkingDeck();
    return true;
  }

  retryMissedOnly(): boolean {
    if (this.missed.length === 0) {
      this.summaryVisible = false;
      return false;
    }
    const retryDeck = shuffled(this.missed, this.random);
    this.startDeck(retryDeck);
    this.log.info({ deckSize: retryDeck.length }, 'retrying missed items');
    return true;
  }

  startNewSessionFromFilters(): void {
    this.rebuildWorkingDeck();
    this.summaryVisible = false;
  }

  speakCurrentWord(): boolean {
    const entry = this.current;
    if (!entry) {
      return this.reject('speakCurrentWord', 'no current card');
    }
    const { speechRate, speechEnabled } = this.settingsStore.get();
    dispatchFeedback(this.log, 'speak', () => this.sink.speak(entry.word, speechRate, speechEnabled));
    return true;
  }

  snapshot(): QuizSnapshot {
    const entry = this.current;
    const state = entry ? this.cards.peek(entry.id) : undefined;
    return {
      current: entry,
      currentIndex: this.index,
      deckSize: this.deck.length,
      phase: this.phase,
      meaningOptions: this.meaningOptions,
      selectedMeaning: state?.selectedMeaning,
      selectedGender: state?.selectedGender,
      meaningCorrect: state?.meaningCorrect,
      genderCorrect: state?.genderCorrect,
      score: this.scoreValue,
      totalAsked: this.asked,
      scoreText: this.scoreText,
      counterText: this.counterText,
      progress: this.progress,
      canGoBack: this.canGoBack,
      showSummary: this.summaryVisible,
      missedItems: this.missedItems,
      summary: this.summary,
      categories: this.categories,
      activeCategories: this.activeCategories,
    };
  }

  private startDeck(deck: VocabEntry[]): void {
    this.deck = deck;
    this.index = 0;
    this.history = [];
    this.cards.clearAll();
    this.scoreValue = 0;
    this.asked = 0;
    this.missed = [];
    this.summaryVisible = false;
    this.primeCard();
  }

  /** Restores the current card after any index change: its state exists and its options are fresh. */
  private primeCard(): void {
    const entry = this.current;
    if (!entry) {
      this.options = [];
      return;
    }
    this.cards.getOrCreate(entry.id);
    this.options = composeMeaningOptions(entry, this.deck, this.random);
  }

  private recordMissed(entry: VocabEntry): void {
    if (!this.missed.some((item) => item.id === entry.id)) {
      this.missed.push(entry);
    }
  }

  private notify(event: 'notifyCorrect' | 'notifyIncorrect'): void {
    dispatchFeedback(this.log, event, () => this.sink[event]());
  }

  private persistSettings(patch: Partial<QuizSettings>): void {
    void this.settingsStore.update(patch).catch((err: unknown) => {
      this.log.warn({ err }, 'failed to persist settings');
    });
  }

  private reject(operation: string, reason: string): false {
    this.log.debug({ operation, reason }, 'ignored session call');
    return false;
  }
}
