export type Gender = 'masculine' | 'feminine' | 'neuter';

export type CardPhase = 'awaiting-meaning' | 'awaiting-gender' | 'completed';

export type RandomSource = () => number;

export interface VocabEntry {
  readonly id: string;
  readonly word: string;
  readonly meaning: string;
  readonly gender: Gender;
  readonly categories: readonly string[];
}

export interface VocabSeed {
  word: string;
  meaning: string;
  gender: string;
  categories?: string[];
}

export interface CardState {
  selectedMeaning?: string;
  selectedGender?: Gender;
  meaningCorrect?: boolean;
  genderCorrect?: boolean;
  phase: CardPhase;
  meaningScored: boolean;
  genderScored: boolean;
}

export interface QuizSettings {
  shuffleEnabled: boolean;
  sessionLength: number;
  activeCategories: string[];
  speechEnabled: boolean;
  speechRate: number;
  hapticsEnabled: boolean;
  answerSoundsEnabled: boolean;
  showInstructions: boolean;
  hasSeenWelcome: boolean;
}

export interface DeckOptions {
  activeCategories: Iterable<string>;
  shuffle: boolean;
  sessionLength: number;
}

export interface SessionSummary {
  total: number;
  correct: number;
  missed: number;
  accuracyPercent: number;
  perfect: boolean;
}
