import { Gender } from './types';

export const GENDERS: readonly Gender[] = ['masculine', 'feminine', 'neuter'];

export const WORD_MAX_LENGTH = 80;
export const MEANING_MAX_LENGTH = 180;
export const CATEGORY_MAX_LENGTH = 40;

export const SCORE_STEP = 0.5;
export const BACK_HISTORY_LIMIT = 5;
export const MEANING_OPTION_COUNT = 4;

export const SESSION_LENGTH_MAX = 10000;

export const SPEECH_RATE_MIN = 0;
export const SPEECH_RATE_MAX = 1;
export const DEFAULT_UTTERANCE_RATE = 0.5;
export const UTTERANCE_RATE_SPREAD = 0.4;
