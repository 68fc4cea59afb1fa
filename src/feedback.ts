import { DEFAULT_UTTERANCE_RATE, SPEECH_RATE_MAX, SPEECH_RATE_MIN, UTTERANCE_RATE_SPREAD } from './constants';
import { createModuleLogger, Logger } from './logger';
import { QuizSettings } from './types';

/**
 * Receives answer outcomes and speech requests from the session. Implementations may be
 * asynchronous; the session never waits on them.
 */
export interface NotificationSink {
  notifyCorrect(): unknown;
  notifyIncorrect(): unknown;
  speak(word: string, rate: number, enabled: boolean): unknown;
}

export interface HapticsOutput {
  success(): unknown;
  error(): unknown;
}

export interface SoundOutput {
  correct(): unknown;
  wrong(): unknown;
}

export interface SpeechOutput {
  speak(text: string, utteranceRate: number): unknown;
}

export interface FeedbackOutputs {
  haptics?: HapticsOutput;
  sounds?: SoundOutput;
  speech?: SpeechOutput;
}

export type FeedbackSettings = Pick<QuizSettings, 'hapticsEnabled' | 'answerSoundsEnabled'>;

const feedbackLogger = createModuleLogger('feedback');

export const silentSink: NotificationSink = {
  notifyCorrect: () => undefined,
  notifyIncorrect: () => undefined,
  speak: () => undefined,
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Runs a sink call without letting its failure reach the caller. Synchronous throws and
 * rejected promises are both logged at warn.
 */
export function dispatchFeedback(log: Logger, event: string, call: () => unknown): void {
  try {
    const result = call();
    if (isPromiseLike(result)) {
      void Promise.resolve(result).catch((err: unknown) => {
        log.warn({ err, event }, 'feedback output rejected');
      });
    }
  } catch (err) {
    log.warn({ err, event }, 'feedback output failed');
  }
}

/** Maps the 0..1 speech-rate slider onto an utterance rate centred on the platform default. */
export function toUtteranceRate(sliderRate: number): number {
  const slider = Number.isFinite(sliderRate) ? sliderRate : DEFAULT_UTTERANCE_RATE;
  const rate = DEFAULT_UTTERANCE_RATE + (slider - 0.5) * UTTERANCE_RATE_SPREAD;
  return Math.min(SPEECH_RATE_MAX, Math.max(SPEECH_RATE_MIN, rate));
}

export function createFeedbackSink(
  getSettings: () => FeedbackSettings,
  outputs: FeedbackOutputs,
  log: Logger = feedbackLogger,
): NotificationSink {
  const { haptics, sounds, speech } = outputs;
  return {
    notifyCorrect() {
      const settings = getSettings();
      if (settings.hapticsEnabled && haptics) {
        dispatchFeedback(log, 'haptics.success', () => haptics.success());
      }
      if (settings.answerSoundsEnabled && sounds) {
        dispatchFeedback(log, 'sounds.correct', () => sounds.correct());
      }
    },
    notifyIncorrect() {
      const settings = getSettings();
      if (settings.hapticsEnabled && haptics) {
        dispatchFeedback(log, 'haptics.error', () => haptics.error());
      }
      if (settings.answerSoundsEnabled && sounds) {
        dispatchFeedback(log, 'sounds.wrong', () => sounds.wrong());
      }
    },
    speak(word, rate, enabled) {
      if (!enabled || word.length === 0 || !speech) {
        return;
      }
      dispatchFeedback(log, 'speech.speak', () => speech.speak(word, toUtteranceRate(rate)));
    },
  };
}
