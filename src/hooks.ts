import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { loadDefaultCatalog, VocabularyCatalog } from './catalog/catalog';
import { NotificationSink } from './feedback';
import { createModuleLogger } from './logger';
import { QuizSession, QuizSnapshot } from './session';
import { KeyValueStore } from './storage/keyValueStore';
import { SettingsStore } from './storage/settingsRepository';
import { Gender, QuizSettings, RandomSource } from './types';

const hookLogger = createModuleLogger('hooks');

export interface UseQuizSessionOptions {
  store: KeyValueStore;
  catalog?: VocabularyCatalog;
  sink?: NotificationSink;
  random?: RandomSource;
}

/**
 * Binds a {@link QuizSession} to React state. Settings are loaded once on mount; every
 * action runs against the session and republishes its snapshot.
 */
export function useQuizSession(options: UseQuizSessionOptions) {
  const [snapshot, setSnapshot] = useState<QuizSnapshot | null>(null);
  const [loading, setLoading] = useState(true);
  const sessionRef = useRef<QuizSession | null>(null);
  const optionsRef = useRef(options);

  useEffect(() => {
    let active = true;
    const { store, catalog, sink, random } = optionsRef.current;
    SettingsStore.open(store)
      .then((settings) => {
        if (!active) {
          return;
        }
        const session = new QuizSession({
          catalog: catalog ?? loadDefaultCatalog(),
          settings,
          sink,
          random,
        });
        sessionRef.current = session;
        setSnapshot(session.snapshot());
      })
      .catch((err: unknown) => {
        hookLogger.error({ err }, 'failed to start quiz session');
      })
      .finally(() => {
        if (active) {
          setLoading(false);
        }
      });

    return () => {
      active = false;
    };
  }, []);

  const run = useCallback((action: (session: QuizSession) => boolean | void): boolean => {
    const session = sessionRef.current;
    if (!session) {
      return false;
    }
    const result = action(session);
    setSnapshot(session.snapshot());
    return result !== false;
  }, []);

  const actions = useMemo(
    () => ({
      submitMeaning: (choice: string) => run((session) => session.submitMeaning(choice)),
      submitGender: (choice: Gender) => run((session) => session.submitGender(choice)),
      next: () => run((session) => session.next()),
      previous: () => run((session) => session.previous()),
      resetScore: () => run((session) => session.resetScore()),
      toggleCategory: (category: string) => run((session) => session.toggleCategory(category)),
      updateSettings: (patch: Partial<QuizSettings>) => run((session) => session.updateSettings(patch)),
      retryMissedOnly: () => run((session) => session.retryMissedOnly()),
      startNewSession: () => run((session) => session.startNewSessionFromFilters()),
      speakCurrentWord: () => run((session) => session.speakCurrentWord()),
    }),
    [run],
  );

  return {
    loading,
    snapshot,
    settings: sessionRef.current?.settings ?? null,
    ...actions,
  };
}
