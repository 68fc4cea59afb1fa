import { CardPhase, CardState } from './types';

const PHASE_ORDER: Record<CardPhase, number> = {
  'awaiting-meaning': 0,
  'awaiting-gender': 1,
  completed: 2,
};

export function createCardState(): CardState {
  return {
    phase: 'awaiting-meaning',
    meaningScored: false,
    genderScored: false,
  };
}

function laterPhase(previous: CardPhase, requested: CardPhase): CardPhase {
  return PHASE_ORDER[requested] >= PHASE_ORDER[previous] ? requested : previous;
}

/** Per-entry answer progress for one working deck, keyed by entry id. */
export class CardStateStore {
  private readonly states = new Map<string, CardState>();

  get size(): number {
    return this.states.size;
  }

  peek(entryId: string): CardState | undefined {
    const state = this.states.get(entryId);
    return state ? { ...state } : undefined;
  }

  getOrCreate(entryId: string): CardState {
    const existing = this.states.get(entryId);
    if (existing) {
      return { ...existing };
    }
    const created = createCardState();
    this.states.set(entryId, created);
    return { ...created };
  }

  update(entryId: string, mutate: (state: CardState) => void): CardState {
    const previous = this.states.get(entryId) ?? createCardState();
    const draft = { ...previous };
    mutate(draft);
    const next = { ...draft, phase: laterPhase(previous.phase, draft.phase) };
    this.states.set(entryId, next);
    return { ...next };
  }

  clearScoreFlags(): void {
    for (const [entryId, state] of this.states) {
      this.states.set(entryId, { ...state, meaningScored: false, genderScored: false });
    }
  }

  clearAll(): void {
    this.states.clear();
  }
}
