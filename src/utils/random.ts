import { RandomSource } from '../types';

export const defaultRandom: RandomSource = () => Math.random();

/** Index in [0, upperExclusive) drawn from `random`; out-of-range draws are clamped. */
export function randomIndex(random: RandomSource, upperExclusive: number): number {
  if (upperExclusive <= 1) {
    return 0;
  }
  const draw = random();
  const safeDraw = Number.isFinite(draw) ? Math.min(Math.max(draw, 0), 1 - Number.EPSILON) : 0;
  return Math.floor(safeDraw * upperExclusive);
}

export function shuffled<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const values = [...items];
  for (let i = values.length - 1; i > 0; i -= 1) {
    const j = randomIndex(random, i + 1);
    [values[i], values[j]] = [values[j], values[i]];
  }
  return values;
}
