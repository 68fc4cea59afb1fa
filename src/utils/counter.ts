function toNonNegativeFinite(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function toNonNegativeInt(value: number): number {
  return Math.floor(toNonNegativeFinite(value));
}

export function formatScoreText(score: number, totalAsked: number): string {
  return `Score: ${toNonNegativeFinite(score).toFixed(1)} / ${toNonNegativeInt(totalAsked)}`;
}

/** One-based position label; empty for an empty deck. */
export function formatPositionText(index: number, deckSize: number): string {
  const size = toNonNegativeInt(deckSize);
  if (size === 0) {
    return '';
  }
  const position = Math.min(toNonNegativeInt(index) + 1, size);
  return `Word ${position} of ${size}`;
}

export function formatAccuracyText(accuracyPercent: number): string {
  return `${Math.round(toNonNegativeFinite(accuracyPercent))}%`;
}
