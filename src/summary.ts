import { SessionSummary } from './types';

function toCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

export function summarizeSession(totalAsked: number, missedCount: number): SessionSummary {
  const total = toCount(totalAsked);
  const missed = toCount(missedCount);
  const correct = Math.max(0, total - missed);
  return {
    total,
    correct,
    missed,
    accuracyPercent: total > 0 ? Math.round((correct * 100) / total) : 0,
    perfect: total > 0 && missed === 0,
  };
}
