import { summarizeSession } from './summary';

describe('summarizeSession', () => {
  it('derives correct answers and accuracy from the asked and missed counts', () => {
    expect(summarizeSession(3, 1)).toEqual({
      total: 3,
      correct: 2,
      missed: 1,
      accuracyPercent: 67,
      perfect: false,
    });
  });

  it('marks a session without misses as perfect', () => {
    expect(summarizeSession(4, 0)).toEqual({
      total: 4,
      correct: 4,
      missed: 0,
      accuracyPercent: 100,
      perfect: true,
    });
  });

  it('reports zero accuracy and no perfect run before anything is asked', () => {
    expect(summarizeSession(0, 0)).toEqual({
      total: 0,
      correct: 0,
      missed: 0,
      accuracyPercent: 0,
      perfect: false,
    });
  });

  it('never reports negative correct counts after a score reset', () => {
    expect(summarizeSession(0, 2).correct).toBe(0);
  });
});
