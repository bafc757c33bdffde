import { describe, expect, it } from 'vitest';
import { resolveMinScore } from './min-score.js';

describe('resolveMinScore', () => {
  it('returns the base score in a neutral market with room to spare', () => {
    expect(resolveMinScore({ base: 8, marketCondition: 'neutral', openCount: 0, capacity: 10 })).toBe(8);
  });

  it('loosens in a bull market and tightens in a bear market', () => {
    expect(resolveMinScore({ base: 8, marketCondition: 'bull', openCount: 0, capacity: 10 })).toBe(7);
    expect(resolveMinScore({ base: 8, marketCondition: 'bear', openCount: 0, capacity: 10 })).toBe(9);
  });

  it('adds a point once 70% of the slots are used', () => {
    expect(resolveMinScore({ base: 8, marketCondition: 'neutral', openCount: 6, capacity: 10 })).toBe(8);
    expect(resolveMinScore({ base: 8, marketCondition: 'neutral', openCount: 7, capacity: 10 })).toBe(9);
  });

  it('stays within 0..10', () => {
    expect(resolveMinScore({ base: 10, marketCondition: 'bear', openCount: 9, capacity: 10 })).toBe(10);
    expect(resolveMinScore({ base: 0, marketCondition: 'bull', openCount: 0, capacity: 10 })).toBe(0);
  });
});
