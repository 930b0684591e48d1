import { describe, it, expect } from 'vitest';

import { branchPolicy, classifyRisk, compareTiers } from '../src/core/risk.js';

describe('classifyRisk', () => {
  it('puts boundary scores in the higher tier', () => {
    expect(classifyRisk(80)).toBe('High');
    expect(classifyRisk(79)).toBe('Medium');
    expect(classifyRisk(50)).toBe('Medium');
    expect(classifyRisk(49)).toBe('Low');
  });

  it('covers the ends of the range', () => {
    expect(classifyRisk(0)).toBe('Low');
    expect(classifyRisk(100)).toBe('High');
  });

  it('is monotonic in the score', () => {
    for (let score = 0; score < 100; score++) {
      expect(compareTiers(classifyRisk(score), classifyRisk(score + 1))).toBeLessThanOrEqual(0);
    }
  });

  it.each([-1, 101, 50.5, Number.NaN])('rejects %s', (score) => {
    expect(() => classifyRisk(score)).toThrow(RangeError);
  });
});

describe('branchPolicy', () => {
  it('plans containment only for the High tier', () => {
    expect(branchPolicy('High').containment).toBe(true);
    expect(branchPolicy('Medium').containment).toBe(false);
    expect(branchPolicy('Low').label).toBe('record-and-monitor');
  });
});
