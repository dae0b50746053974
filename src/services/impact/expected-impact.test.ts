/**
 * Unit Tests for checkExpectedImpact
 */

import { describe, it, expect } from 'vitest';
import { checkExpectedImpact } from './expected-impact.js';
import type { ImpactScores } from '../../models/impact.js';

function scoresOf(entries: Record<string, number>): ImpactScores {
  return new Map(Object.entries(entries));
}

describe('checkExpectedImpact', () => {
  it('should warn when the difference exceeds the tolerance', () => {
    expect(checkExpectedImpact({ X: 0.75 }, scoresOf({ X: 1 }))).toEqual([
      { component: 'X', expected: 0.75, actual: 1, difference: 0.25 }
    ]);
  });

  it('should not warn within the tolerance', () => {
    expect(checkExpectedImpact({ X: 0.9 }, scoresOf({ X: 1 }))).toEqual([]);
  });

  it('should skip components without a computed score', () => {
    expect(checkExpectedImpact({ Ghost: 0.9 }, scoresOf({ X: 0.1 }))).toEqual([]);
  });

  it('should honour a custom tolerance', () => {
    const warnings = checkExpectedImpact({ X: 0.9 }, scoresOf({ X: 1 }), 0.05);

    expect(warnings.map(w => w.component)).toEqual(['X']);
  });

  it('should not treat inherited object keys as expected components', () => {
    expect(checkExpectedImpact({ toString: 0.5 }, scoresOf({}))).toEqual([]);
  });
});
