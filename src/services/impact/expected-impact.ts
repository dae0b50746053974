// Compares declared expected impact with computed scores

import type { ImpactScores, ToleranceWarning } from '../../models/impact.js';

/**
 * Absolute difference allowed between expected and actual score
 */
export const DEFAULT_IMPACT_TOLERANCE = 0.2;

/**
 * Returns a warning for every expected component whose computed score differs
 * by more than the tolerance. Components without a computed score are skipped.
 */
export function checkExpectedImpact(
  expected: Record<string, number>,
  scores: ImpactScores,
  tolerance: number = DEFAULT_IMPACT_TOLERANCE
): ToleranceWarning[] {
  const warnings: ToleranceWarning[] = [];

  for (const [component, expectedScore] of Object.entries(expected)) {
    const actual = scores.get(component);
    if (actual === undefined) continue;

    const difference = Math.abs(actual - expectedScore);
    if (difference > tolerance) {
      warnings.push({ component, expected: expectedScore, actual, difference });
    }
  }

  return warnings;
}
