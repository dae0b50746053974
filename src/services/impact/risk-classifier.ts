// Buckets impact scores into risk tiers

import type { ChangeSpecification } from '../../models/change-spec.js';
import type { AffectedComponents, ImpactScores, RiskArea } from '../../models/impact.js';
import type { RiskType } from '../../models/types.js';

export const RISK_THRESHOLD = 0.6;
export const MEDIUM_IMPACT_THRESHOLD = 0.4;
export const HIGH_IMPACT_THRESHOLD = 0.7;

/**
 * Risk Classifier
 */
export class RiskClassifier {
  /**
   * Turns every component scoring at least RISK_THRESHOLD into a RiskArea
   */
  classify(scores: ImpactScores, change: ChangeSpecification): RiskArea[] {
    const riskAreas: RiskArea[] = [];

    for (const [component, score] of scores) {
      if (score < RISK_THRESHOLD) continue;

      riskAreas.push({
        component,
        riskType: this.determineRiskType(change, component, score),
        riskScore: score,
        description: this.describeRisk(component, score),
        // Prefix match, so `PayAPI` also claims `PayAPI.v2`
        affectedContracts: change.affectedContracts.filter(contract => contract.startsWith(component))
      });
    }

    return riskAreas;
  }

  determineRiskType(change: ChangeSpecification, component: string, score: number): RiskType {
    if (change.affectedContracts.includes(component)) {
      return 'ContractCompliance';
    }
    if (score >= HIGH_IMPACT_THRESHOLD) {
      return 'HighImpact';
    }
    if (score >= MEDIUM_IMPACT_THRESHOLD) {
      return 'MediumImpact';
    }
    return 'LowImpact';
  }

  describeRisk(component: string, score: number): string {
    if (score >= HIGH_IMPACT_THRESHOLD) {
      return `High risk of breaking changes affecting ${component}`;
    }
    if (score >= MEDIUM_IMPACT_THRESHOLD) {
      return `Potential indirect effects on ${component}`;
    }
    return `Minor impact possible on ${component}`;
  }
}

/**
 * Groups components by score band, plus the affected contracts when there are any
 */
export function groupByTier(scores: ImpactScores, change: ChangeSpecification): AffectedComponents {
  const entries = [...scores];
  const affected: AffectedComponents = {
    high: entries.filter(([, score]) => score >= HIGH_IMPACT_THRESHOLD).map(([name]) => name),
    medium: entries
      .filter(([, score]) => score >= MEDIUM_IMPACT_THRESHOLD && score < HIGH_IMPACT_THRESHOLD)
      .map(([name]) => name),
    low: entries.filter(([, score]) => score < MEDIUM_IMPACT_THRESHOLD).map(([name]) => name)
  };

  if (change.affectedContracts.length > 0) {
    affected.contracts = [...change.affectedContracts];
  }

  return affected;
}
