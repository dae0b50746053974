// Canned remediation suggestions per risk tier

import type { RiskArea } from '../../models/impact.js';
import type { RiskType } from '../../models/types.js';

type MitigationTemplate = (component: string) => string[];

const MITIGATIONS: Record<RiskType, MitigationTemplate> = {
  ContractCompliance: component => [
    `Implement compatibility layer for ${component}`,
    `Add contract validation tests for ${component}`
  ],
  HighImpact: component => [
    `Phase implementation for ${component}`,
    `Increase test coverage for ${component}`,
    `Prepare rollback procedure for ${component}`
  ],
  MediumImpact: component => [
    `Monitor ${component} during deployment`,
    `Add performance tests for ${component}`
  ],
  LowImpact: () => []
};

/**
 * Mitigation Advisor
 */
export class MitigationAdvisor {
  /**
   * Suggestions for all risk areas, without duplicates, in first-seen order
   */
  advise(riskAreas: readonly RiskArea[]): string[] {
    const suggestions = new Set<string>();

    for (const risk of riskAreas) {
      for (const suggestion of MITIGATIONS[risk.riskType](risk.component)) {
        suggestions.add(suggestion);
      }
    }

    return Array.from(suggestions);
  }
}
