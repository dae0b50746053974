/**
 * Change Impact Module
 *
 * Impact propagation, risk classification, mitigation advice and the
 * service that coordinates them.
 *
 * @module services/impact
 */

export {
  ImpactPropagator,
  changeTypeMultiplier,
  CHANGE_TYPE_MULTIPLIERS,
  DEFAULT_CHANGE_TYPE_MULTIPLIER,
  AFFECTED_CONTRACT_MULTIPLIER,
  MAX_IMPACT_SCORE,
  DEFAULT_PROPAGATION_OPTIONS,
  type PropagationOptions,
  type RankResult
} from './impact-propagator.js';
export {
  RiskClassifier,
  groupByTier,
  RISK_THRESHOLD,
  MEDIUM_IMPACT_THRESHOLD,
  HIGH_IMPACT_THRESHOLD
} from './risk-classifier.js';
export { MitigationAdvisor } from './mitigation-advisor.js';
export { checkExpectedImpact, DEFAULT_IMPACT_TOLERANCE } from './expected-impact.js';
export {
  ChangeImpactService,
  AFFECTED_CONTRACT_TYPE,
  type IChangeImpactService,
  type ChangeImpactServiceOptions
} from './change-impact-service.js';
