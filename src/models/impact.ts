// Impact analysis result types

import type { RiskType, ImpactTier } from './types.js';

/**
 * Final score per component, each in [0, 1], in graph insertion order.
 * A Map, so that any component name (`__proto__`, `10`) keeps its own entry and position.
 */
export type ImpactScores = Map<string, number>;

/**
 * A component whose score cleared the risk threshold
 */
export interface RiskArea {
  component: string;
  riskType: RiskType;
  riskScore: number;
  description: string;
  /** Affected contracts whose names start with the component name */
  affectedContracts: string[];
}

/**
 * Components grouped by impact tier; `contracts` echoes the affected contracts
 */
export type AffectedComponents = Partial<Record<ImpactTier, string[]>>;

/**
 * Complete result of one analysis call
 */
export interface ImpactAnalysisResult {
  impactScores: ImpactScores;
  riskAreas: RiskArea[];
  suggestedMitigations: string[];
  affectedComponents: AffectedComponents;
}

/**
 * Expected-vs-actual mismatch beyond tolerance. Reported, never thrown.
 */
export interface ToleranceWarning {
  component: string;
  expected: number;
  actual: number;
  difference: number;
}
