// Core type definitions for the change impact toolkit

// Change types with a dedicated score multiplier
export type ChangeType = 'contract' | 'implementation' | 'resource';

// Risk tiers
export type RiskType = 'ContractCompliance' | 'HighImpact' | 'MediumImpact' | 'LowImpact';

// Buckets of ImpactAnalysisResult.affectedComponents
export type ImpactTier = 'high' | 'medium' | 'low' | 'contracts';

// Contract document kinds
export type ContractType = 'interface' | 'behavior' | 'resource';
