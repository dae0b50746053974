// Zod schemas for documents crossing the toolkit boundary

import { z } from 'zod';
import type { ChangeSpecification } from '../models/change-spec.js';

/**
 * Scalar that may be written as a YAML number or string (e.g. `version: 1.2`)
 */
const ScalarStringSchema = z.preprocess(
  value => (typeof value === 'number' ? String(value) : value),
  z.string()
);

/**
 * Change specification as written in a YAML document.
 * Empty YAML keys parse as null, so every collection is nullish.
 */
export const ChangeSpecificationDocumentSchema = z.object({
  component: z.string().min(1, 'Component is required'),
  changeType: z.string().min(1, 'Change type is required'),
  changes: z.record(z.string(), z.unknown()).nullish(),
  affectedContracts: z.array(z.string()).nullish(),
  expectedImpact: z.record(z.string(), z.coerce.number()).nullish()
});

/**
 * Change specification document mapped onto the domain model
 */
export const ChangeSpecificationSchema = ChangeSpecificationDocumentSchema.transform(
  (doc): ChangeSpecification => ({
    component: doc.component,
    changeType: doc.changeType,
    changedFields: doc.changes ?? {},
    affectedContracts: doc.affectedContracts ?? [],
    expectedImpact: doc.expectedImpact ?? {}
  })
);

/**
 * Component snapshot from a code structure provider
 */
export const ComponentSnapshotSchema = z.object({
  name: z.string().min(1, 'Component name is required'),
  dependencies: z.array(z.string()).nullish().transform(deps => deps ?? [])
});

export const ComponentListSchema = z.array(ComponentSnapshotSchema);

/**
 * Component manifest file (`components.yaml`)
 */
export const ComponentManifestSchema = z.object({
  components: ComponentListSchema.nullish().transform(components => components ?? [])
});

/**
 * Verdict returned by a contract validator
 */
export const ContractVerdictSchema = z.object({
  isValid: z.boolean(),
  errors: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([])
});

// Contract documents, one tagged variant per contract type

const NamedTypeSchema = z.object({
  name: z.string(),
  type: z.string()
});

const ParameterSchema = NamedTypeSchema.extend({
  required: z.boolean().optional()
});

const BaseContractSchema = z.object({
  name: z.string(),
  version: ScalarStringSchema,
  description: z.string().optional()
});

export const InterfaceContractSchema = BaseContractSchema.extend({
  type: z.literal('interface'),
  inputs: z.array(NamedTypeSchema).optional(),
  outputs: z.array(NamedTypeSchema).optional(),
  extensionPoints: z.array(z.unknown()).optional()
});

export const OperationSchema = z.object({
  name: z.string(),
  description: z.string(),
  parameters: z.array(ParameterSchema).optional(),
  returnType: z.string().optional()
});

export const BehaviorContractSchema = BaseContractSchema.extend({
  type: z.literal('behavior'),
  operations: z.array(OperationSchema).optional(),
  concurrencyRules: z.array(z.object({ type: z.string(), description: z.string() })).optional(),
  performanceConstraints: z.array(z.object({ metric: z.string(), threshold: ScalarStringSchema })).optional()
});

export const ResourceRequirementSchema = z.object({
  type: z.string(),
  specification: ScalarStringSchema
});

export const ResourceContractSchema = BaseContractSchema.extend({
  type: z.literal('resource'),
  resourceRequirements: z.array(ResourceRequirementSchema).optional(),
  accessPatterns: z.array(z.object({ type: z.string(), description: z.string() })).optional(),
  scalingRules: z.array(z.object({ trigger: z.string(), action: z.string() })).optional()
});

export const ContractDocumentSchema = z.discriminatedUnion('type', [
  InterfaceContractSchema,
  BehaviorContractSchema,
  ResourceContractSchema
]);

/**
 * Project configuration (`.impact/config.yaml`)
 */
export const PropagationConfigSchema = z.object({
  dampingFactor: z.number().gt(0).lt(1).default(0.85),
  maxIterations: z.number().int().positive().default(100),
  tolerance: z.number().positive().default(1e-4)
});

export const ImpactConfigSchema = z.object({
  manifest: z.string().min(1).default('components.yaml'),
  contractsDir: z.string().min(1).default('contracts'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  propagation: PropagationConfigSchema.default({}),
  tolerance: z.number().min(0).default(0.2)
});

/**
 * Type exports
 */
export type ChangeSpecificationDocument = z.infer<typeof ChangeSpecificationDocumentSchema>;
export type ComponentManifest = z.infer<typeof ComponentManifestSchema>;
export type InterfaceContract = z.infer<typeof InterfaceContractSchema>;
export type BehaviorContract = z.infer<typeof BehaviorContractSchema>;
export type ResourceContract = z.infer<typeof ResourceContractSchema>;
export type ContractDocument = z.infer<typeof ContractDocumentSchema>;
export type Operation = z.infer<typeof OperationSchema>;
export type ResourceRequirement = z.infer<typeof ResourceRequirementSchema>;
export type PropagationConfig = z.infer<typeof PropagationConfigSchema>;
export type ImpactConfig = z.infer<typeof ImpactConfigSchema>;

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
