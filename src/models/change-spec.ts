// Change specification model

/**
 * Caller-provided description of a proposed change.
 *
 * Loaded once per invocation and treated as immutable afterwards.
 */
export interface ChangeSpecification {
  /** Component the change is made to */
  component: string;
  /** Character of the change (contract, implementation, resource or anything else) */
  changeType: string;
  /** Free-form description of the changed fields (`changes` in the document) */
  changedFields: Record<string, unknown>;
  /** Contracts touched by the change, in document order */
  affectedContracts: string[];
  /** Scores the author expects per component */
  expectedImpact: Record<string, number>;
}
