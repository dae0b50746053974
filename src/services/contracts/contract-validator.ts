/**
 * Contract Validation
 *
 * The ContractValidator interface the impact engine depends on, and the
 * pure checks that validate a single typed contract document.
 */

import { ContractDocumentSchema, formatIssues, type ContractDocument } from '../../core/schemas.js';
import { isContractType } from '../../core/validation.js';
import type { ContractVerdict } from '../../models/contract.js';
import type { ContractType } from '../../models/types.js';

/**
 * Validates a named contract as a given contract type
 */
export interface ContractValidator {
  validate(contractName: string, contractType: string): Promise<ContractVerdict>;
}

export function validVerdict(warnings: string[] = []): ContractVerdict {
  return { isValid: true, errors: [], warnings };
}

export function invalidVerdict(errors: string[], warnings: string[] = []): ContractVerdict {
  return { isValid: false, errors, warnings };
}

/**
 * Combines verdicts: valid only if every verdict is valid
 */
export function mergeVerdicts(verdicts: readonly ContractVerdict[]): ContractVerdict {
  return {
    isValid: verdicts.every(v => v.isValid),
    errors: verdicts.flatMap(v => v.errors),
    warnings: verdicts.flatMap(v => v.warnings)
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Guesses a contract type from a file name (`billing-interface.yaml` -> interface)
 */
export function inferContractType(fileName: string): ContractType | undefined {
  const lower = fileName.toLowerCase();
  if (lower.includes('interface')) return 'interface';
  if (lower.includes('behavior')) return 'behavior';
  if (lower.includes('resource')) return 'resource';
  return undefined;
}

/**
 * Result of reading a raw document as a typed contract
 */
export type ContractParseResult =
  | { success: true; contract: ContractDocument }
  | { success: false; errors: string[] };

/**
 * Reads a raw document as a contract of the given type.
 *
 * A document may omit `type`; if it declares one it must match.
 */
export function parseContractDocument(document: unknown, contractType: string): ContractParseResult {
  const type = contractType.trim().toLowerCase();
  if (!isContractType(type)) {
    return { success: false, errors: [`Unknown contract type: ${contractType}`] };
  }

  if (!isRecord(document)) {
    return { success: false, errors: [`A ${type} contract must be a mapping`] };
  }

  const declared = document.type;
  if (declared !== undefined && declared !== type) {
    return {
      success: false,
      errors: [`Contract declares type "${String(declared)}" but was validated as "${type}"`]
    };
  }

  const parsed = ContractDocumentSchema.safeParse({ ...document, type });
  if (!parsed.success) {
    return { success: false, errors: formatIssues(parsed.error) };
  }

  return { success: true, contract: parsed.data };
}

/**
 * Validates a raw document as a contract of the given type
 */
export function validateContractDocument(document: unknown, contractType: string): ContractVerdict {
  const parsed = parseContractDocument(document, contractType);
  return parsed.success ? validVerdict() : invalidVerdict(parsed.errors);
}
