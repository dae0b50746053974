// Input validation and sanitization utilities

import { InputError, SecurityError } from './errors.js';
import type { ContractType } from '../models/types.js';

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

export const CONTRACT_TYPES: readonly ContractType[] = ['interface', 'behavior', 'resource'];

export const OUTPUT_FORMATS = ['yaml', 'json'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const MAX_CONTRACT_NAME_LENGTH = 200;

/**
 * Validates a contract name before it is turned into a file path.
 * Nested names (`billing/PayAPI`) are allowed; escaping the contracts directory is not.
 */
export function validateContractName(name: string): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InputError('Contract name is required', 'contract');
  }

  const trimmed = name.trim();

  if (trimmed.length > MAX_CONTRACT_NAME_LENGTH) {
    throw new InputError(`Contract name exceeds maximum length of ${MAX_CONTRACT_NAME_LENGTH}`, 'contract');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new SecurityError('Invalid contract name: potential path traversal detected', { contract: name });
    }
  }

  return trimmed;
}

/**
 * Type guard for contract types
 */
export function isContractType(value: string): value is ContractType {
  return CONTRACT_TYPES.some(type => type === value);
}

/**
 * Validates a contract type given on the command line
 */
export function validateContractType(type: string): ContractType {
  const normalized = type.trim().toLowerCase();

  if (!isContractType(normalized)) {
    throw new InputError(
      `Invalid contract type "${type}". Must be: ${CONTRACT_TYPES.join(', ')}`,
      'type'
    );
  }

  return normalized;
}

/**
 * Validates a result output format
 */
export function validateOutputFormat(format: string): OutputFormat {
  const normalized = format.trim().toLowerCase();
  const match = OUTPUT_FORMATS.find(f => f === normalized);

  if (!match) {
    throw new InputError(
      `Invalid format "${format}". Must be: ${OUTPUT_FORMATS.join(', ')}`,
      'format'
    );
  }

  return match;
}
