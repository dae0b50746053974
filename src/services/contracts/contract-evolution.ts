// Compatibility checks between two versions of a contract

import type {
  BehaviorContract,
  ContractDocument,
  InterfaceContract,
  Operation,
  ResourceContract
} from '../../core/schemas.js';
import type { ContractVerdict } from '../../models/contract.js';

/**
 * Parses a dotted numeric version (`2`, `1.4`, `1.4.2`)
 */
export function parseVersion(version: string): number[] | null {
  if (!/^\d+(\.\d+)*$/.test(version.trim())) {
    return null;
  }
  return version.trim().split('.').map(Number);
}

/**
 * Compares dotted versions; missing parts count as 0
 */
export function compareVersions(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

/**
 * Checks that `next` is a compatible evolution of `previous`
 */
export function compareContracts(previous: ContractDocument, next: ContractDocument): ContractVerdict {
  const errors: string[] = [];
  const warnings: string[] = [];

  checkVersions(previous.version, next.version, errors, warnings);

  if (previous.name !== next.name) {
    errors.push('Contract names must match');
  }

  if (previous.type !== next.type) {
    errors.push(`Contract type changed from ${previous.type} to ${next.type}`);
  } else if (previous.type === 'interface' && next.type === 'interface') {
    checkInterface(previous, next, errors, warnings);
  } else if (previous.type === 'behavior' && next.type === 'behavior') {
    checkBehavior(previous, next, errors);
  } else if (previous.type === 'resource' && next.type === 'resource') {
    checkResource(previous, next, warnings);
  }

  return { isValid: errors.length === 0, errors, warnings };
}

function checkVersions(previous: string, next: string, errors: string[], warnings: string[]): void {
  const oldVersion = parseVersion(previous);
  const newVersion = parseVersion(next);

  if (!oldVersion || !newVersion) {
    errors.push('Invalid version format');
    return;
  }

  if (compareVersions(newVersion, oldVersion) <= 0) {
    errors.push('New version must be greater than old version');
  }

  if (newVersion[0] > oldVersion[0]) {
    warnings.push('Major version change detected - breaking changes expected');
  }
}

function removedNames(previous: { name: string }[], next: { name: string }[]): string[] {
  const remaining = new Set(next.map(item => item.name));
  return previous.map(item => item.name).filter(name => !remaining.has(name));
}

function checkInterface(
  previous: InterfaceContract,
  next: InterfaceContract,
  errors: string[],
  warnings: string[]
): void {
  if (previous.inputs && next.inputs) {
    const removed = removedNames(previous.inputs, next.inputs);
    if (removed.length > 0) {
      errors.push(`Breaking change: Removed inputs: ${removed.join(', ')}`);
    }
  }

  if (previous.outputs && next.outputs) {
    const removed = removedNames(previous.outputs, next.outputs);
    if (removed.length > 0) {
      warnings.push(`Potentially breaking change: Removed outputs: ${removed.join(', ')}`);
    }
  }
}

function checkBehavior(previous: BehaviorContract, next: BehaviorContract, errors: string[]): void {
  if (!previous.operations || !next.operations) return;

  const removed = removedNames(previous.operations, next.operations);
  if (removed.length > 0) {
    errors.push(`Breaking change: Removed operations: ${removed.join(', ')}`);
  }

  for (const oldOperation of previous.operations) {
    const newOperation = next.operations.find(op => op.name === oldOperation.name);
    if (newOperation && !areSignaturesCompatible(oldOperation, newOperation)) {
      errors.push(`Breaking change: Modified operation signature: ${oldOperation.name}`);
    }
  }
}

/**
 * An operation stays compatible while every old parameter survives with
 * the same type and the return type is unchanged
 */
export function areSignaturesCompatible(previous: Operation, next: Operation): boolean {
  for (const oldParam of previous.parameters ?? []) {
    const newParam = next.parameters?.find(p => p.name === oldParam.name);
    if (!newParam || newParam.type !== oldParam.type) {
      return false;
    }
  }

  if (previous.returnType !== undefined && next.returnType !== undefined &&
      previous.returnType !== next.returnType) {
    return false;
  }

  return true;
}

function checkResource(previous: ResourceContract, next: ResourceContract, warnings: string[]): void {
  if (!previous.resourceRequirements || !next.resourceRequirements) return;

  for (const requirement of next.resourceRequirements) {
    const old = previous.resourceRequirements.find(r => r.type === requirement.type);
    if (old && hasIncreased(old.specification, requirement.specification)) {
      warnings.push(`Increased resource requirements for: ${requirement.type}`);
    }
  }
}

const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Numeric specifications must not grow; textual ones must not change
 */
export function hasIncreased(previous: string, next: string): boolean {
  if (NUMERIC.test(previous.trim()) && NUMERIC.test(next.trim())) {
    return Number(next) > Number(previous);
  }
  return previous.toLowerCase() !== next.toLowerCase();
}
