/**
 * Tests for contract evolution checks
 */

import { describe, it, expect } from 'vitest';
import {
  compareContracts,
  compareVersions,
  hasIncreased,
  parseVersion
} from './contract-evolution.js';
import type { BehaviorContract, InterfaceContract, ResourceContract } from '../../core/schemas.js';

function iface(version: string, overrides: Partial<InterfaceContract> = {}): InterfaceContract {
  return { type: 'interface', name: 'PayAPI', version, ...overrides };
}

describe('parseVersion', () => {
  it('should parse dotted numeric versions', () => {
    expect(parseVersion('1.4.2')).toEqual([1, 4, 2]);
    expect(parseVersion(' 2 ')).toEqual([2]);
  });

  it('should reject anything else', () => {
    expect(parseVersion('v1.0')).toBeNull();
    expect(parseVersion('1.0-beta')).toBeNull();
    expect(parseVersion('')).toBeNull();
  });
});

describe('compareVersions', () => {
  it('should compare part by part, padding with zeros', () => {
    expect(compareVersions([1, 10], [1, 9])).toBe(1);
    expect(compareVersions([1, 0], [1])).toBe(0);
    expect(compareVersions([1], [1, 0, 1])).toBe(-1);
  });
});

describe('compareContracts', () => {
  it('should accept a minor version bump with no removals', () => {
    expect(compareContracts(iface('1.0'), iface('1.1'))).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  it('should require the version to increase', () => {
    expect(compareContracts(iface('1.1'), iface('1.1')).errors)
      .toEqual(['New version must be greater than old version']);
    expect(compareContracts(iface('1.10'), iface('1.9')).errors)
      .toEqual(['New version must be greater than old version']);
  });

  it('should reject unparseable versions', () => {
    expect(compareContracts(iface('1.0'), iface('next')).errors).toEqual(['Invalid version format']);
  });

  it('should warn on a major version change', () => {
    const verdict = compareContracts(iface('1.9'), iface('2.0'));

    expect(verdict.isValid).toBe(true);
    expect(verdict.warnings).toEqual(['Major version change detected - breaking changes expected']);
  });

  it('should require matching names and types', () => {
    const renamed = compareContracts(iface('1.0'), iface('1.1', { name: 'PaymentAPI' }));
    const retyped = compareContracts(iface('1.0'), { type: 'resource', name: 'PayAPI', version: '1.1' });

    expect(renamed.errors).toEqual(['Contract names must match']);
    expect(retyped.errors).toEqual(['Contract type changed from interface to resource']);
  });

  it('should reject removed inputs and warn on removed outputs', () => {
    const verdict = compareContracts(
      iface('1.0', {
        inputs: [{ name: 'amount', type: 'number' }, { name: 'currency', type: 'string' }, { name: 'note', type: 'string' }],
        outputs: [{ name: 'receipt', type: 'Receipt' }]
      }),
      iface('1.1', {
        inputs: [{ name: 'amount', type: 'number' }],
        outputs: []
      })
    );

    expect(verdict).toEqual({
      isValid: false,
      errors: ['Breaking change: Removed inputs: currency, note'],
      warnings: ['Potentially breaking change: Removed outputs: receipt']
    });
  });

  it('should reject removed operations and changed signatures', () => {
    const previous: BehaviorContract = {
      type: 'behavior',
      name: 'Ledger',
      version: '1.0',
      operations: [
        { name: 'post', description: 'Post entry', parameters: [{ name: 'amount', type: 'number' }], returnType: 'Entry' },
        { name: 'void', description: 'Void entry' },
        { name: 'balance', description: 'Read balance', returnType: 'number' }
      ]
    };
    const next: BehaviorContract = {
      ...previous,
      version: '1.1',
      operations: [
        { name: 'post', description: 'Post entry', parameters: [{ name: 'amount', type: 'string' }], returnType: 'Entry' },
        { name: 'balance', description: 'Read balance', returnType: 'number' }
      ]
    };

    expect(compareContracts(previous, next).errors).toEqual([
      'Breaking change: Removed operations: void',
      'Breaking change: Modified operation signature: post'
    ]);
  });

  it('should allow added parameters', () => {
    const previous: BehaviorContract = {
      type: 'behavior',
      name: 'Ledger',
      version: '1.0',
      operations: [{ name: 'post', description: 'Post', parameters: [{ name: 'amount', type: 'number' }] }]
    };
    const next: BehaviorContract = {
      ...previous,
      version: '1.1',
      operations: [{
        name: 'post',
        description: 'Post',
        parameters: [{ name: 'amount', type: 'number' }, { name: 'memo', type: 'string', required: false }]
      }]
    };

    expect(compareContracts(previous, next).isValid).toBe(true);
  });

  it('should warn on increased resource requirements', () => {
    const previous: ResourceContract = {
      type: 'resource',
      name: 'Storage',
      version: '1.0',
      resourceRequirements: [
        { type: 'memory', specification: '512' },
        { type: 'cpu', specification: '2' },
        { type: 'tier', specification: 'Standard' }
      ]
    };
    const next: ResourceContract = {
      ...previous,
      version: '1.1',
      resourceRequirements: [
        { type: 'memory', specification: '1024' },
        { type: 'cpu', specification: '1' },
        { type: 'tier', specification: 'standard' }
      ]
    };

    expect(compareContracts(previous, next)).toEqual({
      isValid: true,
      errors: [],
      warnings: ['Increased resource requirements for: memory']
    });
  });
});

describe('hasIncreased', () => {
  it('should compare numbers numerically and text case-insensitively', () => {
    expect(hasIncreased('512', '1024')).toBe(true);
    expect(hasIncreased('2.5', '2')).toBe(false);
    expect(hasIncreased('SSD', 'ssd')).toBe(false);
    expect(hasIncreased('hdd', 'ssd')).toBe(true);
  });
});
