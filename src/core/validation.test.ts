// Tests for input validation and sanitization

import { describe, it, expect } from 'vitest';
import {
  validateContractName,
  validateContractType,
  validateOutputFormat,
  isContractType,
  MAX_CONTRACT_NAME_LENGTH
} from './validation.js';
import { InputError, SecurityError } from './errors.js';

describe('validateContractName', () => {
  it('should accept plain and nested names', () => {
    expect(validateContractName('PayAPI')).toBe('PayAPI');
    expect(validateContractName('billing/PayAPI.v2')).toBe('billing/PayAPI.v2');
  });

  it('should trim surrounding whitespace', () => {
    expect(validateContractName('  PayAPI ')).toBe('PayAPI');
  });

  it('should reject empty names', () => {
    expect(() => validateContractName('')).toThrow(InputError);
    expect(() => validateContractName('   ')).toThrow('Contract name is required');
  });

  it('should reject names over the maximum length', () => {
    expect(() => validateContractName('a'.repeat(MAX_CONTRACT_NAME_LENGTH + 1))).toThrow(InputError);
    expect(validateContractName('a'.repeat(MAX_CONTRACT_NAME_LENGTH))).toHaveLength(MAX_CONTRACT_NAME_LENGTH);
  });

  it('should reject path traversal attempts', () => {
    expect(() => validateContractName('../secrets')).toThrow(SecurityError);
    expect(() => validateContractName('billing/../../etc')).toThrow(SecurityError);
    expect(() => validateContractName('/etc/passwd')).toThrow(SecurityError);
    expect(() => validateContractName('\\share')).toThrow(SecurityError);
    expect(() => validateContractName('C:contract')).toThrow(SecurityError);
    expect(() => validateContractName('Pay\0API')).toThrow(SecurityError);
  });
});

describe('validateContractType', () => {
  it('should normalize known types', () => {
    expect(validateContractType('interface')).toBe('interface');
    expect(validateContractType(' Behavior ')).toBe('behavior');
    expect(validateContractType('RESOURCE')).toBe('resource');
  });

  it('should reject unknown types', () => {
    expect(() => validateContractType('schema')).toThrow(
      'Invalid contract type "schema". Must be: interface, behavior, resource'
    );
  });
});

describe('isContractType', () => {
  it('should only accept lower-case type names', () => {
    expect(isContractType('interface')).toBe(true);
    expect(isContractType('Interface')).toBe(false);
    expect(isContractType('')).toBe(false);
  });
});

describe('validateOutputFormat', () => {
  it('should accept yaml and json in any case', () => {
    expect(validateOutputFormat('yaml')).toBe('yaml');
    expect(validateOutputFormat('JSON')).toBe('json');
  });

  it('should reject other formats', () => {
    expect(() => validateOutputFormat('xml')).toThrow(InputError);
    expect(() => validateOutputFormat('xml')).toThrow('Invalid format "xml". Must be: yaml, json');
  });
});
