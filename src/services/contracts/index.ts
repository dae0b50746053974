/**
 * Contracts Module
 *
 * Contract validator interface, typed contract document checks,
 * evolution checks and the file-backed validator.
 *
 * @module services/contracts
 */

export {
  type ContractValidator,
  type ContractParseResult,
  validVerdict,
  invalidVerdict,
  mergeVerdicts,
  inferContractType,
  parseContractDocument,
  validateContractDocument
} from './contract-validator.js';
export {
  compareContracts,
  compareVersions,
  parseVersion,
  areSignaturesCompatible,
  hasIncreased
} from './contract-evolution.js';
export {
  FileContractValidator,
  type FileContractValidatorOptions
} from './file-contract-validator.js';
