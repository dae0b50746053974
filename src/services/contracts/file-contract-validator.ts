/**
 * File Contract Validator
 *
 * Validates contract documents stored as YAML files under a contracts
 * directory. A contract named `billing/PayAPI` lives at
 * `<contractsDir>/billing/PayAPI.yaml` (or `.yml`).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { CollaboratorError, NotFoundError, errorMessage } from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import { validateContractName } from '../../core/validation.js';
import type { ContractVerdict } from '../../models/contract.js';
import { compareContracts } from './contract-evolution.js';
import {
  type ContractParseResult,
  type ContractValidator,
  inferContractType,
  invalidVerdict,
  isRecord,
  mergeVerdicts,
  parseContractDocument,
  validateContractDocument
} from './contract-validator.js';

const CONTRACT_EXTENSIONS = ['.yaml', '.yml'];

export interface FileContractValidatorOptions {
  contractsDir: string;
  logger?: Logger;
}

/**
 * File Contract Validator Implementation
 */
export class FileContractValidator implements ContractValidator {
  private readonly contractsDir: string;
  private readonly logger: Logger;

  constructor(options: FileContractValidatorOptions) {
    this.contractsDir = options.contractsDir;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Validates the named contract as `contractType`
   *
   * @throws NotFoundError if no document exists for the name
   * @throws CollaboratorError if the document cannot be read or parsed
   */
  async validate(contractName: string, contractType: string): Promise<ContractVerdict> {
    this.logger.debug('Validating contract', { contract: contractName, type: contractType });

    const filePath = await this.resolve(contractName);
    const document = await this.readDocument(filePath);
    return validateContractDocument(document, contractType);
  }

  /**
   * Validates every contract document under the contracts directory.
   * The type comes from the document's `type` field, or else from its file name.
   */
  async validateAll(): Promise<ContractVerdict> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.contractsDir, { recursive: true });
    } catch {
      throw new NotFoundError('Contracts directory', this.contractsDir);
    }

    const files = entries
      .filter(entry => CONTRACT_EXTENSIONS.includes(path.extname(entry).toLowerCase()))
      .sort();

    const verdicts: ContractVerdict[] = [];
    for (const file of files) {
      const document = await this.readDocument(path.join(this.contractsDir, file));
      const declared = isRecord(document) && typeof document.type === 'string' ? document.type : undefined;
      const type = declared ?? inferContractType(path.basename(file));

      const verdict = type
        ? validateContractDocument(document, type)
        : invalidVerdict(['Unable to determine contract type']);

      verdicts.push({
        isValid: verdict.isValid,
        errors: verdict.errors.map(error => `${file}: ${error}`),
        warnings: verdict.warnings.map(warning => `${file}: ${warning}`)
      });
    }

    this.logger.info(`Validated ${files.length} contract(s)`, { contractsDir: this.contractsDir });
    return mergeVerdicts(verdicts);
  }

  /**
   * Checks that `newName` is a compatible evolution of `oldName`
   */
  async validateEvolution(oldName: string, newName: string): Promise<ContractVerdict> {
    const previous = await this.loadTyped(oldName, 'old');
    const next = await this.loadTyped(newName, 'new');

    if (!previous.success || !next.success) {
      return invalidVerdict([
        ...(previous.success ? [] : previous.errors),
        ...(next.success ? [] : next.errors)
      ]);
    }

    return compareContracts(previous.contract, next.contract);
  }

  private async loadTyped(
    name: string,
    label: string
  ): Promise<ContractParseResult> {
    const filePath = await this.resolve(name);
    const document = await this.readDocument(filePath);
    const declared = isRecord(document) && typeof document.type === 'string' ? document.type : undefined;
    const type = declared ?? inferContractType(path.basename(filePath));

    if (!type) {
      return { success: false, errors: [`${label}: Unable to determine contract type for ${name}`] };
    }

    const parsed = parseContractDocument(document, type);
    return parsed.success
      ? parsed
      : { success: false, errors: parsed.errors.map(error => `${label}: ${error}`) };
  }

  /**
   * Maps a contract name onto an existing file
   */
  private async resolve(contractName: string): Promise<string> {
    const name = validateContractName(contractName);
    const hasExtension = CONTRACT_EXTENSIONS.includes(path.extname(name).toLowerCase());
    const candidates = hasExtension
      ? [name]
      : CONTRACT_EXTENSIONS.map(extension => `${name}${extension}`);

    for (const candidate of candidates) {
      const filePath = path.join(this.contractsDir, candidate);
      try {
        await fs.access(filePath);
        return filePath;
      } catch {
        continue;
      }
    }

    throw new NotFoundError('Contract', name);
  }

  private async readDocument(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new CollaboratorError(`Cannot read contract ${filePath}: ${errorMessage(error)}`, { path: filePath });
    }

    try {
      return yaml.parse(content);
    } catch (error) {
      throw new CollaboratorError(
        `Invalid YAML syntax in contract ${filePath}: ${errorMessage(error)}`,
        { path: filePath }
      );
    }
  }
}
