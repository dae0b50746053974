// Contract commands: check, check-all, diff

import { Command } from 'commander';
import type { ContractVerdict } from '../../models/contract.js';
import { validateContractType } from '../../core/validation.js';
import { createContext, type ProjectOptions } from '../utils/context.js';
import { handleError, warn } from '../utils/error-handler.js';

interface ContractOptions extends ProjectOptions {
  type: string;
  json?: boolean;
}

/**
 * Prints a verdict and exits non-zero when it is invalid
 */
function report(verdict: ContractVerdict, subject: string, json?: boolean): void {
  if (json) {
    console.log(JSON.stringify(verdict, null, 2));
  } else {
    console.log(verdict.isValid ? `✓ ${subject} is valid` : `✗ ${subject} is invalid`);
    for (const error of verdict.errors) {
      console.log(`  • ${error}`);
    }
    for (const warning of verdict.warnings) {
      warn(warning);
    }
  }

  if (!verdict.isValid) {
    process.exitCode = 1;
  }
}

export function registerContractCommands(program: Command): void {
  const contracts = program
    .command('contracts')
    .description('Validate contract documents');

  contracts
    .command('check <name>')
    .description('Validate a single contract')
    .option('-t, --type <type>', 'Contract type (interface, behavior, resource)', 'interface')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Project root', process.cwd())
    .option('-c, --contracts <dir>', 'Contracts directory (overrides config)')
    .action(async (name: string, options: ContractOptions) => {
      try {
        const type = validateContractType(options.type);
        const { contractValidator } = await createContext(options);
        report(await contractValidator.validate(name, type), name, options.json);
      } catch (error) {
        handleError(error);
      }
    });

  contracts
    .command('check-all')
    .description('Validate every contract in the contracts directory')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Project root', process.cwd())
    .option('-c, --contracts <dir>', 'Contracts directory (overrides config)')
    .action(async (options: Omit<ContractOptions, 'type'>) => {
      try {
        const { contractValidator } = await createContext(options);
        report(await contractValidator.validateAll(), 'Contracts', options.json);
      } catch (error) {
        handleError(error);
      }
    });

  contracts
    .command('diff <old> <new>')
    .description('Check that a new contract version is compatible with the old one')
    .option('--json', 'Output as JSON')
    .option('-p, --path <path>', 'Project root', process.cwd())
    .option('-c, --contracts <dir>', 'Contracts directory (overrides config)')
    .action(async (oldName: string, newName: string, options: Omit<ContractOptions, 'type'>) => {
      try {
        const { contractValidator } = await createContext(options);
        report(
          await contractValidator.validateEvolution(oldName, newName),
          `${oldName} -> ${newName}`,
          options.json
        );
      } catch (error) {
        handleError(error);
      }
    });
}
