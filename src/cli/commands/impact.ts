// Change impact commands: analyze, validate, scores

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { validateOutputFormat } from '../../core/validation.js';
import { serializeResult, serializeScores } from '../../services/serialization/result-serializer.js';
import { ChangeSpecLoader } from '../../services/serialization/change-spec-loader.js';
import { createContext, type ProjectOptions } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';

/**
 * Impact command options
 */
interface ImpactOptions extends ProjectOptions {
  format: string;
  output?: string;
}

/**
 * Writes command output to a file (relative to the project root) or stdout
 */
async function emit(content: string, projectRoot: string, output?: string): Promise<void> {
  if (output) {
    const target = path.resolve(projectRoot, output);
    await fs.writeFile(target, content, 'utf-8');
    success(`Result written to ${target}`);
  } else {
    process.stdout.write(content);
  }
}

function withProjectOptions(command: Command): Command {
  return command
    .option('-f, --format <format>', 'Output format (yaml, json)', 'yaml')
    .option('-o, --output <file>', 'Write output to file instead of stdout (relative to the project root)')
    .option('-p, --path <path>', 'Project root; the spec file, manifest and contracts resolve against it', process.cwd())
    .option('-m, --manifest <file>', 'Component manifest (overrides config)')
    .option('-c, --contracts <dir>', 'Contracts directory (overrides config)')
    .option('-v, --verbose', 'Log debug output');
}

/**
 * Registers the impact commands
 *
 * - impact analyze <spec>  - Predict blast radius and risk areas of a change
 * - impact validate <spec> - Analyze, then check contracts and expected impact
 * - impact scores <spec>   - Print raw impact scores only
 */
export function registerImpactCommands(program: Command): void {
  withProjectOptions(
    program
      .command('analyze <spec>')
      .description('Analyze the impact of the change described in a specification file')
  ).action(async (spec: string, options: ImpactOptions) => {
    try {
      const format = validateOutputFormat(options.format);
      const { projectRoot, impactService } = await createContext(options);
      const result = await impactService.analyzeChangeImpact(path.resolve(projectRoot, spec));
      await emit(serializeResult(result, format), projectRoot, options.output);
    } catch (error) {
      handleError(error);
    }
  });

  withProjectOptions(
    program
      .command('validate <spec>')
      .description('Analyze a change and validate it against its contracts and expected impact')
  ).action(async (spec: string, options: ImpactOptions) => {
    try {
      const format = validateOutputFormat(options.format);
      const { projectRoot, impactService } = await createContext(options);
      const result = await impactService.validateChange(path.resolve(projectRoot, spec));
      await emit(serializeResult(result, format), projectRoot, options.output);
    } catch (error) {
      handleError(error);
    }
  });

  withProjectOptions(
    program
      .command('scores <spec>')
      .description('Print the raw impact scores of a change')
  ).action(async (spec: string, options: ImpactOptions) => {
    try {
      const format = validateOutputFormat(options.format);
      const { projectRoot, impactService } = await createContext(options);
      const change = await new ChangeSpecLoader().load(path.resolve(projectRoot, spec));
      const scores = await impactService.calculateImpactScores(change);
      await emit(serializeScores(scores, format), projectRoot, options.output);
    } catch (error) {
      handleError(error);
    }
  });
}
