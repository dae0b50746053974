// Loads change specifications from YAML documents

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { InputError, errorMessage } from '../../core/errors.js';
import { ChangeSpecificationSchema, formatIssues } from '../../core/schemas.js';
import type { ChangeSpecification } from '../../models/change-spec.js';

/**
 * Parses a change specification document
 *
 * @param content - YAML (or JSON) text
 * @param source - Name used in error messages
 * @throws InputError if the text is not YAML or does not describe a change
 */
export function parseChangeSpecification(content: string, source: string = '<inline>'): ChangeSpecification {
  let document: unknown;
  try {
    document = yaml.parse(content);
  } catch (error) {
    throw new InputError(
      `Error loading change specification ${source}: ${errorMessage(error)}`,
      undefined,
      { source }
    );
  }

  const parsed = ChangeSpecificationSchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InputError(
      `Invalid change specification ${source}: ${issues.join('; ')}`,
      undefined,
      { source, issues }
    );
  }

  return parsed.data;
}

/**
 * Change Specification Loader
 */
export class ChangeSpecLoader {
  /**
   * Reads and parses the change specification at `specPath`
   */
  async load(specPath: string): Promise<ChangeSpecification> {
    let content: string;
    try {
      content = await fs.readFile(specPath, 'utf-8');
    } catch (error) {
      throw new InputError(
        `Error loading change specification: ${errorMessage(error)}`,
        'path',
        { source: specPath }
      );
    }

    return parseChangeSpecification(content, specPath);
  }
}
