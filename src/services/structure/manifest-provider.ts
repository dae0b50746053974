/**
 * Manifest Structure Provider
 *
 * Reads the component list from a YAML (or JSON) manifest:
 *
 * ```yaml
 * components:
 *   - name: OrderService
 *     dependencies: [PaymentGateway, Inventory]
 *   - name: PaymentGateway
 * ```
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { CollaboratorError, errorMessage } from '../../core/errors.js';
import { ComponentManifestSchema, formatIssues } from '../../core/schemas.js';
import type { ComponentSnapshot } from '../../models/component.js';
import type { CodeStructureProvider } from './code-structure-provider.js';

export class ManifestStructureProvider implements CodeStructureProvider {
  constructor(private readonly manifestPath: string) {}

  async listComponents(): Promise<ComponentSnapshot[]> {
    let content: string;
    try {
      content = await fs.readFile(this.manifestPath, 'utf-8');
    } catch (error) {
      throw new CollaboratorError(
        `Cannot read component manifest ${this.manifestPath}: ${errorMessage(error)}`,
        { manifest: this.manifestPath }
      );
    }

    let document: unknown;
    try {
      document = yaml.parse(content);
    } catch (error) {
      throw new CollaboratorError(
        `Component manifest ${this.manifestPath} is not valid YAML: ${errorMessage(error)}`,
        { manifest: this.manifestPath }
      );
    }

    const parsed = ComponentManifestSchema.safeParse(document ?? {});
    if (!parsed.success) {
      throw new CollaboratorError(
        `Invalid component manifest ${this.manifestPath}: ${formatIssues(parsed.error).join('; ')}`,
        { manifest: this.manifestPath }
      );
    }

    return parsed.data.components;
  }
}
