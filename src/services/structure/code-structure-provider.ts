// Source of graph topology for an analysis

import type { ComponentSnapshot } from '../../models/component.js';

/**
 * Supplies the components of the analyzed system and their dependency names.
 * Called once per analysis; may answer synchronously or asynchronously.
 */
export interface CodeStructureProvider {
  listComponents(): Promise<ComponentSnapshot[]> | ComponentSnapshot[];
}

/**
 * Provider over a fixed component list
 */
export class InMemoryStructureProvider implements CodeStructureProvider {
  private readonly components: ComponentSnapshot[];

  constructor(components: ComponentSnapshot[] = []) {
    this.components = components.map(c => ({ name: c.name, dependencies: [...c.dependencies] }));
  }

  listComponents(): ComponentSnapshot[] {
    return this.components.map(c => ({ name: c.name, dependencies: [...c.dependencies] }));
  }
}
