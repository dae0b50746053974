/**
 * Dependency Graph
 *
 * Directed, weighted multigraph over component names. Vertices live in an
 * arena indexed by insertion order; edges reference vertices by index and
 * a separate map resolves names to indices.
 */

import { InputError } from '../../core/errors.js';

/**
 * Default weight of a dependency edge
 */
export const DEFAULT_EDGE_WEIGHT = 1.0;

/**
 * Directed edge between two vertex indices. Parallel edges are kept.
 */
export interface DependencyEdge {
  source: number;
  target: number;
  weight: number;
}

/**
 * Dependency Graph Implementation
 */
export class DependencyGraph {
  private readonly names: string[] = [];
  private readonly indexByName = new Map<string, number>();
  private readonly outgoing: DependencyEdge[][] = [];
  private edgeTotal = 0;

  /**
   * Adds a vertex if it is not present yet
   *
   * @returns Index of the vertex
   */
  addVertex(name: string): number {
    const existing = this.indexByName.get(name);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.names.length;
    this.names.push(name);
    this.indexByName.set(name, index);
    this.outgoing.push([]);
    return index;
  }

  /**
   * Adds a directed edge source -> target, adding either endpoint if missing
   */
  addEdge(source: string, target: string, weight: number = DEFAULT_EDGE_WEIGHT): DependencyEdge {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InputError(`Edge weight must be a positive number, got ${weight}`, 'weight', { source, target });
    }

    const edge: DependencyEdge = {
      source: this.addVertex(source),
      target: this.addVertex(target),
      weight
    };
    this.outgoing[edge.source].push(edge);
    this.edgeTotal++;
    return edge;
  }

  get vertexCount(): number {
    return this.names.length;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  /**
   * Vertex names in insertion order (index i holds the name of vertex i)
   */
  get vertices(): readonly string[] {
    return this.names;
  }

  hasVertex(name: string): boolean {
    return this.indexByName.has(name);
  }

  indexOf(name: string): number | undefined {
    return this.indexByName.get(name);
  }

  nameOf(index: number): string {
    const name = this.names[index];
    if (name === undefined) {
      throw new RangeError(`No vertex at index ${index}`);
    }
    return name;
  }

  outEdges(index: number): readonly DependencyEdge[] {
    return this.outgoing[index] ?? [];
  }

  outDegree(index: number): number {
    return this.outEdges(index).length;
  }

  /**
   * All edges, grouped by source vertex
   */
  *edges(): IterableIterator<DependencyEdge> {
    for (const list of this.outgoing) {
      yield* list;
    }
  }

  /**
   * Names this vertex depends on, one entry per edge
   */
  dependenciesOf(name: string): string[] {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      return [];
    }
    return this.outgoing[index].map(edge => this.names[edge.target]);
  }

  /**
   * Names of vertices with an edge into this one
   */
  dependentsOf(name: string): string[] {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      return [];
    }

    const dependents = new Set<string>();
    for (const edge of this.edges()) {
      if (edge.target === index) {
        dependents.add(this.names[edge.source]);
      }
    }
    return Array.from(dependents);
  }
}
