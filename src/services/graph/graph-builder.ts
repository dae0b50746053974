// Builds a dependency graph from a flat component list

import type { ComponentSnapshot } from '../../models/component.js';
import { DependencyGraph, DEFAULT_EDGE_WEIGHT } from './dependency-graph.js';

/**
 * Turns a component snapshot into a DependencyGraph.
 *
 * Every component becomes a vertex, including components without
 * dependencies. Every listed dependency becomes an edge
 * component -> dependency; dependencies that are not components
 * themselves become sink vertices.
 */
export function buildDependencyGraph(components: readonly ComponentSnapshot[]): DependencyGraph {
  const graph = new DependencyGraph();

  for (const component of components) {
    graph.addVertex(component.name);
  }

  for (const component of components) {
    for (const dependency of component.dependencies) {
      graph.addEdge(component.name, dependency, DEFAULT_EDGE_WEIGHT);
    }
  }

  return graph;
}
