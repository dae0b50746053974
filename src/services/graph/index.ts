/**
 * Graph Module
 *
 * Dependency graph representation and construction from
 * code structure snapshots.
 *
 * @module services/graph
 */

export {
  DependencyGraph,
  DEFAULT_EDGE_WEIGHT,
  type DependencyEdge
} from './dependency-graph.js';
export { buildDependencyGraph } from './graph-builder.js';
