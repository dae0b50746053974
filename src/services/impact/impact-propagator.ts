/**
 * Impact Propagator
 *
 * Diffuses impact through the dependency graph with a PageRank-style
 * iteration, then scales the normalized ranks by the character of the
 * change (its type and the contracts it touches).
 */

import type { ChangeSpecification } from '../../models/change-spec.js';
import type { ImpactScores } from '../../models/impact.js';
import type { ChangeType } from '../../models/types.js';
import type { DependencyGraph } from '../graph/dependency-graph.js';

/**
 * Diffusion parameters
 */
export interface PropagationOptions {
  dampingFactor: number;
  maxIterations: number;
  tolerance: number;
}

export const DEFAULT_PROPAGATION_OPTIONS: PropagationOptions = {
  dampingFactor: 0.85,
  maxIterations: 100,
  tolerance: 1e-4
};

/**
 * Score multiplier per change type; anything else scores as-is
 */
export const CHANGE_TYPE_MULTIPLIERS: Record<ChangeType, number> = {
  contract: 1.5,
  implementation: 1.2,
  resource: 1.3
};

export const DEFAULT_CHANGE_TYPE_MULTIPLIER = 1.0;
export const AFFECTED_CONTRACT_MULTIPLIER = 1.4;
export const MAX_IMPACT_SCORE = 1.0;

/**
 * Normalized ranks indexed like graph.vertices
 */
export interface RankResult {
  ranks: number[];
  iterations: number;
  converged: boolean;
}

/**
 * Multiplier for a change type (case-insensitive)
 */
export function changeTypeMultiplier(changeType: string): number {
  switch (changeType.toLowerCase()) {
    case 'contract':
      return CHANGE_TYPE_MULTIPLIERS.contract;
    case 'implementation':
      return CHANGE_TYPE_MULTIPLIERS.implementation;
    case 'resource':
      return CHANGE_TYPE_MULTIPLIERS.resource;
    default:
      return DEFAULT_CHANGE_TYPE_MULTIPLIER;
  }
}

/**
 * Impact Propagator Implementation
 */
export class ImpactPropagator {
  private readonly options: PropagationOptions;

  constructor(options: Partial<PropagationOptions> = {}) {
    this.options = { ...DEFAULT_PROPAGATION_OPTIONS, ...options };
  }

  /**
   * Computes adjusted impact scores for every vertex of the graph
   */
  propagate(graph: DependencyGraph, change: ChangeSpecification): ImpactScores {
    const { ranks } = this.rank(graph);
    return this.adjust(graph, ranks, change);
  }

  /**
   * Runs the diffusion and normalizes the ranks so they sum to 1.
   *
   * Rank held by vertices without outgoing edges is not redistributed.
   */
  rank(graph: DependencyGraph): RankResult {
    const n = graph.vertexCount;
    if (n === 0) {
      return { ranks: [], iterations: 0, converged: true };
    }

    const { dampingFactor, maxIterations, tolerance } = this.options;
    const outDegrees = graph.vertices.map((_, index) => graph.outDegree(index));
    let ranks = new Array<number>(n).fill(1 / n);
    let iterations = 0;
    let converged = false;

    while (iterations < maxIterations) {
      const incoming = new Array<number>(n).fill(0);
      for (const edge of graph.edges()) {
        incoming[edge.target] += (ranks[edge.source] * edge.weight) / outDegrees[edge.source];
      }

      const next = new Array<number>(n);
      let totalDiff = 0;
      for (let v = 0; v < n; v++) {
        next[v] = (1 - dampingFactor) + dampingFactor * incoming[v];
        totalDiff += Math.abs(next[v] - ranks[v]);
      }

      ranks = next;
      iterations++;

      if (totalDiff < tolerance) {
        converged = true;
        break;
      }
    }

    const sum = ranks.reduce((acc, rank) => acc + rank, 0);
    return {
      ranks: ranks.map(rank => rank / sum),
      iterations,
      converged
    };
  }

  /**
   * Scales normalized ranks by the change type and contract involvement, capped at 1
   */
  adjust(graph: DependencyGraph, ranks: readonly number[], change: ChangeSpecification): ImpactScores {
    const typeMultiplier = changeTypeMultiplier(change.changeType);
    const contracts = new Set(change.affectedContracts);
    const scores: ImpactScores = new Map();

    graph.vertices.forEach((name, index) => {
      let score = ranks[index] * typeMultiplier;
      if (contracts.has(name)) {
        score *= AFFECTED_CONTRACT_MULTIPLIER;
      }
      scores.set(name, Math.min(score, MAX_IMPACT_SCORE));
    });

    return scores;
  }
}
