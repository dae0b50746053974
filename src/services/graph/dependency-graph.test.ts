/**
 * Unit Tests for DependencyGraph
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph } from './dependency-graph.js';
import { InputError } from '../../core/errors.js';

describe('DependencyGraph', () => {
  describe('addVertex', () => {
    it('should assign indices in insertion order', () => {
      const graph = new DependencyGraph();

      expect(graph.addVertex('A')).toBe(0);
      expect(graph.addVertex('B')).toBe(1);
      expect(graph.vertices).toEqual(['A', 'B']);
    });

    it('should not duplicate an existing vertex', () => {
      const graph = new DependencyGraph();
      graph.addVertex('A');

      expect(graph.addVertex('A')).toBe(0);
      expect(graph.vertexCount).toBe(1);
    });
  });

  describe('addEdge', () => {
    it('should add missing endpoints as vertices', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'B');

      expect(graph.vertices).toEqual(['A', 'B']);
      expect(graph.hasVertex('B')).toBe(true);
      expect(graph.edgeCount).toBe(1);
    });

    it('should default the weight to 1.0', () => {
      const graph = new DependencyGraph();
      const edge = graph.addEdge('A', 'B');

      expect(edge).toEqual({ source: 0, target: 1, weight: 1 });
    });

    it('should keep parallel edges', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'B');
      graph.addEdge('A', 'B');

      expect(graph.edgeCount).toBe(2);
      expect(graph.outDegree(0)).toBe(2);
      expect(graph.dependenciesOf('A')).toEqual(['B', 'B']);
    });

    it('should reject non-positive weights', () => {
      const graph = new DependencyGraph();

      expect(() => graph.addEdge('A', 'B', 0)).toThrow(InputError);
      expect(() => graph.addEdge('A', 'B', -1)).toThrow(InputError);
      expect(() => graph.addEdge('A', 'B', Number.NaN)).toThrow(InputError);
      expect(graph.edgeCount).toBe(0);
    });
  });

  describe('lookups', () => {
    it('should resolve names and indices both ways', () => {
      const graph = new DependencyGraph();
      graph.addEdge('Order', 'Payment');

      expect(graph.indexOf('Payment')).toBe(1);
      expect(graph.indexOf('Missing')).toBeUndefined();
      expect(graph.nameOf(0)).toBe('Order');
      expect(() => graph.nameOf(5)).toThrow(RangeError);
    });

    it('should list dependents without duplicates', () => {
      const graph = new DependencyGraph();
      graph.addEdge('Api', 'Svc');
      graph.addEdge('Api', 'Svc');
      graph.addEdge('Web', 'Svc');

      expect(graph.dependentsOf('Svc')).toEqual(['Api', 'Web']);
      expect(graph.dependentsOf('Api')).toEqual([]);
      expect(graph.dependentsOf('Missing')).toEqual([]);
    });

    it('should iterate edges grouped by source', () => {
      const graph = new DependencyGraph();
      graph.addVertex('A');
      graph.addVertex('B');
      graph.addEdge('B', 'C');
      graph.addEdge('A', 'C');

      expect(Array.from(graph.edges()).map(e => [e.source, e.target])).toEqual([[0, 2], [1, 2]]);
    });

    it('should report zero out-degree for sinks', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'B');

      expect(graph.outDegree(1)).toBe(0);
      expect(graph.outEdges(1)).toEqual([]);
    });
  });
});
