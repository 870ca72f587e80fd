import { describe, it, expect } from 'vitest';
import { RouteGraph } from '../graph-index/index';
import { shortestRoute } from './shortestRoute';

describe('shortestRoute', () => {
  it('prefers the shorter distance over fewer hops', () => {
    const graph = RouteGraph.parse('AB1, BC1, AD3, DC3');
    expect(shortestRoute(graph, 'A', 'C')).toBe(2);
  });

  it('prefers a longer hop count when it is shorter in distance', () => {
    const graph = RouteGraph.parse('AC10, AB1, BD1, DC1');
    expect(shortestRoute(graph, 'A', 'C')).toBe(3);
  });

  it('finds the shortest non-trivial cycle when start equals destination', () => {
    const graph = RouteGraph.parse('AB5, BC4, CD8, DC8, DE6, AD5, CE2, EB3, AE7');
    expect(shortestRoute(graph, 'B', 'B')).toBe(9);
    expect(shortestRoute(graph, 'C', 'C')).toBe(9);
  });

  it('uses a self-loop as a cycle', () => {
    const graph = RouteGraph.parse('AA4, AB1, BA1');
    expect(shortestRoute(graph, 'A', 'A')).toBe(2);
  });

  it('returns null when the destination is unreachable', () => {
    const graph = RouteGraph.parse('AB5, BC4, CB1');
    expect(shortestRoute(graph, 'A', 'A')).toBeNull();
    expect(shortestRoute(graph, 'C', 'A')).toBeNull();
    expect(shortestRoute(graph, 'Z', 'A')).toBeNull();
  });
});
