import { describe, it, expect } from 'vitest';
import { RouteGraph } from '../graph-index/index';
import { routesLessThan } from './routesLessThan';

describe('routesLessThan', () => {
  it('counts routes strictly under the ceiling, including repeated cycles', () => {
    const graph = RouteGraph.parse('AB1, BC1, BA2, CA3, CD5, DA5');
    expect(routesLessThan(graph, 'A', 'A', 8)).toBe(3);
  });

  it('excludes routes whose distance equals the ceiling', () => {
    const graph = RouteGraph.parse('AB2');
    expect(routesLessThan(graph, 'A', 'B', 2)).toBe(0);
    expect(routesLessThan(graph, 'A', 'B', 3)).toBe(1);
  });

  it('keeps expanding past the destination', () => {
    const graph = RouteGraph.parse('AB1, BB1');
    expect(routesLessThan(graph, 'A', 'B', 4)).toBe(3);
  });

  it('returns zero when nothing qualifies', () => {
    const graph = RouteGraph.parse('AB5');
    expect(routesLessThan(graph, 'B', 'A', 30)).toBe(0);
  });
});
