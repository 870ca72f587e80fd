import { describe, it, expect } from 'vitest';
import type { QueryRequest } from '@transit-routes/shared';
import { RouteGraph } from '../graph-index/index';
import { executeQuery } from './executor';

const graph = RouteGraph.parse('AB5, BC4, CD8, DC8, DE6, AD5, CE2, EB3, AE7');

describe('executeQuery', () => {
  it.each<[QueryRequest, number | null]>([
    [{ queryType: 'ROUTE_DISTANCE', stops: ['A', 'E', 'B', 'C', 'D'] }, 22],
    [{ queryType: 'ROUTE_DISTANCE', stops: ['A', 'E', 'D'] }, null],
    [{ queryType: 'CIRCULAR_ROUTE', start: 'C', maxStops: 3 }, 2],
    [{ queryType: 'EXACT_STOPS', start: 'A', destination: 'B', stops: 4 }, 3],
    [{ queryType: 'SHORTEST_ROUTE', start: 'A', destination: 'C' }, 9],
    [{ queryType: 'ROUTES_LESS_THAN', start: 'C', destination: 'C', maxDistance: 30 }, 7],
  ])('routes %j', (request, expected) => {
    const response = executeQuery(graph, request);
    expect(response.queryType).toBe(request.queryType);
    expect(response.result).toBe(expected);
    expect(response.meta.executionMs).toBeGreaterThanOrEqual(0);
  });

  it('returns identical results on repeated calls', () => {
    const request: QueryRequest = { queryType: 'SHORTEST_ROUTE', start: 'B', destination: 'B' };
    const first = executeQuery(graph, request).result;
    const second = executeQuery(graph, request).result;
    expect(first).toBe(9);
    expect(second).toBe(first);
  });
});
