/**
 * Query Executor - QueryRequest를 받아 적절한 알고리즘으로 위임
 */
import type { QueryRequest, QueryResponse } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';
import { routeDistance } from './routeDistance';
import { circularRoute } from './circularRoute';
import { exactStops } from './exactStops';
import { shortestRoute } from './shortestRoute';
import { routesLessThan } from './routesLessThan';

/** queryType별 결과 계산 */
function evaluate(graph: RouteGraph, request: QueryRequest): number | null {
  switch (request.queryType) {
    case 'ROUTE_DISTANCE':
      return routeDistance(graph, request.stops);

    case 'CIRCULAR_ROUTE':
      return circularRoute(graph, request.start, request.maxStops);

    case 'EXACT_STOPS':
      return exactStops(graph, request.start, request.destination, request.stops);

    case 'SHORTEST_ROUTE':
      return shortestRoute(graph, request.start, request.destination);

    case 'ROUTES_LESS_THAN':
      return routesLessThan(graph, request.start, request.destination, request.maxDistance);
  }
}

/**
 * 쿼리 실행 메인 진입점
 * 각 호출은 독립적이며 그래프를 변경하지 않음
 */
export function executeQuery(graph: RouteGraph, request: QueryRequest): QueryResponse {
  const startTime = Date.now();
  const result = evaluate(graph, request);

  return {
    queryType: request.queryType,
    result,
    meta: {
      computedAt: new Date().toISOString(),
      executionMs: Date.now() - startTime,
    },
  };
}
