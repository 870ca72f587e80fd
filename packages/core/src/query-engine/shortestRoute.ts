/**
 * SHORTEST_ROUTE - 두 역 사이 최단 거리
 * 가지치기를 적용한 라운드 BFS (우선순위 큐 없음)
 * 출발역과 목적지가 같으면 가장 짧은 순환 경로를 찾음
 */
import type { StationId } from '@transit-routes/shared';
import { currentStation } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';
import { expandRoute, firstLegs, isReachable, runRounds } from './traversal';

/**
 * 현재 최단 거리 이상인 경로는 버리고, 목적지에 닿은 경로는 기록만 하고 더 확장하지 않음
 * 도달 불가능하면 탐색 없이 null
 * 거리가 양수인 edge만 있을 때 종료가 보장됨
 */
export function shortestRoute(
  graph: RouteGraph,
  start: StationId,
  destination: StationId,
): number | null {
  if (!isReachable(graph, start, destination)) return null;

  let best = Number.POSITIVE_INFINITY;

  runRounds(firstLegs(graph, start), (route) => {
    if (route.distance >= best) return [];
    if (currentStation(route) === destination) {
      best = route.distance;
      return [];
    }
    return expandRoute(graph, route);
  });

  return Number.isFinite(best) ? best : null;
}
