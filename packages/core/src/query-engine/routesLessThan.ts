/**
 * ROUTES_LESS_THAN - 거리 상한 미만으로 목적지에 도착하는 경로 수
 */
import type { StationId } from '@transit-routes/shared';
import { currentStation } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';
import { expandRoute, firstLegs, runRounds } from './traversal';

/**
 * 상한 미만인 경로는 목적지 도달 여부와 관계없이 계속 확장
 * (목적지를 지나 다시 돌아오는 순환 경로도 집계)
 */
export function routesLessThan(
  graph: RouteGraph,
  start: StationId,
  destination: StationId,
  maxDistance: number,
): number {
  let count = 0;

  runRounds(firstLegs(graph, start), (route) => {
    if (route.distance >= maxDistance) return [];
    if (currentStation(route) === destination) count++;
    return expandRoute(graph, route);
  });

  return count;
}
