/**
 * ROUTE_DISTANCE - 지정된 정차 순서대로 이동한 거리
 */
import type { StationId } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';

/**
 * 연속한 두 역마다 단일 구간 거리를 합산
 * 구간 하나라도 없으면 즉시 null (뒤 구간은 보지 않음)
 */
export function routeDistance(graph: RouteGraph, stops: readonly StationId[]): number | null {
  let distance = 0;
  let previous: StationId | undefined;

  for (const stop of stops) {
    if (previous !== undefined) {
      const leg = graph.lookup(previous, stop);
      if (leg === null) return null;
      distance += leg;
    }
    previous = stop;
  }

  return distance;
}
