/**
 * EXACT_STOPS - 정확히 N개 역을 거쳐 목적지에 도착하는 경로 수
 * 중간 정차 N개 = 구간 N + 1개
 */
import type { StationId } from '@transit-routes/shared';
import { currentStation } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';
import { expandRoute, firstLegs, runRounds } from './traversal';

export function exactStops(
  graph: RouteGraph,
  start: StationId,
  destination: StationId,
  stops: number,
): number {
  const frontier =
    runRounds(firstLegs(graph, start), (route) => expandRoute(graph, route), stops) ?? [];

  return frontier.filter((route) => currentStation(route) === destination).length;
}
