/**
 * CIRCULAR_ROUTE - 출발역으로 되돌아오는 경로 수 (최대 정차 수 이내)
 * 경로 이력 없이 역 식별자만 frontier로 추적
 */
import type { StationId } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';
import { runRounds } from './traversal';

/**
 * maxStops 라운드 동안 확장하며 출발역에 도착하는 edge마다 1씩 증가
 * frontier에 막다른 역이 하나라도 있으면 부분 결과 없이 null
 */
export function circularRoute(
  graph: RouteGraph,
  start: StationId,
  maxStops: number,
): number | null {
  let count = 0;

  const frontier = runRounds<StationId>(
    [start],
    (station) => {
      if (!graph.hasOutgoing(station)) return null;
      const destinations = graph.outgoing(station).map((leg) => leg.destination);
      count += destinations.filter((destination) => destination === start).length;
      return destinations;
    },
    maxStops,
  );

  return frontier === null ? null : count;
}
