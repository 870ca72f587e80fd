/**
 * BFS 라운드 골격
 * frontier의 모든 원소를 한 라운드에 확장하고 결과를 다음 frontier로 교체
 * 네 가지 탐색 전략이 모두 이 골격 위에서 수용/가지치기 규칙만 달리함
 */
import type { PartialRoute, StationId } from '@transit-routes/shared';
import { currentStation, startRoute } from '@transit-routes/shared';
import type { RouteGraph } from '../graph-index/index';

/**
 * frontier 원소 하나의 다음 라운드 후보
 * null을 반환하면 탐색 전체를 중단
 */
export type RoundStep<T> = (item: T) => readonly T[] | null;

/**
 * 라운드 단위 너비 우선 탐색
 * frontier가 비거나 maxRounds 라운드를 마치면 종료하고 마지막 frontier 반환
 */
export function runRounds<T>(
  initial: readonly T[],
  step: RoundStep<T>,
  maxRounds: number = Number.POSITIVE_INFINITY,
): T[] | null {
  let frontier: T[] = [...initial];
  let rounds = 0;

  while (frontier.length > 0 && rounds < maxRounds) {
    const next: T[] = [];
    for (const item of frontier) {
      const expanded = step(item);
      if (expanded === null) return null;
      next.push(...expanded);
    }
    frontier = next;
    rounds++;
  }

  return frontier;
}

/**
 * 현재 역에서 나가는 모든 edge로 경로를 한 구간씩 연장
 * 막다른 역이면 빈 배열 (다음 라운드에서 자연히 사라짐)
 */
export function expandRoute(graph: RouteGraph, route: PartialRoute): PartialRoute[] {
  return graph.outgoing(currentStation(route)).map((leg) => ({
    stops: [...route.stops, leg.destination],
    distance: route.distance + leg.distance,
  }));
}

/** 출발역에서 한 구간 이동한 첫 frontier (길이 0 경로는 후보에서 제외) */
export function firstLegs(graph: RouteGraph, start: StationId): PartialRoute[] {
  return expandRoute(graph, startRoute(start));
}

/**
 * 한 구간 이상 이동해 destination에 닿을 수 있는지 (방문 집합 BFS)
 * start === destination이면 순환 경로가 있는지 확인
 */
export function isReachable(graph: RouteGraph, start: StationId, destination: StationId): boolean {
  const visited = new Set<StationId>();
  const queue: StationId[] = [start];

  while (queue.length > 0) {
    const station = queue.shift();
    if (station === undefined) break;

    for (const leg of graph.outgoing(station)) {
      if (leg.destination === destination) return true;
      if (!visited.has(leg.destination)) {
        visited.add(leg.destination);
        queue.push(leg.destination);
      }
    }
  }

  return false;
}
