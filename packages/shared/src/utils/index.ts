import { NO_SUCH_ROUTE } from '../constants/index';
import type { PartialRoute, StationId } from '../types/index';

/**
 * 질의 결과를 출력 문자열로 변환
 * null은 경로 없음
 */
export function formatResult(value: number | null): string {
  return value === null ? NO_SUCH_ROUTE : value.toString();
}

/** `Output #<n>: <result>` 형식의 한 줄 (index는 0부터) */
export function formatOutputLine(index: number, value: number | null): string {
  return `Output #${index + 1}: ${formatResult(value)}`;
}

/** 부분 경로의 현재 역 */
export function currentStation(route: PartialRoute): StationId {
  const station = route.stops[route.stops.length - 1];
  if (station === undefined) {
    throw new Error('currentStation called on empty route');
  }
  return station;
}

/** 출발역 하나로 이루어진 시작 경로 */
export function startRoute(start: StationId): PartialRoute {
  return { stops: [start], distance: 0 };
}

/**
 * 환경 변수 플래그 해석
 * '1', 'true', 'yes'(대소문자 무시)만 참
 */
export function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
