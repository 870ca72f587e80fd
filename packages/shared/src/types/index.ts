import type { QUERY_TYPES } from '../constants/index';

// === 기본 유틸리티 타입 ===

/** 배열 타입에서 원소 타입 추출 */
export type ArrayElement<T extends readonly unknown[]> = T[number];

/** Query 타입 유니온 */
export type QueryType = ArrayElement<typeof QUERY_TYPES>;

// === 그래프 엔티티 타입 ===

/**
 * 역(station) 식별자
 * 입력 예시는 한 글자지만 길이를 가정하지 않는 불투명 토큰으로 취급
 */
export type StationId = string;

/** 파싱 직후의 edge 토큰 (검증 전) */
export interface RawEdge {
  origin: StationId | undefined;
  destination: StationId | undefined;
  distance: string | number | undefined;
}

/** 검증된 단방향 edge */
export interface Edge {
  origin: StationId;
  destination: StationId;
  distance: number;
}

/** 한 역에서 나가는 edge (outgoing 조회 결과) */
export interface Leg {
  destination: StationId;
  distance: number;
}

/**
 * 탐색 중인 부분 경로
 * stops[0]은 출발역, 마지막 원소가 현재 위치
 */
export interface PartialRoute {
  stops: readonly StationId[];
  distance: number;
}

// === Query 요청/응답 타입 ===

/** 고정 경로 거리 */
export interface RouteDistanceRequest {
  queryType: 'ROUTE_DISTANCE';
  stops: readonly StationId[];
}

/** 출발역으로 돌아오는 경로 수 (최대 정차 수) */
export interface CircularRouteRequest {
  queryType: 'CIRCULAR_ROUTE';
  start: StationId;
  maxStops: number;
}

/** 정확한 정차 수의 경로 수 */
export interface ExactStopsRequest {
  queryType: 'EXACT_STOPS';
  start: StationId;
  destination: StationId;
  stops: number;
}

/** 최단 경로 거리 */
export interface ShortestRouteRequest {
  queryType: 'SHORTEST_ROUTE';
  start: StationId;
  destination: StationId;
}

/** 거리 상한 미만의 경로 수 */
export interface RoutesLessThanRequest {
  queryType: 'ROUTES_LESS_THAN';
  start: StationId;
  destination: StationId;
  maxDistance: number;
}

/** Query 요청 */
export type QueryRequest =
  | RouteDistanceRequest
  | CircularRouteRequest
  | ExactStopsRequest
  | ShortestRouteRequest
  | RoutesLessThanRequest;

/** Query 응답 - result가 null이면 경로 없음 */
export interface QueryResponse {
  queryType: QueryType;
  result: number | null;
  meta: {
    computedAt: string;
    executionMs: number;
  };
}
