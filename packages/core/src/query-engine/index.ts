/**
 * Query Engine - 라운드 BFS 기반 결정론적 경로 질의
 * 동일 입력 → 동일 출력 보장
 */
export { executeQuery } from './executor';
export { routeDistance } from './routeDistance';
export { circularRoute } from './circularRoute';
export { exactStops } from './exactStops';
export { shortestRoute } from './shortestRoute';
export { routesLessThan } from './routesLessThan';
export { runRounds, expandRoute, firstLegs, isReachable } from './traversal';
export type { RoundStep } from './traversal';
