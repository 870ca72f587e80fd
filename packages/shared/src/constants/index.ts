// Query 타입 - 엔진이 제공하는 다섯 가지 질의
export const QUERY_TYPES = [
  'ROUTE_DISTANCE',
  'CIRCULAR_ROUTE',
  'EXACT_STOPS',
  'SHORTEST_ROUTE',
  'ROUTES_LESS_THAN',
] as const;

// 경로가 존재하지 않을 때의 출력 문자열
export const NO_SUCH_ROUTE = 'NO SUCH ROUTE';

// 입력 텍스트의 edge 패턴: <출발 문자><도착 문자><거리 숫자열>
export const EDGE_PATTERN = /([a-zA-Z])([a-zA-Z])(\d+)/g;

// 인자 개수가 맞지 않을 때 출력하는 사용법 안내
export const USAGE_MESSAGE = 'Need path of input file as only argument';

// 환경 변수 이름
export const ENV_KEYS = {
  VERBOSE: 'TRANSIT_ROUTES_VERBOSE',
} as const;
