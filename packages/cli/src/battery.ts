/**
 * 고정 질의 묶음 (10개)
 * 입력 그래프에 대해 순서대로 실행하고 `Output #n: ...` 줄을 만듦
 */
import { executeQuery } from '@transit-routes/core';
import type { RouteGraph } from '@transit-routes/core';
import { formatOutputLine } from '@transit-routes/shared';
import type { QueryRequest, QueryResponse } from '@transit-routes/shared';

export interface BatteryEntry {
  name: string;
  request: QueryRequest;
}

export const BATTERY: readonly BatteryEntry[] = [
  { name: 'abc-distance', request: { queryType: 'ROUTE_DISTANCE', stops: ['A', 'B', 'C'] } },
  { name: 'ad-distance', request: { queryType: 'ROUTE_DISTANCE', stops: ['A', 'D'] } },
  { name: 'adc-distance', request: { queryType: 'ROUTE_DISTANCE', stops: ['A', 'D', 'C'] } },
  {
    name: 'aebcd-distance',
    request: { queryType: 'ROUTE_DISTANCE', stops: ['A', 'E', 'B', 'C', 'D'] },
  },
  { name: 'aed-distance', request: { queryType: 'ROUTE_DISTANCE', stops: ['A', 'E', 'D'] } },
  { name: 'c-circular', request: { queryType: 'CIRCULAR_ROUTE', start: 'C', maxStops: 3 } },
  {
    name: 'ab-four-stops',
    request: { queryType: 'EXACT_STOPS', start: 'A', destination: 'B', stops: 4 },
  },
  { name: 'ac-shortest', request: { queryType: 'SHORTEST_ROUTE', start: 'A', destination: 'C' } },
  {
    name: 'b-shortest-cycle',
    request: { queryType: 'SHORTEST_ROUTE', start: 'B', destination: 'B' },
  },
  {
    name: 'c-cycles-under-30',
    request: { queryType: 'ROUTES_LESS_THAN', start: 'C', destination: 'C', maxDistance: 30 },
  },
];

export interface BatteryResult {
  entry: BatteryEntry;
  response: QueryResponse;
  line: string;
}

export function runBattery(
  graph: RouteGraph,
  entries: readonly BatteryEntry[] = BATTERY,
): BatteryResult[] {
  return entries.map((entry, index) => {
    const response = executeQuery(graph, entry.request);
    return { entry, response, line: formatOutputLine(index, response.result) };
  });
}
