/**
 * Edge list 파서
 * 입력 전체에서 `<문자><문자><숫자열>` 패턴을 검색하고 나머지 문자는 구분자로 무시
 * 예) "AB5, BC4\nCD8" → A→B(5), B→C(4), C→D(8)
 */
import { EDGE_PATTERN } from '@transit-routes/shared';
import type { RawEdge } from '@transit-routes/shared';

export function parseEdgeList(input: string): RawEdge[] {
  const edges: RawEdge[] = [];
  for (const match of input.matchAll(EDGE_PATTERN)) {
    const [, origin, destination, distance] = match;
    edges.push({ origin, destination, distance });
  }
  return edges;
}
