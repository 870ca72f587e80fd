import type { RawEdge } from '../types/index';

/**
 * edge 토큰 검증 실패
 * 그래프 구성 단계에서 발생하며 전체 실행을 중단
 */
export class MalformedEdgeError extends Error {
  readonly edge: RawEdge;

  constructor(edge: RawEdge, reason: string) {
    super(
      `Malformed edge ${String(edge.origin ?? '?')}${String(edge.destination ?? '?')}${String(edge.distance ?? '?')}: ${reason}`,
    );
    this.name = 'MalformedEdgeError';
    this.edge = edge;
  }
}
