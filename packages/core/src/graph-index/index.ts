/**
 * Graph Index - 역 인접 구조
 * edge 목록을 graphology 방향 그래프로 한 번 구성한 뒤 읽기 전용으로 사용
 * 구성 이후에는 어떤 질의도 그래프를 변경하지 않음
 */
import Graph from 'graphology';
import { MalformedEdgeError } from '@transit-routes/shared';
import type { Edge, Leg, RawEdge, StationId } from '@transit-routes/shared';
import { parseEdgeList } from './parser';

type StationAttributes = Record<string, never>;

type LegAttributes = {
  distance: number;
};

const DIGITS = /^\d+$/;

/** 토큰 검증 후 Edge로 변환 */
export function toEdge(raw: RawEdge): Edge {
  const { origin, destination, distance } = raw;

  if (!origin) throw new MalformedEdgeError(raw, 'missing origin');
  if (!destination) throw new MalformedEdgeError(raw, 'missing destination');

  let parsed: number;
  if (typeof distance === 'number') {
    parsed = distance;
  } else if (distance !== undefined && DIGITS.test(distance)) {
    parsed = Number(distance);
  } else {
    throw new MalformedEdgeError(raw, 'distance is not a non-negative integer');
  }

  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new MalformedEdgeError(raw, 'distance is not a non-negative integer');
  }

  return { origin, destination, distance: parsed };
}

export class RouteGraph {
  private readonly graph: Graph<StationAttributes, LegAttributes>;

  private constructor(graph: Graph<StationAttributes, LegAttributes>) {
    this.graph = graph;
  }

  /**
   * edge 목록으로 그래프 구성
   * 같은 (출발, 도착) 쌍이 다시 나오면 나중 값으로 덮어씀
   */
  static fromEdges(edges: Iterable<RawEdge>): RouteGraph {
    const graph = new Graph<StationAttributes, LegAttributes>({
      type: 'directed',
      multi: false,
      allowSelfLoops: true,
    });

    for (const raw of edges) {
      const edge = toEdge(raw);
      graph.mergeEdge(edge.origin, edge.destination, { distance: edge.distance });
    }

    return new RouteGraph(graph);
  }

  /** 원본 텍스트에서 바로 구성 */
  static parse(input: string): RouteGraph {
    return RouteGraph.fromEdges(parseEdgeList(input));
  }

  /** 단일 구간 거리. edge가 없으면 null */
  lookup(origin: StationId, destination: StationId): number | null {
    if (!this.graph.hasNode(origin) || !this.graph.hasNode(destination)) return null;
    if (!this.graph.hasEdge(origin, destination)) return null;
    return this.graph.getEdgeAttribute(origin, destination, 'distance');
  }

  /** 나가는 edge 전체 (순서 무관) */
  outgoing(station: StationId): Leg[] {
    if (!this.graph.hasNode(station)) return [];

    const legs: Leg[] = [];
    this.graph.forEachOutEdge(station, (_edge, attributes, _source, target) => {
      legs.push({ destination: target, distance: attributes.distance });
    });
    return legs;
  }

  hasOutgoing(station: StationId): boolean {
    return this.graph.hasNode(station) && this.graph.outDegree(station) > 0;
  }

  /** 나가는 edge가 하나 이상 있는 역 목록 */
  stations(): StationId[] {
    return this.graph.filterNodes((node) => this.graph.outDegree(node) > 0);
  }

  get edgeCount(): number {
    return this.graph.size;
  }
}

export { parseEdgeList } from './parser';
