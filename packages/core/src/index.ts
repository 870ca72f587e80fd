export { RouteGraph, parseEdgeList, toEdge } from './graph-index/index';
export * from './query-engine/index';
