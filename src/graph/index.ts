/**
 * Graph model, construction and analysis.
 */

export { DependencyGraph } from './dependency-graph';
export {
    buildDependencyGraph,
    collectRawEdges,
    mergeRawEdges,
    workspacePackageNames,
    defaultWorkerCount,
    RawEdgeBuffer,
} from './builder';
export type { BuildOptions } from './builder';
export { pruneUnconnected, filterGraph, countByKind, INCLUDE_ALL } from './analysis';
export type { IncludeKinds, KindCount } from './analysis';
export { NODE_KINDS, CLASSIFIED_KINDS, KIND_PRECEDENCE, typeNodeName } from './types';
export type {
    NodeKind,
    ClassifiedKind,
    EdgeKind,
    NodeId,
    GraphNode,
    GraphEdge,
    RawEdge,
    ViewNode,
    ViewEdge,
    GraphView,
} from './types';
