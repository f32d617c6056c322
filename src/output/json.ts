import { EdgeKind, GraphView, NodeKind } from '../graph/types';

export interface JsonGraph {
    nodes: Array<{ name: string; kind: NodeKind }>;
    edges: Array<{ from: number; to: number; kind: Exclude<EdgeKind, 'typeOf'> }>;
}

/**
 * Plain-object form of a view. Edge endpoints are indices into `nodes`.
 */
export function toJsonGraph(view: GraphView): JsonGraph {
    return {
        nodes: view.nodes.map(n => ({ name: n.name, kind: n.kind })),
        edges: view.edges.map(e => ({ from: e.from, to: e.to, kind: e.kind })),
    };
}

export function renderJson(view: GraphView): string {
    return JSON.stringify(toJsonGraph(view), null, 2) + '\n';
}
