/**
 * Post-build passes over a DependencyGraph.
 */

import { DependencyGraph } from './dependency-graph';
import { GraphView, NodeId, NodeKind, ViewEdge, ViewNode } from './types';

/**
 * Which optional kinds survive filtering. Files have no flag; they are
 * always kept.
 */
export interface IncludeKinds {
    external: boolean;
    builtins: boolean;
    folders: boolean;
    assets: boolean;
    packages: boolean;
}

export const INCLUDE_ALL: IncludeKinds = {
    external: true,
    builtins: true,
    folders: true,
    assets: true,
    packages: true,
};

function isIncluded(kind: NodeKind, include: IncludeKinds): boolean {
    switch (kind) {
        case 'file': return true;
        case 'asset': return include.assets;
        case 'external': return include.external;
        case 'builtin': return include.builtins;
        case 'folder': return include.folders;
        case 'package': return include.packages;
    }
}

// ============================================================================
// Prune
// ============================================================================

/**
 * True when the node has an edge other than its own classification.
 */
function isConnected(graph: DependencyGraph, id: NodeId): boolean {
    for (const edge of graph.outgoing(id)) {
        if (edge.kind !== 'typeOf') return true;
    }
    // Incoming typeOf edges only point at type nodes, which are never pruned
    return graph.incoming(id).length > 0;
}

/**
 * Remove nodes with no edges, in place, until a full pass removes nothing.
 * Type nodes are kept. Returns how many nodes were removed.
 */
export function pruneUnconnected(graph: DependencyGraph): number {
    let removed = 0;
    let changed = true;
    while (changed) {
        changed = false;
        for (const node of graph.nodes()) {
            if (graph.isTypeNode(node.id)) continue;
            if (isConnected(graph, node.id)) continue;
            graph.removeNode(node.id);
            removed++;
            changed = true;
        }
    }
    return removed;
}

// ============================================================================
// Filter
// ============================================================================

/**
 * Derive a presentation view: nodes whose kind is enabled and whose name is
 * not ignored, edges whose endpoints both survive. Type nodes and typeOf
 * edges never appear. The source graph is not modified.
 */
export function filterGraph(
    graph: DependencyGraph,
    include: IncludeKinds,
    ignoreNames: Iterable<string> = []
): GraphView {
    const ignored = new Set(ignoreNames);
    const indexById = new Map<NodeId, number>();
    const nodes: ViewNode[] = [];

    for (const node of graph.nodes()) {
        if (graph.isTypeNode(node.id)) continue;
        if (ignored.has(node.name)) continue;
        const kind = graph.kindOf(node.id);
        if (!isIncluded(kind, include)) continue;
        indexById.set(node.id, nodes.length);
        nodes.push({ index: nodes.length, name: node.name, kind });
    }

    const edges: ViewEdge[] = [];
    for (const edge of graph.edges()) {
        if (edge.kind === 'typeOf') continue;
        const from = indexById.get(edge.from);
        const to = indexById.get(edge.to);
        if (from === undefined || to === undefined) continue;
        edges.push({ from, to, kind: edge.kind });
    }

    return { nodes, edges };
}

// ============================================================================
// Summary
// ============================================================================

export interface KindCount {
    nodes: number;
    edges: number;
}

/**
 * Per-kind node counts, and per-kind counts of the edges leaving those nodes.
 */
export function countByKind(view: GraphView): Record<NodeKind, KindCount> {
    const counts: Record<NodeKind, KindCount> = {
        file: { nodes: 0, edges: 0 },
        asset: { nodes: 0, edges: 0 },
        external: { nodes: 0, edges: 0 },
        builtin: { nodes: 0, edges: 0 },
        folder: { nodes: 0, edges: 0 },
        package: { nodes: 0, edges: 0 },
    };
    for (const node of view.nodes) {
        counts[node.kind].nodes++;
    }
    for (const edge of view.edges) {
        const source = view.nodes[edge.from];
        if (source) counts[source.kind].edges++;
    }
    return counts;
}
