// Node kinds, in classification precedence order (low -> high)
export const NODE_KINDS = ['file', 'asset', 'external', 'builtin', 'folder', 'package'] as const;

export type NodeKind = typeof NODE_KINDS[number];

/** Every kind except 'file' is recorded by an edge to a type node */
export type ClassifiedKind = Exclude<NodeKind, 'file'>;

export const CLASSIFIED_KINDS: readonly ClassifiedKind[] = ['asset', 'external', 'builtin', 'folder', 'package'];

export const KIND_PRECEDENCE: Record<NodeKind, number> = {
    file: 0,
    asset: 1,
    external: 2,
    builtin: 3,
    folder: 4,
    package: 5,
};

/**
 * regular: an import dependency.
 * sameAs:  a folder and the index file that stands for it.
 * typeOf:  classification of a node by its kind's type node.
 */
export type EdgeKind = 'regular' | 'sameAs' | 'typeOf';

export type NodeId = number;

export interface GraphNode {
    id: NodeId;
    name: string;   // Canonical name, e.g. "src/parser/config.ts", "react", "node:fs" -> "fs"
}

export interface GraphEdge {
    from: NodeId;
    to: NodeId;
    kind: EdgeKind;
}

/**
 * What an extractor reports before any resolution happens.
 *
 * `from` is a root-relative path, or a package name when `fromKind` is
 * 'package'. `to` is a raw specifier when `resolveFrom` is set (the absolute
 * directory it is relative to), otherwise a canonical name used verbatim.
 */
export interface RawEdge {
    from: string;
    to: string;
    kind: Exclude<EdgeKind, 'typeOf'>;
    fromKind?: NodeKind;
    toKind?: NodeKind;
    resolveFrom?: string;
}

// Presentation view: kind stored on the node, no type nodes

export interface ViewNode {
    index: number;
    name: string;
    kind: NodeKind;
}

export interface ViewEdge {
    from: number;   // ViewNode index
    to: number;
    kind: Exclude<EdgeKind, 'typeOf'>;
}

export interface GraphView {
    nodes: ViewNode[];
    edges: ViewEdge[];
}

export function typeNodeName(kind: ClassifiedKind): string {
    return `__type__::${kind}`;
}
