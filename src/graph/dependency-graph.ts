/**
 * Dependency Graph
 *
 * In-memory directed graph with interned nodes and deduplicated edges.
 *
 * A node is only a name. Its kind is recorded by a 'typeOf' edge to one of
 * the per-kind type nodes (`__type__::<kind>`); a node without such an edge
 * is a plain file. Nodes are interned by (name, kind), so a file "lodash" and
 * an external package "lodash" stay distinct.
 */

import * as path from 'path';
import {
    CLASSIFIED_KINDS,
    ClassifiedKind,
    EdgeKind,
    GraphEdge,
    GraphNode,
    KIND_PRECEDENCE,
    NodeId,
    NodeKind,
    typeNodeName,
} from './types';

const ROOT_FOLDER = '';

function nodeKey(name: string, kind: NodeKind): string {
    return `${kind}\u0000${name}`;
}

/** Never equal to a nodeKey: no NodeKind is "type" */
function typeNodeKey(kind: ClassifiedKind): string {
    return `type\u0000${kind}`;
}

function edgeKey(from: NodeId, to: NodeId, kind: EdgeKind): string {
    return `${from}>${to}>${kind}`;
}

export class DependencyGraph {
    private nextId = 0;
    private readonly nodesById = new Map<NodeId, GraphNode>();
    private readonly nodeIndex = new Map<string, NodeId>();
    private readonly keyById = new Map<NodeId, string>();
    private readonly edgesByKey = new Map<string, GraphEdge>();
    private readonly outgoingKeys = new Map<NodeId, Set<string>>();
    private readonly incomingKeys = new Map<NodeId, Set<string>>();
    private readonly typeNodes = new Map<ClassifiedKind, NodeId>();

    // ========================================================================
    // Type nodes
    // ========================================================================

    /**
     * Create the type node of every classified kind. Idempotent.
     */
    addTypeNodes(): void {
        for (const kind of CLASSIFIED_KINDS) {
            this.typeNode(kind);
        }
    }

    typeNode(kind: ClassifiedKind): NodeId {
        const existing = this.typeNodes.get(kind);
        if (existing !== undefined) return existing;
        const id = this.createNode(typeNodeName(kind), typeNodeKey(kind));
        this.typeNodes.set(kind, id);
        return id;
    }

    isTypeNode(id: NodeId): boolean {
        for (const typeId of this.typeNodes.values()) {
            if (typeId === id) return true;
        }
        return false;
    }

    typeNodeIds(): NodeId[] {
        return Array.from(this.typeNodes.values());
    }

    // ========================================================================
    // Nodes
    // ========================================================================

    /**
     * Get or create the node for (name, kind) and classify it.
     */
    intern(name: string, kind: NodeKind): NodeId {
        const key = nodeKey(name, kind);
        const existing = this.nodeIndex.get(key);
        if (existing !== undefined) return existing;
        const id = this.createNode(name, key);
        this.classify(id, kind);
        return id;
    }

    find(name: string, kind: NodeKind): NodeId | undefined {
        return this.nodeIndex.get(nodeKey(name, kind));
    }

    /**
     * Attach a kind to a node. Attaching the same kind twice is a no-op,
     * and 'file' needs no edge at all.
     */
    classify(id: NodeId, kind: NodeKind): void {
        if (kind === 'file') return;
        this.addEdge(id, this.typeNode(kind), 'typeOf');
    }

    /**
     * Effective kind: the highest-precedence type node the node points at.
     */
    kindOf(id: NodeId): NodeKind {
        let best: NodeKind = 'file';
        for (const edge of this.outgoing(id)) {
            if (edge.kind !== 'typeOf') continue;
            for (const [kind, typeId] of this.typeNodes) {
                if (typeId === edge.to && KIND_PRECEDENCE[kind] > KIND_PRECEDENCE[best]) {
                    best = kind;
                }
            }
        }
        return best;
    }

    node(id: NodeId): GraphNode | undefined {
        return this.nodesById.get(id);
    }

    nodes(): GraphNode[] {
        return Array.from(this.nodesById.values());
    }

    get nodeCount(): number {
        return this.nodesById.size;
    }

    /**
     * Delete a node and every edge touching it.
     */
    removeNode(id: NodeId): boolean {
        if (!this.nodesById.has(id)) return false;
        for (const key of [...(this.outgoingKeys.get(id) ?? []), ...(this.incomingKeys.get(id) ?? [])]) {
            this.removeEdgeByKey(key);
        }
        const key = this.keyById.get(id);
        if (key !== undefined) this.nodeIndex.delete(key);
        this.keyById.delete(id);
        this.nodesById.delete(id);
        this.outgoingKeys.delete(id);
        this.incomingKeys.delete(id);
        for (const [kind, typeId] of this.typeNodes) {
            if (typeId === id) this.typeNodes.delete(kind);
        }
        return true;
    }

    private createNode(name: string, key: string): NodeId {
        const id = this.nextId++;
        this.nodesById.set(id, { id, name });
        this.nodeIndex.set(key, id);
        this.keyById.set(id, key);
        this.outgoingKeys.set(id, new Set());
        this.incomingKeys.set(id, new Set());
        return id;
    }

    // ========================================================================
    // Folders
    // ========================================================================

    /**
     * The root folder (empty name).
     */
    ensureRoot(): NodeId {
        return this.intern(ROOT_FOLDER, 'folder');
    }

    /**
     * Create (or reuse) the folder node for a root-relative directory and
     * every ancestor up to the root, each linked parent -> child.
     */
    ensureFolder(relDir: string): NodeId {
        let parent = this.ensureRoot();
        if (relDir === '' || relDir === '.') return parent;
        let accum = '';
        for (const segment of relDir.split('/')) {
            if (!segment) continue;
            accum = accum ? `${accum}/${segment}` : segment;
            const id = this.intern(accum, 'folder');
            this.addEdge(parent, id);
            parent = id;
        }
        return parent;
    }

    /**
     * Folder chain of a root-relative file path; returns the parent folder.
     */
    ensureFolders(relFile: string): NodeId {
        const dir = path.posix.dirname(relFile);
        return this.ensureFolder(dir === '.' ? '' : dir);
    }

    // ========================================================================
    // Edges
    // ========================================================================

    /**
     * Insert an edge unless the same (from, to, kind) already exists.
     * Returns true when a new edge was added.
     */
    addEdge(from: NodeId, to: NodeId, kind: EdgeKind = 'regular'): boolean {
        if (!this.nodesById.has(from) || !this.nodesById.has(to)) {
            throw new Error(`Edge endpoint does not exist: ${from} -> ${to}`);
        }
        const key = edgeKey(from, to, kind);
        if (this.edgesByKey.has(key)) return false;
        this.edgesByKey.set(key, { from, to, kind });
        this.outgoingKeys.get(from)?.add(key);
        this.incomingKeys.get(to)?.add(key);
        return true;
    }

    hasEdge(from: NodeId, to: NodeId, kind: EdgeKind = 'regular'): boolean {
        return this.edgesByKey.has(edgeKey(from, to, kind));
    }

    edges(): GraphEdge[] {
        return Array.from(this.edgesByKey.values());
    }

    get edgeCount(): number {
        return this.edgesByKey.size;
    }

    outgoing(id: NodeId): GraphEdge[] {
        return this.collect(this.outgoingKeys.get(id));
    }

    incoming(id: NodeId): GraphEdge[] {
        return this.collect(this.incomingKeys.get(id));
    }

    private collect(keys: Set<string> | undefined): GraphEdge[] {
        const result: GraphEdge[] = [];
        for (const key of keys ?? []) {
            const edge = this.edgesByKey.get(key);
            if (edge) result.push(edge);
        }
        return result;
    }

    private removeEdgeByKey(key: string): void {
        const edge = this.edgesByKey.get(key);
        if (!edge) return;
        this.edgesByKey.delete(key);
        this.outgoingKeys.get(edge.from)?.delete(key);
        this.incomingKeys.get(edge.to)?.delete(key);
    }
}
