/**
 * Shared test fixtures: temp workspaces on disk and graph lookups.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DependencyGraph } from '../graph/dependency-graph';
import { EdgeKind, NodeKind } from '../graph/types';

export interface TestWorkspace {
    root: string;
    /** Absolute path of a root-relative file */
    file(rel: string): string;
    write(rel: string, content: string): string;
    cleanup(): void;
}

/**
 * Create a temp directory holding the given files (root-relative path ->
 * content). Parent directories are created as needed.
 */
export function createWorkspace(files: Record<string, string> = {}): TestWorkspace {
    const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'depscope-test-')));
    const file = (rel: string) => path.join(root, ...rel.split('/'));
    const write = (rel: string, content: string) => {
        const abs = file(rel);
        fs.mkdirSync(path.dirname(abs), { recursive: true });
        fs.writeFileSync(abs, content);
        return abs;
    };
    for (const [rel, content] of Object.entries(files)) {
        write(rel, content);
    }
    return {
        root,
        file,
        write,
        cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
    };
}

/**
 * Sorted names of the nodes of one kind (type nodes excluded).
 */
export function namesOfKind(graph: DependencyGraph, kind: NodeKind): string[] {
    return graph.nodes()
        .filter(n => !graph.isTypeNode(n.id) && graph.kindOf(n.id) === kind)
        .map(n => n.name)
        .sort();
}

export function hasGraphEdge(
    graph: DependencyGraph,
    from: [string, NodeKind],
    to: [string, NodeKind],
    kind: EdgeKind = 'regular'
): boolean {
    const fromId = graph.find(from[0], from[1]);
    const toId = graph.find(to[0], to[1]);
    if (fromId === undefined || toId === undefined) return false;
    return graph.hasEdge(fromId, toId, kind);
}

/**
 * Regular edges as "from -> to" strings, sorted.
 */
export function regularEdges(graph: DependencyGraph): string[] {
    return graph.edges()
        .filter(e => e.kind === 'regular')
        .map(e => `${graph.node(e.from)?.name ?? '?'} -> ${graph.node(e.to)?.name ?? '?'}`)
        .sort();
}
