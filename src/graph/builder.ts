/**
 * Concurrent Builder
 *
 * Two phases:
 *   1. Extraction, concurrent and unordered. Each file is read by every
 *      extractor that accepts it; the file's raw edges are appended to a
 *      shared buffer in one piece. Nothing touches the graph.
 *   2. Merge, serial. Raw edges are resolved and interned into the graph.
 *      Interning is idempotent, so the result does not depend on the order
 *      in which phase 1 finished.
 */

import * as os from 'os';
import * as path from 'path';
import pLimit from 'p-limit';
import { LogSink, silentLogger } from '../common/logger';
import { WorkerPoolError, errorMessage } from '../common/errors';
import { toRootRelative } from '../common/paths';
import { isSourceFile } from '../parser/config';
import { ExtractionContext } from '../parser/interfaces';
import { ExtractorRegistry, createDefaultRegistry } from '../parser/registry';
import { AliasEntry, loadAliases } from '../resolver/aliases';
import { ResolveContext, resolveSpecifier } from '../resolver/resolver';
import { DependencyGraph } from './dependency-graph';
import { NodeId, NodeKind, RawEdge } from './types';

export interface BuildOptions {
    /** Project root; file names in the graph are relative to it */
    root: string;
    /** Concurrent extraction tasks (default: available parallelism) */
    workers?: number;
    registry?: ExtractorRegistry;
    /** Path aliases (default: read from the root tsconfig.json) */
    aliases?: readonly AliasEntry[];
    logger?: LogSink;
}

export function defaultWorkerCount(): number {
    return os.availableParallelism();
}

// ============================================================================
// Raw edge buffer
// ============================================================================

/**
 * Append-only collection shared by the extraction tasks. Each task appends
 * its whole batch in one synchronous call, so batches never interleave.
 */
export class RawEdgeBuffer {
    private readonly batches: RawEdge[][] = [];
    private count = 0;

    append(batch: readonly RawEdge[]): void {
        if (batch.length === 0) return;
        this.batches.push([...batch]);
        this.count += batch.length;
    }

    get size(): number {
        return this.count;
    }

    get batchCount(): number {
        return this.batches.length;
    }

    /** Every edge, batch by batch, in append order */
    edges(): RawEdge[] {
        return this.batches.flat();
    }
}

// ============================================================================
// Phase 1: extraction
// ============================================================================

/**
 * Run every applicable extractor over one file. Extractor failures are
 * logged and only lose that extractor's edges for this file.
 */
async function scanFile(
    filePath: string,
    registry: ExtractorRegistry,
    ctx: ExtractionContext,
    buffer: RawEdgeBuffer
): Promise<void> {
    const batch: RawEdge[] = [];
    for (const extractor of registry.extractorsFor(filePath)) {
        try {
            batch.push(...await extractor.extract(filePath, ctx));
        } catch (error) {
            ctx.logger.warn('Extractor failed', {
                extractor: extractor.name,
                path: filePath,
                error: errorMessage(error),
            });
        }
    }
    buffer.append(batch);
}

/**
 * Extract raw edges from every file with at most `workers` files in
 * flight. Throws WorkerPoolError before reading anything when the pool
 * cannot be created.
 */
export async function collectRawEdges(
    files: readonly string[],
    registry: ExtractorRegistry,
    ctx: ExtractionContext,
    workers: number
): Promise<RawEdgeBuffer> {
    let limit: ReturnType<typeof pLimit>;
    try {
        limit = pLimit(workers);
    } catch (error) {
        throw new WorkerPoolError(workers, { cause: error });
    }

    const buffer = new RawEdgeBuffer();
    await Promise.all(files.map(file => limit(() => scanFile(file, registry, ctx, buffer))));
    return buffer;
}

// ============================================================================
// Phase 2: merge
// ============================================================================

/** File or Asset, by extension */
function pathKind(name: string): NodeKind {
    return isSourceFile(name) ? 'file' : 'asset';
}

/**
 * Package names declared inside the project: every Package endpoint among
 * the collected edges.
 */
export function workspacePackageNames(edges: readonly RawEdge[]): Set<string> {
    const names = new Set<string>();
    for (const edge of edges) {
        if (edge.fromKind === 'package') names.add(edge.from);
        if (edge.toKind === 'package') names.add(edge.to);
    }
    return names;
}

/**
 * Intern a node, along with the folder chain of path-named kinds.
 */
function internEndpoint(graph: DependencyGraph, name: string, kind: NodeKind): NodeId {
    if (kind === 'folder') return graph.ensureFolder(name);
    const id = graph.intern(name, kind);
    if (kind === 'file' || kind === 'asset') graph.ensureFolders(name);
    return id;
}

function mergeEdge(graph: DependencyGraph, edge: RawEdge, resolveCtx: ResolveContext): void {
    let toName = edge.to;
    let toKind: NodeKind = edge.toKind ?? pathKind(edge.to);
    if (edge.resolveFrom !== undefined) {
        const resolution = resolveSpecifier(edge.to, edge.resolveFrom, resolveCtx);
        if (!resolution) return;
        toName = resolution.name;
        toKind = resolution.kind;
    } else if ((toKind === 'file' || toKind === 'asset') && resolveCtx.knownFiles && !resolveCtx.knownFiles.has(toName)) {
        // Glob matches are not filtered by ignore files
        return;
    }

    const from = internEndpoint(graph, edge.from, edge.fromKind ?? pathKind(edge.from));
    const to = internEndpoint(graph, toName, toKind);
    graph.addEdge(from, to, edge.kind);
}

/**
 * Serial merge of scanned files and raw edges into a new graph.
 *
 * With `knownFiles` (root-relative names of every walked file), edges to
 * files outside that set are dropped.
 */
export function mergeRawEdges(
    root: string,
    nodeFiles: readonly string[],
    edges: readonly RawEdge[],
    aliases: readonly AliasEntry[],
    knownFiles?: ReadonlySet<string>
): DependencyGraph {
    const graph = new DependencyGraph();
    graph.addTypeNodes();
    graph.ensureRoot();

    for (const file of nodeFiles) {
        const name = toRootRelative(root, file);
        if (name === null || name === '') continue;
        internEndpoint(graph, name, pathKind(name));
    }

    const resolveCtx: ResolveContext = {
        root,
        aliases,
        workspacePackages: workspacePackageNames(edges),
        knownFiles,
    };
    for (const edge of edges) {
        mergeEdge(graph, edge, resolveCtx);
    }
    return graph;
}

// ============================================================================
// Entry point
// ============================================================================

export async function buildDependencyGraph(
    files: readonly string[],
    options: BuildOptions
): Promise<DependencyGraph> {
    const log = options.logger ?? silentLogger;
    const root = path.resolve(options.root);
    const registry = options.registry ?? createDefaultRegistry();
    const workers = options.workers ?? defaultWorkerCount();
    const aliases = options.aliases ?? loadAliases(root, log);
    const ctx: ExtractionContext = { root, aliases, logger: log };

    const buffer = await collectRawEdges(files, registry, ctx, workers);
    log.debug('Extraction complete', { files: files.length, rawEdges: buffer.size, workers });

    const knownFiles = new Set<string>();
    for (const file of files) {
        const name = toRootRelative(root, file);
        if (name) knownFiles.add(name);
    }
    const nodeFiles = files.filter(file => registry.isNodeFile(file));
    const graph = mergeRawEdges(root, nodeFiles, buffer.edges(), aliases, knownFiles);
    log.debug('Merge complete', { nodes: graph.nodeCount, edges: graph.edgeCount });
    return graph;
}
