import * as path from 'path';
import { LogSink } from '../common/logger';
import { toRootRelative } from '../common/paths';
import { RawEdge } from '../graph/types';
import { AliasEntry } from '../resolver/aliases';

/**
 * What every extractor gets besides the file itself.
 */
export interface ExtractionContext {
    /** Absolute project root */
    root: string;
    aliases: readonly AliasEntry[];
    logger: LogSink;
}

/**
 * Turns one kind of file into raw edges. Extractors never resolve
 * specifiers; that happens once all files are scanned.
 */
export interface Extractor {
    readonly name: string;

    /**
     * Whether the files this extractor handles are graph nodes themselves.
     * Manifests are not: their edges start at a package.
     */
    readonly fileNode: boolean;

    canHandle(filePath: string): boolean;

    /**
     * Never rejects on malformed input: a file that cannot be read or
     * parsed produces no edges (or whatever could be recovered).
     */
    extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]>;
}

/**
 * Regular edges from a file to each specifier, resolved later relative to
 * the file's directory. Duplicates are collapsed, first occurrence kept.
 */
export function importEdges(filePath: string, ctx: ExtractionContext, specifiers: Iterable<string>): RawEdge[] {
    const from = toRootRelative(ctx.root, filePath);
    if (from === null) return [];
    const resolveFrom = path.dirname(filePath);
    const seen = new Set<string>();
    const edges: RawEdge[] = [];
    for (const to of specifiers) {
        if (!to || seen.has(to)) continue;
        seen.add(to);
        edges.push({ from, to, kind: 'regular', resolveFrom });
    }
    return edges;
}
