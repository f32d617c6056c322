/**
 * Bundler glob imports: `import.meta.glob('./pages/*.tsx')` and the older
 * `import.meta.globEager(...)`. Patterns are expanded against the importing
 * file's directory at scan time, so the edges point at concrete files.
 */

import fg from 'fast-glob';
import * as path from 'path';
import { errorMessage } from '../common/errors';
import { toRootRelative } from '../common/paths';
import { RawEdge } from '../graph/types';
import { isSourceFile } from './config';
import { ExtractionContext, Extractor } from './interfaces';
import { readSource } from './source';

const GLOB_CALL = /import\.meta\.glob(?:Eager)?\(([^)]*)\)/g;
const QUOTED = /['"`]([^'"`]+)['"`]/g;

/**
 * Pattern strings passed to glob-import calls, in order.
 */
export function collectGlobPatterns(text: string): string[] {
    const patterns: string[] = [];
    for (const call of text.matchAll(GLOB_CALL)) {
        for (const literal of (call[1] ?? '').matchAll(QUOTED)) {
            const pattern = literal[1];
            if (pattern) patterns.push(pattern);
        }
    }
    return patterns;
}

function stripCurrentDir(pattern: string): string {
    const negated = pattern.startsWith('!');
    const body = negated ? pattern.slice(1) : pattern;
    const stripped = body.startsWith('./') ? body.slice(2) : body;
    return negated ? `!${stripped}` : stripped;
}

export class GlobImportExtractor implements Extractor {
    readonly name = 'glob-import';
    readonly fileNode = true;

    canHandle(filePath: string): boolean {
        return isSourceFile(filePath);
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const text = await readSource(filePath, ctx, this.name);
        if (text === null) return [];

        const patterns = collectGlobPatterns(text).map(stripCurrentDir);
        if (!patterns.some(p => !p.startsWith('!'))) return [];

        const from = toRootRelative(ctx.root, filePath);
        if (from === null) return [];

        let matches: string[];
        try {
            matches = await fg(patterns, {
                cwd: path.dirname(filePath),
                absolute: true,
                onlyFiles: true,
                ignore: ['**/node_modules/**'],
            });
        } catch (error) {
            ctx.logger.warn('Invalid glob import pattern', { path: filePath, patterns, error: errorMessage(error) });
            return [];
        }

        const edges: RawEdge[] = [];
        for (const match of matches.sort()) {
            const to = toRootRelative(ctx.root, path.normalize(match));
            if (to === null || to === '' || to === from) continue;
            edges.push({ from, to, kind: 'regular', toKind: isSourceFile(to) ? 'file' : 'asset' });
        }
        return edges;
    }
}
