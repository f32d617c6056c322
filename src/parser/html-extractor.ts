import * as path from 'path';
import { RawEdge } from '../graph/types';
import { HTML_EXTENSIONS, extensionOf } from './config';
import { ExtractionContext, Extractor, importEdges } from './interfaces';
import { readSource } from './source';

const SCRIPT_SRC = /<script[^>]*src=["']([^"']+)["'][^>]*>/gi;

const HTML_SET = new Set<string>(HTML_EXTENSIONS);

/**
 * `src` attributes of `<script>` tags, in document order.
 */
export function collectScriptSources(html: string): string[] {
    const sources: string[] = [];
    for (const match of html.matchAll(SCRIPT_SRC)) {
        if (match[1]) sources.push(match[1].trim());
    }
    return sources;
}

/**
 * Script tags of HTML entry pages. A src starting with "/" is served from
 * the project root, so it is rewritten to a path relative to the page.
 */
export class HtmlExtractor implements Extractor {
    readonly name = 'html';
    readonly fileNode = true;

    canHandle(filePath: string): boolean {
        return HTML_SET.has(extensionOf(filePath));
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const html = await readSource(filePath, ctx, this.name);
        if (html === null) return [];

        const pageDir = path.dirname(filePath);
        const specifiers = collectScriptSources(html).map(src => {
            if (!src.startsWith('/') || src.startsWith('//')) return src;
            const relative = path.relative(pageDir, path.join(ctx.root, src)).split(path.sep).join('/');
            return relative.startsWith('.') ? relative : `./${relative}`;
        });
        return importEdges(filePath, ctx, specifiers);
    }
}
