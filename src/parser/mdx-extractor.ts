import { RawEdge } from '../graph/types';
import { MDX_EXTENSIONS, extensionOf } from './config';
import { ExtractionContext, Extractor, importEdges } from './interfaces';
import { readSource } from './source';

// ESM import statements at the start of a line; prose mentioning "import" is not matched
const MDX_IMPORT = /^\s*import\s+(?:[^'"]*?from\s+)?['"]([^'"]+)['"]/gm;

const MDX_SET = new Set<string>(MDX_EXTENSIONS);

export function collectMdxImports(text: string): string[] {
    const specifiers: string[] = [];
    for (const match of text.matchAll(MDX_IMPORT)) {
        if (match[1]) specifiers.push(match[1]);
    }
    return specifiers;
}

export class MdxExtractor implements Extractor {
    readonly name = 'mdx';
    readonly fileNode = true;

    canHandle(filePath: string): boolean {
        return MDX_SET.has(extensionOf(filePath));
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const text = await readSource(filePath, ctx, this.name);
        if (text === null) return [];
        return importEdges(filePath, ctx, collectMdxImports(text));
    }
}
