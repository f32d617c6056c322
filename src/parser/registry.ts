/**
 * Extractor Registry
 *
 * Fixed, ordered list of extractors. A file is handed to every extractor
 * that accepts it, in registration order.
 */

import { GlobImportExtractor } from './glob-import-extractor';
import { HtmlExtractor } from './html-extractor';
import { IndexExtractor } from './index-extractor';
import { Extractor } from './interfaces';
import { JsExtractor } from './js-extractor';
import { MdxExtractor } from './mdx-extractor';
import { PackageJsonExtractor } from './package-json';

export class ExtractorRegistry {
    private readonly extractors: Extractor[] = [];

    constructor(extractors: Iterable<Extractor> = []) {
        for (const extractor of extractors) {
            this.register(extractor);
        }
    }

    register(extractor: Extractor): void {
        if (this.extractors.some(e => e.name === extractor.name)) {
            throw new Error(`Extractor already registered: ${extractor.name}`);
        }
        this.extractors.push(extractor);
    }

    /**
     * Every extractor that accepts the file, in registration order.
     */
    extractorsFor(filePath: string): Extractor[] {
        return this.extractors.filter(e => e.canHandle(filePath));
    }

    /**
     * Whether the file becomes a graph node: some extractor that accepts
     * it treats its files as nodes.
     */
    isNodeFile(filePath: string): boolean {
        return this.extractorsFor(filePath).some(e => e.fileNode);
    }

    get names(): string[] {
        return this.extractors.map(e => e.name);
    }
}

/**
 * The standard extractor set.
 */
export function createDefaultRegistry(): ExtractorRegistry {
    return new ExtractorRegistry([
        new JsExtractor(),
        new GlobImportExtractor(),
        new HtmlExtractor(),
        new MdxExtractor(),
        new IndexExtractor(),
        new PackageJsonExtractor(),
    ]);
}
