import * as path from 'path';
import { toRootRelative } from '../common/paths';
import { RawEdge } from '../graph/types';
import { isSourceFile } from './config';
import { ExtractionContext, Extractor } from './interfaces';

/**
 * `index.<ext>` stands for its folder: emits folder -SameAs-> file.
 */
export class IndexExtractor implements Extractor {
    readonly name = 'index-file';
    readonly fileNode = true;

    canHandle(filePath: string): boolean {
        return path.basename(filePath).startsWith('index.') && isSourceFile(filePath);
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const file = toRootRelative(ctx.root, filePath);
        if (file === null || file === '') return [];
        const folder = path.posix.dirname(file);
        return [{
            from: folder === '.' ? '' : folder,
            fromKind: 'folder',
            to: file,
            toKind: 'file',
            kind: 'sameAs',
        }];
    }
}
