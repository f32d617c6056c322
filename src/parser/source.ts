import * as fs from 'fs/promises';
import { errorMessage } from '../common/errors';
import { ExtractionContext } from './interfaces';

/**
 * Read a file as UTF-8 for an extractor. Returns null (and warns) when the
 * file cannot be read.
 */
export async function readSource(filePath: string, ctx: ExtractionContext, extractor: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (error) {
        ctx.logger.warn('Failed to read file', { extractor, path: filePath, error: errorMessage(error) });
        return null;
    }
}
