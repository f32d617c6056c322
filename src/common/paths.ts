import * as path from 'path';

/**
 * Normalizes a file path to forward slashes.
 * e.g., "src\foo\bar.ts" -> "src/foo/bar.ts"
 */
export function normalizePath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

/**
 * Canonical root-relative name of an absolute path: forward slashes, no
 * leading slash, the root itself is ''. Returns null for paths outside root.
 */
export function toRootRelative(root: string, absPath: string): string | null {
    const rel = path.relative(root, absPath);
    if (rel === '') return '';
    if (path.isAbsolute(rel) || rel === '..' || rel.startsWith('..' + path.sep)) {
        return null;
    }
    return normalizePath(rel);
}
