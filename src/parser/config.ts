/**
 * Parser Configuration
 *
 * Extension tables shared by the extractors and the module resolver.
 */

import * as path from 'path';

// ============================================================================
// Supported Extensions
// ============================================================================

/**
 * JavaScript/TypeScript source extensions, in resolution probe order.
 * A resolved target with one of these is a File, anything else an Asset.
 */
export const SOURCE_EXTENSIONS = ['js', 'jsx', 'ts', 'tsx', 'mjs', 'cjs', 'mts', 'cts'] as const;

export type SourceExtension = typeof SOURCE_EXTENSIONS[number];

export const HTML_EXTENSIONS = ['html', 'htm'] as const;

export const MDX_EXTENSIONS = ['mdx'] as const;

/** Extensions parsed with TypeScript syntax rather than plain JavaScript */
const TYPESCRIPT_SYNTAX = new Set<string>(['ts', 'mts', 'cts']);

const SOURCE_SET = new Set<string>(SOURCE_EXTENSIONS);

// ============================================================================
// Helpers
// ============================================================================

/**
 * Extension without the dot, as written ('' when there is none).
 */
export function extensionOf(filePath: string): string {
    return path.extname(filePath).slice(1);
}

export function isSourceExtension(ext: string): ext is SourceExtension {
    return SOURCE_SET.has(ext);
}

export function isSourceFile(filePath: string): boolean {
    return isSourceExtension(extensionOf(filePath));
}

export function usesTypeScriptSyntax(ext: string): boolean {
    return TYPESCRIPT_SYNTAX.has(ext);
}

export const MANIFEST_FILENAME = 'package.json';
export const TSCONFIG_FILENAME = 'tsconfig.json';
export const IGNORE_FILENAME = '.gitignore';
