/**
 * Module Resolver
 *
 * Maps an import specifier, as written, to the canonical node it refers to.
 * Checked in order, first success wins:
 *
 *   1. relative ("./x", "../x")   -> File | Asset, or dropped
 *   2. tsconfig path alias        -> File | Asset, dropped when the file
 *                                    is ignored, else falls through
 *   3. Node.js core module        -> Builtin (name without "node:")
 *   4. workspace package name     -> Package
 *   5. anything else              -> External (raw specifier)
 */

import * as fs from 'fs';
import * as path from 'path';
import { toRootRelative } from '../common/paths';
import { SOURCE_EXTENSIONS, extensionOf, isSourceExtension } from '../parser/config';
import { NodeKind } from '../graph/types';
import { AliasEntry } from './aliases';
import { isBuiltin, stripNodeScheme } from './builtins';

export interface Resolution {
    name: string;
    kind: NodeKind;
}

export interface ResolveContext {
    /** Absolute project root; file targets outside it are dropped */
    root: string;
    aliases: readonly AliasEntry[];
    /** Names of the packages declared inside the project */
    workspacePackages: ReadonlySet<string>;
    /**
     * Root-relative names of the walked files. When given, a file target
     * outside this set (ignored, or never walked) resolves to nothing.
     */
    knownFiles?: ReadonlySet<string>;
}

// ============================================================================
// File probing
// ============================================================================

function isFile(absPath: string): boolean {
    return fs.statSync(absPath, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(absPath: string): boolean {
    return fs.statSync(absPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/** Specifiers that can only mean a directory: "./", ".", "..", "../.." */
function namesDirectory(specifier: string): boolean {
    const last = specifier.slice(specifier.lastIndexOf('/') + 1);
    return last === '' || last === '.' || last === '..';
}

/**
 * Probe `base` the way a bundler would: the path itself, then
 * `base.<ext>` when the specifier carries no extension and does not name a
 * directory, then `base/index.<ext>`. Returns the absolute file path or null.
 */
export function probeFile(base: string, specifier: string): string | null {
    if (isFile(base)) return base;

    if (extensionOf(specifier) === '' && !namesDirectory(specifier)) {
        for (const ext of SOURCE_EXTENSIONS) {
            const candidate = `${base}.${ext}`;
            if (isFile(candidate)) return candidate;
        }
    }

    if (isDirectory(base)) {
        for (const ext of SOURCE_EXTENSIONS) {
            const candidate = path.join(base, `index.${ext}`);
            if (isFile(candidate)) return candidate;
        }
    }

    return null;
}

/**
 * Resolve a relative specifier against the importing file's directory.
 */
export function resolveRelative(specifier: string, fromDir: string): string | null {
    return probeFile(path.resolve(fromDir, specifier), specifier);
}

/**
 * Resolve through the first alias whose prefix matches (exactly, or followed
 * by "/") and whose probe finds a file.
 */
export function resolveAlias(specifier: string, aliases: readonly AliasEntry[]): string | null {
    for (const alias of aliases) {
        let rest: string;
        if (specifier === alias.prefix) {
            rest = '';
        } else if (specifier.startsWith(alias.prefix + '/')) {
            rest = specifier.slice(alias.prefix.length + 1);
        } else {
            continue;
        }
        const hit = probeFile(rest ? path.resolve(alias.target, rest) : alias.target, rest);
        if (hit) return hit;
    }
    return null;
}

/**
 * Package part of a bare specifier: "lodash/fp" -> "lodash",
 * "@scope/pkg/sub" -> "@scope/pkg".
 */
export function packageNameOf(specifier: string): string {
    const parts = specifier.split('/');
    if (specifier.startsWith('@') && parts.length > 1) {
        return `${parts[0]}/${parts[1]}`;
    }
    return parts[0] ?? specifier;
}

/** Inside the root, but not among the walked files */
function isExcluded(name: string, ctx: ResolveContext): boolean {
    return ctx.knownFiles !== undefined && !ctx.knownFiles.has(name);
}

function fileResolution(absPath: string, ctx: ResolveContext): Resolution | null {
    const name = toRootRelative(ctx.root, absPath);
    if (name === null || name === '' || isExcluded(name, ctx)) return null;
    return { name, kind: isSourceExtension(extensionOf(absPath)) ? 'file' : 'asset' };
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Resolve `specifier` as imported from a file in `fromDir` (absolute).
 * Returns null when a relative specifier matches nothing or only a file
 * outside the root, and when either kind of specifier reaches a file left
 * out of `knownFiles`; such imports are dropped without a diagnostic.
 */
export function resolveSpecifier(specifier: string, fromDir: string, ctx: ResolveContext): Resolution | null {
    if (specifier.startsWith('.')) {
        const hit = resolveRelative(specifier, fromDir);
        return hit ? fileResolution(hit, ctx) : null;
    }

    const aliased = resolveAlias(specifier, ctx.aliases);
    if (aliased) {
        const resolution = fileResolution(aliased, ctx);
        if (resolution) return resolution;
        // An ignored file is still the target; it must not turn external
        const name = toRootRelative(ctx.root, aliased);
        if (name !== null && name !== '' && isExcluded(name, ctx)) return null;
    }

    if (isBuiltin(specifier)) {
        return { name: stripNodeScheme(specifier), kind: 'builtin' };
    }

    const packageName = packageNameOf(specifier);
    if (ctx.workspacePackages.has(packageName)) {
        return { name: packageName, kind: 'package' };
    }

    return { name: specifier, kind: 'external' };
}
