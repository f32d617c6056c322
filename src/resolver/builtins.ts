import { builtinModules } from 'module';

const NODE_SCHEME = 'node:';

const BUILTINS = new Set(builtinModules.map(name => stripNodeScheme(name)));

export function stripNodeScheme(specifier: string): string {
    return specifier.startsWith(NODE_SCHEME) ? specifier.slice(NODE_SCHEME.length) : specifier;
}

/**
 * Whether a specifier names a Node.js core module. Anything written with the
 * `node:` scheme is one, including modules such as `node:test` that only
 * exist under the scheme.
 */
export function isBuiltin(specifier: string): boolean {
    return specifier.startsWith(NODE_SCHEME) || BUILTINS.has(specifier);
}
