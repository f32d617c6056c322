/**
 * Ignore Rules
 *
 * Cascading gitignore matcher. Patterns are grouped in scopes, one per
 * directory that declared them; a scope only sees paths below its directory,
 * expressed relative to it. Deeper scopes decide first, so a `!pattern` in a
 * nested .gitignore re-includes what an ancestor ignored.
 */

import ignore from 'ignore';
import type { Ignore } from 'ignore';

interface IgnoreScope {
    /** Root-relative directory the patterns are anchored to ('' = root) */
    base: string;
    depth: number;
    matcher: Ignore;
}

/** Version control metadata is never walked */
export const ALWAYS_IGNORED = ['.git'];

function depthOf(base: string): number {
    return base === '' ? 0 : base.split('/').length;
}

/**
 * Split ignore-file text into pattern lines. Blank lines and comments are
 * left to the matcher, which skips them.
 */
export function parseIgnoreFile(content: string): string[] {
    return content.split(/\r?\n/);
}

export class IgnoreRules {
    private scopes: IgnoreScope[] = [];

    constructor(seedPatterns: readonly string[] = []) {
        this.add('', [...ALWAYS_IGNORED, ...seedPatterns]);
    }

    /**
     * Add patterns anchored at a root-relative directory. Patterns for a
     * directory that already has a scope are appended to it, after the
     * existing ones.
     */
    add(base: string, patterns: readonly string[]): void {
        const existing = this.scopes.find(s => s.base === base);
        if (existing) {
            existing.matcher.add([...patterns]);
            return;
        }
        const scope: IgnoreScope = {
            base,
            depth: depthOf(base),
            matcher: ignore({ ignorecase: false }).add([...patterns]),
        };
        this.scopes.push(scope);
        this.scopes.sort((a, b) => b.depth - a.depth);
    }

    /**
     * Parse the text of `<base>/.gitignore` into a scope for that directory.
     */
    forDirectory(base: string, content: string): void {
        this.add(base, parseIgnoreFile(content));
    }

    get scopeCount(): number {
        return this.scopes.length;
    }

    /**
     * Decide a root-relative path. The full path is tried first, then each
     * parent directory; the first scope with an opinion wins.
     */
    isIgnored(relPath: string, isDir: boolean): boolean {
        if (relPath === '') return false;
        let candidate = relPath;
        let candidateIsDir = isDir;

        for (;;) {
            const decision = this.decide(candidate, candidateIsDir);
            if (decision !== undefined) return decision;

            const slash = candidate.lastIndexOf('/');
            if (slash < 0) return false;
            candidate = candidate.slice(0, slash);
            candidateIsDir = true;
        }
    }

    private decide(candidate: string, isDir: boolean): boolean | undefined {
        for (const scope of this.scopes) {
            if (scope.base !== '' && !candidate.startsWith(scope.base + '/')) continue;
            const local = scope.base === '' ? candidate : candidate.slice(scope.base.length + 1);
            const result = scope.matcher.test(isDir ? `${local}/` : local);
            if (result.ignored) return true;
            if (result.unignored) return false;
        }
        return undefined;
    }
}
