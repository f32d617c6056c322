/**
 * Ignore-Aware Walker
 *
 * Depth-first enumeration of the files under a root, honoring the
 * .gitignore of every directory on the way down plus caller patterns.
 */

import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import { LogSink, silentLogger } from '../common/logger';
import { RootEnumerationError, errorCode, errorMessage } from '../common/errors';
import { normalizePath } from '../common/paths';
import { IGNORE_FILENAME } from '../parser/config';
import { IgnoreRules } from './ignore-rules';

export interface WalkOptions {
    /** Extra gitignore-style patterns anchored at the root */
    ignorePatterns?: readonly string[];
    logger?: LogSink;
}

/**
 * List every non-ignored file under `root` as absolute paths.
 *
 * A missing root yields an empty list. A root that exists but cannot be
 * listed throws RootEnumerationError. Anything that goes wrong below the
 * root is logged and skipped.
 */
export async function walkFiles(root: string, options: WalkOptions = {}): Promise<string[]> {
    const log = options.logger ?? silentLogger;
    const absRoot = path.resolve(root);

    let rootStat: Stats;
    try {
        rootStat = await fs.stat(absRoot);
    } catch (error) {
        if (errorCode(error) === 'ENOENT') {
            log.info('Root does not exist, nothing to walk', { root: absRoot });
            return [];
        }
        throw new RootEnumerationError(absRoot, { cause: error });
    }
    if (!rootStat.isDirectory()) {
        throw new RootEnumerationError(absRoot);
    }

    let rootEntries: Dirent[];
    try {
        rootEntries = await fs.readdir(absRoot, { withFileTypes: true });
    } catch (error) {
        throw new RootEnumerationError(absRoot, { cause: error });
    }

    const rules = new IgnoreRules(options.ignorePatterns ?? []);
    const files: string[] = [];
    await visitDirectory(absRoot, '', rootEntries, rules, files, log);
    log.debug('Walk complete', { root: absRoot, files: files.length, scopes: rules.scopeCount });
    return files;
}

async function visitDirectory(
    absDir: string,
    relDir: string,
    entries: Dirent[],
    rules: IgnoreRules,
    files: string[],
    log: LogSink
): Promise<void> {
    const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    if (sorted.some(e => e.name === IGNORE_FILENAME && !e.isDirectory())) {
        await loadIgnoreFile(absDir, relDir, rules, log);
    }

    for (const entry of sorted) {
        const absPath = path.join(absDir, entry.name);
        const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

        const kind = await entryKind(entry, absPath, log);
        if (kind === null) continue;

        let ignored: boolean;
        try {
            ignored = rules.isIgnored(relPath, kind === 'dir');
        } catch (error) {
            // The matcher rejects some legal names, e.g. "..."
            log.warn('Skipping entry that cannot be matched', { path: relPath, error: errorMessage(error) });
            continue;
        }
        if (ignored) continue;

        if (kind === 'file') {
            files.push(absPath);
            continue;
        }

        let children: Dirent[];
        try {
            children = await fs.readdir(absPath, { withFileTypes: true });
        } catch (error) {
            log.warn('Skipping unreadable directory', { path: normalizePath(relPath), error: errorMessage(error) });
            continue;
        }
        await visitDirectory(absPath, relPath, children, rules, files, log);
    }
}

/**
 * 'file', 'dir', or null for entries that are neither (or that vanished).
 * Symlinks count as what they point at, but linked directories are not
 * followed.
 */
async function entryKind(entry: Dirent, absPath: string, log: LogSink): Promise<'file' | 'dir' | null> {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'dir';
    if (!entry.isSymbolicLink()) return null;

    try {
        const stat = await fs.stat(absPath);
        return stat.isFile() ? 'file' : null;
    } catch (error) {
        log.warn('Skipping entry that cannot be read', { path: absPath, error: errorMessage(error) });
        return null;
    }
}

async function loadIgnoreFile(absDir: string, relDir: string, rules: IgnoreRules, log: LogSink): Promise<void> {
    const file = path.join(absDir, IGNORE_FILENAME);
    try {
        rules.forDirectory(relDir, await fs.readFile(file, 'utf8'));
    } catch (error) {
        log.warn('Skipping unreadable ignore file', { path: file, error: errorMessage(error) });
    }
}
