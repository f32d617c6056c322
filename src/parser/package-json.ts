/**
 * package.json support
 *
 * A manifest is not a graph node itself. It contributes edges that start at
 * its package:
 *   - Package(name) -> the file its `main` entry resolves to
 *   - Package(name) -> every dependency and devDependency, as a Package when
 *     the version uses the `workspace:` protocol, otherwise as External
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { LogSink } from '../common/logger';
import { errorMessage } from '../common/errors';
import { normalizePath } from '../common/paths';
import { RawEdge } from '../graph/types';
import { MANIFEST_FILENAME } from './config';
import { ExtractionContext, Extractor } from './interfaces';

// ============================================================================
// Manifest reader
// ============================================================================

const DependencyMapSchema = z.record(z.string());

export const PackageManifestSchema = z.object({
    name: z.string().min(1).optional(),
    main: z.string().optional(),
    dependencies: DependencyMapSchema.optional(),
    devDependencies: DependencyMapSchema.optional(),
}).passthrough();

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

export const WORKSPACE_PROTOCOL = 'workspace:';

export function isWorkspaceVersion(version: string): boolean {
    return version.startsWith(WORKSPACE_PROTOCOL);
}

/**
 * Parse and validate a manifest. Unreadable files, invalid JSON and
 * unexpected field types all give null with a warning.
 */
export async function readPackageManifest(filePath: string, log: LogSink): Promise<PackageManifest | null> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
        log.warn('Failed to read package manifest', { path: filePath, error: errorMessage(error) });
        return null;
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        log.warn('Failed to parse package manifest', { path: filePath, error: errorMessage(error) });
        return null;
    }

    const parsed = PackageManifestSchema.safeParse(json);
    if (!parsed.success) {
        log.warn('Invalid package manifest', {
            path: filePath,
            error: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
        });
        return null;
    }
    return parsed.data;
}

/**
 * dependencies followed by devDependencies; a name listed in both appears
 * once, with the devDependencies version.
 */
export function manifestDependencies(manifest: PackageManifest): Array<[string, string]> {
    const merged = new Map<string, string>();
    for (const [name, version] of Object.entries(manifest.dependencies ?? {})) merged.set(name, version);
    for (const [name, version] of Object.entries(manifest.devDependencies ?? {})) merged.set(name, version);
    return Array.from(merged.entries());
}

// ============================================================================
// Extractor
// ============================================================================

function isInstalledPackage(filePath: string): boolean {
    return normalizePath(filePath).split('/').includes('node_modules');
}

/**
 * `main` as a relative specifier. "." names the package directory, so it
 * becomes "./" and goes straight to the index file.
 */
export function mainSpecifier(main: string): string {
    if (main === '.') return './';
    return main.startsWith('.') ? main : `./${main}`;
}

export class PackageJsonExtractor implements Extractor {
    readonly name = 'package-json';
    readonly fileNode = false;

    canHandle(filePath: string): boolean {
        return path.basename(filePath) === MANIFEST_FILENAME && !isInstalledPackage(filePath);
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const manifest = await readPackageManifest(filePath, ctx.logger);
        if (!manifest?.name) return [];
        const name = manifest.name;

        const edges: RawEdge[] = [];
        if (manifest.main) {
            edges.push({
                from: name,
                fromKind: 'package',
                to: mainSpecifier(manifest.main),
                kind: 'regular',
                resolveFrom: path.dirname(filePath),
            });
        }
        for (const [dependency, version] of manifestDependencies(manifest)) {
            edges.push({
                from: name,
                fromKind: 'package',
                to: dependency,
                toKind: isWorkspaceVersion(version) ? 'package' : 'external',
                kind: 'regular',
            });
        }
        return edges;
    }
}
