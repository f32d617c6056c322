/**
 * Path alias table from the root tsconfig.json (`baseUrl` + `paths`).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as ts from 'typescript';
import { z } from 'zod';
import { LogSink, silentLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { TSCONFIG_FILENAME } from '../parser/config';

export interface AliasEntry {
    /** Specifier prefix with any trailing `/*` removed, e.g. "@app" */
    prefix: string;
    /** Absolute directory (or file) the prefix stands for */
    target: string;
}

const TsConfigSchema = z.object({
    compilerOptions: z.object({
        baseUrl: z.string().optional(),
        paths: z.record(z.array(z.string())).optional(),
    }).passthrough().optional(),
}).passthrough();

function trimWildcard(pattern: string): string {
    return pattern.endsWith('/*') ? pattern.slice(0, -2) : pattern;
}

/**
 * Read `<root>/tsconfig.json` into an ordered alias table. Only the first
 * target of each `paths` entry is used. Comments and trailing commas are
 * accepted. A missing file gives an empty table; an unreadable or malformed
 * one also does, with a warning.
 */
export function loadAliases(root: string, log: LogSink = silentLogger): AliasEntry[] {
    const configPath = path.join(root, TSCONFIG_FILENAME);
    if (!fs.existsSync(configPath)) return [];

    let text: string;
    try {
        text = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
        log.warn('Failed to read tsconfig.json', { path: configPath, error: errorMessage(error) });
        return [];
    }

    const configFile = ts.parseConfigFileTextToJson(configPath, text);
    if (configFile.error) {
        log.warn('Failed to parse tsconfig.json', {
            path: configPath,
            error: ts.flattenDiagnosticMessageText(configFile.error.messageText, '\n'),
        });
        return [];
    }

    const parsed = TsConfigSchema.safeParse(configFile.config ?? {});
    if (!parsed.success) {
        log.warn('Unexpected tsconfig.json shape', { path: configPath, error: parsed.error.message });
        return [];
    }

    const options = parsed.data.compilerOptions;
    if (!options?.paths) return [];

    const base = path.resolve(root, options.baseUrl ?? '.');
    const aliases: AliasEntry[] = [];
    for (const [pattern, targets] of Object.entries(options.paths)) {
        const first = targets[0];
        if (first === undefined) continue;
        aliases.push({
            prefix: trimWildcard(pattern),
            target: path.resolve(base, trimWildcard(first)),
        });
    }
    log.debug('Loaded path aliases', { count: aliases.length });
    return aliases;
}
