#!/usr/bin/env node
/**
 * depscope command line
 *
 * Usage:
 *   depscope [path] [options]
 *   depscope src --format json --output graph.json --prune
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, DepscopeError, errorMessage } from '../common/errors';
import { configureLogger, createLogger, isLogLevel } from '../common/logger';
import { ConfigOverrides, DepscopeConfig, loadConfig } from '../config/config';
import { countByKind, filterGraph, pruneUnconnected } from '../graph/analysis';
import { buildDependencyGraph } from '../graph/builder';
import { GraphView, NodeKind } from '../graph/types';
import { render } from '../output';
import { walkFiles } from '../walker/walker';

export interface ParsedArgs {
    overrides: ConfigOverrides;
    help: boolean;
}

/** Flags that switch one include setting on or off */
const INCLUDE_FLAGS: Record<string, [keyof NonNullable<ConfigOverrides['include']>, boolean]> = {
    '--include-external': ['external', true],
    '--no-external': ['external', false],
    '--include-builtins': ['builtins', true],
    '--no-builtins': ['builtins', false],
    '--include-folders': ['folders', true],
    '--no-folders': ['folders', false],
    '--include-assets': ['assets', true],
    '--no-assets': ['assets', false],
    '--include-packages': ['packages', true],
    '--no-packages': ['packages', false],
};

/**
 * Parse command line arguments (without the node and script entries).
 * Values are checked later, together with the other configuration sources.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
    const overrides: ConfigOverrides = {};
    let help = false;

    const valueOf = (option: string, index: number): string => {
        const value = args[index];
        if (value === undefined || value.startsWith('--')) {
            throw new ConfigError(option, 'missing value');
        }
        return value;
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';

        const include = INCLUDE_FLAGS[arg];
        if (include) {
            const [key, value] = include;
            overrides.include = { ...overrides.include, [key]: value };
            continue;
        }

        switch (arg) {
            case '--format':
            case '-f': {
                const format = valueOf(arg, ++i);
                if (format !== 'dot' && format !== 'json') {
                    throw new ConfigError('format', `expected dot or json, got "${format}"`);
                }
                overrides.format = format;
                break;
            }

            case '--output':
            case '-o':
                overrides.output = valueOf(arg, ++i);
                break;

            case '--workers':
            case '-j':
                overrides.workers = Number(valueOf(arg, ++i));
                break;

            case '--ignore':
                overrides.ignorePatterns = [...overrides.ignorePatterns ?? [], valueOf(arg, ++i)];
                break;

            case '--ignore-node':
                overrides.ignoreNodes = [...overrides.ignoreNodes ?? [], valueOf(arg, ++i)];
                break;

            case '--prune':
                overrides.prune = true;
                break;

            case '--verbose':
            case '-v':
                overrides.verbose = true;
                break;

            case '--log-level': {
                const level = valueOf(arg, ++i);
                if (!isLogLevel(level)) {
                    throw new ConfigError('logLevel', `unknown level "${level}"`);
                }
                overrides.logLevel = level;
                break;
            }

            case '--color':
                overrides.color = true;
                break;

            case '--no-color':
                overrides.color = false;
                break;

            case '--help':
            case '-h':
                help = true;
                break;

            default:
                if (arg.startsWith('-')) {
                    throw new ConfigError(arg, 'unknown option (use --help for usage)');
                }
                if (overrides.root !== undefined) {
                    throw new ConfigError('root', `more than one path given: ${overrides.root}, ${arg}`);
                }
                overrides.root = arg;
                break;
        }
    }

    return { overrides, help };
}

export const HELP_TEXT = `
depscope - dependency graph of a JS/TS source tree

USAGE:
  depscope [path] [OPTIONS]

OPTIONS:
  -f, --format <dot|json>   Output format (default: dot)
  -o, --output <file>       Output file (default: out.dot)
  -j, --workers <n>         Files scanned concurrently (default: CPU count)
  --prune                   Drop nodes without any edge
  --include-folders         Show folder nodes
  --no-external             Hide external packages
  --no-builtins             Hide Node.js core modules
  --no-assets               Hide non-source files
  --no-packages             Hide workspace packages
  --ignore <pattern>        Extra gitignore pattern (repeatable)
  --ignore-node <name>      Hide the node with this name (repeatable)
  -v, --verbose             Debug logging
  --log-level <level>       debug | info | warn | error
  --no-color                Plain log output
  -h, --help                Show this help

ENVIRONMENT:
  DEPSCOPE_WORKERS, DEPSCOPE_FORMAT, DEPSCOPE_OUTPUT, LOG_LEVEL
  CI                        Disables colour by default

A depscope.config.json in the project root is read as well; flags win
over environment variables, which win over the file.
`;

const KIND_LABELS: Array<[NodeKind, string]> = [
    ['file', 'File'],
    ['external', 'External'],
    ['builtin', 'Builtin'],
    ['folder', 'Folder'],
    ['asset', 'Asset'],
    ['package', 'Package'],
];

/**
 * One "Kind: n nodes & m edges" line per kind.
 */
export function formatSummary(view: GraphView): string[] {
    const counts = countByKind(view);
    return KIND_LABELS.map(([kind, label]) => `${label}: ${counts[kind].nodes} nodes & ${counts[kind].edges} edges`);
}

/**
 * Walk, build, analyse, render. Returns the view that was written.
 */
export async function generate(config: DepscopeConfig, cwd: string): Promise<GraphView> {
    const log = createLogger('depscope');

    const files = await log.time('Walk', () => walkFiles(config.root, {
        ignorePatterns: config.ignorePatterns,
        logger: log.child('walker'),
    }), { root: config.root });

    const graph = await log.time('Build graph', () => buildDependencyGraph(files, {
        root: config.root,
        workers: config.workers,
        logger: log.child('builder'),
    }), { files: files.length, workers: config.workers });

    if (config.prune) {
        const removed = pruneUnconnected(graph);
        log.debug('Pruned unconnected nodes', { removed });
    }

    const view = filterGraph(graph, config.include, config.ignoreNodes);
    const outputPath = path.resolve(cwd, config.output);
    await fs.writeFile(outputPath, render(view, config.format), 'utf8');
    return view;
}

export interface RunIO {
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    /** Where results go (default: stdout) */
    print?: (line: string) => void;
}

/**
 * Entry point shared by the binary and the tests. Resolves to the exit code.
 */
export async function run(args: readonly string[], io: RunIO = {}): Promise<number> {
    const print = io.print ?? ((line: string) => console.log(line));
    const env = io.env ?? process.env;
    const cwd = io.cwd ?? process.cwd();
    const log = createLogger('depscope');

    try {
        const { overrides, help } = parseArgs(args);
        if (help) {
            print(HELP_TEXT);
            return 0;
        }
        if (overrides.root !== undefined) {
            overrides.root = path.resolve(cwd, overrides.root);
        } else {
            overrides.root = cwd;
        }

        const config = loadConfig({ cli: overrides, env });
        configureLogger({ level: config.logLevel, color: config.color });
        log.debug('Configuration', { root: config.root, format: config.format, workers: config.workers });

        const view = await generate(config, cwd);
        print(`Saving ${config.format} file ${config.output}`);
        for (const line of formatSummary(view)) {
            print(line);
        }
        return 0;
    } catch (error) {
        if (error instanceof DepscopeError) {
            log.error(error.message, { code: error.code });
        } else {
            log.error('Failed', { error: errorMessage(error) });
        }
        return 1;
    }
}

if (require.main === module) {
    run(process.argv.slice(2)).then(
        code => { process.exitCode = code; },
        (error: unknown) => {
            console.error(errorMessage(error));
            process.exitCode = 1;
        }
    );
}
