/**
 * depscope configuration
 *
 * Priority (highest first):
 * 1. Command-line flags
 * 2. Environment variables
 * 3. depscope.config.json in the project root
 * 4. Defaults
 *
 * List settings (ignoreNodes, ignorePatterns) accumulate across sources
 * instead of replacing each other.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../common/errors';
import { LogLevel } from '../common/logger';
import { IncludeKinds } from '../graph/analysis';
import { defaultWorkerCount } from '../graph/builder';
import { OUTPUT_FORMATS, OutputFormat } from '../output';

export const CONFIG_FILENAME = 'depscope.config.json';

const INCLUDE_KEYS: ReadonlyArray<keyof IncludeKinds> = ['external', 'builtins', 'folders', 'assets', 'packages'];

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

/**
 * Environment variables read by loadConfig:
 *
 * - DEPSCOPE_WORKERS: extraction concurrency
 * - DEPSCOPE_FORMAT: dot | json
 * - DEPSCOPE_OUTPUT: output file
 * - LOG_LEVEL: debug | info | warn | error
 * - CI: when set, colour defaults to off
 */
export const ENV_VARS = {
    WORKERS: 'DEPSCOPE_WORKERS',
    FORMAT: 'DEPSCOPE_FORMAT',
    OUTPUT: 'DEPSCOPE_OUTPUT',
    LOG_LEVEL: 'LOG_LEVEL',
} as const;

// ============================================================================
// Schema
// ============================================================================

const IncludeSchema = z.object({
    external: z.boolean(),
    builtins: z.boolean(),
    folders: z.boolean(),
    assets: z.boolean(),
    packages: z.boolean(),
}).partial().strict();

/**
 * One configuration source. Every field is optional; unknown fields are
 * rejected so typos surface.
 */
export const ConfigOverridesSchema = z.object({
    root: z.string().min(1),
    output: z.string().min(1),
    format: z.enum(OUTPUT_FORMATS),
    workers: z.number().int().positive(),
    prune: z.boolean(),
    include: IncludeSchema,
    ignoreNodes: z.array(z.string()),
    ignorePatterns: z.array(z.string()),
    verbose: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
    color: z.boolean(),
}).partial().strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

export interface DepscopeConfig {
    root: string;
    output: string;
    format: OutputFormat;
    workers: number;
    prune: boolean;
    include: IncludeKinds;
    ignoreNodes: string[];
    ignorePatterns: string[];
    verbose: boolean;
    logLevel: LogLevel;
    color: boolean;
}

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): DepscopeConfig {
    return {
        root: '.',
        output: 'out.dot',
        format: 'dot',
        workers: defaultWorkerCount(),
        prune: false,
        include: {
            external: true,
            builtins: true,
            folders: false,
            assets: true,
            packages: true,
        },
        ignoreNodes: [],
        ignorePatterns: [],
        verbose: false,
        logLevel: 'info',
        color: !env.CI,
    };
}

/**
 * Validate one source. The error names the first offending field and where
 * it came from.
 */
export function validateOverrides(input: unknown, source: string): ConfigOverrides {
    const parsed = ConfigOverridesSchema.safeParse(input);
    if (parsed.success) return parsed.data;

    const issue = parsed.error.issues[0];
    if (!issue) throw new ConfigError(source, 'invalid value');
    const unknownKeys = issue.code === 'unrecognized_keys' ? issue.keys : [];
    const field = [...issue.path, ...unknownKeys].join('.') || source;
    throw new ConfigError(field, `${issue.message} (from ${source})`);
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Settings from the environment. Only variables that are set contribute.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const raw: Record<string, unknown> = {};
    const workers = env[ENV_VARS.WORKERS];
    if (workers !== undefined && workers !== '') raw.workers = Number(workers);
    const format = env[ENV_VARS.FORMAT];
    if (format) raw.format = format;
    const output = env[ENV_VARS.OUTPUT];
    if (output) raw.output = output;
    const logLevel = env[ENV_VARS.LOG_LEVEL];
    if (logLevel) raw.logLevel = logLevel;
    return validateOverrides(raw, 'environment');
}

/**
 * `<root>/depscope.config.json`, or no settings when the file is absent.
 */
export function configFromFile(root: string): ConfigOverrides {
    const file = path.join(root, CONFIG_FILENAME);
    if (!fs.existsSync(file)) return {};

    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
        throw new ConfigError(CONFIG_FILENAME, errorMessage(error));
    }
    return validateOverrides(json, CONFIG_FILENAME);
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Apply sources over a base, lowest priority first.
 */
export function mergeConfig(base: DepscopeConfig, ...layers: ConfigOverrides[]): DepscopeConfig {
    const result: DepscopeConfig = {
        ...base,
        include: { ...base.include },
        ignoreNodes: [...base.ignoreNodes],
        ignorePatterns: [...base.ignorePatterns],
    };
    for (const layer of layers) {
        if (layer.root !== undefined) result.root = layer.root;
        if (layer.output !== undefined) result.output = layer.output;
        if (layer.format !== undefined) result.format = layer.format;
        if (layer.workers !== undefined) result.workers = layer.workers;
        if (layer.prune !== undefined) result.prune = layer.prune;
        if (layer.verbose !== undefined) result.verbose = layer.verbose;
        if (layer.logLevel !== undefined) result.logLevel = layer.logLevel;
        if (layer.color !== undefined) result.color = layer.color;
        for (const key of INCLUDE_KEYS) {
            const value = layer.include?.[key];
            if (value !== undefined) result.include[key] = value;
        }
        if (layer.ignoreNodes) result.ignoreNodes.push(...layer.ignoreNodes);
        if (layer.ignorePatterns) result.ignorePatterns.push(...layer.ignorePatterns);
    }
    if (result.verbose) result.logLevel = 'debug';
    return result;
}

export interface LoadConfigOptions {
    cli?: ConfigOverrides;
    env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the effective configuration. The project root comes from the
 * command line (or the default) and decides where the config file is read.
 */
export function loadConfig(options: LoadConfigOptions = {}): DepscopeConfig {
    const env = options.env ?? process.env;
    const cli = validateOverrides(options.cli ?? {}, 'command line');
    const defaults = defaultConfig(env);
    const root = path.resolve(cli.root ?? defaults.root);

    const merged = mergeConfig(defaults, configFromFile(root), configFromEnv(env), cli);
    return { ...merged, root };
}
