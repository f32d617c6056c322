/**
 * depscope library entry
 *
 * Typical use:
 *
 *   const files = await walkFiles(root);
 *   const graph = await buildDependencyGraph(files, { root });
 *   pruneUnconnected(graph);
 *   const dot = renderDot(filterGraph(graph, INCLUDE_ALL));
 */

export * from './graph';
export * from './walker';
export * from './resolver';
export * from './parser';
export * from './output';
export * from './common';
export {
    loadConfig,
    defaultConfig,
    mergeConfig,
    configFromEnv,
    configFromFile,
    validateOverrides,
    ConfigOverridesSchema,
    CONFIG_FILENAME,
    ENV_VARS,
} from './config/config';
export type { DepscopeConfig, ConfigOverrides, LoadConfigOptions } from './config/config';
export { run, parseArgs, generate, formatSummary } from './cli/cli';
