export { resolveSpecifier, resolveRelative, resolveAlias, probeFile, packageNameOf } from './resolver';
export type { Resolution, ResolveContext } from './resolver';
export { loadAliases } from './aliases';
export type { AliasEntry } from './aliases';
export { isBuiltin, stripNodeScheme } from './builtins';
