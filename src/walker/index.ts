export { walkFiles } from './walker';
export type { WalkOptions } from './walker';
export { IgnoreRules, ALWAYS_IGNORED, parseIgnoreFile } from './ignore-rules';
