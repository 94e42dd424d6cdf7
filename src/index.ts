/**
 * dirpack - library entry point.
 */

export * from './errors.js';
export * from './selection/index.js';
export * from './vcs/index.js';
export * from './bundle/index.js';
export * from './summary/index.js';
export { loadConfig, CONFIG_TEMPLATE } from './config/config.js';
export type { CliConfig } from './config/config.js';
export {
    resolveRunOptions,
    validateSuffixes,
    validateKeywords,
    validateGitFlags,
    validateRange,
    validatePathFilters,
    validateSummaryFlags,
    MAX_SUFFIX_LENGTH,
    MAX_KEYWORD_LENGTH,
} from './config/validate.js';
export type { RawRunOptions, RunOptions } from './config/validate.js';
export { runBundleCommand, toRawRunOptions } from './commands/bundle.js';
export type { BundleFlags, BundleCommandDeps, BundleCommandResult } from './commands/bundle.js';
