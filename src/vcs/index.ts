export { GitCliProvider, parseNameStatus } from './git.js';
export { resolveTree, resolveDiff, resolveChangedPaths, unifiedDiff, changedPathsFor } from './diff-scope.js';
export { fragmentFor } from './diff-attributor.js';
export type { VcsProvider, DiffTarget, ChangedFile, ChangeStatus } from './types.js';
