/**
 * Diff Scope - turns a commit range into the comparison git should run, then
 * answers "which files changed" and "what is the patch" from that one handle.
 */

import type { DiffRange } from '../selection/criteria.js';
import type { DiffTarget, VcsProvider } from './types.js';

/**
 * Resolve one revision to a commit id. RevisionError propagates for unknown
 * or non-commit revisions.
 */
export function resolveTree(vcs: VcsProvider, ref: string): string {
  return vcs.resolveCommit(ref);
}

/**
 * The four range shapes:
 *   (none, none)  HEAD  -> working tree
 *   (start, none) start -> working tree
 *   (start, end)  start -> end
 *   (none, end)   HEAD  -> end
 */
export function resolveDiff(vcs: VcsProvider, range: DiffRange = {}): DiffTarget {
  const from = range.start !== undefined ? resolveTree(vcs, range.start) : vcs.headCommit();
  if (range.end === undefined) {
    return { kind: 'tree-to-workdir', from };
  }
  return { kind: 'tree-to-tree', from, to: resolveTree(vcs, range.end) };
}

/** New-side paths of every delta; deletions have none and are left out. */
export function resolveChangedPaths(vcs: VcsProvider, range: DiffRange = {}): Set<string> {
  return changedPathsFor(vcs, resolveDiff(vcs, range));
}

export function unifiedDiff(vcs: VcsProvider, range: DiffRange = {}): string {
  return vcs.diffText(resolveDiff(vcs, range));
}

export function changedPathsFor(vcs: VcsProvider, target: DiffTarget): Set<string> {
  const paths = new Set<string>();
  for (const delta of vcs.changedFiles(target)) {
    if (delta.newPath !== null) paths.add(delta.newPath);
  }
  return paths;
}
