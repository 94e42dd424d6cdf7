/**
 * Selection Pipeline - runs every walked entry through the admission steps in
 * a fixed order; the first failing step rejects the entry:
 *
 *   1. changed in the commit range (diff-scoped selection only)
 *   2. extension / name / wildcard rule
 *   3. exclude-path prefixes
 *   4. include-path prefixes
 *   5. keyword rules over the file's text
 *
 * Admitted files keep walker order. A file that cannot be read in step 5 fails
 * the whole selection.
 */

import { resolveChangedPaths } from '../vcs/diff-scope.js';
import type { VcsProvider } from '../vcs/types.js';
import type { DiffRange, SelectionCriteria } from './criteria.js';
import { matchesRule } from './path-matcher.js';
import { admitsContent, readTextFile } from './content-filter.js';
import { walk, type WalkEntry } from './walker.js';

export interface CandidateFile {
  /** Path relative to the traversal root, '/'-separated */
  relativePath: string;
  absolutePath: string;
}

export type AdmittedFile = CandidateFile;

export type SkipReason = 'walk-error' | 'excluded-path' | 'not-included-path' | 'keyword-filter';

export interface SkippedEntry {
  path: string;
  reason: SkipReason;
  detail?: string;
}

export interface SelectOptions {
  /** Only admit files changed in this range */
  diff?: { vcs: VcsProvider; range: DiffRange };
  /** Precomputed changed-path set; skips asking the provider again */
  changedPaths?: ReadonlySet<string>;
}

export interface SelectionResult {
  files: AdmittedFile[];
  /** Files rejected by path or keyword rules, and entries the walker could not read */
  skipped: SkippedEntry[];
}

export function selectFiles(
  root: string,
  criteria: SelectionCriteria,
  options: SelectOptions = {}
): SelectionResult {
  const files: AdmittedFile[] = [];
  const skipped: SkippedEntry[] = [];

  let changed: ReadonlySet<string> | null = options.changedPaths ?? null;
  if (!changed && options.diff) {
    changed = resolveChangedPaths(options.diff.vcs, options.diff.range);
  }

  const entries = walk(root, {
    respectGitignore: criteria.gitignore === 'respect',
    includeHidden: criteria.includeHidden,
    onError: issue => skipped.push({ path: issue.path, reason: 'walk-error', detail: issue.message }),
  });

  for (const entry of entries) {
    const reason = rejectReason(entry, criteria, changed);
    if (reason === null) {
      files.push({ relativePath: entry.relativePath, absolutePath: entry.absolutePath });
    } else if (reason !== 'silent') {
      skipped.push({ path: entry.relativePath, reason });
    }
  }

  return { files, skipped };
}

/**
 * null admits; 'silent' rejects without recording (directories, other
 * extensions and unchanged files would flood the skipped list).
 */
function rejectReason(
  entry: WalkEntry,
  criteria: SelectionCriteria,
  changed: ReadonlySet<string> | null
): SkipReason | 'silent' | null {
  if (changed && !changed.has(entry.relativePath)) return 'silent';

  if (!matchesRule(entry, criteria.rules)) return 'silent';

  if (criteria.excludePaths.some(prefix => entry.relativePath.startsWith(prefix))) {
    return 'excluded-path';
  }

  if (
    criteria.includePaths.length > 0 &&
    !criteria.includePaths.some(prefix => entry.relativePath.startsWith(prefix))
  ) {
    return 'not-included-path';
  }

  const content = readTextFile(entry.absolutePath, entry.relativePath);
  if (!admitsContent(content, criteria.keywords)) return 'keyword-filter';

  return null;
}
