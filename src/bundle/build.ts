/**
 * Bundle builder - the full pipeline:
 *
 * 1. Resolve the commit range once (diff mode only)
 * 2. Walk and select files
 * 3. Assemble the bundle from disk or from the end revision
 *
 * No validation happens here; resolveRunOptions() does that for the CLI.
 * The version-control provider is injectable so tests can run without git.
 */

import { resolve } from 'path';
import type { DiffRange, SelectionCriteria } from '../selection/criteria.js';
import { hasKeywordRules } from '../selection/content-filter.js';
import { selectFiles, type AdmittedFile, type SkippedEntry } from '../selection/pipeline.js';
import { changedPathsFor, resolveDiff } from '../vcs/diff-scope.js';
import { GitCliProvider } from '../vcs/git.js';
import type { DiffTarget, VcsProvider } from '../vcs/types.js';
import { collectEntries, renderBundle, type BundleEntry } from './assembler.js';

export interface BuildOptions {
  criteria: SelectionCriteria;
  /** Restrict to files changed in `range` and append their patches */
  diffOnly?: boolean;
  range?: DiffRange;
  /** Defaults to the git CLI opened on `root` when one is needed */
  vcs?: VcsProvider;
  /** Verbose logging */
  verbose?: boolean;
}

export interface BuildResult {
  bundle: string;
  /** Content (and patch section) of each file, in bundle order */
  entries: BundleEntry[];
  /** Relative paths of the files in the bundle, in bundle order */
  files: string[];
  skipped: SkippedEntry[];
  timing: {
    diffMs: number;
    selectMs: number;
    assembleMs: number;
    totalMs: number;
  };
}

export function buildBundle(root: string, options: BuildOptions): BuildResult {
  const totalStart = Date.now();
  const { criteria, diffOnly = false, range = {}, verbose = false } = options;
  const absRoot = resolve(root);

  const needsVcs = diffOnly || range.end !== undefined;
  const vcs = options.vcs ?? (needsVcs ? GitCliProvider.open(absRoot) : undefined);

  // ── Step 1: Commit range ─────────────────────────────────────────────────
  let diffMs = 0;
  let target: DiffTarget | undefined;
  let changedPaths: ReadonlySet<string> | undefined;

  if (diffOnly && vcs) {
    const diffStart = Date.now();
    target = resolveDiff(vcs, range);
    changedPaths = changedPathsFor(vcs, target);
    diffMs = Date.now() - diffStart;

    if (verbose) {
      const to = target.kind === 'tree-to-tree' ? target.to.slice(0, 12) : 'working tree';
      console.log(`  Diff ${target.from.slice(0, 12)} -> ${to}: ${changedPaths.size} changed file(s) in ${diffMs}ms`);
    }
  }

  // ── Step 2: Select ───────────────────────────────────────────────────────
  const selectStart = Date.now();
  const selection = selectFiles(absRoot, criteria, { changedPaths });
  const selectMs = Date.now() - selectStart;

  if (verbose) {
    console.log(`  Rules: ${criteria.rules.join(', ')}`);
    if (hasKeywordRules(criteria.keywords)) {
      const { or, and, exclude } = criteria.keywords;
      console.log(`  Keywords: or=[${or.join(', ')}] and=[${and.join(', ')}] exclude=[${exclude.join(', ')}]`);
    }
    console.log(`  Selected ${selection.files.length} file(s) in ${selectMs}ms`);
    console.log(`  Skipped ${selection.skipped.length} file(s)`);
  }

  for (const entry of selection.skipped) {
    if (entry.reason === 'walk-error') {
      console.warn(`Warning: Could not read ${entry.path}: ${entry.detail ?? 'unknown error'}`);
    }
  }

  // ── Step 3: Assemble ─────────────────────────────────────────────────────
  const assembleStart = Date.now();
  const entries = collectEntries(selection.files, { diffOnly, range, vcs, target });
  const bundle = renderBundle(entries);
  const assembleMs = Date.now() - assembleStart;

  if (verbose) {
    console.log(`  Assembled ${(Buffer.byteLength(bundle, 'utf-8') / 1024).toFixed(1)}KB in ${assembleMs}ms`);
  }

  return {
    bundle,
    entries,
    files: selection.files.map((file: AdmittedFile) => file.relativePath),
    skipped: selection.skipped,
    timing: { diffMs, selectMs, assembleMs, totalMs: Date.now() - totalStart },
  };
}
