/**
 * Bundle Assembler - renders the admitted files into the final text.
 *
 *   File Paths:
 *   <path per line>
 *
 *   File Contents:
 *
 *   File: <path>
 *   <content>
 *
 *   Diff:            (diff mode only)
 *   <fragment>
 *
 * Content comes from the end revision of the range when one is given, else
 * from disk. Any read or diff failure aborts; there is no partial bundle.
 */

import { ConfigError } from '../errors.js';
import type { DiffRange } from '../selection/criteria.js';
import type { AdmittedFile } from '../selection/pipeline.js';
import { decodeUtf8, readTextFile } from '../selection/content-filter.js';
import { resolveDiff, resolveTree } from '../vcs/diff-scope.js';
import { fragmentFor } from '../vcs/diff-attributor.js';
import type { DiffTarget, VcsProvider } from '../vcs/types.js';

export const PATHS_HEADER = 'File Paths:';
export const CONTENTS_HEADER = 'File Contents:';

export interface AssembleOptions {
  /** Append each file's patch for the range under "Diff:" */
  diffOnly?: boolean;
  range?: DiffRange;
  /** Required in diff mode and whenever the range has an end revision */
  vcs?: VcsProvider;
  /** Already-resolved comparison for `range`, to avoid resolving twice */
  target?: DiffTarget;
}

export interface BundleEntry {
  relativePath: string;
  absolutePath: string;
  content: string;
  /** The file's section of the patch; null outside diff mode */
  fragment: string | null;
}

/** Read every admitted file (and in diff mode its patch section) in order. */
export function collectEntries(files: readonly AdmittedFile[], options: AssembleOptions = {}): BundleEntry[] {
  const { diffOnly = false, range = {} } = options;
  const vcs = options.vcs;

  if ((diffOnly || range.end !== undefined) && !vcs) {
    throw new ConfigError('A version control provider is required for diff mode or an end revision');
  }

  const endCommit = vcs && range.end !== undefined ? resolveTree(vcs, range.end) : null;

  let diffText: string | null = null;
  const patch = (): string => {
    if (diffText === null && vcs) {
      diffText = vcs.diffText(options.target ?? resolveDiff(vcs, range));
    }
    return diffText ?? '';
  };

  return files.map(file => {
    const content = endCommit !== null && vcs
      ? decodeUtf8(vcs.readBlob(endCommit, file.relativePath), file.relativePath)
      : readTextFile(file.absolutePath, file.relativePath);

    return {
      relativePath: file.relativePath,
      absolutePath: file.absolutePath,
      content,
      fragment: diffOnly ? fragmentFor(patch(), file.relativePath) : null,
    };
  });
}

export function renderPathList(paths: readonly string[]): string {
  return `${PATHS_HEADER}\n${paths.map(path => `${path}\n`).join('')}\n`;
}

export function renderBundle(entries: readonly BundleEntry[]): string {
  const parts: string[] = [renderPathList(entries.map(entry => entry.relativePath)), `${CONTENTS_HEADER}\n\n`];

  for (const entry of entries) {
    parts.push(`File: ${entry.relativePath}\n`);
    parts.push(`${entry.content}\n`);

    if (entry.fragment !== null) {
      parts.push(`\nDiff:\n${entry.fragment}\n`);
    }

    parts.push('\n');
  }

  return parts.join('');
}

export function assembleBundle(files: readonly AdmittedFile[], options: AssembleOptions = {}): string {
  return renderBundle(collectEntries(files, options));
}
