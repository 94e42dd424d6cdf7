/**
 * The narrow version-control contract the core depends on. GitCliProvider is
 * the real implementation; tests substitute an in-memory one.
 *
 * Paths going in and out are relative to the directory the provider was
 * opened on (the traversal root), '/'-separated.
 */

export type ChangeStatus = 'A' | 'M' | 'D' | 'R' | 'C' | 'T' | 'U' | 'X';

export interface ChangedFile {
  status: ChangeStatus;
  /** Path after the change; null for deletions */
  newPath: string | null;
  /** Path before the change; null for additions */
  oldPath: string | null;
}

/** Tree-to-tree or tree-to-working-tree comparison, endpoints as commit ids */
export type DiffTarget =
  | { kind: 'tree-to-workdir'; from: string }
  | { kind: 'tree-to-tree'; from: string; to: string };

export interface VcsProvider {
  /** Resolve a revision expression to a commit id, or throw RevisionError */
  resolveCommit(ref: string): string;
  /** Commit id HEAD points at, or throw RevisionError */
  headCommit(): string;
  /** True when `ancestor` is reachable from `descendant` (or equal to it) */
  isAncestor(ancestor: string, descendant: string): boolean;
  /** Per-file deltas in the engine's natural order; throws DiffError */
  changedFiles(target: DiffTarget): ChangedFile[];
  /** Patch text for the whole comparison; throws DiffError */
  diffText(target: DiffTarget): string;
  /** File bytes at a commit; throws HistoricalReadError when the path is absent there */
  readBlob(commit: string, path: string): Uint8Array;
}
