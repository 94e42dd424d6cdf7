/**
 * Git provider - VcsProvider over the `git` executable.
 *
 * Every call is a synchronous child process run with `-C <root>`. Diff output
 * uses --relative so paths come back relative to the root even when the root
 * is a subdirectory of the work tree.
 */

import { spawnSync } from 'child_process';
import { ConfigError, DiffError, HistoricalReadError, RevisionError } from '../errors.js';
import type { ChangeStatus, ChangedFile, DiffTarget, VcsProvider } from './types.js';

const VALID_STATUSES: ReadonlySet<string> = new Set(['A', 'M', 'D', 'R', 'C', 'T', 'U', 'X']);

/** Settings that would otherwise let user config change patch text */
const PATCH_CONFIG = [
  '-c', 'core.quotePath=false',
  '-c', 'diff.noprefix=false',
  '-c', 'diff.mnemonicPrefix=false',
];

interface GitOutput {
  status: number;
  stdout: Buffer;
  stderr: string;
}

export class GitCliProvider implements VcsProvider {
  private constructor(private readonly root: string) {}

  /**
   * Open the repository containing `root`. Throws ConfigError when git is not
   * installed or `root` is not inside a work tree.
   */
  static open(root: string): GitCliProvider {
    const provider = new GitCliProvider(root);
    const result = provider.run(['rev-parse', '--is-inside-work-tree']);
    if (result.status !== 0 || result.stdout.toString('utf-8').trim() !== 'true') {
      throw new ConfigError(`Not a git repository: ${root}`);
    }
    return provider;
  }

  resolveCommit(ref: string): string {
    if (!ref || ref.startsWith('-')) {
      throw new RevisionError(`Invalid revision: ${ref}`, ref);
    }
    const result = this.run(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    const id = result.stdout.toString('utf-8').trim();
    if (result.status !== 0 || !id) {
      throw new RevisionError(`Unknown revision or not a commit: ${ref}`, ref, result.stderr);
    }
    return id;
  }

  headCommit(): string {
    const result = this.run(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
    const id = result.stdout.toString('utf-8').trim();
    if (result.status !== 0 || !id) {
      throw new RevisionError('HEAD does not point at a commit (empty repository?)', 'HEAD', result.stderr);
    }
    return id;
  }

  isAncestor(ancestor: string, descendant: string): boolean {
    const result = this.run(['merge-base', '--is-ancestor', ancestor, descendant]);
    if (result.status === 0) return true;
    if (result.status === 1) return false;
    throw new RevisionError(
      `Failed to check commit relationship between ${ancestor} and ${descendant}`,
      ancestor,
      result.stderr
    );
  }

  changedFiles(target: DiffTarget): ChangedFile[] {
    const args = ['diff', '--name-status', '-z', '--no-renames', '--relative', ...targetArgs(target)];
    const result = this.run(args);
    if (result.status !== 0) {
      throw new DiffError(`Git command failed: git ${args.join(' ')}`, `git ${args.join(' ')}`, result.stderr);
    }
    return parseNameStatus(result.stdout.toString('utf-8'));
  }

  diffText(target: DiffTarget): string {
    const args = [
      ...PATCH_CONFIG,
      'diff', '--no-color', '--no-ext-diff', '--no-renames', '--relative',
      ...targetArgs(target),
    ];
    const result = this.run(args);
    if (result.status !== 0) {
      throw new DiffError(`Git command failed: git ${args.join(' ')}`, `git ${args.join(' ')}`, result.stderr);
    }
    return result.stdout.toString('utf-8');
  }

  readBlob(commit: string, path: string): Uint8Array {
    // "./" makes the path relative to -C, not to the top of the work tree
    const result = this.run(['cat-file', 'blob', `${commit}:./${path}`]);
    if (result.status !== 0) {
      throw new HistoricalReadError(`File ${path} does not exist at revision ${commit}`, path, commit);
    }
    return result.stdout;
  }

  private run(args: string[]): GitOutput {
    const result = spawnSync('git', ['-C', this.root, ...args], {
      encoding: 'buffer',
      maxBuffer: 1024 * 1024 * 1024,
    });
    if (result.error) {
      throw new ConfigError(`Failed to run git: ${result.error.message}`);
    }
    return {
      status: result.status ?? -1,
      stdout: result.stdout,
      stderr: result.stderr.toString('utf-8'),
    };
  }
}

function targetArgs(target: DiffTarget): string[] {
  return target.kind === 'tree-to-tree' ? [target.from, target.to] : [target.from];
}

/**
 * Parse `git diff --name-status -z`: a status token followed by one path, or
 * two paths for renames and copies (R100, C075).
 */
export function parseNameStatus(output: string): ChangedFile[] {
  const tokens = output.split('\0');
  const files: ChangedFile[] = [];

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    i++;
    if (!token) continue;

    const status = token[0];
    if (!isChangeStatus(status)) continue;

    if (status === 'R' || status === 'C') {
      const oldPath = tokens[i];
      const newPath = tokens[i + 1];
      i += 2;
      if (oldPath === undefined || newPath === undefined) break;
      files.push({ status, oldPath, newPath });
      continue;
    }

    const path = tokens[i];
    i++;
    if (path === undefined) break;
    files.push({
      status,
      newPath: status === 'D' ? null : path,
      oldPath: status === 'A' ? null : path,
    });
  }

  return files;
}

function isChangeStatus(value: string | undefined): value is ChangeStatus {
  return value !== undefined && VALID_STATUSES.has(value);
}
