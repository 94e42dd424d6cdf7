import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { spawnSync } from 'child_process';
import { join } from 'path';
import { GitCliProvider, parseNameStatus } from '../../../src/vcs/git.js';
import { buildBundle } from '../../../src/bundle/build.js';
import { createCriteria } from '../../../src/selection/criteria.js';
import { ConfigError, HistoricalReadError, RevisionError } from '../../../src/errors.js';
import { createFixture, removeFixture, writeFiles } from '../../helpers/fixture.js';

// ─── Name-status parsing ────────────────────────────────────────────────────

describe('parseNameStatus', () => {
  it('parses single-path statuses', () => {
    expect(parseNameStatus('M\0a.ts\0A\0b.ts\0D\0c.ts\0')).toEqual([
      { status: 'M', newPath: 'a.ts', oldPath: 'a.ts' },
      { status: 'A', newPath: 'b.ts', oldPath: null },
      { status: 'D', newPath: null, oldPath: 'c.ts' },
    ]);
  });

  it('parses renames and copies with two paths', () => {
    expect(parseNameStatus('R100\0old.ts\0new.ts\0C075\0x.ts\0y.ts\0')).toEqual([
      { status: 'R', oldPath: 'old.ts', newPath: 'new.ts' },
      { status: 'C', oldPath: 'x.ts', newPath: 'y.ts' },
    ]);
  });

  it('keeps paths with spaces and unicode as-is', () => {
    expect(parseNameStatus('M\0dir with space/naïve.md\0')).toEqual([
      { status: 'M', newPath: 'dir with space/naïve.md', oldPath: 'dir with space/naïve.md' },
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseNameStatus('')).toEqual([]);
  });
});

// ─── Real git ───────────────────────────────────────────────────────────────

const gitAvailable = spawnSync('git', ['--version']).status === 0;

function git(cwd: string, ...args: string[]): string {
  const result = spawnSync(
    'git',
    ['-C', cwd, '-c', 'user.name=Test', '-c', 'user.email=test@example.com', '-c', 'commit.gpgsign=false', ...args],
    { encoding: 'utf-8' }
  );
  if (result.status !== 0) throw new Error(`git ${args.join(' ')} failed: ${result.stderr}`);
  return result.stdout.trim();
}

describe.skipIf(!gitAvailable)('GitCliProvider', () => {
  let repo: string;
  let c1: string;
  let c2: string;

  beforeAll(() => {
    repo = createFixture('git');
    git(repo, 'init', '-q');

    writeFiles(repo, { 'a.ts': 'one\n', 'b.md': 'doc\n' });
    git(repo, 'add', '.');
    git(repo, 'commit', '-q', '-m', 'first');
    c1 = git(repo, 'rev-parse', 'HEAD');

    writeFiles(repo, { 'a.ts': 'two\n', 'c.ts': 'new\n', 'sub/x.ts': 'x\n' });
    git(repo, 'add', '.');
    git(repo, 'commit', '-q', '-m', 'second');
    c2 = git(repo, 'rev-parse', 'HEAD');

    // uncommitted edits
    writeFiles(repo, { 'a.ts': 'three\n', 'b.md': 'doc2\n' });
  });

  afterAll(() => {
    removeFixture(repo);
  });

  it('refuses a directory outside any repository', () => {
    const plain = createFixture('not-a-repo');
    try {
      expect(() => GitCliProvider.open(plain)).toThrow(ConfigError);
    } finally {
      removeFixture(plain);
    }
  });

  it('resolves revisions to commit ids', () => {
    const vcs = GitCliProvider.open(repo);
    expect(vcs.resolveCommit('HEAD')).toBe(c2);
    expect(vcs.resolveCommit('HEAD~1')).toBe(c1);
    expect(vcs.headCommit()).toBe(c2);
  });

  it('rejects unknown and option-like revisions', () => {
    const vcs = GitCliProvider.open(repo);
    expect(() => vcs.resolveCommit('does-not-exist')).toThrow(RevisionError);
    expect(() => vcs.resolveCommit('--all')).toThrow(RevisionError);
  });

  it('checks ancestry', () => {
    const vcs = GitCliProvider.open(repo);
    expect(vcs.isAncestor(c1, c2)).toBe(true);
    expect(vcs.isAncestor(c2, c1)).toBe(false);
    expect(vcs.isAncestor(c2, c2)).toBe(true);
  });

  it('lists changes between two commits', () => {
    const vcs = GitCliProvider.open(repo);
    expect(vcs.changedFiles({ kind: 'tree-to-tree', from: c1, to: c2 })).toEqual([
      { status: 'M', newPath: 'a.ts', oldPath: 'a.ts' },
      { status: 'A', newPath: 'c.ts', oldPath: null },
      { status: 'A', newPath: 'sub/x.ts', oldPath: null },
    ]);
  });

  it('lists changes against the working tree', () => {
    const vcs = GitCliProvider.open(repo);
    expect(vcs.changedFiles({ kind: 'tree-to-workdir', from: c2 })).toEqual([
      { status: 'M', newPath: 'a.ts', oldPath: 'a.ts' },
      { status: 'M', newPath: 'b.md', oldPath: 'b.md' },
    ]);
  });

  it('reports paths relative to a subdirectory root', () => {
    const vcs = GitCliProvider.open(join(repo, 'sub'));
    expect(vcs.changedFiles({ kind: 'tree-to-tree', from: c1, to: c2 })).toEqual([
      { status: 'A', newPath: 'x.ts', oldPath: null },
    ]);
    expect(new TextDecoder().decode(vcs.readBlob(c2, 'x.ts'))).toBe('x\n');
  });

  it('produces a standard patch', () => {
    const vcs = GitCliProvider.open(repo);
    const patch = vcs.diffText({ kind: 'tree-to-tree', from: c1, to: c2 });
    expect(patch.startsWith('diff --git a/a.ts b/a.ts\n')).toBe(true);
    expect(patch).toContain('\n-one\n+two\n');
  });

  it('reads historical content', () => {
    const vcs = GitCliProvider.open(repo);
    expect(new TextDecoder().decode(vcs.readBlob(c1, 'a.ts'))).toBe('one\n');
    expect(() => vcs.readBlob(c1, 'c.ts')).toThrow(HistoricalReadError);
  });

  it('bundles changed files from the end revision', () => {
    const result = buildBundle(repo, {
      criteria: createCriteria({ rules: ['ts'] }),
      diffOnly: true,
      range: { start: c1, end: c2 },
    });
    expect(result.files).toEqual(['a.ts', 'c.ts', 'sub/x.ts']);
    expect(result.bundle.startsWith(
      'File Paths:\na.ts\nc.ts\nsub/x.ts\n\nFile Contents:\n\nFile: a.ts\ntwo\n\n\nDiff:\ndiff --git a/a.ts b/a.ts\n'
    )).toBe(true);
  });

  it('bundles working-tree content when no end is given', () => {
    const result = buildBundle(repo, {
      criteria: createCriteria({ rules: ['ts', 'md'] }),
      diffOnly: true,
      range: { start: c2 },
    });
    expect(result.files).toEqual(['a.ts', 'b.md']);
    expect(result.bundle).toContain('File: a.ts\nthree\n\n\nDiff:\ndiff --git a/a.ts b/a.ts\n');
  });
});
