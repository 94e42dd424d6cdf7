import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildBundle } from '../../../src/bundle/build.js';
import { createCriteria } from '../../../src/selection/criteria.js';
import { WalkError } from '../../../src/errors.js';
import { createFixture, removeFixture, writeFiles } from '../../helpers/fixture.js';
import { FakeVcs, modified } from '../../helpers/fake-vcs.js';

describe('buildBundle', () => {
  let root: string;

  beforeEach(() => {
    root = createFixture('build');
    writeFiles(root, {
      'src/a.ts': 'a',
      'src/b.ts': 'b',
      'notes.md': 'n',
    });
  });

  afterEach(() => {
    removeFixture(root);
    vi.restoreAllMocks();
  });

  it('selects and assembles', () => {
    const result = buildBundle(root, { criteria: createCriteria({ rules: ['ts'] }) });
    expect(result.files).toEqual(['src/a.ts', 'src/b.ts']);
    expect(result.bundle).toBe(
      'File Paths:\nsrc/a.ts\nsrc/b.ts\n\nFile Contents:\n\nFile: src/a.ts\na\n\nFile: src/b.ts\nb\n\n'
    );
    expect(result.skipped).toEqual([]);
  });

  it('produces byte-identical bundles for an unchanged tree', () => {
    writeFiles(root, { 'z/last.ts': 'z', 'A.ts': 'A', 'src/nested/c.ts': 'c' });
    const criteria = createCriteria({ rules: ['ts', 'md'] });
    const first = buildBundle(root, { criteria }).bundle;
    const second = buildBundle(root, { criteria }).bundle;
    expect(second).toBe(first);
    expect(first).toBe(
      'File Paths:\nA.ts\nnotes.md\nsrc/a.ts\nsrc/b.ts\nsrc/nested/c.ts\nz/last.ts\n\nFile Contents:\n\n' +
      'File: A.ts\nA\n\nFile: notes.md\nn\n\nFile: src/a.ts\na\n\nFile: src/b.ts\nb\n\n' +
      'File: src/nested/c.ts\nc\n\nFile: z/last.ts\nz\n\n'
    );
  });

  it('produces byte-identical diff bundles for an unchanged range', () => {
    const patch = 'diff --git a/src/a.ts b/src/a.ts\n+a\ndiff --git a/src/b.ts b/src/b.ts\n+b\n';
    const build = () => buildBundle(root, {
      criteria: createCriteria({ rules: ['ts'] }),
      diffOnly: true,
      range: { start: 'c1' },
      vcs: new FakeVcs([{ id: 'c1' }], [modified('src/b.ts'), modified('src/a.ts')], patch),
    }).bundle;
    expect(build()).toBe(build());
  });

  it('resolves the range once and shares it between selection and assembly', () => {
    const vcs = new FakeVcs([{ id: 'c1' }], [modified('src/b.ts')], 'diff --git a/src/b.ts b/src/b.ts\n+b\n');
    const result = buildBundle(root, {
      criteria: createCriteria({ rules: ['ts'] }),
      diffOnly: true,
      range: { start: 'c1' },
      vcs,
    });
    expect(result.files).toEqual(['src/b.ts']);
    expect(result.bundle).toBe(
      'File Paths:\nsrc/b.ts\n\nFile Contents:\n\n' +
      'File: src/b.ts\nb\n\nDiff:\ndiff --git a/src/b.ts b/src/b.ts\n+b\n\n'
    );
    expect(vcs.calls.changedFiles).toEqual([{ kind: 'tree-to-workdir', from: 'c1' }]);
    expect(vcs.calls.diffText).toEqual([{ kind: 'tree-to-workdir', from: 'c1' }]);
  });

  it('produces the empty bundle when nothing changed', () => {
    const vcs = new FakeVcs([{ id: 'c1' }]);
    const result = buildBundle(root, {
      criteria: createCriteria({ rules: ['*'] }),
      diffOnly: true,
      range: { start: 'c1' },
      vcs,
    });
    expect(result.bundle).toBe('File Paths:\n\nFile Contents:\n\n');
    expect(vcs.calls.diffText).toEqual([]);
  });

  it('reports timing for each stage', () => {
    const { timing } = buildBundle(root, { criteria: createCriteria({ rules: ['md'] }) });
    expect(timing.diffMs).toBe(0);
    expect(timing.totalMs).toBeGreaterThanOrEqual(timing.selectMs + timing.assembleMs);
  });

  it('logs progress when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    buildBundle(root, {
      criteria: createCriteria({ rules: ['ts'], orKeywords: ['a'] }),
      verbose: true,
    });
    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines).toContain('  Rules: ts');
    expect(lines).toContain('  Keywords: or=[a] and=[] exclude=[]');
    expect(lines).toContain('  Skipped 1 file(s)');
  });

  it('stays quiet by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    buildBundle(root, { criteria: createCriteria({ rules: ['ts'] }) });
    expect(log).not.toHaveBeenCalled();
  });

  it('fails for a missing root', () => {
    expect(() => buildBundle(`${root}-missing`, { criteria: createCriteria({ rules: ['ts'] }) })).toThrow(WalkError);
  });
});
