import { describe, it, expect } from 'vitest';
import {
  cleanSummary,
  commentStyleFor,
  formatInstructions,
  isWellFormedSummary,
  stripSummaryBlock,
  withSummaryBlock,
} from '../../../src/summary/summary-block.js';

const BLOCK = { kind: 'block', open: '/*', close: '*/' } as const;
const HASH = { kind: 'line', prefix: '#' } as const;

describe('commentStyleFor', () => {
  it('maps extensions to comment styles', () => {
    expect(commentStyleFor('src/a.ts')).toEqual(BLOCK);
    expect(commentStyleFor('tools/run.py')).toEqual(HASH);
    expect(commentStyleFor('docs/index.html')).toEqual({ kind: 'block', open: '<!--', close: '-->' });
  });

  it('ignores extension case', () => {
    expect(commentStyleFor('src/A.TS')).toEqual(BLOCK);
  });

  it('returns null for files without a known extension', () => {
    expect(commentStyleFor('README')).toBeNull();
    expect(commentStyleFor('.bashrc')).toBeNull();
    expect(commentStyleFor('data.bin')).toBeNull();
  });
});

describe('formatInstructions', () => {
  it('describes the block layout', () => {
    expect(formatInstructions(BLOCK)).toBe(
      "\n\nUse this structure: line 1: '/*', line 2: '[DIRPACK]', then the summary, then '[/DIRPACK]', last line: '*/'."
    );
  });

  it('asks for the prefix on every line', () => {
    expect(formatInstructions(HASH)).toContain("line 2: '# [DIRPACK]'");
  });
});

describe('isWellFormedSummary', () => {
  it('accepts the block layout', () => {
    expect(isWellFormedSummary('/*\n[DIRPACK]\nDoes x.\n[/DIRPACK]\n*/', BLOCK)).toBe(true);
  });

  it('rejects a block without markers', () => {
    expect(isWellFormedSummary('/*\nDoes x.\n*/', BLOCK)).toBe(false);
    expect(isWellFormedSummary('/*\nDoes x.\nStill x.\n*/', BLOCK)).toBe(false);
  });

  it('accepts the line layout', () => {
    expect(isWellFormedSummary('#\n# [DIRPACK]\n# Prints.\n# [/DIRPACK]\n#', HASH)).toBe(true);
  });

  it('rejects a line layout with an unprefixed line', () => {
    expect(isWellFormedSummary('#\n# [DIRPACK]\nPrints.\n# [/DIRPACK]\n#', HASH)).toBe(false);
  });
});

describe('cleanSummary', () => {
  it('drops reasoning and code fences', () => {
    const raw = '<think>plan</think>\n```c\n/*\n[DIRPACK]\nx\n[/DIRPACK]\n*/\n```\n';
    expect(cleanSummary(raw)).toBe('/*\n[DIRPACK]\nx\n[/DIRPACK]\n*/');
  });

  it('trims plain text', () => {
    expect(cleanSummary('  Does x.\n')).toBe('Does x.');
  });
});

describe('stripSummaryBlock', () => {
  it('removes a leading block', () => {
    expect(stripSummaryBlock('/*\n[DIRPACK]\nOld.\n[/DIRPACK]\n*/\nconst a = 1;\n')).toBe('const a = 1;\n');
  });

  it('leaves an unterminated block alone', () => {
    const content = '/*\n[DIRPACK]\nhalf';
    expect(stripSummaryBlock(content)).toBe(content);
  });

  it('leaves a marker further down alone', () => {
    const content = 'a\nb\nc\n[DIRPACK]\n[/DIRPACK]\nd\n';
    expect(stripSummaryBlock(content)).toBe(content);
  });
});

describe('withSummaryBlock', () => {
  it('puts the block first', () => {
    expect(withSummaryBlock('x\n', '/*\n[DIRPACK]\nNew.\n[/DIRPACK]\n*/')).toBe(
      '/*\n[DIRPACK]\nNew.\n[/DIRPACK]\n*/\nx\n'
    );
  });

  it('replaces an earlier block', () => {
    const content = '/*\n[DIRPACK]\nOld.\n[/DIRPACK]\n*/\nconst a = 1;\n';
    expect(withSummaryBlock(content, '/*\n[DIRPACK]\nNew.\n[/DIRPACK]\n*/')).toBe(
      '/*\n[DIRPACK]\nNew.\n[/DIRPACK]\n*/\nconst a = 1;\n'
    );
  });

  it('keeps a shebang on the first line', () => {
    const content = '#!/usr/bin/env python\n#\n# [DIRPACK]\n# Old.\n# [/DIRPACK]\n#\nprint(1)\n';
    expect(withSummaryBlock(content, '#\n# [DIRPACK]\n# Prints.\n# [/DIRPACK]\n#')).toBe(
      '#!/usr/bin/env python\n#\n# [DIRPACK]\n# Prints.\n# [/DIRPACK]\n#\nprint(1)\n'
    );
  });
});
