import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, CONFIG_TEMPLATE } from '../../../src/config/config.js';
import { ConfigError } from '../../../src/errors.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'dirpack-config-test-' + Date.now());

function writeConfig(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  // ── File loading ──────────────────────────────────────────────────────────

  it('throws if config file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/config.json')).toThrow('Config file not found');
  });

  it('throws ConfigError on invalid JSON', () => {
    const path = writeConfig('bad.json', '{ not valid json }');
    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow('Invalid JSON');
  });

  it('throws if config is an array', () => {
    const path = writeConfig('array.json', [1, 2, 3]);
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('loads a valid empty config', () => {
    const path = writeConfig('empty.json', {});
    expect(loadConfig(path)).toEqual({});
  });

  // ── Fields ────────────────────────────────────────────────────────────────

  it('loads selection and keyword fields', () => {
    const path = writeConfig('selection.json', {
      suffixes: ['ts', 'md'],
      useGitignore: false,
      hidden: false,
      excludePaths: ['dist'],
      includePaths: ['src'],
      orKeywords: ['a'],
      andKeywords: ['b'],
      excludeKeywords: ['c'],
    });
    expect(loadConfig(path)).toEqual({
      suffixes: ['ts', 'md'],
      useGitignore: false,
      hidden: false,
      excludePaths: ['dist'],
      includePaths: ['src'],
      orKeywords: ['a'],
      andKeywords: ['b'],
      excludeKeywords: ['c'],
    });
  });

  it('loads diff fields', () => {
    const path = writeConfig('diff.json', { diffOnly: true, startCommit: 'main', endCommit: 'HEAD' });
    expect(loadConfig(path)).toEqual({ diffOnly: true, startCommit: 'main', endCommit: 'HEAD' });
  });

  it('resolves output and template paths from the config directory', () => {
    const path = writeConfig('paths.json', { outputPath: 'out/bundle.txt', promptTemplatePath: '/abs/prompt.txt' });
    const config = loadConfig(path);
    expect(config.outputPath).toBe(join(TEST_DIR, 'out', 'bundle.txt'));
    expect(config.promptTemplatePath).toBe('/abs/prompt.txt');
  });

  it('loads summary fields', () => {
    const fields = { summarize: true, apply: false, model: 'some/model', apiKey: 'test-key', cache: false, timeoutSecs: 30 };
    const path = writeConfig('summary.json', fields);
    expect(loadConfig(path)).toEqual(fields);
  });

  // ── Type errors ───────────────────────────────────────────────────────────

  it('rejects a string where a list is expected', () => {
    const path = writeConfig('type1.json', { suffixes: 'ts,md' });
    expect(() => loadConfig(path)).toThrow('Config "suffixes" must be an array of strings');
  });

  it('rejects a list with non-string items', () => {
    const path = writeConfig('type2.json', { orKeywords: ['a', 1] });
    expect(() => loadConfig(path)).toThrow('Config "orKeywords" must be an array of strings');
  });

  it('rejects a non-boolean flag', () => {
    const path = writeConfig('type3.json', { diffOnly: 'yes' });
    expect(() => loadConfig(path)).toThrow('Config "diffOnly" must be a boolean');
  });

  it('rejects a non-string commit', () => {
    const path = writeConfig('type4.json', { startCommit: 42 });
    expect(() => loadConfig(path)).toThrow('Config "startCommit" must be a string');
  });

  it('rejects a timeout that is not a positive number', () => {
    const zero = writeConfig('type5.json', { timeoutSecs: 0 });
    expect(() => loadConfig(zero)).toThrow('Config "timeoutSecs" must be a positive number');
    const text = writeConfig('type6.json', { timeoutSecs: '30' });
    expect(() => loadConfig(text)).toThrow('Config "timeoutSecs" must be a positive number');
  });

  // ── Unknown keys ──────────────────────────────────────────────────────────

  it('warns about unknown keys and ignores them', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const path = writeConfig('unknown.json', { verbose: true, colour: 'blue' });
    expect(loadConfig(path)).toEqual({ verbose: true });
    expect(warn).toHaveBeenCalledWith('Warning: Unknown config keys ignored: colour');
  });
});

describe('CONFIG_TEMPLATE', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('round-trips through loadConfig without warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const path = writeConfig('template.json', CONFIG_TEMPLATE);
    expect(loadConfig(path)).toEqual(CONFIG_TEMPLATE);
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});
