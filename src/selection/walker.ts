/**
 * Ignore-aware walker - depth-first directory traversal honoring .gitignore
 * and .ignore files at every level, the same files in the directories between
 * the root and the top of its git work tree, and that work tree's
 * .git/info/exclude.
 *
 * Entries of a directory are visited in code-unit order of their names and a
 * directory is yielded before its contents, so two walks of an unchanged tree
 * produce the same sequence.
 */

import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from 'fs';
import { dirname, join, relative, resolve, sep } from 'path';
import { createRequire } from 'module';
import type { Ignore } from 'ignore';
import { WalkError, errorMessage } from '../errors.js';

// Import ignore using require for proper CJS interop
const require = createRequire(import.meta.url);
const createIgnore: (options?: { ignorecase?: boolean; allowRelativePaths?: boolean }) => Ignore = require('ignore');

export interface WalkEntry {
  /** Path relative to the walk root, '/'-separated */
  relativePath: string;
  absolutePath: string;
  /** Final path segment */
  name: string;
  isDirectory: boolean;
}

export interface WalkIssue {
  path: string;
  message: string;
}

export interface WalkOptions {
  /** Apply .gitignore files (default: true). .ignore files and .git/info/exclude always apply */
  respectGitignore?: boolean;
  /** Walk dot-prefixed entries (default: true) */
  includeHidden?: boolean;
  /** Called for each entry that could not be read; the walk continues */
  onError?: (issue: WalkIssue) => void;
}

const GITIGNORE = '.gitignore';
const DOT_IGNORE = '.ignore';
const VCS_DIR = '.git';

interface IgnoreLayer {
  /** Walk-relative directory the layer covers ('' for the root and above) */
  base: string;
  /** Prepended to paths of entries under `base`; set for layers above the root */
  prefix: string;
  matcher: Ignore;
}

/**
 * Walk `root`. Throws WalkError right away when the root is missing or not a
 * directory; everything after that is reported through `onError`.
 */
export function walk(root: string, options: WalkOptions = {}): Generator<WalkEntry> {
  let isDir: boolean;
  try {
    isDir = statSync(root).isDirectory();
  } catch (error) {
    throw new WalkError(`Directory not found: ${root}`, root, { cause: error });
  }
  if (!isDir) {
    throw new WalkError(`Path is not a directory: ${root}`, root);
  }

  const ctx: WalkContext = {
    root,
    respectGitignore: options.respectGitignore ?? true,
    includeHidden: options.includeHidden ?? true,
    onError: options.onError ?? (() => undefined),
  };

  return walkDir(ctx, root, '', outerLayers(ctx));
}

/**
 * Layers that sit outside the walk: the work tree's info/exclude first, then
 * the ignore files of each directory from the work-tree top down to the
 * root's parent. Nothing is read above the root when it is not in a work tree.
 */
function outerLayers(ctx: WalkContext): IgnoreLayer[] {
  const root = resolve(ctx.root);
  const top = findWorkTreeTop(root);
  if (top === null) return [];

  const layers: IgnoreLayer[] = [];
  const exclude = loadIgnoreLayer(ctx, [join(top, VCS_DIR, 'info', 'exclude')], '', toPrefix(top, root));
  if (exclude) layers.push(exclude);

  const ancestors: string[] = [];
  for (let dir = root; dir !== top; dir = dirname(dir)) {
    ancestors.unshift(dirname(dir));
  }
  for (const dir of ancestors) {
    const files = ignoreNames(ctx).map(name => join(dir, name));
    const layer = loadIgnoreLayer(ctx, files, '', toPrefix(dir, root));
    if (layer) layers.push(layer);
  }
  return layers;
}

/** The nearest directory at or above `start` that holds a .git entry. */
function findWorkTreeTop(start: string): string | null {
  let dir = start;
  for (;;) {
    if (existsSync(join(dir, VCS_DIR))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function toPrefix(from: string, root: string): string {
  const rel = relative(from, root).split(sep).join('/');
  return rel ? `${rel}/` : '';
}

function ignoreNames(ctx: WalkContext): string[] {
  return ctx.respectGitignore ? [GITIGNORE, DOT_IGNORE] : [DOT_IGNORE];
}

interface WalkContext {
  root: string;
  respectGitignore: boolean;
  includeHidden: boolean;
  onError: (issue: WalkIssue) => void;
}

function* walkDir(
  ctx: WalkContext,
  dirPath: string,
  relDir: string,
  layers: IgnoreLayer[]
): Generator<WalkEntry> {
  let entries: Dirent[];
  try {
    entries = readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    ctx.onError({ path: relDir || '.', message: errorMessage(error) });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  // Only ignore files present in the listing are read
  const present = new Set(entries.filter(entry => !entry.isDirectory()).map(entry => entry.name));
  const ownFiles = ignoreNames(ctx).filter(name => present.has(name)).map(name => join(dirPath, name));
  const own = ownFiles.length > 0 ? loadIgnoreLayer(ctx, ownFiles, relDir, '') : null;
  const scoped = own ? [...layers, own] : layers;

  for (const entry of entries) {
    if (entry.name === VCS_DIR && entry.isDirectory()) continue;
    if (!ctx.includeHidden && entry.name.startsWith('.')) continue;

    const absolutePath = join(dirPath, entry.name);
    const relativePath = relDir ? `${relDir}/${entry.name}` : entry.name;

    let isDirectory = entry.isDirectory();
    if (entry.isSymbolicLink()) {
      // Links are not followed; a link to a directory is reported as a directory entry
      try {
        isDirectory = statSync(absolutePath).isDirectory();
      } catch (error) {
        ctx.onError({ path: relativePath, message: errorMessage(error) });
        continue;
      }
    }

    if (isIgnored(scoped, relativePath, isDirectory)) continue;

    yield { relativePath, absolutePath, name: entry.name, isDirectory };

    if (isDirectory && !entry.isSymbolicLink()) {
      yield* walkDir(ctx, absolutePath, relativePath, scoped);
    }
  }
}

/**
 * Later (deeper) layers override earlier ones, so a nested "!keep.log" can
 * re-include what the root .gitignore excluded.
 */
function isIgnored(layers: IgnoreLayer[], relativePath: string, isDirectory: boolean): boolean {
  let ignored = false;
  for (const layer of layers) {
    if (layer.base && !relativePath.startsWith(`${layer.base}/`)) continue;
    const sub = layer.prefix + (layer.base ? relativePath.slice(layer.base.length + 1) : relativePath);
    const result = layer.matcher.test(isDirectory ? `${sub}/` : sub);
    if (result.ignored) ignored = true;
    else if (result.unignored) ignored = false;
  }
  return ignored;
}

function loadIgnoreLayer(ctx: WalkContext, files: string[], base: string, prefix: string): IgnoreLayer | null {
  let matcher: Ignore | null = null;

  for (const file of files) {
    let content: string;
    try {
      content = readFileSync(file, 'utf-8');
    } catch (error) {
      // Missing ignore files are skipped silently
      if (isNotFound(error)) continue;
      ctx.onError({ path: file, message: errorMessage(error) });
      continue;
    }
    // Names such as "..." are legal entries but not "relative" paths to the matcher
    matcher = (matcher ?? createIgnore({ allowRelativePaths: true })).add(content);
  }

  return matcher ? { base, prefix, matcher } : null;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
