/**
 * Selection criteria and commit range values.
 *
 * Both are plain frozen objects. Build them through createCriteria() so the
 * wildcard invariant is checked once, up front.
 */

import { ConfigError } from '../errors.js';

export const WILDCARD = '*';

/** Governs .gitignore files only; .ignore files and .git/info/exclude apply either way */
export type GitignorePolicy = 'respect' | 'ignore';

export interface KeywordRules {
  /** At least one must occur in the file (when non-empty) */
  or: readonly string[];
  /** All must occur in the file (when non-empty) */
  and: readonly string[];
  /** None may occur in the file */
  exclude: readonly string[];
}

export interface SelectionCriteria {
  /** Extension / exact-name tokens, or exactly ['*'] for "any text file" */
  readonly rules: readonly string[];
  readonly gitignore: GitignorePolicy;
  /** Hidden entries (dot-prefixed) are walked unless this is false */
  readonly includeHidden: boolean;
  /** Relative-path prefixes that reject a file */
  readonly excludePaths: readonly string[];
  /** Relative-path prefixes a file must start with (when non-empty) */
  readonly includePaths: readonly string[];
  readonly keywords: Readonly<KeywordRules>;
}

/**
 * Commit range. (none, none) is HEAD vs working tree, (start, none) start vs
 * working tree, (start, end) start vs end, (none, end) HEAD vs end.
 */
export interface DiffRange {
  readonly start?: string;
  readonly end?: string;
}

export interface CriteriaInput {
  rules: string[];
  gitignore?: GitignorePolicy;
  includeHidden?: boolean;
  excludePaths?: string[];
  includePaths?: string[];
  orKeywords?: string[];
  andKeywords?: string[];
  excludeKeywords?: string[];
}

export function isWildcard(rules: readonly string[]): boolean {
  return rules.length === 1 && rules[0] === WILDCARD;
}

export function createCriteria(input: CriteriaInput): SelectionCriteria {
  if (input.rules.length === 0) {
    throw new ConfigError('At least one suffix or file name rule is required');
  }
  if (!isWildcard(input.rules) && input.rules.includes(WILDCARD)) {
    throw new ConfigError(`Wildcard "${WILDCARD}" cannot be combined with other suffixes`);
  }

  return Object.freeze({
    rules: Object.freeze([...input.rules]),
    gitignore: input.gitignore ?? 'respect',
    includeHidden: input.includeHidden ?? true,
    excludePaths: Object.freeze(normalizePrefixes(input.excludePaths)),
    includePaths: Object.freeze(normalizePrefixes(input.includePaths)),
    keywords: Object.freeze({
      or: Object.freeze([...(input.orKeywords ?? [])]),
      and: Object.freeze([...(input.andKeywords ?? [])]),
      exclude: Object.freeze([...(input.excludeKeywords ?? [])]),
    }),
  });
}

/**
 * Split a comma-separated CLI value. A value without commas is a single token;
 * undefined yields an empty list.
 */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.includes(',') ? value.split(',') : [value];
}

function normalizePrefixes(prefixes: string[] = []): string[] {
  return prefixes.map(normalizePrefix).filter(p => p.length > 0);
}

/** Prefixes are compared against POSIX-style relative paths, so "./src" and "src\\a" normalise. */
export function normalizePrefix(prefix: string): string {
  let p = prefix.replace(/\\/g, '/');
  while (p.startsWith('./')) p = p.slice(2);
  return p;
}
