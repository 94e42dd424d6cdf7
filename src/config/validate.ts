/**
 * Run option resolution - turns raw flag/config values into validated inputs
 * for buildBundle(). Everything here runs before the first directory is read;
 * any problem surfaces as a ConfigError.
 */

import { existsSync, realpathSync, statSync } from 'fs';
import { isAbsolute, relative, resolve, sep } from 'path';
import { ConfigError, RevisionError } from '../errors.js';
import { TEMPLATE_MARKER, loadTemplate } from '../bundle/output.js';
import {
    WILDCARD,
    createCriteria,
    normalizePrefix,
    type DiffRange,
    type SelectionCriteria,
} from '../selection/criteria.js';
import { resolveApiKey, type CallLLMOptions } from '../summary/llm-client.js';
import { GitCliProvider } from '../vcs/git.js';
import type { VcsProvider } from '../vcs/types.js';

export const MAX_SUFFIX_LENGTH = 10;
export const MAX_KEYWORD_LENGTH = 100;

export interface RawRunOptions {
    /** Suffix / file name tokens, already split on commas */
    suffixes: string[];
    /** Directory to bundle (default: CWD) */
    directory?: string;
    outputPath?: string;
    promptTemplatePath?: string;
    useGitignore?: boolean;
    hidden?: boolean;
    excludePaths?: string[];
    includePaths?: string[];
    orKeywords?: string[];
    andKeywords?: string[];
    excludeKeywords?: string[];
    diffOnly?: boolean;
    startCommit?: string;
    endCommit?: string;
    summarize?: boolean;
    apply?: boolean;
    model?: string;
    apiKey?: string;
    cache?: boolean;
    timeoutSecs?: number;
    verbose?: boolean;
}

export interface RunOptions {
    /** Absolute traversal root */
    root: string;
    criteria: SelectionCriteria;
    diffOnly: boolean;
    range: DiffRange;
    /** Opened only in diff mode */
    vcs?: VcsProvider;
    /** File destination; the clipboard is used when absent */
    outputPath?: string;
    /** Template text, already checked for the placeholder */
    template?: string;
    summarize: boolean;
    apply: boolean;
    /** Model settings; the API key is resolved when summarize is set */
    llm: CallLLMOptions;
    verbose: boolean;
}

export function resolveRunOptions(raw: RawRunOptions, deps: { vcs?: VcsProvider } = {}): RunOptions {
    const root = resolve(raw.directory ?? '.');

    validateSuffixes(raw.suffixes);
    validateKeywords(raw.orKeywords, 'or-keywords');
    validateKeywords(raw.andKeywords, 'and-keywords');
    validateKeywords(raw.excludeKeywords, 'exclude-keywords');

    const template = raw.promptTemplatePath !== undefined
        ? readTemplate(raw.promptTemplatePath)
        : undefined;

    if (raw.outputPath !== undefined) validateOutputPath(raw.outputPath);

    const diffOnly = raw.diffOnly ?? false;
    validateGitFlags(diffOnly, raw.startCommit, raw.endCommit);

    validatePathFilters(root, raw.excludePaths ?? [], raw.includePaths ?? []);

    const summarize = raw.summarize ?? false;
    const apply = raw.apply ?? false;
    validateSummaryFlags(summarize, apply, diffOnly);
    const llm: CallLLMOptions = {
        apiKey: summarize ? resolveApiKey(raw.apiKey) : raw.apiKey,
        model: raw.model,
        useCache: raw.cache ?? true,
        timeoutMs: raw.timeoutSecs !== undefined ? raw.timeoutSecs * 1000 : undefined,
    };

    const range: DiffRange = { start: raw.startCommit, end: raw.endCommit };
    let vcs: VcsProvider | undefined;
    if (diffOnly) {
        vcs = deps.vcs ?? GitCliProvider.open(root);
        validateRange(vcs, range);
    }

    const criteria = createCriteria({
        rules: raw.suffixes,
        gitignore: raw.useGitignore === false ? 'ignore' : 'respect',
        includeHidden: raw.hidden ?? true,
        excludePaths: raw.excludePaths,
        includePaths: raw.includePaths,
        orKeywords: raw.orKeywords,
        andKeywords: raw.andKeywords,
        excludeKeywords: raw.excludeKeywords,
    });

    return {
        root,
        criteria,
        diffOnly,
        range,
        vcs,
        outputPath: raw.outputPath,
        template,
        summarize,
        apply,
        llm,
        verbose: raw.verbose ?? false,
    };
}

export function validateSuffixes(suffixes: readonly string[]): void {
    if (suffixes.length === 0 || (suffixes.length === 1 && suffixes[0] === '')) {
        throw new ConfigError('Suffixes cannot be empty');
    }
    if (suffixes.length === 1 && suffixes[0] === WILDCARD) return;

    for (const suffix of suffixes) {
        if (suffix === '') {
            throw new ConfigError('Empty suffix found after splitting');
        }
        if (!/^[\p{L}\p{N}]+$/u.test(suffix)) {
            throw new ConfigError(`Invalid suffix '${suffix}': must be alphanumeric`);
        }
        if (suffix.length > MAX_SUFFIX_LENGTH) {
            throw new ConfigError(`Suffix '${suffix}' exceeds maximum length of ${MAX_SUFFIX_LENGTH}`);
        }
    }
}

export function validateKeywords(keywords: readonly string[] | undefined, flag: string): void {
    for (const keyword of keywords ?? []) {
        if (keyword === '') {
            throw new ConfigError(`Empty keyword found in --${flag}`);
        }
        if (keyword.length > MAX_KEYWORD_LENGTH) {
            throw new ConfigError(`Keyword in --${flag} exceeds maximum length of ${MAX_KEYWORD_LENGTH}`);
        }
        if (/[^\x00-\x7f]/.test(keyword)) {
            throw new ConfigError(`Non-ASCII characters found in --${flag} keyword: ${keyword}`);
        }
    }
}

export function validateGitFlags(diffOnly: boolean, start?: string, end?: string): void {
    if (diffOnly && start === undefined) {
        throw new ConfigError('--start-commit must be provided when using --diff-only');
    }
    if (start !== undefined && !diffOnly) {
        throw new ConfigError('--diff-only must be set when using --start-commit');
    }
    if (end !== undefined && !diffOnly) {
        throw new ConfigError('--diff-only must be set when using --end-commit');
    }
    if (end !== undefined && start === undefined) {
        throw new ConfigError('--start-commit must be set when using --end-commit');
    }
}

export function validateSummaryFlags(summarize: boolean, apply: boolean, diffOnly: boolean): void {
    if (apply && !summarize) {
        throw new ConfigError('--summarize must be set when using --apply');
    }
    if (apply && diffOnly) {
        throw new ConfigError('--apply cannot be used with --diff-only');
    }
}

/**
 * Every given commit must resolve, and start must be a proper ancestor of end:
 * two refs naming the same commit are rejected.
 */
export function validateRange(vcs: VcsProvider, range: DiffRange): void {
    const start = range.start !== undefined ? resolveOrFail(vcs, range.start, 'start') : undefined;
    const end = range.end !== undefined ? resolveOrFail(vcs, range.end, 'end') : undefined;

    if (start !== undefined && end !== undefined && (start === end || !vcs.isAncestor(start, end))) {
        throw new ConfigError('Start commit must be an ancestor of end commit');
    }
}

function resolveOrFail(vcs: VcsProvider, ref: string, label: 'start' | 'end'): string {
    try {
        return vcs.resolveCommit(ref);
    } catch (error) {
        if (error instanceof RevisionError) {
            throw new ConfigError(`Invalid ${label} commit: ${ref}`);
        }
        throw error;
    }
}

/**
 * Each filter path must exist inside the root, and an include path may not sit
 * at or under an exclude path.
 */
export function validatePathFilters(
    root: string,
    excludePaths: readonly string[],
    includePaths: readonly string[]
): void {
    const realRoot = existsSync(root) ? realpathSync(root) : root;

    const check = (paths: readonly string[], kind: 'Exclude' | 'Include'): string[] => {
        const normalized = paths.map(normalizePrefix).filter(p => p.length > 0);
        for (const p of normalized) {
            const abs = resolve(root, p);
            if (!existsSync(abs)) {
                throw new ConfigError(`${kind} path does not exist: ${p}`);
            }
            const rel = relative(realRoot, realpathSync(abs));
            if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
                throw new ConfigError(`Path is outside project directory: ${p}`);
            }
        }
        return normalized;
    };

    const excluded = check(excludePaths, 'Exclude');
    const included = check(includePaths, 'Include');

    for (const inc of included) {
        const incParts = segments(inc);
        const conflict = excluded.some(ex => {
            const exParts = segments(ex);
            return exParts.every((part, i) => incParts[i] === part);
        });
        if (conflict) {
            throw new ConfigError(`Include path conflicts with exclude path: ${inc}`);
        }
    }
}

function segments(path: string): string[] {
    return path.split('/').filter(part => part.length > 0 && part !== '.');
}

function readTemplate(templatePath: string): string {
    const abs = resolve(templatePath);
    if (!existsSync(abs)) {
        throw new ConfigError(`Template file does not exist: ${templatePath}`);
    }
    if (!statSync(abs).isFile()) {
        throw new ConfigError(`Template path is not a file: ${templatePath}`);
    }
    const template = loadTemplate(abs);
    if (!template.includes(TEMPLATE_MARKER)) {
        throw new ConfigError(`Template does not contain the placeholder ${TEMPLATE_MARKER}: ${templatePath}`);
    }
    return template;
}

function validateOutputPath(outputPath: string): void {
    const abs = resolve(outputPath);
    if (existsSync(abs) && statSync(abs).isDirectory()) {
        throw new ConfigError(`Output path is a directory: ${outputPath}`);
    }
}
