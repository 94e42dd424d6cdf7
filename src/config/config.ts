/**
 * Config File Support
 *
 * One JSON file can stand in for any `bundle` flag:
 * - Selection (suffixes, useGitignore, hidden, excludePaths, includePaths)
 * - Keywords (orKeywords, andKeywords, excludeKeywords)
 * - Diff mode (diffOnly, startCommit, endCommit)
 * - Output (outputPath, promptTemplatePath)
 * - Summaries (summarize, apply, model, apiKey, cache, timeoutSecs)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigError } from '../errors.js';

export interface CliConfig {
    // Selection
    suffixes?: string[];
    useGitignore?: boolean;
    hidden?: boolean;
    excludePaths?: string[];
    includePaths?: string[];

    // Keywords
    orKeywords?: string[];
    andKeywords?: string[];
    excludeKeywords?: string[];

    // Diff mode
    diffOnly?: boolean;
    startCommit?: string;
    endCommit?: string;

    // Output
    outputPath?: string;
    promptTemplatePath?: string;

    // Summaries
    summarize?: boolean;
    apply?: boolean;
    model?: string;
    apiKey?: string;
    cache?: boolean;          // model response cache
    /** Model request timeout in seconds (default: 120) */
    timeoutSecs?: number;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'suffixes', 'useGitignore', 'hidden', 'excludePaths', 'includePaths',
    'orKeywords', 'andKeywords', 'excludeKeywords',
    'diffOnly', 'startCommit', 'endCommit',
    'outputPath', 'promptTemplatePath',
    'summarize', 'apply', 'model', 'apiKey', 'cache', 'timeoutSecs',
    'verbose',
]);

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: RawConfig, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: RawConfig, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertPositiveNumber(obj: RawConfig, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isFinite(val) || val <= 0) {
        throw new ConfigError(`Config "${key}" must be a positive number`);
    }
    return val;
}

function assertStringArray(obj: RawConfig, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) throw new ConfigError(`Config "${key}" must be an array of strings`);
    const out: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigError(`Config "${key}" must be an array of strings`);
        out.push(item);
    }
    return out;
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - outputPath and promptTemplatePath resolve from the config file's directory
 * - excludePaths / includePaths stay relative to the bundled directory
 * - Throws ConfigError on a missing file, invalid JSON or a mistyped value
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);
    const fromConfigDir = (p: string) => isAbsolute(p) ? p : resolve(configDir, p);

    // Selection
    if (obj.suffixes !== undefined) config.suffixes = assertStringArray(obj, 'suffixes');
    if (obj.useGitignore !== undefined) config.useGitignore = assertBoolean(obj, 'useGitignore');
    if (obj.hidden !== undefined) config.hidden = assertBoolean(obj, 'hidden');
    if (obj.excludePaths !== undefined) config.excludePaths = assertStringArray(obj, 'excludePaths');
    if (obj.includePaths !== undefined) config.includePaths = assertStringArray(obj, 'includePaths');

    // Keywords
    if (obj.orKeywords !== undefined) config.orKeywords = assertStringArray(obj, 'orKeywords');
    if (obj.andKeywords !== undefined) config.andKeywords = assertStringArray(obj, 'andKeywords');
    if (obj.excludeKeywords !== undefined) config.excludeKeywords = assertStringArray(obj, 'excludeKeywords');

    // Diff mode
    if (obj.diffOnly !== undefined) config.diffOnly = assertBoolean(obj, 'diffOnly');
    if (obj.startCommit !== undefined) config.startCommit = assertString(obj, 'startCommit');
    if (obj.endCommit !== undefined) config.endCommit = assertString(obj, 'endCommit');

    // Output
    if (obj.outputPath !== undefined) config.outputPath = fromConfigDir(assertString(obj, 'outputPath'));
    if (obj.promptTemplatePath !== undefined) {
        config.promptTemplatePath = fromConfigDir(assertString(obj, 'promptTemplatePath'));
    }

    // Summaries
    if (obj.summarize !== undefined) config.summarize = assertBoolean(obj, 'summarize');
    if (obj.apply !== undefined) config.apply = assertBoolean(obj, 'apply');
    if (obj.model !== undefined) config.model = assertString(obj, 'model');
    if (obj.apiKey !== undefined) config.apiKey = assertString(obj, 'apiKey');
    if (obj.cache !== undefined) config.cache = assertBoolean(obj, 'cache');
    if (obj.timeoutSecs !== undefined) config.timeoutSecs = assertPositiveNumber(obj, 'timeoutSecs');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for the `init` command.
 * Shows every available option with its default.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    suffixes: ['ts', 'md'],
    useGitignore: true,
    hidden: true,
    excludePaths: [],
    includePaths: [],

    orKeywords: [],
    andKeywords: [],
    excludeKeywords: [],

    diffOnly: false,

    summarize: false,
    apply: false,
    cache: true,
    timeoutSecs: 120,

    verbose: false,
};
