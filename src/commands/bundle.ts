/**
 * The body of `dirpack bundle`: validate, build, optionally summarise, wrap
 * in the template, and hand the result to a sink. Returns the line to print
 * on success.
 */

import { buildBundle, type BuildResult } from '../bundle/build.js';
import { applyTemplate, copyToClipboard, writeOutput } from '../bundle/output.js';
import type { CliConfig } from '../config/config.js';
import { resolveRunOptions, type RawRunOptions } from '../config/validate.js';
import { ConfigError } from '../errors.js';
import { splitList } from '../selection/criteria.js';
import { summarizeEntries, type SummaryResult } from '../summary/summarize.js';
import type { VcsProvider } from '../vcs/types.js';

export interface BundleCommandDeps {
    vcs?: VcsProvider;
    /** Replaces the clipboard sink (tests) */
    clipboard?: (content: string) => void;
}

export interface BundleCommandResult {
    message: string;
    build: BuildResult;
    /** Present when --summarize was set */
    summary?: SummaryResult;
    /** What went to the sink, template applied */
    output: string;
}

export async function runBundleCommand(raw: RawRunOptions, deps: BundleCommandDeps = {}): Promise<BundleCommandResult> {
    const run = resolveRunOptions(raw, { vcs: deps.vcs });

    if (run.verbose) {
        console.log(`Bundling ${run.root}`);
        if (run.diffOnly) {
            console.log(`  Range: ${run.range.start ?? 'HEAD'}..${run.range.end ?? 'working tree'}`);
        }
    }

    const build = buildBundle(run.root, {
        criteria: run.criteria,
        diffOnly: run.diffOnly,
        range: run.range,
        vcs: run.vcs,
        verbose: run.verbose,
    });

    let summary: SummaryResult | undefined;
    if (run.summarize) {
        summary = await summarizeEntries(build.entries, {
            diffOnly: run.diffOnly,
            apply: run.apply,
            llm: run.llm,
            verbose: run.verbose,
        });
    }

    const document = summary ? summary.text : build.bundle;
    const output = run.template !== undefined ? applyTemplate(run.template, document) : document;

    let message: string;
    if (run.outputPath !== undefined) {
        writeOutput(run.outputPath, output);
        message = `Successfully processed directory and written output to ${run.outputPath}`;
    } else {
        (deps.clipboard ?? copyToClipboard)(output);
        message = 'Successfully processed directory and copied output to clipboard';
    }

    if (run.verbose) {
        console.log(`  ${build.files.length} file(s), ${build.timing.totalMs}ms total`);
    }

    return { message, build, summary, output };
}

/** Flag values as commander hands them over; lists are still comma-joined. */
export interface BundleFlags {
    outputPath?: string;
    promptTemplatePath?: string;
    dontUseGitignore?: boolean;
    hidden?: boolean;
    excludePaths?: string;
    includePaths?: string;
    orKeywords?: string;
    andKeywords?: string;
    excludeKeywords?: string;
    diffOnly?: boolean;
    startCommit?: string;
    endCommit?: string;
    summarize?: boolean;
    apply?: boolean;
    model?: string;
    apiKey?: string;
    /** false when --no-cache was given */
    cache?: boolean;
    configPath?: string;
    verbose?: boolean;
}

/**
 * Merge flags over config values. `fromCli(name)` says whether the user typed
 * the flag; only then does it beat the config file.
 */
export function toRawRunOptions(
    suffixes: string | undefined,
    directory: string | undefined,
    flags: BundleFlags,
    config: CliConfig,
    fromCli: (name: keyof BundleFlags) => boolean
): RawRunOptions {
    const pick = <T>(name: keyof BundleFlags, flag: T | undefined, fromConfig: T | undefined): T | undefined =>
        fromCli(name) || fromConfig === undefined ? flag : fromConfig;

    const list = (name: keyof BundleFlags, flag: string | undefined, fromConfig: string[] | undefined) =>
        fromCli(name) || fromConfig === undefined ? splitList(flag) : fromConfig;

    const rules = suffixes !== undefined ? splitList(suffixes) : config.suffixes;
    if (rules === undefined) {
        throw new ConfigError('No suffixes given: pass them as the first argument or set "suffixes" in the config file');
    }

    const useGitignore = fromCli('dontUseGitignore') || config.useGitignore === undefined
        ? !(flags.dontUseGitignore ?? false)
        : config.useGitignore;

    return {
        suffixes: rules,
        directory,
        outputPath: pick('outputPath', flags.outputPath, config.outputPath),
        promptTemplatePath: pick('promptTemplatePath', flags.promptTemplatePath, config.promptTemplatePath),
        useGitignore,
        hidden: pick('hidden', flags.hidden, config.hidden),
        excludePaths: list('excludePaths', flags.excludePaths, config.excludePaths),
        includePaths: list('includePaths', flags.includePaths, config.includePaths),
        orKeywords: list('orKeywords', flags.orKeywords, config.orKeywords),
        andKeywords: list('andKeywords', flags.andKeywords, config.andKeywords),
        excludeKeywords: list('excludeKeywords', flags.excludeKeywords, config.excludeKeywords),
        diffOnly: pick('diffOnly', flags.diffOnly, config.diffOnly),
        startCommit: pick('startCommit', flags.startCommit, config.startCommit),
        endCommit: pick('endCommit', flags.endCommit, config.endCommit),
        summarize: pick('summarize', flags.summarize, config.summarize),
        apply: pick('apply', flags.apply, config.apply),
        model: pick('model', flags.model, config.model),
        apiKey: pick('apiKey', flags.apiKey, config.apiKey),
        cache: pick('cache', flags.cache, config.cache),
        timeoutSecs: config.timeoutSecs,
        verbose: pick('verbose', flags.verbose, config.verbose),
    };
}
