/**
 * Summarise a built bundle file by file.
 *
 *   File Paths:
 *   <path per line>
 *
 *   File Summaries:
 *
 *   Summary of <path>:
 *
 *   <summary>
 *
 * In diff mode each file's patch section is summarised instead of its
 * content. With `apply`, every well-formed summary is also written as a
 * comment block at the top of its file.
 */

import { readFileSync, writeFileSync } from 'fs';
import { renderPathList, type BundleEntry } from '../bundle/assembler.js';
import { applyTemplate } from '../bundle/output.js';
import { ConfigError, SummaryError, errorMessage } from '../errors.js';
import { callLLM, type CallLLMOptions } from './llm-client.js';
import {
    cleanSummary,
    commentStyleFor,
    formatInstructions,
    isWellFormedSummary,
    stripSummaryBlock,
    withSummaryBlock,
} from './summary-block.js';

export const SUMMARIES_HEADER = 'File Summaries:';

export type PromptName = 'summary' | 'summary-diff';

export function loadPrompt(name: PromptName): string {
    return readFileSync(new URL(`../../data/prompts/${name}.txt`, import.meta.url), 'utf-8');
}

// ── Types ───────────────────────────────────────────────────────────────────

export interface SummarizeOptions {
    /** Summarise each file's patch section instead of its content */
    diffOnly?: boolean;
    /** Write each well-formed summary to the top of its file; not allowed in diff mode */
    apply?: boolean;
    llm?: CallLLMOptions;
    verbose?: boolean;
}

export interface FileSummary {
    path: string;
    /** Cleaned model output, or "Error: <message>" when the request failed */
    summary: string;
    failed: boolean;
    applied: boolean;
}

export interface SummaryResult {
    summaries: FileSummary[];
    /** The rendered summary document */
    text: string;
}

// ── Prompting ───────────────────────────────────────────────────────────────

/**
 * The template with the file's content (any earlier summary block removed)
 * or, in diff mode, its patch section, plus the comment layout to answer in.
 */
export function buildSummaryPrompt(template: string, entry: BundleEntry, diffOnly: boolean): string {
    const source = diffOnly ? entry.fragment ?? '' : stripSummaryBlock(entry.content);
    return applyTemplate(template, source) + formatInstructions(commentStyleFor(entry.relativePath));
}

/**
 * One request at a time, in bundle order. A failed request becomes an
 * "Error: ..." summary and a warning; the other files still go through.
 */
export async function summarizeEntries(
    entries: readonly BundleEntry[],
    options: SummarizeOptions = {}
): Promise<SummaryResult> {
    const { diffOnly = false, apply = false, verbose = false } = options;
    if (apply && diffOnly) {
        throw new ConfigError('--apply cannot be used with --diff-only');
    }

    const promptName: PromptName = diffOnly ? 'summary-diff' : 'summary';
    const template = loadPrompt(promptName);
    const summaries: FileSummary[] = [];

    for (const [index, entry] of entries.entries()) {
        if (verbose) console.log(`  Summarising ${entry.relativePath} (${index + 1}/${entries.length})`);

        const prompt = buildSummaryPrompt(template, entry, diffOnly);
        let summary: string;
        try {
            summary = cleanSummary(await callLLM(prompt, undefined, { ...options.llm, verbose, cacheFormat: promptName }));
        } catch (error) {
            if (!(error instanceof SummaryError)) throw error;
            console.warn(`Warning: Could not summarise ${entry.relativePath}: ${error.message}`);
            summaries.push({ path: entry.relativePath, summary: `Error: ${error.message}`, failed: true, applied: false });
            continue;
        }

        const applied = apply && applySummary(entry, summary);
        summaries.push({ path: entry.relativePath, summary, failed: false, applied });
    }

    return { summaries, text: renderSummaries(summaries, apply) };
}

export function renderSummaries(summaries: readonly FileSummary[], apply = false): string {
    const parts = [renderPathList(summaries.map(s => s.path)), `${SUMMARIES_HEADER}\n\n`];

    if (apply) {
        const written = summaries.filter(s => s.applied).length;
        parts.push(`\nSummaries have been written to the top of ${written} files.\n`);
    }
    for (const s of summaries) {
        parts.push(`\nSummary of ${s.path}:\n\n${s.summary}\n`);
    }
    return parts.join('');
}

// ── Apply ───────────────────────────────────────────────────────────────────

/** Write `summary` above the file's content. Returns false (with a warning) when it was not written. */
function applySummary(entry: BundleEntry, summary: string): boolean {
    const style = commentStyleFor(entry.relativePath);
    if (style === null) {
        console.warn(`Warning: No comment style known for ${entry.relativePath}; summary not written`);
        return false;
    }
    if (!isWellFormedSummary(summary, style)) {
        console.warn(`Warning: Summary for ${entry.relativePath} is not a well-formed comment block; file left unchanged`);
        return false;
    }

    try {
        writeFileSync(entry.absolutePath, withSummaryBlock(entry.content, summary), 'utf-8');
    } catch (error) {
        console.warn(`Warning: Could not write summary to ${entry.relativePath}: ${errorMessage(error)}`);
        return false;
    }
    return true;
}
