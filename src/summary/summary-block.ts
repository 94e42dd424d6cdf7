/**
 * Summary blocks - the comment a summary is written as at the top of a file.
 *
 * For block-comment languages the block is the opening delimiter, a
 * "[DIRPACK]" line, the summary, a "[/DIRPACK]" line and the closing
 * delimiter, each on its own line. Line-comment languages use the same five
 * parts with every line starting with the comment prefix ("#", "# [DIRPACK]",
 * "# ...", "# [/DIRPACK]", "#").
 */

import { readFileSync } from 'fs';
import { fileExtension } from '../selection/path-matcher.js';

export const SUMMARY_OPEN = '[DIRPACK]';
export const SUMMARY_CLOSE = '[/DIRPACK]';

export type CommentStyle =
    | { kind: 'block'; open: string; close: string }
    | { kind: 'line'; prefix: string };

interface CommentStyleTable {
    /** Extension -> [opening, closing] delimiters */
    block: Record<string, [string, string]>;
    /** Extension -> line prefix */
    line: Record<string, string>;
}

const styles: CommentStyleTable = JSON.parse(
    readFileSync(new URL('../../data/comment-styles.json', import.meta.url), 'utf-8')
);

/** Comment style for a path's extension, or null when it is not known. */
export function commentStyleFor(path: string): CommentStyle | null {
    const name = path.split('/').pop() ?? path;
    const ext = fileExtension(name)?.toLowerCase();
    if (ext === undefined) return null;

    const block = Object.hasOwn(styles.block, ext) ? styles.block[ext] : undefined;
    if (block) return { kind: 'block', open: block[0], close: block[1] };

    const prefix = Object.hasOwn(styles.line, ext) ? styles.line[ext] : undefined;
    if (prefix) return { kind: 'line', prefix };

    return null;
}

/** Layout instructions appended to the summary prompt. */
export function formatInstructions(style: CommentStyle | null): string {
    if (style === null) {
        return '\n\nReturn the summary as a comment block suited to the file\'s language. ' +
            `The first line opens the comment, the second line is '${SUMMARY_OPEN}', ` +
            `the second-to-last line is '${SUMMARY_CLOSE}' and the last line closes the comment.`;
    }
    if (style.kind === 'block') {
        return `\n\nUse this structure: line 1: '${style.open}', line 2: '${SUMMARY_OPEN}', ` +
            `then the summary, then '${SUMMARY_CLOSE}', last line: '${style.close}'.`;
    }
    const p = style.prefix;
    return `\n\nStart every line of the summary with '${p}'. Use this structure: line 1: '${p}', ` +
        `line 2: '${p} ${SUMMARY_OPEN}', then the summary, then '${p} ${SUMMARY_CLOSE}', last line: '${p}'.`;
}

/** Drop a leading <think> section and surrounding code fences, then trim. */
export function cleanSummary(raw: string): string {
    const thinkEnd = raw.lastIndexOf('</think>');
    let text = (thinkEnd >= 0 ? raw.slice(thinkEnd + '</think>'.length) : raw).trim();

    const lines = text.split('\n');
    if (lines.length >= 2 && lines[0].trim().startsWith('```') && lines[lines.length - 1].trim() === '```') {
        text = lines.slice(1, -1).join('\n').trim();
    }
    return text;
}

/** True when `summary` follows the layout `formatInstructions(style)` asks for. */
export function isWellFormedSummary(summary: string, style: CommentStyle): boolean {
    const lines = summary.trim().split('\n').map(line => line.trim());
    if (lines.length < 4) return false;

    const first = lines[0];
    const second = lines[1];
    const beforeLast = lines[lines.length - 2];
    const last = lines[lines.length - 1];

    if (style.kind === 'block') {
        return first === style.open && second === SUMMARY_OPEN && beforeLast === SUMMARY_CLOSE && last === style.close;
    }

    const p = style.prefix;
    return (
        lines.every(line => line.startsWith(p)) &&
        first === p &&
        second === `${p} ${SUMMARY_OPEN}` &&
        beforeLast === `${p} ${SUMMARY_CLOSE}` &&
        last === p
    );
}

/**
 * Remove a summary block from the top of `content`. The block's opening line
 * must be line 1 or 2 (after a shebang, say) with the marker on the next line;
 * it ends at the line after the closing marker. Anything else is left alone.
 */
export function stripSummaryBlock(content: string): string {
    const lines = content.split('\n');

    const openAt = [0, 1].find(i => i + 1 < lines.length && lines[i + 1].includes(SUMMARY_OPEN));
    if (openAt === undefined) return content;

    const closeMarker = lines.findIndex((line, i) => i > openAt + 1 && line.includes(SUMMARY_CLOSE));
    if (closeMarker === -1 || closeMarker + 1 >= lines.length) return content;

    return [...lines.slice(0, openAt), ...lines.slice(closeMarker + 2)].join('\n');
}

/** `content` with `summary` as its first block, replacing any earlier one. A shebang stays first. */
export function withSummaryBlock(content: string, summary: string): string {
    const body = stripSummaryBlock(content);
    const block = `${summary.trim()}\n`;

    if (body.startsWith('#!')) {
        const newline = body.indexOf('\n');
        if (newline === -1) return `${body}\n${block}`;
        return `${body.slice(0, newline + 1)}${block}${body.slice(newline + 1)}`;
    }
    return `${block}${body}`;
}
