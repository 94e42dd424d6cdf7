/**
 * Path Matcher - decides whether a walked entry qualifies by extension,
 * exact file name, or (for the "*" rule) by looking like text.
 */

import { closeSync, openSync, readFileSync, readSync } from 'fs';
import { isWildcard } from './criteria.js';
import type { WalkEntry } from './walker.js';

interface TextFileLists {
    /** Extensions accepted under the wildcard rule without sniffing (compared lowercase) */
    extensions: string[];
    /** Well-known names accepted under the wildcard rule, matched exactly */
    names: string[];
}

// data/ sits at the package root, two levels above both src/selection and dist/selection
const lists: TextFileLists = JSON.parse(
    readFileSync(new URL('../../data/text-files.json', import.meta.url), 'utf-8')
);

const TEXT_EXTENSIONS: ReadonlySet<string> = new Set(lists.extensions);
const TEXT_FILE_NAMES: ReadonlySet<string> = new Set(lists.names);

export const SNIFF_BYTES = 1024;

/**
 * Extension of a file name: the text after the last dot, or null when there is
 * none. A leading dot alone does not start an extension (".env" has none).
 */
export function fileExtension(fileName: string): string | null {
    const idx = fileName.lastIndexOf('.');
    if (idx <= 0) return null;
    return fileName.slice(idx + 1);
}

export function matchesRule(entry: WalkEntry, rules: readonly string[]): boolean {
    if (entry.isDirectory) return false;

    if (isWildcard(rules)) {
        return isLikelyTextFile(entry.absolutePath, entry.name);
    }

    const ext = fileExtension(entry.name);
    if (ext !== null) {
        return rules.includes(ext);
    }
    return rules.includes(entry.name);
}

/**
 * Allow-listed names and extensions pass outright; anything else passes only
 * when its first SNIFF_BYTES bytes are valid UTF-8. Unreadable files fail.
 */
export function isLikelyTextFile(absolutePath: string, fileName: string): boolean {
    if (TEXT_FILE_NAMES.has(fileName)) return true;

    const ext = fileExtension(fileName);
    if (ext !== null && TEXT_EXTENSIONS.has(ext.toLowerCase())) return true;

    const head = readHead(absolutePath, SNIFF_BYTES);
    if (head === null) return false;
    return isValidUtf8(head, head.length === SNIFF_BYTES);
}

function readHead(absolutePath: string, maxBytes: number): Buffer | null {
    let fd: number;
    try {
        fd = openSync(absolutePath, 'r');
    } catch {
        return null;
    }
    try {
        const buffer = Buffer.alloc(maxBytes);
        const bytesRead = readSync(fd, buffer, 0, maxBytes, 0);
        return buffer.subarray(0, bytesRead);
    } catch {
        return null;
    } finally {
        closeSync(fd);
    }
}

/**
 * @param truncated the bytes were cut at the sniff limit, so a multi-byte
 *   sequence split at the end is not held against the file
 */
export function isValidUtf8(bytes: Uint8Array, truncated = false): boolean {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    try {
        decoder.decode(bytes, { stream: truncated });
        return true;
    } catch {
        return false;
    }
}
