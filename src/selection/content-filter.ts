/**
 * Content Filter - keyword admission over a file's text.
 *
 * Matching is literal, case-sensitive substring containment. Exclude keywords
 * win over everything else.
 */

import { readFileSync } from 'fs';
import { EncodingError, ReadError, errorMessage } from '../errors.js';
import type { KeywordRules } from './criteria.js';

export function hasKeywordRules(keywords: Readonly<KeywordRules>): boolean {
  return keywords.or.length > 0 || keywords.and.length > 0 || keywords.exclude.length > 0;
}

export function admitsContent(content: string, keywords: Readonly<KeywordRules>): boolean {
  if (keywords.exclude.some(keyword => content.includes(keyword))) return false;

  if (keywords.or.length > 0 && !keywords.or.some(keyword => content.includes(keyword))) {
    return false;
  }

  if (keywords.and.length > 0 && !keywords.and.every(keyword => content.includes(keyword))) {
    return false;
  }

  return true;
}

/**
 * Read a file as UTF-8 text. Throws ReadError when it cannot be read and
 * EncodingError when the bytes are not UTF-8; callers must not skip either.
 */
export function readTextFile(absolutePath: string, displayPath: string = absolutePath): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(absolutePath);
  } catch (error) {
    throw new ReadError(`Failed to read ${displayPath}: ${errorMessage(error)}`, displayPath, { cause: error });
  }
  return decodeUtf8(bytes, displayPath);
}

export function decodeUtf8(bytes: Uint8Array, displayPath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    throw new EncodingError(`File is not valid UTF-8: ${displayPath}`, displayPath);
  }
}
