/**
 * Query Cache - local cache for model responses
 *
 * Summarising the same file twice with the same prompt and model should not
 * cost a second request. Entries are keyed on:
 * - Prompt text (which embeds the file content)
 * - Model
 * - Temperature
 * - Format (summary or summary-diff)
 *
 * Entries expire after 7 days by default.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync, readdirSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { errorMessage } from '../errors.js';

export interface CacheEntry {
  key: string;
  model: string;
  temperature: number;
  format: string;
  response: string;
  timestamp: number;
}

export interface CacheOptions {
  cacheDir?: string;
  ttlDays?: number;
  maxEntries?: number;
  verbose?: boolean;
}

const DEFAULT_OPTIONS: Required<CacheOptions> = {
  cacheDir: join(tmpdir(), 'dirpack-cache'),
  ttlDays: 7,
  maxEntries: 500,
  verbose: false,
};

function generateCacheKey(prompt: string, model: string, temperature: number, format: string): string {
  const hash = createHash('sha256');
  hash.update(prompt);
  hash.update(model);
  hash.update(String(temperature));
  hash.update(format);
  return hash.digest('hex');
}

function getCacheFilePath(cacheDir: string, key: string): string {
  return join(cacheDir, `${key}.cache`);
}

function isExpired(timestamp: number, ttlDays: number): boolean {
  const maxAge = ttlDays * 24 * 60 * 60 * 1000;
  return Date.now() - timestamp > maxAge;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'key' in value && typeof value.key === 'string' &&
    'model' in value && typeof value.model === 'string' &&
    'temperature' in value && typeof value.temperature === 'number' &&
    'format' in value && typeof value.format === 'string' &&
    'response' in value && typeof value.response === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'number'
  );
}

/**
 * Get cached response if it exists and is not expired. A corrupt or stale
 * entry counts as a miss.
 */
export function getCachedResponse(
  prompt: string,
  model: string,
  temperature: number,
  format: string,
  options: CacheOptions = {}
): string | null {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const key = generateCacheKey(prompt, model, temperature, format);
  const cacheFile = getCacheFilePath(opts.cacheDir, key);

  if (!existsSync(cacheFile)) {
    if (opts.verbose) console.log(`  Cache miss: ${key.slice(0, 16)}...`);
    return null;
  }

  let entry: unknown;
  try {
    entry = JSON.parse(readFileSync(cacheFile, 'utf-8'));
  } catch (error) {
    if (opts.verbose) console.log(`  Cache error: ${errorMessage(error)}`);
    return null;
  }

  if (!isCacheEntry(entry) || entry.key !== key || entry.model !== model || entry.format !== format) {
    if (opts.verbose) console.log('  Cache miss: Entry does not match');
    return null;
  }

  if (isExpired(entry.timestamp, opts.ttlDays)) {
    if (opts.verbose) console.log('  Cache miss: Entry expired');
    removeEntry(cacheFile, opts.verbose);
    return null;
  }

  if (opts.verbose) {
    const age = Math.floor((Date.now() - entry.timestamp) / 1000 / 60);
    console.log(`  Cache hit: Response found (age: ${age}m)`);
  }
  return entry.response;
}

/**
 * Cache a response. A failed write only costs a future request, so it is
 * logged (when verbose) rather than thrown.
 */
export function cacheResponse(
  prompt: string,
  model: string,
  temperature: number,
  format: string,
  response: string,
  options: CacheOptions = {}
): void {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const key = generateCacheKey(prompt, model, temperature, format);

  const entry: CacheEntry = {
    key,
    model,
    temperature,
    format,
    response,
    timestamp: Date.now(),
  };

  try {
    mkdirSync(opts.cacheDir, { recursive: true });
    writeFileSync(getCacheFilePath(opts.cacheDir, key), JSON.stringify(entry, null, 2), 'utf-8');
    if (opts.verbose) console.log('  Response cached');
    cleanupOldEntries(opts.cacheDir, opts.maxEntries, opts.verbose);
  } catch (error) {
    if (opts.verbose) console.log(`  Cache write error: ${errorMessage(error)}`);
  }
}

/** Keep the newest `maxEntries` entries. */
function cleanupOldEntries(cacheDir: string, maxEntries: number, verbose: boolean): void {
  const files = readdirSync(cacheDir)
    .filter(f => f.endsWith('.cache'))
    .map(f => ({
      path: join(cacheDir, f),
      mtime: statSync(join(cacheDir, f)).mtime.getTime(),
    }))
    .sort((a, b) => b.mtime - a.mtime);

  for (const file of files.slice(maxEntries)) {
    removeEntry(file.path, verbose);
  }
}

function removeEntry(path: string, verbose: boolean): void {
  try {
    unlinkSync(path);
  } catch (error) {
    if (verbose) console.log(`  Cache cleanup error: ${errorMessage(error)}`);
  }
}
