/**
 * Model client for file summaries, speaking the OpenAI-style chat completions
 * protocol (DEFAULT_API_URL unless overridden).
 *
 * callLLM() returns the raw response text; callers clean and check it.
 */

import { setTimeout as sleep } from 'timers/promises';
import { ConfigError, SummaryError, errorMessage } from '../errors.js';
import { getCachedResponse, cacheResponse } from './query-cache.js';

export const DEFAULT_API_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_MODEL = 'openai/gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0;
export const MAX_TOKENS = 512;

const DEFAULT_SYSTEM_PROMPT = 'You are a senior engineer writing concise source file summaries.';

// ── Types ───────────────────────────────────────────────────────────────────

export interface CallLLMOptions {
    model?: string;
    apiKey?: string;
    /** Chat completions endpoint (default: DEFAULT_API_URL) */
    apiUrl?: string;
    temperature?: number;
    verbose?: boolean;
    useCache?: boolean;
    /** Cache namespace (default: 'text') */
    cacheFormat?: string;
    cacheDir?: string;
    /** Per-attempt timeout in milliseconds (default: 120000) */
    timeoutMs?: number;
    /** Retries after a 429 or 5xx answer (default: 6) */
    maxRetries?: number;
    /** First retry delay, doubled after each retry (default: 1000) */
    backoffMs?: number;
}

/**
 * Key from options, then DIRPACK_API_KEY, then OPENROUTER_API_KEY.
 * Throws ConfigError when none is set.
 */
export function resolveApiKey(apiKey?: string): string {
    const key = apiKey || process.env.DIRPACK_API_KEY || process.env.OPENROUTER_API_KEY;
    if (!key) {
        throw new ConfigError(
            'An API key is required for --summarize.\n' +
            'Set "apiKey" in the config file, pass --api-key, or set DIRPACK_API_KEY / OPENROUTER_API_KEY.'
        );
    }
    return key;
}

export function resolveModel(model?: string): string {
    return model || process.env.DIRPACK_MODEL || process.env.OPENROUTER_MODEL || DEFAULT_MODEL;
}

// ── callLLM ─────────────────────────────────────────────────────────────────

export async function callLLM(
    userPrompt: string,
    systemPrompt?: string,
    options: CallLLMOptions = {}
): Promise<string> {
    const apiKey = resolveApiKey(options.apiKey);
    const model = resolveModel(options.model);
    const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    const system = systemPrompt || DEFAULT_SYSTEM_PROMPT;
    const useCache = options.useCache !== false;
    const cacheFormat = options.cacheFormat || 'text';
    const cacheOptions = { cacheDir: options.cacheDir, verbose: options.verbose };

    if (useCache) {
        const cached = getCachedResponse(userPrompt, model, temperature, cacheFormat, cacheOptions);
        if (cached !== null) {
            if (options.verbose) console.log(`  Cache hit (${cacheFormat})`);
            return cached;
        }
    }

    const timeoutMs = options.timeoutMs ?? 120_000;
    const maxRetries = options.maxRetries ?? 6;
    let backoffMs = options.backoffMs ?? 1000;

    if (options.verbose) {
        console.log(`  Calling ${model}...`);
        console.log(`  Prompt size: ${(userPrompt.length / 1024).toFixed(1)}KB`);
    }

    const body = JSON.stringify({
        model,
        temperature,
        max_tokens: MAX_TOKENS,
        messages: [
            { role: 'system', content: system },
            { role: 'user', content: userPrompt },
        ],
    });

    for (let attempt = 0; ; attempt++) {
        const response = await post(options.apiUrl ?? DEFAULT_API_URL, apiKey, body, timeoutMs, model);

        if (response.ok) {
            const output = extractContent(await response.json());
            if (!output) {
                throw new SummaryError('Model API returned empty response', response.status);
            }
            if (useCache) {
                cacheResponse(userPrompt, model, temperature, cacheFormat, output, cacheOptions);
            }
            return output;
        }

        const error = await response.text();
        const retryable = response.status === 429 || response.status >= 500;
        if (!retryable) {
            throw new SummaryError(`Model API error (${response.status}): ${error}`, response.status);
        }
        if (attempt >= maxRetries) {
            throw new SummaryError(`Max retries exceeded. Last error (${response.status}): ${error}`, response.status);
        }

        if (options.verbose) console.log(`  Got ${response.status}, retrying in ${backoffMs}ms`);
        await sleep(backoffMs);
        backoffMs *= 2;
    }
}

async function post(url: string, apiKey: string, body: string, timeoutMs: number, model: string): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
        return await fetch(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${apiKey}`,
                'X-Title': 'dirpack',
            },
            body,
            signal: controller.signal,
        });
    } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') {
            throw new SummaryError(`Model request timed out after ${timeoutMs / 1000}s (model: ${model})`, undefined, { cause: err });
        }
        throw new SummaryError(`Model request failed: ${errorMessage(err)}`, undefined, { cause: err });
    } finally {
        clearTimeout(timer);
    }
}

/** choices[0].message.content, when the payload has that shape. */
function extractContent(data: unknown): string | null {
    if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
        return null;
    }
    const first: unknown = data.choices[0];
    if (typeof first !== 'object' || first === null || !('message' in first)) return null;
    const message: unknown = first.message;
    if (typeof message !== 'object' || message === null || !('content' in message)) return null;
    return typeof message.content === 'string' ? message.content : null;
}
