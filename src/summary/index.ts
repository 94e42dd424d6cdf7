export { callLLM, resolveApiKey, resolveModel, DEFAULT_API_URL, DEFAULT_MODEL, DEFAULT_TEMPERATURE } from './llm-client.js';
export type { CallLLMOptions } from './llm-client.js';
export { getCachedResponse, cacheResponse } from './query-cache.js';
export type { CacheEntry, CacheOptions } from './query-cache.js';
export {
    SUMMARY_OPEN,
    SUMMARY_CLOSE,
    commentStyleFor,
    formatInstructions,
    cleanSummary,
    isWellFormedSummary,
    stripSummaryBlock,
    withSummaryBlock,
} from './summary-block.js';
export type { CommentStyle } from './summary-block.js';
export { summarizeEntries, renderSummaries, buildSummaryPrompt, loadPrompt, SUMMARIES_HEADER } from './summarize.js';
export type { SummarizeOptions, FileSummary, SummaryResult, PromptName } from './summarize.js';
