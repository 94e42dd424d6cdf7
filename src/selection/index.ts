// Criteria
export { createCriteria, isWildcard, splitList, normalizePrefix, WILDCARD } from './criteria.js';
export type { SelectionCriteria, CriteriaInput, DiffRange, GitignorePolicy, KeywordRules } from './criteria.js';

// Matching
export { matchesRule, isLikelyTextFile, isValidUtf8, fileExtension, SNIFF_BYTES } from './path-matcher.js';
export { admitsContent, hasKeywordRules, readTextFile, decodeUtf8 } from './content-filter.js';

// Traversal
export { walk } from './walker.js';
export type { WalkEntry, WalkIssue, WalkOptions } from './walker.js';

// Pipeline
export { selectFiles } from './pipeline.js';
export type { CandidateFile, AdmittedFile, SelectOptions, SelectionResult, SkippedEntry, SkipReason } from './pipeline.js';
