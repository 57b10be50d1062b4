export { searchLedger, DEFAULT_SEARCH_OPTIONS } from './core/searcher.js';
export type { SearchContext, SearchOptions } from './core/searcher.js';
export { nextStep, interpolateGuess, normalizeBracket, splitRole, replaceBound } from './core/bracket.js';
export type { NextStep, StepRules, IndexLimits } from './core/bracket.js';
export { describeResult, describeSample } from './core/report.js';
export { createHttpClient } from './api/http-client.js';
export type { HttpClient, RequestOptions } from './api/http-client.js';
export { createLedgerSource } from './api/ledger-source.js';
export type { LedgerSource } from './api/ledger-source.js';
export { toLedgerTime, fromLedgerTime, formatLedgerTime, parseTargetTime } from './time/ledger-time.js';
export * from './types.js';
