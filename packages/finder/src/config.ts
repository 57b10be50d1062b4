import type { AppConfig, SeedStrategy } from './types.js';
import { parseTargetTime } from './time/ledger-time.js';
import type { SearchOptions } from './core/searcher.js';

// Oldest ledger kept by full-history servers
const FIRST_AVAILABLE_LEDGER = 32570;

function mustGetEnv(key: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

function getEnv(key: string, fallback: string): string {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

function getOptionalIntEnv(key: string): number | null {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return null;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid integer, got: ${raw}`);
  }
  return parsed;
}

function getIntEnv(key: string, fallback: number): number {
  return getOptionalIntEnv(key) ?? fallback;
}

function getBoolEnv(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

function loadSeedStrategy(): SeedStrategy {
  const lower = getOptionalIntEnv('SEED_LOWER');
  const upper = getOptionalIntEnv('SEED_UPPER');

  if (lower === null && upper === null) {
    return { kind: 'latest', offset: Math.max(1, getIntEnv('SEED_OFFSET', 10)) };
  }
  if (lower === null || upper === null) {
    throw new Error('SEED_LOWER and SEED_UPPER must be set together');
  }
  if (lower === upper) {
    throw new Error(`SEED_LOWER and SEED_UPPER must differ, both are ${lower}`);
  }
  return { kind: 'range', lower, upper };
}

export function loadConfig(): AppConfig {
  const termination = getEnv('TERMINATION', 'bracket');
  if (termination !== 'bracket' && termination !== 'nearest') {
    throw new Error(`TERMINATION must be "bracket" or "nearest", got: ${termination}`);
  }

  const degeneratePolicy = getEnv('DEGENERATE_POLICY', 'widen');
  if (degeneratePolicy !== 'widen' && degeneratePolicy !== 'error') {
    throw new Error(`DEGENERATE_POLICY must be "widen" or "error", got: ${degeneratePolicy}`);
  }

  const retryBaseMs = Math.max(0, getIntEnv('RETRY_BASE_MS', 250));
  const retryMaxMs = getIntEnv('RETRY_MAX_MS', 8000);
  if (retryMaxMs < retryBaseMs) {
    throw new Error(`RETRY_MAX_MS (${retryMaxMs}) must not be less than RETRY_BASE_MS (${retryBaseMs})`);
  }

  return {
    rpcUrl: normalizeRpcUrl(getEnv('RPC_URL', 'https://s2.ripple.com:51234')),
    targetCloseTime: parseTargetTime(mustGetEnv('TARGET_TIME')),
    seed: loadSeedStrategy(),
    termination,
    degeneratePolicy,
    maxIterations: Math.max(1, getIntEnv('MAX_ITERATIONS', 64)),
    minLedgerIndex: Math.max(0, getIntEnv('MIN_LEDGER_INDEX', FIRST_AVAILABLE_LEDGER)),
    memoizeLookups: getBoolEnv('MEMOIZE_LOOKUPS', true),
    requestTimeoutMs: Math.max(1, getIntEnv('REQUEST_TIMEOUT_MS', 30000)),
    maxRetries: Math.max(1, getIntEnv('MAX_RETRIES', 5)),
    retryBaseMs,
    retryMaxMs,
    tlsRejectUnauthorized: getBoolEnv('TLS_REJECT_UNAUTHORIZED', true),
    userAgent: getEnv('USER_AGENT', 'ledger-seek'),
  };
}

export function searchOptionsFromConfig(config: AppConfig): SearchOptions {
  return {
    seed: config.seed,
    termination: config.termination,
    degeneratePolicy: config.degeneratePolicy,
    maxIterations: config.maxIterations,
    minIndex: config.minLedgerIndex,
    maxIndex: null,
    memoize: config.memoizeLookups,
  };
}

function normalizeRpcUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`RPC_URL must be an absolute URL, got: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`RPC_URL must use http or https, got: ${parsed.protocol}`);
  }
  return url.replace(/\/+$/, '');
}
