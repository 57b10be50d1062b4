import type {
  BoundRole,
  BracketState,
  DegeneratePolicy,
  LedgerLookup,
  LedgerRef,
  LedgerSample,
  ProbeEvent,
  SearchResult,
  SearchStats,
  SeedStrategy,
  TerminationStrategy,
} from '../types.js';
import {
  IterationLimitError,
  LookupFailureError,
  ProbeMove,
  SearchAbortedError,
  toLookupFailure,
} from '../types.js';
import { nextStep, normalizeBracket, replaceBound, splitRole, type StepRules } from './bracket.js';
import type { Logger } from '../logger.js';

export interface SearchContext {
  readonly lookup: LedgerLookup;
  readonly logger: Logger;
}

export interface SearchOptions {
  readonly seed: SeedStrategy;
  readonly termination: TerminationStrategy;
  readonly degeneratePolicy: DegeneratePolicy;
  readonly maxIterations: number;
  readonly minIndex: number;
  readonly maxIndex: number | null;
  readonly memoize: boolean;
  readonly signal?: AbortSignal;
  readonly onProbe?: (event: ProbeEvent) => void;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  seed: { kind: 'latest', offset: 10 },
  termination: 'bracket',
  degeneratePolicy: 'widen',
  maxIterations: 64,
  minIndex: 0,
  maxIndex: null,
  memoize: true,
};

type SeedOutcome =
  | { readonly kind: 'settled'; readonly result: SearchResult }
  | { readonly kind: 'bracket'; readonly state: BracketState; readonly maxIndex: number | null };

/**
 * Find the ledger whose close time equals `target`, or the adjacent pair of
 * ledgers around it. One lookup is in flight at a time.
 */
export async function searchLedger(
  target: number,
  ctx: SearchContext,
  overrides: Partial<SearchOptions> = {},
): Promise<SearchResult> {
  const options: SearchOptions = { ...DEFAULT_SEARCH_OPTIONS, ...overrides };
  const { logger } = ctx;
  const cache = new Map<number, LedgerSample>();
  let lookups = 0;
  let iterations = 0;

  function stats(): SearchStats {
    return { lookups, iterations };
  }

  function checkAborted(): void {
    if (options.signal?.aborted === true) {
      throw new SearchAbortedError();
    }
  }

  async function fetchSample(ref: LedgerRef): Promise<LedgerSample> {
    if (options.memoize && typeof ref === 'number') {
      const cached = cache.get(ref);
      if (cached !== undefined) return cached;
    }

    lookups++;
    let sample: LedgerSample;
    try {
      sample = await ctx.lookup(ref, options.signal);
    } catch (err) {
      if (options.signal?.aborted === true) {
        throw new SearchAbortedError();
      }
      throw toLookupFailure(ref, err);
    }

    if (typeof ref === 'number' && sample.index !== ref) {
      throw new LookupFailureError(
        `Requested ledger ${ref} but received ledger ${sample.index}`,
        ref,
        'malformed',
      );
    }

    if (options.memoize) cache.set(sample.index, sample);
    return sample;
  }

  function emit(move: ProbeMove, sample: LedgerSample, bracket: BracketState | null): void {
    logger.debug({ iteration: iterations, move, index: sample.index, closeTime: sample.closeTime }, 'Probe');
    options.onProbe?.({ iteration: iterations, move, sample, bracket });
  }

  function exact(sample: LedgerSample): SearchResult {
    return { kind: 'exact', sample, ...stats() };
  }

  async function seedLatest(offset: number): Promise<SeedOutcome> {
    const latest = await fetchSample('validated');
    emit(ProbeMove.LATEST, latest, null);
    if (latest.closeTime === target) {
      return { kind: 'settled', result: exact(latest) };
    }

    const seedIndex = Math.max(latest.index - offset, options.minIndex);
    if (seedIndex >= latest.index) {
      // Nothing below the latest ledger is permitted
      const side = target < latest.closeTime ? 'below' : 'above';
      return { kind: 'settled', result: { kind: 'out-of-range', side, boundary: latest, ...stats() } };
    }

    const seed = await fetchSample(seedIndex);
    emit(ProbeMove.SEED, seed, null);
    if (seed.closeTime === target) {
      return { kind: 'settled', result: exact(seed) };
    }

    const maxIndex = options.maxIndex === null ? latest.index : Math.min(options.maxIndex, latest.index);
    return { kind: 'bracket', state: normalizeBracket(seed, latest), maxIndex };
  }

  async function seedRange(first: number, second: number): Promise<SeedOutcome> {
    if (first === second) {
      throw new Error(`Seed range needs two distinct ledger indices, got ${first} twice`);
    }

    const a = await fetchSample(first);
    emit(ProbeMove.SEED, a, null);
    if (a.closeTime === target) {
      return { kind: 'settled', result: exact(a) };
    }

    const b = await fetchSample(second);
    emit(ProbeMove.SEED, b, null);
    if (b.closeTime === target) {
      return { kind: 'settled', result: exact(b) };
    }

    return { kind: 'bracket', state: normalizeBracket(a, b), maxIndex: options.maxIndex };
  }

  checkAborted();
  const seeded = options.seed.kind === 'latest'
    ? await seedLatest(options.seed.offset)
    : await seedRange(options.seed.lower, options.seed.upper);

  if (seeded.kind === 'settled') {
    logger.debug({ result: seeded.result.kind, lookups }, 'Search settled while seeding');
    return seeded.result;
  }

  const rules: StepRules = {
    termination: options.termination,
    degeneratePolicy: options.degeneratePolicy,
    limits: { minIndex: options.minIndex, maxIndex: seeded.maxIndex },
  };
  let state = seeded.state;
  let lastSplit: BoundRole | null = null;
  let splitStreak = 0;

  while (true) {
    checkAborted();
    iterations++;
    if (iterations > options.maxIterations) {
      throw new IterationLimitError(options.maxIterations);
    }

    const step = nextStep(state, target, rules, splitStreak >= 2);

    if (step.kind === 'terminate') {
      return { kind: 'adjacent', lower: state.lower, upper: state.upper, answer: step.answer, ...stats() };
    }
    if (step.kind === 'out-of-range') {
      return { kind: 'out-of-range', side: step.side, boundary: step.boundary, ...stats() };
    }

    const sample = await fetchSample(step.index);
    if (step.kind === 'split') {
      const role = splitRole(state, sample, target);
      splitStreak = role === lastSplit ? splitStreak + 1 : 1;
      lastSplit = role;
      state = replaceBound(state, role, sample);
    } else {
      splitStreak = 0;
      lastSplit = null;
      state = step.role === 'lower'
        ? { lower: sample, upper: step.kept }
        : { lower: step.kept, upper: sample };
    }
    emit(step.move, sample, state);

    if (sample.closeTime === target) {
      return exact(sample);
    }
  }
}
