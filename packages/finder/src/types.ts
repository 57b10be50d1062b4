// ── Ledger types ──

export interface LedgerSample {
  readonly index: number;
  readonly closeTime: number; // seconds since the ledger epoch
}

/** A ledger index, or the most recent validated ledger. */
export type LedgerRef = number | 'validated';

export type LedgerLookup = (ref: LedgerRef, signal?: AbortSignal) => Promise<LedgerSample>;

// ── Search types ──

export interface BracketState {
  readonly lower: LedgerSample;
  readonly upper: LedgerSample;
}

export type BoundRole = 'lower' | 'upper';

export const ProbeMove = {
  LATEST: 'latest',
  SEED: 'seed',
  EXTRAPOLATE_BELOW: 'extrapolate-below',
  EXTRAPOLATE_ABOVE: 'extrapolate-above',
  PROBE_SUCCESSOR: 'probe-successor',
  PROBE_PREDECESSOR: 'probe-predecessor',
  INTERPOLATE: 'interpolate',
  BISECT: 'bisect',
  STEP_BELOW: 'step-below',
  STEP_ABOVE: 'step-above',
} as const;

export type ProbeMove = (typeof ProbeMove)[keyof typeof ProbeMove];

export interface ProbeEvent {
  readonly iteration: number;
  readonly move: ProbeMove;
  readonly sample: LedgerSample;
  // Bracket after the update; null while seeding
  readonly bracket: BracketState | null;
}

export type SeedStrategy =
  | { readonly kind: 'latest'; readonly offset: number }
  | { readonly kind: 'range'; readonly lower: number; readonly upper: number };

export type TerminationStrategy = 'bracket' | 'nearest';

export type DegeneratePolicy = 'widen' | 'error';

export interface SearchStats {
  readonly lookups: number;
  readonly iterations: number;
}

export type SearchResult =
  | ({ readonly kind: 'exact'; readonly sample: LedgerSample } & SearchStats)
  | ({
      readonly kind: 'adjacent';
      readonly lower: LedgerSample;
      readonly upper: LedgerSample;
      readonly answer: BoundRole;
    } & SearchStats)
  | ({
      readonly kind: 'out-of-range';
      readonly side: 'below' | 'above';
      readonly boundary: LedgerSample;
    } & SearchStats);

// ── Error types ──

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly method: string,
    readonly url: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RpcError extends Error {
  constructor(
    message: string,
    readonly errorCode: string,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export class MalformedResponseError extends Error {
  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export type LookupFailureReason = 'transport' | 'status' | 'malformed' | 'unknown';

export class LookupFailureError extends Error {
  constructor(
    message: string,
    readonly ref: LedgerRef,
    readonly reason: LookupFailureReason,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'LookupFailureError';
  }
}

export class DegenerateBracketError extends Error {
  constructor(
    readonly lower: LedgerSample,
    readonly upper: LedgerSample,
  ) {
    super(`Ledgers ${lower.index} and ${upper.index} share close time ${lower.closeTime}`);
    this.name = 'DegenerateBracketError';
  }
}

export class NonMonotonicInputError extends Error {
  constructor(
    readonly lower: LedgerSample,
    readonly upper: LedgerSample,
  ) {
    super(
      `Close time decreases from ledger ${lower.index} (${lower.closeTime}) to ledger ${upper.index} (${upper.closeTime})`,
    );
    this.name = 'NonMonotonicInputError';
  }
}

export class IterationLimitError extends Error {
  constructor(readonly iterations: number) {
    super(`Search did not converge within ${iterations} iterations`);
    this.name = 'IterationLimitError';
  }
}

export class SearchAbortedError extends Error {
  constructor() {
    super('Search aborted');
    this.name = 'SearchAbortedError';
  }
}

export function toLookupFailure(ref: LedgerRef, err: unknown): LookupFailureError {
  if (err instanceof LookupFailureError) return err;

  const detail = err instanceof Error ? err.message : String(err);
  let reason: LookupFailureReason = 'unknown';
  if (err instanceof HttpError) reason = 'transport';
  else if (err instanceof RpcError) reason = 'status';
  else if (err instanceof MalformedResponseError) reason = 'malformed';

  return new LookupFailureError(`Lookup of ledger ${String(ref)} failed: ${detail}`, ref, reason, err);
}

// ── Config type ──

export interface AppConfig {
  readonly rpcUrl: string;
  readonly targetCloseTime: number;
  readonly seed: SeedStrategy;
  readonly termination: TerminationStrategy;
  readonly degeneratePolicy: DegeneratePolicy;
  readonly maxIterations: number;
  readonly minLedgerIndex: number;
  readonly memoizeLookups: boolean;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
  readonly tlsRejectUnauthorized: boolean;
  readonly userAgent: string;
}
