import type {
  BoundRole,
  BracketState,
  DegeneratePolicy,
  LedgerSample,
  TerminationStrategy,
} from '../types.js';
import { DegenerateBracketError, NonMonotonicInputError, ProbeMove } from '../types.js';

export interface IndexLimits {
  readonly minIndex: number;
  readonly maxIndex: number | null;
}

export interface StepRules {
  readonly termination: TerminationStrategy;
  readonly degeneratePolicy: DegeneratePolicy;
  readonly limits: IndexLimits;
}

/**
 * What the searcher does next. A `probe` fetches `index` into `role`; `kept`
 * takes the opposite role in the new bracket. A `split` fetches an index
 * inside the bracket and leaves the role to {@link splitRole}, which needs the
 * fetched close time.
 */
export type NextStep =
  | {
      readonly kind: 'probe';
      readonly move: ProbeMove;
      readonly role: BoundRole;
      readonly index: number;
      readonly kept: LedgerSample;
    }
  | { readonly kind: 'split'; readonly move: ProbeMove; readonly index: number }
  | { readonly kind: 'terminate'; readonly answer: BoundRole }
  | { readonly kind: 'out-of-range'; readonly side: 'below' | 'above'; readonly boundary: LedgerSample };

export function normalizeBracket(a: LedgerSample, b: LedgerSample): BracketState {
  return a.index <= b.index ? { lower: a, upper: b } : { lower: b, upper: a };
}

/**
 * Inverse linear interpolation: close time is the independent variable, so
 * the line through both bounds maps the target back to a ledger index.
 */
export function interpolateGuess(state: BracketState, target: number): number {
  const { lower, upper } = state;
  const m = (upper.index - lower.index) / (upper.closeTime - lower.closeTime);
  const b = lower.index - m * lower.closeTime;
  return Math.round(m * target + b);
}

export function clampIndex(index: number, limits: IndexLimits): number {
  const clamped = Math.max(index, limits.minIndex);
  return limits.maxIndex === null ? clamped : Math.min(clamped, limits.maxIndex);
}

export function containsTarget(state: BracketState, target: number): boolean {
  return target > state.lower.closeTime && target < state.upper.closeTime;
}

/**
 * `stalled` is set by the caller after the same bound was replaced twice in a
 * row; a bracket that holds the target is then halved instead of interpolated.
 */
export function nextStep(state: BracketState, target: number, rules: StepRules, stalled = false): NextStep {
  const { lower, upper } = state;

  if (lower.closeTime > upper.closeTime) {
    throw new NonMonotonicInputError(lower, upper);
  }

  const { minIndex, maxIndex } = rules.limits;
  if (target < lower.closeTime && lower.index <= minIndex) {
    return { kind: 'out-of-range', side: 'below', boundary: lower };
  }
  if (target > upper.closeTime && maxIndex !== null && upper.index >= maxIndex) {
    return { kind: 'out-of-range', side: 'above', boundary: upper };
  }

  const contained = containsTarget(state, target);
  const width = upper.index - lower.index;
  if (stalled && contained && width > 1) {
    return { kind: 'split', move: ProbeMove.BISECT, index: lower.index + Math.floor(width / 2) };
  }

  let guess: number;
  if (lower.closeTime === upper.closeTime) {
    if (rules.degeneratePolicy === 'error') {
      throw new DegenerateBracketError(lower, upper);
    }
    // No slope to follow: jump one bracket width toward the target
    guess = target < lower.closeTime ? lower.index - width : upper.index + width;
  } else {
    guess = interpolateGuess(state, target);
  }
  const nl = clampIndex(guess, rules.limits);

  if (nl < lower.index) {
    return probe(ProbeMove.EXTRAPOLATE_BELOW, 'lower', nl, lower);
  }
  if (nl > upper.index) {
    return probe(ProbeMove.EXTRAPOLATE_ABOVE, 'upper', nl, upper);
  }
  if (nl === lower.index) {
    if (width === 1) {
      return settleAdjacent(state, target, 'lower', rules.termination);
    }
    return contained
      ? { kind: 'split', move: ProbeMove.PROBE_SUCCESSOR, index: lower.index + 1 }
      : probe(ProbeMove.PROBE_SUCCESSOR, 'upper', lower.index + 1, lower);
  }
  if (nl === upper.index) {
    if (width === 1) {
      return settleAdjacent(state, target, 'upper', rules.termination);
    }
    return contained
      ? { kind: 'split', move: ProbeMove.PROBE_PREDECESSOR, index: upper.index - 1 }
      : probe(ProbeMove.PROBE_PREDECESSOR, 'lower', upper.index - 1, upper);
  }

  return { kind: 'split', move: ProbeMove.INTERPOLATE, index: nl };
}

/**
 * Which bound a sample fetched inside the bracket replaces. While the bracket
 * holds the target, the side of the target the sample falls on decides, so the
 * new bracket still holds it. Otherwise the nearer bound goes, ties to the
 * upper one.
 */
export function splitRole(state: BracketState, sample: LedgerSample, target: number): BoundRole {
  const { lower, upper } = state;
  if (containsTarget(state, target)) {
    return sample.closeTime < target ? 'lower' : 'upper';
  }
  return sample.index - lower.index <= upper.index - sample.index ? 'upper' : 'lower';
}

export function replaceBound(state: BracketState, role: BoundRole, sample: LedgerSample): BracketState {
  return role === 'lower' ? { lower: sample, upper: state.upper } : { lower: state.lower, upper: sample };
}

function settleAdjacent(
  state: BracketState,
  target: number,
  answer: BoundRole,
  termination: TerminationStrategy,
): NextStep {
  const { lower, upper } = state;
  if (termination === 'nearest' || containsTarget(state, target)) {
    return { kind: 'terminate', answer };
  }
  if (target < lower.closeTime) {
    return probe(ProbeMove.STEP_BELOW, 'lower', lower.index - 1, lower);
  }
  return probe(ProbeMove.STEP_ABOVE, 'upper', upper.index + 1, upper);
}

function probe(move: ProbeMove, role: BoundRole, index: number, kept: LedgerSample): NextStep {
  return { kind: 'probe', move, role, index, kept };
}
