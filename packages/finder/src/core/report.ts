import type { LedgerSample, ProbeEvent, SearchResult } from '../types.js';
import { formatLedgerTime } from '../time/ledger-time.js';

export interface SampleRecord {
  readonly index: number;
  readonly closeTime: number;
  readonly closeTimeUtc: string;
}

export function describeSample(sample: LedgerSample): SampleRecord {
  return {
    index: sample.index,
    closeTime: sample.closeTime,
    closeTimeUtc: formatLedgerTime(sample.closeTime),
  };
}

export function describeProbe(event: ProbeEvent): Record<string, unknown> {
  return {
    iteration: event.iteration,
    move: event.move,
    ...describeSample(event.sample),
    ...(event.bracket === null
      ? {}
      : { lowerIndex: event.bracket.lower.index, upperIndex: event.bracket.upper.index }),
  };
}

export function describeResult(result: SearchResult): Record<string, unknown> {
  const stats = { lookups: result.lookups, iterations: result.iterations };

  switch (result.kind) {
    case 'exact':
      return { result: 'exact', ledger: describeSample(result.sample), ...stats };
    case 'adjacent':
      return {
        result: 'adjacent',
        lower: describeSample(result.lower),
        upper: describeSample(result.upper),
        answer: result.answer === 'lower' ? result.lower.index : result.upper.index,
        ...stats,
      };
    case 'out-of-range':
      return { result: 'out-of-range', side: result.side, boundary: describeSample(result.boundary), ...stats };
  }
}
