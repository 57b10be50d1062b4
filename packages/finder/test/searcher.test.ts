import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { searchLedger } from '../src/core/searcher.js';
import type { LedgerLookup, ProbeEvent, SearchResult } from '../src/types.js';
import {
  DegenerateBracketError,
  IterationLimitError,
  LookupFailureError,
  NonMonotonicInputError,
  SearchAbortedError,
} from '../src/types.js';
import { fakeLedger, fromTable, piecewiseLinear } from './fake-ledger.js';

const logger = pino({ level: 'silent' });

// Uneven spacing: 10s per ledger, then 50s, then 10s
const FOUR_POINTS = piecewiseLinear([[10, 100], [20, 200], [25, 450], [26, 460]]);

function recordMoves(events: ProbeEvent[]): (event: ProbeEvent) => void {
  return (event) => { events.push(event); };
}

describe('searchLedger', () => {
  it('returns the latest ledger after one lookup when it already matches', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    const result = await searchLedger(460, { lookup: ledger.lookup, logger });

    expect(result).toEqual({ kind: 'exact', sample: { index: 26, closeTime: 460 }, lookups: 1, iterations: 0 });
    expect(ledger.requested).toEqual(['validated']);
  });

  it('returns the seed ledger when it matches', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    const result = await searchLedger(160, { lookup: ledger.lookup, logger });

    expect(result).toEqual({ kind: 'exact', sample: { index: 16, closeTime: 160 }, lookups: 2, iterations: 0 });
  });

  it('narrows to the adjacent pair around a target between two ledgers', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);
    const events: ProbeEvent[] = [];

    const result = await searchLedger(455, { lookup: ledger.lookup, logger }, { onProbe: recordMoves(events) });

    expect(result.kind).toBe('adjacent');
    if (result.kind !== 'adjacent') return;
    expect(result.lower).toEqual({ index: 25, closeTime: 450 });
    expect(result.upper).toEqual({ index: 26, closeTime: 460 });
    expect(result.lookups).toBe(3);
    expect(result.iterations).toBe(2);
    expect(ledger.requested).toEqual(['validated', 16, 25]);
    expect(events.map((e) => e.move)).toEqual(['latest', 'seed', 'probe-predecessor']);
  });

  it('extrapolates below the seeds and stops at the lowest permitted ledger', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);
    const events: ProbeEvent[] = [];

    const result = await searchLedger(50, { lookup: ledger.lookup, logger }, {
      minIndex: 10,
      onProbe: recordMoves(events),
    });

    expect(result).toEqual({
      kind: 'out-of-range',
      side: 'below',
      boundary: { index: 10, closeTime: 100 },
      lookups: 4,
      iterations: 3,
    });
    expect(ledger.requested).toEqual(['validated', 16, 12, 10]);
    expect(events.map((e) => e.move)).toEqual(['latest', 'seed', 'extrapolate-below', 'extrapolate-below']);
  });

  it('reports a target after the latest ledger as out of range above', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    const result = await searchLedger(10_000, { lookup: ledger.lookup, logger });

    expect(result).toEqual({
      kind: 'out-of-range',
      side: 'above',
      boundary: { index: 26, closeTime: 460 },
      lookups: 2,
      iterations: 1,
    });
  });

  it('fails the whole search when a lookup fails mid-search', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    const search = searchLedger(50, { lookup: ledger.lookup, logger });

    await expect(search).rejects.toBeInstanceOf(LookupFailureError);
    await expect(search).rejects.toMatchObject({ ref: 5, reason: 'unknown' });
    expect(ledger.requested).toEqual(['validated', 16, 12, 5]);
  });

  it('rejects a lookup that answers for a different ledger', async () => {
    const lookup = async (): Promise<{ index: number; closeTime: number }> => ({ index: 7, closeTime: 70 });

    await expect(
      searchLedger(50, { lookup, logger }, { seed: { kind: 'range', lower: 1, upper: 2 } }),
    ).rejects.toMatchObject({ name: 'LookupFailureError', ref: 1, reason: 'malformed' });
  });

  it('gives the same result whichever order the seed range is given in', async () => {
    const sorted = fakeLedger(FOUR_POINTS, 26);
    const reversed = fakeLedger(FOUR_POINTS, 26);

    const a = await searchLedger(455, { lookup: sorted.lookup, logger }, { seed: { kind: 'range', lower: 16, upper: 26 } });
    const b = await searchLedger(455, { lookup: reversed.lookup, logger }, { seed: { kind: 'range', lower: 26, upper: 16 } });

    expect(b).toEqual(a);
    expect(a.kind).toBe('adjacent');
    expect(reversed.requested).toEqual([26, 16, 25]);
  });

  it('rejects a seed range with a single ledger', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    await expect(
      searchLedger(455, { lookup: ledger.lookup, logger }, { seed: { kind: 'range', lower: 16, upper: 16 } }),
    ).rejects.toThrow('two distinct ledger indices');
    expect(ledger.requested).toEqual([]);
  });

  describe('on a noisy, nearly linear ledger', () => {
    const closeTime = (i: number): number => 1000 + 10 * i + ((i * i) % 7);
    const noisy = (i: number): number | undefined => (i >= 0 && i < 200 ? closeTime(i) : undefined);

    function checkResult(result: SearchResult, target: number): void {
      if (result.kind === 'exact') {
        expect(result.sample.closeTime).toBe(target);
        expect(closeTime(result.sample.index)).toBe(target);
        return;
      }
      expect(result.kind).toBe('adjacent');
      if (result.kind !== 'adjacent') return;
      expect(result.upper.index).toBe(result.lower.index + 1);
      expect(closeTime(result.lower.index)).toBeLessThan(target);
      expect(closeTime(result.upper.index)).toBeGreaterThan(target);
    }

    it('converges for targets across the whole range', async () => {
      for (let target = closeTime(0) + 1; target < closeTime(199); target += 37) {
        const ledger = fakeLedger(noisy, 199);
        const result = await searchLedger(target, { lookup: ledger.lookup, logger });
        checkResult(result, target);
      }
    });

    it('never widens the bracket on interpolating or probing moves', async () => {
      const narrowing = new Set(['interpolate', 'bisect', 'probe-successor', 'probe-predecessor']);

      for (let target = closeTime(0) + 3; target < closeTime(199); target += 53) {
        const events: ProbeEvent[] = [];
        const ledger = fakeLedger(noisy, 199);
        await searchLedger(target, { lookup: ledger.lookup, logger }, { onProbe: recordMoves(events) });

        let previousWidth = 10;
        for (const event of events) {
          if (event.bracket === null) continue;
          const width = event.bracket.upper.index - event.bracket.lower.index;
          if (narrowing.has(event.move)) {
            expect(width).toBeLessThanOrEqual(previousWidth);
          }
          expect(width).toBeGreaterThan(0);
          previousWidth = width;
        }
      }
    });
  });

  describe('termination strategy', () => {
    // Ledger 9 closes at 90, ledger 10 at 100, ledger 11 at 200
    const table: Record<number, number> = { 10: 100, 11: 200 };
    for (let i = 0; i < 10; i++) table[i] = i * 10;

    it('stops at the rounded bound under "nearest" even when it misses the target', async () => {
      const ledger = fakeLedger(fromTable(table), 11);

      const result = await searchLedger(95, { lookup: ledger.lookup, logger }, {
        seed: { kind: 'range', lower: 10, upper: 11 },
        termination: 'nearest',
      });

      expect(result).toEqual({
        kind: 'adjacent',
        lower: { index: 10, closeTime: 100 },
        upper: { index: 11, closeTime: 200 },
        answer: 'lower',
        lookups: 2,
        iterations: 1,
      });
    });

    it('steps outward under "bracket" until the pair contains the target', async () => {
      const ledger = fakeLedger(fromTable(table), 11);
      const events: ProbeEvent[] = [];

      const result = await searchLedger(95, { lookup: ledger.lookup, logger }, {
        seed: { kind: 'range', lower: 10, upper: 11 },
        termination: 'bracket',
        onProbe: recordMoves(events),
      });

      expect(result).toMatchObject({
        kind: 'adjacent',
        lower: { index: 9, closeTime: 90 },
        upper: { index: 10, closeTime: 100 },
        lookups: 3,
        iterations: 2,
      });
      expect(events.map((e) => e.move)).toEqual(['seed', 'seed', 'step-below']);
    });
  });

  describe('degenerate brackets', () => {
    // Ledgers 10..20 all close at 500
    const flat = (i: number): number | undefined => (i < 0 || i > 20 ? undefined : i < 10 ? i * 50 : 500);

    it('widens toward the target by default', async () => {
      const ledger = fakeLedger(flat, 20);
      const events: ProbeEvent[] = [];

      const result = await searchLedger(300, { lookup: ledger.lookup, logger }, {
        seed: { kind: 'range', lower: 10, upper: 20 },
        onProbe: recordMoves(events),
      });

      expect(result).toEqual({ kind: 'exact', sample: { index: 6, closeTime: 300 }, lookups: 4, iterations: 2 });
      expect(ledger.requested).toEqual([10, 20, 0, 6]);
      expect(events.map((e) => e.move)).toEqual(['seed', 'seed', 'extrapolate-below', 'interpolate']);
    });

    it('throws DegenerateBracketError under the "error" policy', async () => {
      const ledger = fakeLedger(flat, 20);

      const search = searchLedger(300, { lookup: ledger.lookup, logger }, {
        seed: { kind: 'range', lower: 10, upper: 20 },
        degeneratePolicy: 'error',
      });

      await expect(search).rejects.toBeInstanceOf(DegenerateBracketError);
      await expect(search).rejects.toMatchObject({ lower: { index: 10 }, upper: { index: 20 } });
    });
  });

  it('throws NonMonotonicInputError when close time decreases with the index', async () => {
    const ledger = fakeLedger(fromTable({ 10: 500, 20: 400 }), 20);

    await expect(
      searchLedger(450, { lookup: ledger.lookup, logger }, { seed: { kind: 'range', lower: 10, upper: 20 } }),
    ).rejects.toBeInstanceOf(NonMonotonicInputError);
  });

  it('gives up after maxIterations', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);

    const search = searchLedger(455, { lookup: ledger.lookup, logger }, { maxIterations: 1 });

    await expect(search).rejects.toBeInstanceOf(IterationLimitError);
    await expect(search).rejects.toMatchObject({ iterations: 1 });
  });

  it('does not look anything up once aborted', async () => {
    const ledger = fakeLedger(FOUR_POINTS, 26);
    const controller = new AbortController();
    controller.abort();

    await expect(
      searchLedger(455, { lookup: ledger.lookup, logger }, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(SearchAbortedError);
    expect(ledger.requested).toEqual([]);
  });

  it('abandons a lookup in flight when aborted', async () => {
    const controller = new AbortController();
    const lookup: LedgerLookup = (_ref, signal) => new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('request cancelled')), { once: true });
      controller.abort();
    });

    await expect(
      searchLedger(455, { lookup, logger }, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(SearchAbortedError);
  });

  describe('on a ledger with one long gap', () => {
    // Ledgers 0..50 close 10s apart, ledger 51 closes 10000s after ledger 50
    const gap = piecewiseLinear([[0, 0], [50, 500], [51, 10500], [100, 10990]]);

    it('settles on the pair around the gap for every target inside it', async () => {
      const misses: number[] = [];
      for (let target = 501; target < 10500; target++) {
        const ledger = fakeLedger(gap, 100);
        const result = await searchLedger(target, { lookup: ledger.lookup, logger });
        if (result.kind !== 'adjacent' || result.lower.index !== 50 || result.upper.index !== 51) {
          misses.push(target);
        }
      }
      expect(misses).toEqual([]);
    });

    it('keeps the target inside the bracket once it holds it', async () => {
      for (let target = 503; target < 10500; target += 97) {
        const events: ProbeEvent[] = [];
        const ledger = fakeLedger(gap, 100);
        await searchLedger(target, { lookup: ledger.lookup, logger }, { onProbe: recordMoves(events) });

        let holding = false;
        for (const event of events) {
          if (event.bracket === null) continue;
          const inside = event.bracket.lower.closeTime < target && event.bracket.upper.closeTime > target;
          if (holding) expect(inside).toBe(true);
          holding = inside;
        }
        expect(holding).toBe(true);
      }
    });

    it('halves the bracket after the same bound moves twice in a row', async () => {
      const events: ProbeEvent[] = [];
      const ledger = fakeLedger(gap, 100);

      const result = await searchLedger(624, { lookup: ledger.lookup, logger }, { onProbe: recordMoves(events) });

      expect(result).toEqual({
        kind: 'adjacent',
        lower: { index: 50, closeTime: 500 },
        upper: { index: 51, closeTime: 10500 },
        answer: 'lower',
        lookups: 8,
        iterations: 7,
      });
      expect(ledger.requested).toEqual(['validated', 90, 0, 5, 10, 50, 70, 51]);
      expect(events.map((e) => e.move)).toEqual([
        'latest', 'seed', 'extrapolate-below', 'interpolate', 'interpolate', 'bisect', 'bisect', 'probe-successor',
      ]);
    });
  });

  it('converges within the default iteration cap on a ledger with recurring long gaps', async () => {
    // Every 17th ledger closes 5000s after its predecessor
    const closeTimes = [0];
    for (let i = 1; i < 300; i++) {
      const step = i % 17 === 0 ? 5000 : i % 5 === 0 ? 1 : 3 + (i % 4);
      closeTimes.push((closeTimes[i - 1] ?? 0) + step);
    }
    const spiky = (i: number): number | undefined => closeTimes[i];
    const last = closeTimes[299] ?? 0;

    const misses: number[] = [];
    for (let target = 1; target < last; target += 7) {
      const ledger = fakeLedger(spiky, 299);
      const result = await searchLedger(target, { lookup: ledger.lookup, logger });
      const settled = result.kind === 'exact'
        ? closeTimes[result.sample.index] === target
        : result.kind === 'adjacent'
          && result.upper.index === result.lower.index + 1
          && result.lower.closeTime < target
          && result.upper.closeTime > target;
      if (!settled) misses.push(target);
    }
    expect(misses).toEqual([]);
  });

  describe('memoization', () => {
    const table = { 0: 0, 1: 10, 2: 20, 3: 30, 4: 100, 5: 300, 6: 500, 7: 600, 8: 700, 9: 800, 10: 1000 };
    const options = { seed: { kind: 'range', lower: 0, upper: 10 }, maxIndex: 10 } as const;

    it('does not fetch a ledger twice', async () => {
      const gap = piecewiseLinear([[0, 0], [50, 500], [51, 10500], [100, 10990]]);
      for (let target = 501; target < 10500; target += 41) {
        const ledger = fakeLedger(gap, 100);
        await searchLedger(target, { lookup: ledger.lookup, logger });
        const indices = ledger.requested.map((ref) => (ref === 'validated' ? 100 : ref));
        expect(new Set(indices).size).toBe(indices.length);
      }
    });

    it('reaches the same answer with the cache turned off', async () => {
      const ledger = fakeLedger(fromTable(table), 10);

      const result = await searchLedger(300, { lookup: ledger.lookup, logger }, { ...options, memoize: false });

      expect(result).toEqual({ kind: 'exact', sample: { index: 5, closeTime: 300 }, lookups: 4, iterations: 2 });
      expect(ledger.requested).toEqual([0, 10, 3, 5]);
    });
  });
});
