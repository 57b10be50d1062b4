// Ledger close times count seconds from 2000-01-01T00:00:00Z.
export const LEDGER_EPOCH_UNIX_SECONDS = 946_684_800;

export function toLedgerTime(unixMs: number): number {
  return Math.floor(unixMs / 1000) - LEDGER_EPOCH_UNIX_SECONDS;
}

export function fromLedgerTime(closeTime: number): Date {
  return new Date((closeTime + LEDGER_EPOCH_UNIX_SECONDS) * 1000);
}

export function formatLedgerTime(closeTime: number): string {
  return fromLedgerTime(closeTime).toISOString().replace('.000Z', 'Z');
}

/**
 * Accepts either an integer number of ledger-epoch seconds or any date string
 * `Date.parse` understands.
 */
export function parseTargetTime(raw: string): number {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const parsed = Date.parse(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid target time: ${raw}`);
  }

  const closeTime = toLedgerTime(parsed);
  if (closeTime < 0) {
    throw new Error(`Target time ${raw} is before the ledger epoch`);
  }
  return closeTime;
}
