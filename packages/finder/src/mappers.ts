import type { LedgerRef, LedgerSample } from './types.js';
import { MalformedResponseError, RpcError } from './types.js';

// ── Request building ──

export interface RpcRequest {
  readonly method: string;
  readonly params: readonly Record<string, unknown>[];
}

export function buildLedgerRequest(ref: LedgerRef): RpcRequest {
  return {
    method: 'ledger',
    params: [{ ledger_index: ref }],
  };
}

// ── Reply parsing ──

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

/**
 * Unwraps `{ result: { status, ... } }`, throwing RpcError for any status
 * other than "success".
 */
export function unwrapRpcResult(raw: unknown): Record<string, unknown> {
  if (!isRecord(raw)) {
    throw new MalformedResponseError('Reply is not a JSON object', 'root');
  }

  const result = raw['result'];
  if (!isRecord(result)) {
    throw new MalformedResponseError('Reply has no result object', 'result');
  }

  const status = result['status'];
  if (status !== 'success') {
    const code = typeof result['error'] === 'string' ? result['error'] : 'unknown';
    const message = typeof result['error_message'] === 'string'
      ? result['error_message']
      : `Result status is '${String(status)}', not success`;
    throw new RpcError(message, code);
  }

  return result;
}

export function toLedgerIndex(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : null;
  }
  return null;
}

export function parseLedgerReply(raw: unknown): LedgerSample {
  const result = unwrapRpcResult(raw);

  const header = result['ledger'];
  if (!isRecord(header)) {
    throw new MalformedResponseError('Result has no ledger header', 'ledger');
  }

  const index = toLedgerIndex(header['ledger_index']) ?? toLedgerIndex(result['ledger_index']);
  if (index === null) {
    throw new MalformedResponseError('Ledger header has no usable ledger_index', 'ledger_index');
  }

  const closeTime = header['close_time'];
  if (typeof closeTime !== 'number' || !Number.isSafeInteger(closeTime)) {
    throw new MalformedResponseError(
      `Ledger ${index} has no usable close_time: ${String(closeTime)}`,
      'close_time',
    );
  }

  return { index, closeTime };
}
