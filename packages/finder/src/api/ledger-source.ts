import type { AppConfig, LedgerRef, LedgerSample } from '../types.js';
import { toLookupFailure } from '../types.js';
import type { HttpClient } from './http-client.js';
import { withRetry } from './middleware/retry.js';
import { buildLedgerRequest, parseLedgerReply } from '../mappers.js';
import type { Logger } from '../logger.js';

export interface LedgerSource {
  readonly lookup: (ref: LedgerRef, signal?: AbortSignal) => Promise<LedgerSample>;
}

export type LedgerSourceConfig = Pick<AppConfig, 'rpcUrl' | 'maxRetries' | 'retryBaseMs' | 'retryMaxMs'>;

export function createLedgerSource(
  httpClient: HttpClient,
  config: LedgerSourceConfig,
  logger: Logger,
): LedgerSource {
  async function fetchLedger(ref: LedgerRef, signal: AbortSignal | undefined): Promise<LedgerSample> {
    const response = await httpClient.post(config.rpcUrl, buildLedgerRequest(ref), { signal });
    // Parsed inside the retried call so tooBusy replies are retried too
    return parseLedgerReply(response.body);
  }

  async function lookup(ref: LedgerRef, signal?: AbortSignal): Promise<LedgerSample> {
    const fetchFn = withRetry(() => fetchLedger(ref, signal), config, logger, `ledger:${String(ref)}`, signal);
    try {
      return await fetchFn();
    } catch (err) {
      throw toLookupFailure(ref, err);
    }
  }

  return { lookup };
}
