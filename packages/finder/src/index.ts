import { loadConfig, searchOptionsFromConfig } from './config.js';
import { createLogger } from './logger.js';
import { createHttpClient } from './api/http-client.js';
import { createLedgerSource } from './api/ledger-source.js';
import { searchLedger } from './core/searcher.js';
import { describeProbe, describeResult } from './core/report.js';
import { formatLedgerTime } from './time/ledger-time.js';

const logger = createLogger();
const controller = new AbortController();

function shutdown(signal: string): void {
  if (controller.signal.aborted) return;
  logger.info({ signal }, 'Shutdown signal received, aborting search');
  controller.abort();
}

process.on('SIGTERM', () => { shutdown('SIGTERM'); });
process.on('SIGINT', () => { shutdown('SIGINT'); });

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info(
    {
      rpcOrigin: new URL(config.rpcUrl).origin,
      targetCloseTime: config.targetCloseTime,
      targetUtc: formatLedgerTime(config.targetCloseTime),
      seed: config.seed,
      termination: config.termination,
    },
    'Looking for ledger',
  );

  const httpClient = createHttpClient(config);
  const source = createLedgerSource(httpClient, config, logger);

  try {
    const result = await searchLedger(config.targetCloseTime, { lookup: source.lookup, logger }, {
      ...searchOptionsFromConfig(config),
      signal: controller.signal,
      onProbe: (event) => logger.info(describeProbe(event), 'Probe'),
    });
    logger.info(describeResult(result), 'Search complete');
  } finally {
    // Guaranteed cleanup even on errors
    await httpClient.close();
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
