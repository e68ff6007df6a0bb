/**
 * Print pool and pair state; needs no account
 *
 *   node dist/examples/market.js
 */

import 'dotenv/config';
import { createLogger, createSurgeClient } from '../src/index.js';

const logger = createLogger('example');

async function main(): Promise<void> {
  const { exchange } = await createSurgeClient();

  const pool = await exchange.poolDetails();
  const pairs = await exchange.pairDetails(['BTC/USD', 'ETH/USD']);

  logger.info({ pool }, 'Pool');
  for (const pair of pairs) {
    logger.info({
      pair: pair.pair,
      oiLong: pair.oiLong,
      oiShort: pair.oiShort,
      fundingLong24h: pair.fundingLong24h,
      fundingShort24h: pair.fundingShort24h,
    }, 'Pair');
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Example failed');
  process.exitCode = 1;
});
