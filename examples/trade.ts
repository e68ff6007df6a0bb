/**
 * Stokenet walkthrough: fund an account, open a margin account, trade and clean up
 *
 * Run after `npm run build` with SURGE_NETWORK=stokenet:
 *   node dist/examples/trade.js
 */

import 'dotenv/config';
import {
  AccountStore,
  PriceLimit,
  SlippageLimit,
  createLogger,
  createSurgeClient,
  loadAccount,
  newAccount,
  requestTestTokens,
} from '../src/index.js';

const logger = createLogger('example');

async function main(): Promise<void> {
  const { config, gateway, exchange } = await createSurgeClient();
  const store = new AccountStore(config.accountDir);

  let signer = await loadAccount(config.networkId, store);
  if (!signer) {
    logger.info('No account found, creating one');
    signer = await newAccount(config.networkId, store);
    await requestTestTokens(gateway, signer);
  }
  logger.info({ account: signer.account }, 'Using account');

  const permissions = await exchange.getPermissions(signer.privateKey.publicKey());
  const marginAccount = permissions.level1[0] ?? await exchange.createMarginAccount(signer);
  logger.info({ marginAccount }, 'Using margin account');

  await exchange.createRecoveryKey(signer, marginAccount);

  const { xrd } = await gateway.networkConfiguration();
  await exchange.addCollateral(signer, { marginAccount, resource: xrd, amount: '100' });

  await exchange.marginOrderRequest(signer, {
    marginAccount,
    pair: 'BTC/USD',
    size: '0.001',
    priceLimit: PriceLimit.gte('10000'),
    slippageLimit: SlippageLimit.percent('0.3'),
  });

  const pool = await exchange.poolDetails();
  const account = await exchange.accountDetails(marginAccount);
  const pairs = await exchange.pairDetails(['BTC/USD', 'ETH/USD']);

  const active = account.activeRequests.map(request => request.index);
  if (active.length > 0) {
    await exchange.cancelRequests(signer, marginAccount, active);
  }

  logger.info({ pool, overview: account.overview, pairs: pairs.map(p => p.pair) }, 'Exchange state');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Example failed');
  process.exitCode = 1;
});
