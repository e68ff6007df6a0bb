/**
 * Surge SDK
 *
 * TypeScript SDK for the Surge margin-trading protocol on the Radix network.
 */

export { Api } from './api.js';
export { Gateway, DEFAULT_GATEWAY_URL, DEFAULT_NETWORK_ID } from './gateway.js';
export type { GatewayOptions, CommittedTransaction, ComponentHistory, TransactionPreview } from './gateway.js';
export { Oracle } from './oracle.js';
export type { PriceFeed } from './oracle.js';
export { Exchange, defaultEnvRegistry } from './exchange.js';
export { PriceLimit, SlippageLimit } from './limits.js';
export type { PriceLimitKind, SlippageLimitKind } from './limits.js';
export {
  parseAccountDetails,
  parsePermissions,
  parsePosition,
  parseCollateral,
  parseRequest,
  computeAccountOverview,
  getPairIds,
  orderType,
  requestStatus,
} from './account.js';
export { parsePairDetails, parsePairConfig, markPrice } from './pair.js';
export { parsePoolDetails } from './pool.js';
export * as manifests from './manifests.js';
export { ManifestBuilder, ManifestValue, toDecimalString } from './utils/manifest.js';
export type { ArrayKind } from './utils/manifest.js';
export { calculateFundingRates } from './utils/funding.js';
export { publicKeyHash, signatureBadgeId } from './utils/keys.js';
export type { ProgrammaticValue, ProgrammaticEntry } from './utils/programmatic.js';
export { AccountStore, newAccount, loadAccount, requestTestTokens } from './accounts.js';
export { loadConfig } from './config.js';
export type { SurgeConfig } from './config.js';
export { createSurgeClient, resolveConfig } from './client.js';
export type { SurgeClient, SurgeClientOptions } from './client.js';
export { createLogger, setLogLevel, LOG_LEVELS } from './logger.js';
export type { LogLevel } from './logger.js';
export { SurgeError, ErrorCodes } from './errors.js';
export * from './types.js';
