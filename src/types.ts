/**
 * Core types for the Surge SDK
 *
 * Ledger values are decoded from the Gateway's programmatic JSON. Amounts that
 * the SDK derives (values, PnL, margins) are plain numbers in the pair's quote
 * currency.
 */

import type { PrivateKey } from '@radixdlt/radix-engine-toolkit';
import type { Decimal } from 'decimal.js';
import type { PriceLimit, SlippageLimit } from './limits.js';

/** Networks the SDK ships presets for */
export const NetworkId = {
  MAINNET: 1,
  STOKENET: 2,
} as const;

export type NetworkName = 'mainnet' | 'stokenet';

export interface NetworkPreset {
  networkId: number;
  gatewayUrl: string;
  envRegistry: string;
}

export const NETWORKS: Record<NetworkName, NetworkPreset> = {
  mainnet: {
    networkId: NetworkId.MAINNET,
    gatewayUrl: 'https://mainnet.radixdlt.com',
    envRegistry: 'component_rdx1cr7gxwrvkjfh74f6w5hws7njt9z6ng5uqwdp23x972gx94lfg7cwn4',
  },
  stokenet: {
    networkId: NetworkId.STOKENET,
    gatewayUrl: 'https://stokenet.radixdlt.com',
    envRegistry: 'component_tdx_2_1czj40n6730x4saae7mnpe20htre57rdwvzvnfcuvcusy9s0jn6qqmf',
  },
};

export const DEFAULT_ORACLE_URL = 'https://hermes.pyth.network/v2';

/** Protocol call constants */
export const PROTOCOL_CONFIG = {
  LOCK_FEE: '10',                        // XRD locked for fees on every write
  REQUEST_EXPIRY_SECONDS: 10_000_000_000n,
  REQUEST_DELAY_SECONDS: 0n,
  ACCOUNT_HISTORY_LIMIT: 30n,            // Requests returned by get_account_details
  DAYS_PER_YEAR: 365,
} as const;

/** Names resolved through the environment registry */
export const REGISTRY_VARIABLES = [
  'protocol_resource',
  'lp_resource',
  'referral_resource',
  'recovery_key_resource',
  'base_resource',
  'keeper_reward_resource',
  'fee_oath_resource',
  'token_wrapper_component',
  'config_component',
  'pool_component',
  'referral_generator_component',
  'permission_registry_component',
  'oracle_component',
  'fee_distributor_component',
  'fee_delegator_component',
  'exchange_component',
  'account_package',
] as const;

export type RegistryVariable = typeof REGISTRY_VARIABLES[number];

export type ProtocolVariables = Partial<Record<RegistryVariable, string>>;

/** Pair id → oracle price */
export type Prices = Record<string, number>;

/** Key material and the account that pays for and signs a transaction */
export interface AccountSigner {
  account: string;
  privateKey: PrivateKey;
}

/** An open margin position */
export interface Position {
  pair: string;
  size: number;                 // Positive for long, negative for short
  value: number;
  entryPrice: number;
  markPrice: number;
  margin: number;
  marginMaintenance: number;
  pnl: number;
  roi: number;                  // Percent
}

/** Collateral held by a margin account */
export interface Collateral {
  pair: string;                 // Pair used to value the collateral
  resource: string;
  markPrice: number;
  amount: number;
  value: number;
  discount: number;
  valueDiscounted: number;
  margin: number;
}

/** Aggregated figures for a margin account */
export interface AccountOverview {
  accountValue: number;
  accountValueDiscounted: number;
  availableMargin: number;
  availableMarginMaintenance: number;
  balance: number;
  totalPnl: number;
  totalMargin: number;
  totalMarginMaintenance: number;
  totalCollateralValue: number;
  totalCollateralValueDiscounted: number;
}

/** Liquidity pool state, as decimal strings */
export interface PoolDetails {
  tokenAmount: string;          // Real balance
  balance: string;              // Virtual balance
  unrealizedPoolFunding: string;
  pnlSnap: string;
  skewRatio: string;
  skewRatioCap: string;
  lpSupply: string;
  lpPrice: string;
}

/** Per-pair protocol parameters */
export interface PairConfig {
  pair: string;
  priceMaxAge: number;          // Seconds
  oiMax: number;
  tradeSizeMin: number;
  updatePriceDeltaRatio: number;
  updatePeriodSeconds: number;
  margin: number;
  marginMaintenance: number;
  funding1: number;
  funding2: number;
  funding2Delta: number;
  funding2Decay: number;
  fundingPool0: number;
  fundingPool1: number;
  fundingShare: number;
  fee0: number;
  fee1: number;
}

/** Funding figures derived from a pair's open interest */
export interface FundingRates {
  funding1: number;
  funding2: number;
  funding2Raw: number;
  funding2Max: number;
  funding2Min: number;
  fundingLongApr: number;
  fundingLong24h: number;
  fundingShortApr: number;
  fundingShort24h: number;
  fundingPool24h: number;
}

/** Current state of a trading pair */
export interface PairDetails extends FundingRates {
  pair: string;
  oiLong: number;
  oiShort: number;
  oiNet: number;
  cost: number;
  skew: number;
  pairConfig: PairConfig;
}

export enum RequestType {
  REMOVE_COLLATERAL = 'Remove Collateral',
  MARKET_LONG = 'Market Long',
  MARKET_SHORT = 'Market Short',
  STOP_LONG = 'Stop Long',
  LIMIT_SHORT = 'Limit Short',
  LIMIT_LONG = 'Limit Long',
  STOP_SHORT = 'Stop Short',
  UNKNOWN = 'Unknown',
}

export enum RequestStatus {
  DORMANT = 'Dormant',
  ACTIVE = 'Active',
  EXECUTED = 'Executed',
  CANCELED = 'Canceled',
  EXPIRED = 'Expired',
  FAILED = 'Failed',
  UNKNOWN = 'Unknown',
}

export interface RequestClaim {
  resource: string;
  size: string;
}

export interface RemoveCollateralDetails {
  kind: 'removeCollateral';
  targetAccount: string;
  claims: RequestClaim[];
}

export interface MarginOrderDetails {
  kind: 'marginOrder';
  pair: string;
  size: number;
  reduceOnly: boolean;
  limitPrice: PriceLimit;
  limitSlippage: SlippageLimit;
  activateRequests: string[];
  cancelRequests: string[];
}

/** An entry in a margin account's request queue */
export interface AccountRequest {
  type: RequestType;
  index: number;
  submission: number;           // Unix seconds
  expiry: number;               // Unix seconds
  status: RequestStatus;
  details: RemoveCollateralDetails | MarginOrderDetails | null;
}

export interface AccountDetails {
  balance: number;
  positions: Position[];
  collaterals: Collateral[];
  validRequestsStart: number;   // First valid request index (inclusive)
  activeRequests: AccountRequest[];
  requestsHistory: AccountRequest[];
  overview: AccountOverview;
}

/** Margin accounts a key holds each permission level over */
export interface Permissions {
  level1: string[];
  level2: string[];
  level3: string[];
}

export interface LedgerState {
  network: NetworkName;
  networkId: number;
  stateVersion: number;
  epoch: number;
}

export interface NetworkConfiguration {
  networkId: number;
  networkName: string;
  xrd: string;
  faucet: string;
  ed25519VirtualBadge: string;
  secp256k1VirtualBadge: string;
}

export type TransactionStatus = 'Unknown' | 'CommittedSuccess' | 'CommittedFailure' | 'Pending' | 'Rejected';

/** A compiled, notarized transaction ready to submit */
export interface BuiltTransaction {
  payload: string;              // Hex
  intent: string;               // Intent hash id (txid_...)
}

/** Parameters for a collateral withdrawal request */
export interface CollateralClaim {
  resource: string;
  amount: DecimalInput;
}

/** Amounts accepted from callers */
export type DecimalInput = Decimal.Value;

export interface MarginOrderParams {
  marginAccount: string;
  pair: string;
  size: DecimalInput;           // Positive for long, negative for short
  reduceOnly?: boolean;
  priceLimit?: PriceLimit;
  slippageLimit?: SlippageLimit;
  delaySeconds?: bigint;
  expirySeconds?: bigint;
}

export interface MarginOrderTpSlParams extends MarginOrderParams {
  priceTp?: DecimalInput;
  priceSl?: DecimalInput;
}

export interface AddCollateralParams {
  marginAccount: string;
  resource: string;
  amount: DecimalInput;
}

export interface RemoveCollateralParams {
  marginAccount: string;
  claims: CollateralClaim[];
  targetAccount?: string;       // Defaults to the signing account
  expirySeconds?: bigint;
}

/** Account key persisted between runs */
export interface StoredAccount {
  networkId: number;
  privateKey: string;           // Hex
  account: string;
}
