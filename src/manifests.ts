/**
 * Manifests for Surge exchange calls
 *
 * Read calls are a single CALL_METHOD meant for preview. Write calls lock the
 * fee from the signing account first. The fee oath argument is always None.
 */

import { Decimal } from 'decimal.js';
import { SurgeError } from './errors.js';
import { PriceLimit, SlippageLimit } from './limits.js';
import type {
  AddCollateralParams,
  DecimalInput,
  MarginOrderParams,
  MarginOrderTpSlParams,
  RemoveCollateralParams,
} from './types.js';
import { PROTOCOL_CONFIG } from './types.js';
import {
  ManifestBuilder,
  address,
  array,
  bool,
  bucket,
  decimal,
  enumeration,
  none,
  nonFungibleGlobalId,
  some,
  str,
  toDecimalString,
  tuple,
  u64,
  u8,
} from './utils/manifest.js';
import type { ManifestValue } from './utils/manifest.js';

/** Bucket holding collateral between the withdraw and add_collateral */
const COLLATERAL_BUCKET = 'bucket1';

/** Status a new margin order is created with (active) */
const ORDER_STATUS_ACTIVE = 1;

/**
 * Access rule requiring a signature that yields the given badge
 */
export function signatureRule(badgeId: string): ManifestValue {
  return enumeration(2, enumeration(0, enumeration(0, enumeration(0, nonFungibleGlobalId(badgeId)))));
}

function positive(value: DecimalInput, name: string): string {
  const amount = toDecimalString(value, name);
  if (!new Decimal(amount).gt(0)) {
    throw SurgeError.invalidAmount(name, amount, 'must be greater than zero');
  }
  return amount;
}

function nonZero(value: DecimalInput, name: string): string {
  const amount = toDecimalString(value, name);
  if (new Decimal(amount).isZero()) {
    throw SurgeError.invalidAmount(name, amount, 'must not be zero');
  }
  return amount;
}

function writeManifest(account: string): ManifestBuilder {
  return new ManifestBuilder().lockFee(account, PROTOCOL_CONFIG.LOCK_FEE);
}

export function getVariablesManifest(registry: string, names: readonly string[]): string {
  return new ManifestBuilder()
    .callMethod(registry, 'get_variables', [array('String', ...names.map(str))])
    .build();
}

export function getAccountDetailsManifest(
  exchange: string,
  marginAccount: string,
  historyLimit: bigint = PROTOCOL_CONFIG.ACCOUNT_HISTORY_LIMIT
): string {
  return new ManifestBuilder()
    .callMethod(exchange, 'get_account_details', [address(marginAccount), u64(historyLimit), none()])
    .build();
}

export function getPoolDetailsManifest(exchange: string): string {
  return new ManifestBuilder().callMethod(exchange, 'get_pool_details').build();
}

export function getPairDetailsManifest(exchange: string, pairIds: string[]): string {
  return new ManifestBuilder()
    .callMethod(exchange, 'get_pair_details', [array('String', ...pairIds.map(str))])
    .build();
}

export function getPermissionsManifest(exchange: string, badgeId: string): string {
  return new ManifestBuilder()
    .callMethod(exchange, 'get_permissions', [signatureRule(badgeId)])
    .build();
}

/**
 * Create a margin account owned by the key behind badgeId
 */
export function createAccountManifest(exchange: string, account: string, badgeId: string): string {
  return writeManifest(account)
    .callMethod(exchange, 'create_account', [
      none(),                   // Fee oath
      signatureRule(badgeId),   // Initial rule
      array('Bucket'),          // Initial collateral
      none(),                   // Referral id
      none(),                   // Referral code
    ])
    .build();
}

export function createRecoveryKeyManifest(exchange: string, account: string, marginAccount: string): string {
  return writeManifest(account)
    .callMethod(exchange, 'create_recovery_key', [none(), address(marginAccount)])
    .depositEntireWorktop(account)
    .build();
}

export function addCollateralManifest(exchange: string, account: string, params: AddCollateralParams): string {
  const amount = positive(params.amount, 'collateral amount');
  return writeManifest(account)
    .withdraw(account, params.resource, amount)
    .takeAllFromWorktop(params.resource, COLLATERAL_BUCKET)
    .callMethod(exchange, 'add_collateral', [
      none(),
      address(params.marginAccount),
      array('Bucket', bucket(COLLATERAL_BUCKET)),
    ])
    .build();
}

export function removeCollateralRequestManifest(
  exchange: string,
  account: string,
  params: RemoveCollateralParams
): string {
  if (params.claims.length === 0) {
    throw SurgeError.invalidRequest('at least one collateral claim is required');
  }
  const claims = params.claims.map(claim =>
    tuple(address(claim.resource), decimal(positive(claim.amount, 'claim amount')))
  );

  return writeManifest(account)
    .callMethod(exchange, 'remove_collateral_request', [
      none(),
      u64(params.expirySeconds ?? PROTOCOL_CONFIG.REQUEST_EXPIRY_SECONDS),
      address(params.marginAccount),
      address(params.targetAccount ?? account),
      array('Tuple', ...claims),
    ])
    .build();
}

// Arguments shared by margin_order_request and margin_order_tp_sl_request
function orderArgs(params: MarginOrderParams): ManifestValue[] {
  return [
    none(),
    u64(params.delaySeconds ?? PROTOCOL_CONFIG.REQUEST_DELAY_SECONDS),
    u64(params.expirySeconds ?? PROTOCOL_CONFIG.REQUEST_EXPIRY_SECONDS),
    address(params.marginAccount),
    str(params.pair),
    decimal(nonZero(params.size, 'order size')),
    bool(params.reduceOnly ?? false),
    (params.priceLimit ?? PriceLimit.none()).toManifestValue(),
    (params.slippageLimit ?? SlippageLimit.none()).toManifestValue(),
  ];
}

export function marginOrderRequestManifest(exchange: string, account: string, params: MarginOrderParams): string {
  return writeManifest(account)
    .callMethod(exchange, 'margin_order_request', [
      ...orderArgs(params),
      array('Enum'),            // Requests to activate
      array('Enum'),            // Requests to cancel
      u8(ORDER_STATUS_ACTIVE),
    ])
    .build();
}

export function marginOrderTpSlRequestManifest(
  exchange: string,
  account: string,
  params: MarginOrderTpSlParams
): string {
  const optionalPrice = (value: DecimalInput | undefined, name: string): ManifestValue =>
    value === undefined ? none() : some(decimal(positive(value, name)));

  return writeManifest(account)
    .callMethod(exchange, 'margin_order_tp_sl_request', [
      ...orderArgs(params),
      optionalPrice(params.priceTp, 'take profit price'),
      optionalPrice(params.priceSl, 'stop loss price'),
    ])
    .build();
}

export function cancelRequestsManifest(
  exchange: string,
  account: string,
  marginAccount: string,
  indexes: Array<number | bigint>
): string {
  if (indexes.length === 0) {
    throw SurgeError.invalidRequest('no request indexes to cancel');
  }
  for (const index of indexes) {
    if (typeof index === 'number' ? !Number.isInteger(index) || index < 0 : index < 0n) {
      throw SurgeError.invalidRequest(`request index ${index} is not a non-negative integer`);
    }
  }

  return writeManifest(account)
    .callMethod(exchange, 'cancel_requests', [none(), address(marginAccount), array('U64', ...indexes.map(u64))])
    .build();
}

/**
 * Claim free test XRD from the network faucet
 */
export function faucetManifest(faucet: string, account: string): string {
  return new ManifestBuilder()
    .lockFee(faucet, PROTOCOL_CONFIG.LOCK_FEE)
    .callMethod(faucet, 'free')
    .depositEntireWorktop(account)
    .build();
}
