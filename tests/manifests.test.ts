/**
 * Tests for exchange call manifests
 */

import { describe, it, expect } from 'vitest';
import {
  addCollateralManifest,
  cancelRequestsManifest,
  createAccountManifest,
  createRecoveryKeyManifest,
  faucetManifest,
  getAccountDetailsManifest,
  getPairDetailsManifest,
  getPermissionsManifest,
  getPoolDetailsManifest,
  getVariablesManifest,
  marginOrderRequestManifest,
  marginOrderTpSlRequestManifest,
  removeCollateralRequestManifest,
  signatureRule,
} from '../src/manifests.js';
import { PriceLimit, SlippageLimit } from '../src/limits.js';
import { ErrorCodes, SurgeError } from '../src/errors.js';

const EXCHANGE = 'component_exchange';
const ACCOUNT = 'account_test';
const MARGIN = 'component_margin';
const LOCK_FEE = 'CALL_METHOD Address("account_test") "lock_fee" Decimal("10");';
const RULE = 'Enum<2u8>(Enum<0u8>(Enum<0u8>(Enum<0u8>(NonFungibleGlobalId("resource_badge:[abcd]")))))';

function errorCode(fn: () => unknown): ErrorCodes | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof SurgeError ? error.code : undefined;
  }
  return undefined;
}

describe('Read manifests', () => {
  it('should request registry variables', () => {
    expect(getVariablesManifest('component_registry', ['exchange_component', 'pool_component'])).toBe(
      'CALL_METHOD Address("component_registry") "get_variables" Array<String>("exchange_component", "pool_component");'
    );
  });

  it('should request account details with the history limit', () => {
    expect(getAccountDetailsManifest(EXCHANGE, MARGIN)).toBe(
      'CALL_METHOD Address("component_exchange") "get_account_details" Address("component_margin") 30u64 Enum<0u8>();'
    );
    expect(getAccountDetailsManifest(EXCHANGE, MARGIN, 5n)).toContain('5u64');
  });

  it('should request pool and pair details', () => {
    expect(getPoolDetailsManifest(EXCHANGE)).toBe('CALL_METHOD Address("component_exchange") "get_pool_details";');
    expect(getPairDetailsManifest(EXCHANGE, ['BTC/USD', 'ETH/USD'])).toBe(
      'CALL_METHOD Address("component_exchange") "get_pair_details" Array<String>("BTC/USD", "ETH/USD");'
    );
  });

  it('should request permissions for a signature rule', () => {
    expect(signatureRule('resource_badge:[abcd]').text).toBe(RULE);
    expect(getPermissionsManifest(EXCHANGE, 'resource_badge:[abcd]')).toBe(
      `CALL_METHOD Address("component_exchange") "get_permissions" ${RULE};`
    );
  });
});

describe('Account manifests', () => {
  it('should create a margin account owned by the badge', () => {
    expect(createAccountManifest(EXCHANGE, ACCOUNT, 'resource_badge:[abcd]').split('\n')).toEqual([
      LOCK_FEE,
      `CALL_METHOD Address("component_exchange") "create_account" Enum<0u8>() ${RULE} Array<Bucket>() Enum<0u8>() Enum<0u8>();`,
    ]);
  });

  it('should create a recovery key and deposit it', () => {
    expect(createRecoveryKeyManifest(EXCHANGE, ACCOUNT, MARGIN).split('\n')).toEqual([
      LOCK_FEE,
      'CALL_METHOD Address("component_exchange") "create_recovery_key" Enum<0u8>() Address("component_margin");',
      'CALL_METHOD Address("account_test") "deposit_batch" Expression("ENTIRE_WORKTOP");',
    ]);
  });

  it('should claim from the faucet', () => {
    expect(faucetManifest('component_faucet', ACCOUNT).split('\n')).toEqual([
      'CALL_METHOD Address("component_faucet") "lock_fee" Decimal("10");',
      'CALL_METHOD Address("component_faucet") "free";',
      'CALL_METHOD Address("account_test") "deposit_batch" Expression("ENTIRE_WORKTOP");',
    ]);
  });
});

describe('Collateral manifests', () => {
  it('should withdraw collateral into a bucket and add it', () => {
    const manifest = addCollateralManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      resource: 'resource_xrd',
      amount: '100',
    });

    expect(manifest.split('\n')).toEqual([
      LOCK_FEE,
      'CALL_METHOD Address("account_test") "withdraw" Address("resource_xrd") Decimal("100");',
      'TAKE_ALL_FROM_WORKTOP Address("resource_xrd") Bucket("bucket1");',
      'CALL_METHOD Address("component_exchange") "add_collateral" Enum<0u8>() Address("component_margin") Array<Bucket>(Bucket("bucket1"));',
    ]);
  });

  it('should reject non-positive collateral amounts', () => {
    const params = { marginAccount: MARGIN, resource: 'resource_xrd' };
    expect(errorCode(() => addCollateralManifest(EXCHANGE, ACCOUNT, { ...params, amount: 0 }))).toBe(ErrorCodes.INVALID_AMOUNT);
    expect(errorCode(() => addCollateralManifest(EXCHANGE, ACCOUNT, { ...params, amount: '-1' }))).toBe(ErrorCodes.INVALID_AMOUNT);
    expect(errorCode(() => addCollateralManifest(EXCHANGE, ACCOUNT, { ...params, amount: '0.0000000000000000001' })))
      .toBe(ErrorCodes.INVALID_AMOUNT);
  });

  it('should request collateral removal to the signing account by default', () => {
    const manifest = removeCollateralRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      claims: [{ resource: 'resource_xrd', amount: '25.50' }],
    });

    expect(manifest.split('\n')[1]).toBe(
      'CALL_METHOD Address("component_exchange") "remove_collateral_request" Enum<0u8>() 10000000000u64 ' +
      'Address("component_margin") Address("account_test") Array<Tuple>(Tuple(Address("resource_xrd"), Decimal("25.5")));'
    );
  });

  it('should send removed collateral to an explicit target', () => {
    const manifest = removeCollateralRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      targetAccount: 'account_other',
      claims: [{ resource: 'resource_a', amount: 1 }, { resource: 'resource_b', amount: 2 }],
      expirySeconds: 60n,
    });

    expect(manifest).toContain('Enum<0u8>() 60u64 Address("component_margin") Address("account_other")');
    expect(manifest).toContain(
      'Array<Tuple>(Tuple(Address("resource_a"), Decimal("1")), Tuple(Address("resource_b"), Decimal("2")))'
    );
  });

  it('should reject removal without claims', () => {
    expect(errorCode(() => removeCollateralRequestManifest(EXCHANGE, ACCOUNT, { marginAccount: MARGIN, claims: [] })))
      .toBe(ErrorCodes.INVALID_REQUEST);
  });
});

describe('Order manifests', () => {
  it('should place a margin order with limits', () => {
    const manifest = marginOrderRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      pair: 'BTC/USD',
      size: '0.001',
      priceLimit: PriceLimit.gte(10000),
      slippageLimit: SlippageLimit.percent(1),
    });

    expect(manifest.split('\n')).toEqual([
      LOCK_FEE,
      'CALL_METHOD Address("component_exchange") "margin_order_request" Enum<0u8>() 0u64 10000000000u64 ' +
      'Address("component_margin") "BTC/USD" Decimal("0.001") false Enum<1u8>(Decimal("10000")) ' +
      'Enum<1u8>(Decimal("1")) Array<Enum>() Array<Enum>() 1u8;',
    ]);
  });

  it('should place short reduce-only orders', () => {
    const manifest = marginOrderRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      pair: 'ETH/USD',
      size: -0.5,
      reduceOnly: true,
      delaySeconds: 30n,
    });

    expect(manifest).toContain('Enum<0u8>() 30u64 10000000000u64');
    expect(manifest).toContain('"ETH/USD" Decimal("-0.5") true Enum<0u8>() Enum<0u8>()');
  });

  it('should reject zero-size orders', () => {
    expect(errorCode(() => marginOrderRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      pair: 'BTC/USD',
      size: '0',
    }))).toBe(ErrorCodes.INVALID_AMOUNT);
  });

  it('should attach take-profit and stop-loss prices', () => {
    const manifest = marginOrderTpSlRequestManifest(EXCHANGE, ACCOUNT, {
      marginAccount: MARGIN,
      pair: 'BTC/USD',
      size: 1,
      priceTp: 70000,
    });

    expect(manifest.split('\n')[1]).toBe(
      'CALL_METHOD Address("component_exchange") "margin_order_tp_sl_request" Enum<0u8>() 0u64 10000000000u64 ' +
      'Address("component_margin") "BTC/USD" Decimal("1") false Enum<0u8>() Enum<0u8>() ' +
      'Enum<1u8>(Decimal("70000")) Enum<0u8>();'
    );
  });

  it('should cancel requests by index', () => {
    expect(cancelRequestsManifest(EXCHANGE, ACCOUNT, MARGIN, [3, 4n]).split('\n')[1]).toBe(
      'CALL_METHOD Address("component_exchange") "cancel_requests" Enum<0u8>() Address("component_margin") Array<U64>(3u64, 4u64);'
    );
  });

  it('should reject empty or invalid request indexes', () => {
    expect(errorCode(() => cancelRequestsManifest(EXCHANGE, ACCOUNT, MARGIN, []))).toBe(ErrorCodes.INVALID_REQUEST);
    expect(errorCode(() => cancelRequestsManifest(EXCHANGE, ACCOUNT, MARGIN, [-1]))).toBe(ErrorCodes.INVALID_REQUEST);
    expect(errorCode(() => cancelRequestsManifest(EXCHANGE, ACCOUNT, MARGIN, [1.5]))).toBe(ErrorCodes.INVALID_REQUEST);
  });
});
