/**
 * Transaction manifest encoding
 *
 * Manifests are emitted in the Radix V1 text format, one instruction per line.
 * The same text is accepted by the Gateway preview endpoint and by the engine
 * toolkit when compiling a transaction.
 */

import { Decimal } from 'decimal.js';
import type { DecimalInput } from '../types.js';
import { SurgeError } from '../errors.js';

/** Fractional digits of the ledger Decimal type */
export const DECIMAL_PLACES = 18;

// Ledger decimals are 192-bit signed integers scaled by 10^18
const DECIMAL_MAX = new Decimal('3138550867693340381917894711603833208051.177722232017256447');
const DECIMAL_MIN = new Decimal('-3138550867693340381917894711603833208051.177722232017256448');

/** Element kinds used in typed arrays */
export type ArrayKind = 'String' | 'Bucket' | 'Tuple' | 'Enum' | 'U64' | 'Address' | 'Decimal';

/** An encoded manifest argument */
export class ManifestValue {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

/**
 * Normalize a caller-supplied amount to plain decimal notation
 */
export function toDecimalString(value: DecimalInput, name = 'amount'): string {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw SurgeError.invalidAmount(name, String(value), 'not a decimal');
  }
  if (!parsed.isFinite()) {
    throw SurgeError.invalidAmount(name, String(value), 'not finite');
  }
  if (parsed.decimalPlaces() > DECIMAL_PLACES) {
    throw SurgeError.invalidAmount(name, String(value), `more than ${DECIMAL_PLACES} decimal places`);
  }
  if (parsed.gt(DECIMAL_MAX) || parsed.lt(DECIMAL_MIN)) {
    throw SurgeError.invalidAmount(name, String(value), 'out of range');
  }
  return parsed.toFixed();
}

export function decimal(value: DecimalInput): ManifestValue {
  return new ManifestValue(`Decimal("${toDecimalString(value)}")`);
}

export function address(value: string): ManifestValue {
  return new ManifestValue(`Address("${value}")`);
}

export function str(value: string): ManifestValue {
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return new ManifestValue(`"${escaped}"`);
}

export function u8(value: number): ManifestValue {
  return new ManifestValue(`${value}u8`);
}

export function u64(value: number | bigint): ManifestValue {
  return new ManifestValue(`${value}u64`);
}

export function bool(value: boolean): ManifestValue {
  return new ManifestValue(value ? 'true' : 'false');
}

export function enumeration(variant: number, ...fields: ManifestValue[]): ManifestValue {
  return new ManifestValue(`Enum<${variant}u8>(${fields.join(', ')})`);
}

export function array(kind: ArrayKind, ...elements: ManifestValue[]): ManifestValue {
  return new ManifestValue(`Array<${kind}>(${elements.join(', ')})`);
}

export function tuple(...fields: ManifestValue[]): ManifestValue {
  return new ManifestValue(`Tuple(${fields.join(', ')})`);
}

export function bucket(name: string): ManifestValue {
  return new ManifestValue(`Bucket("${name}")`);
}

export function expression(name: 'ENTIRE_WORKTOP' | 'ENTIRE_AUTH_ZONE'): ManifestValue {
  return new ManifestValue(`Expression("${name}")`);
}

export function nonFungibleGlobalId(id: string): ManifestValue {
  return new ManifestValue(`NonFungibleGlobalId("${id}")`);
}

/** Option::None */
export function none(): ManifestValue {
  return enumeration(0);
}

/** Option::Some(value) */
export function some(value: ManifestValue): ManifestValue {
  return enumeration(1, value);
}

/**
 * Builder for manifest text
 */
export class ManifestBuilder {
  private instructions: string[] = [];

  /**
   * Call a method on a global component
   */
  callMethod(component: string, method: string, args: ManifestValue[] = []): this {
    const parts = [address(component).text, str(method).text, ...args.map(arg => arg.text)];
    this.instructions.push(`CALL_METHOD ${parts.join(' ')};`);
    return this;
  }

  /**
   * Lock the transaction fee from an account
   */
  lockFee(account: string, amount: DecimalInput): this {
    return this.callMethod(account, 'lock_fee', [decimal(amount)]);
  }

  /**
   * Withdraw a fungible amount from an account onto the worktop
   */
  withdraw(account: string, resource: string, amount: DecimalInput): this {
    return this.callMethod(account, 'withdraw', [address(resource), decimal(amount)]);
  }

  /**
   * Move everything of a resource on the worktop into a named bucket
   */
  takeAllFromWorktop(resource: string, bucketName: string): this {
    this.instructions.push(`TAKE_ALL_FROM_WORKTOP ${address(resource).text} ${bucket(bucketName).text};`);
    return this;
  }

  /**
   * Deposit whatever is left on the worktop into an account
   */
  depositEntireWorktop(account: string): this {
    return this.callMethod(account, 'deposit_batch', [expression('ENTIRE_WORKTOP')]);
  }

  /**
   * Number of instructions added so far
   */
  get length(): number {
    return this.instructions.length;
  }

  /**
   * Render the manifest text
   */
  build(): string {
    return this.instructions.join('\n');
  }
}
