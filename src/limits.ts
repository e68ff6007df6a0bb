/**
 * Price and slippage conditions attached to margin orders
 */

import { ErrorCodes, SurgeError } from './errors.js';
import type { DecimalInput } from './types.js';
import { decimal, enumeration, toDecimalString } from './utils/manifest.js';
import type { ManifestValue } from './utils/manifest.js';
import { field, stringValue, variantId } from './utils/programmatic.js';
import type { ProgrammaticValue } from './utils/programmatic.js';

export type PriceLimitKind = 'none' | 'gte' | 'lte';

export type SlippageLimitKind = 'none' | 'percent' | 'absolute';

/**
 * Price condition an order waits for:
 * none, Gte(value) (price at or above value) or Lte(value) (price at or below value)
 */
export class PriceLimit {
  private constructor(
    readonly kind: PriceLimitKind,
    readonly value: string | null
  ) {}

  static none(): PriceLimit {
    return new PriceLimit('none', null);
  }

  static gte(value: DecimalInput): PriceLimit {
    return new PriceLimit('gte', toDecimalString(value, 'price limit'));
  }

  static lte(value: DecimalInput): PriceLimit {
    return new PriceLimit('lte', toDecimalString(value, 'price limit'));
  }

  /**
   * Decode from the programmatic JSON enum
   */
  static fromJson(node: ProgrammaticValue, path = 'price limit'): PriceLimit {
    const variant = variantId(node, path);
    if (variant === 0) return PriceLimit.none();
    const value = ledgerDecimal(field(node, 0, path), path);
    return new PriceLimit(variant === 1 ? 'gte' : 'lte', value);
  }

  /**
   * Encode as a manifest enum
   */
  toManifestValue(): ManifestValue {
    return limitValue(this.kind === 'none' ? 0 : this.kind === 'gte' ? 1 : 2, this.value);
  }

  toString(): string {
    switch (this.kind) {
      case 'none':
        return 'None';
      case 'gte':
        return `Gte(${this.value})`;
      case 'lte':
        return `Lte(${this.value})`;
    }
  }
}

/**
 * Slippage an order tolerates: none, a percentage, or an absolute amount
 */
export class SlippageLimit {
  private constructor(
    readonly kind: SlippageLimitKind,
    readonly value: string | null
  ) {}

  static none(): SlippageLimit {
    return new SlippageLimit('none', null);
  }

  static percent(value: DecimalInput): SlippageLimit {
    return new SlippageLimit('percent', toDecimalString(value, 'slippage limit'));
  }

  static absolute(value: DecimalInput): SlippageLimit {
    return new SlippageLimit('absolute', toDecimalString(value, 'slippage limit'));
  }

  /**
   * Decode from the programmatic JSON enum
   */
  static fromJson(node: ProgrammaticValue, path = 'slippage limit'): SlippageLimit {
    const variant = variantId(node, path);
    if (variant === 0) return SlippageLimit.none();
    const value = ledgerDecimal(field(node, 0, path), path);
    return new SlippageLimit(variant === 1 ? 'percent' : 'absolute', value);
  }

  /**
   * Encode as a manifest enum
   */
  toManifestValue(): ManifestValue {
    return limitValue(this.kind === 'none' ? 0 : this.kind === 'percent' ? 1 : 2, this.value);
  }

  toString(): string {
    switch (this.kind) {
      case 'none':
        return 'None';
      case 'percent':
        return `Percent(${this.value})`;
      case 'absolute':
        return `Absolute(${this.value})`;
    }
  }
}

// Decimals read back from the ledger are response data, not caller input
function ledgerDecimal(node: ProgrammaticValue, path: string): string {
  const value = stringValue(node, path);
  try {
    return toDecimalString(value, path);
  } catch (error) {
    if (error instanceof SurgeError && error.code === ErrorCodes.INVALID_AMOUNT) {
      throw SurgeError.invalidResponse(path, `malformed decimal ${value}`);
    }
    throw error;
  }
}

function limitValue(variant: number, value: string | null): ManifestValue {
  return value === null ? enumeration(0) : enumeration(variant, decimal(value));
}
