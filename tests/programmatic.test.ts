/**
 * Tests for programmatic JSON accessors
 */

import { describe, it, expect } from 'vitest';
import {
  ProgrammaticValueSchema,
  boolValue,
  elementsOf,
  entriesOf,
  field,
  numberValue,
  scalarValue,
  stringValue,
  variantId,
} from '../src/utils/programmatic.js';
import { ErrorCodes, SurgeError } from '../src/errors.js';
import { sbor } from './helpers.js';

describe('Programmatic JSON', () => {
  const position = sbor.tuple(sbor.string('BTC/USD'), sbor.decimal('0.5'));

  it('should index fields', () => {
    expect(stringValue(field(position, 0, 'position'), 'position.pair')).toBe('BTC/USD');
    expect(numberValue(field(position, 1, 'position'), 'position.size')).toBe(0.5);
  });

  it('should report the path of a missing field', () => {
    expect(() => field(position, 3, 'position')).toThrow('Invalid response for position: missing field 3 (has 2)');
    expect(() => field(sbor.decimal('1'), 0, 'size')).toThrow('Invalid response for size: expected fields on Decimal');
  });

  it('should reject values that are not numbers', () => {
    try {
      numberValue(sbor.string('abc'), 'balance');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SurgeError);
      if (error instanceof SurgeError) {
        expect(error.code).toBe(ErrorCodes.INVALID_RESPONSE);
        expect(error.message).toBe('Invalid response for balance: expected a number, got "abc"');
      }
    }
    expect(() => numberValue(sbor.string(''), 'balance')).toThrow(SurgeError);
  });

  it('should unwrap single-field enums to their scalar', () => {
    const reference = sbor.enumeration(0, sbor.u64('7'));
    expect(scalarValue(reference, 'ref')).toBe('7');
    expect(scalarValue(sbor.u64('8'), 'ref')).toBe('8');
    expect(() => scalarValue(sbor.tuple(), 'ref')).toThrow(SurgeError);
  });

  it('should read bools and variants', () => {
    expect(boolValue(sbor.bool(true), 'flag')).toBe(true);
    expect(boolValue({ kind: 'Bool', value: 'false' }, 'flag')).toBe(false);
    expect(() => boolValue(sbor.string('yes'), 'flag')).toThrow(SurgeError);
    expect(variantId(sbor.enumeration(2), 'limit')).toBe(2);
    expect(variantId({ kind: 'Enum', variant_id: 1 }, 'limit')).toBe(1);
  });

  it('should list elements and entries', () => {
    expect(elementsOf(sbor.array(sbor.u64('1'), sbor.u64('2')), 'list')).toHaveLength(2);
    expect(() => elementsOf(sbor.tuple(), 'list')).toThrow(SurgeError);

    const map = sbor.map([sbor.string('exchange_component'), sbor.reference('component_exchange')]);
    const [entry] = entriesOf(map, 'variables');
    expect(entry?.key.value).toBe('exchange_component');
    expect(entry?.value.value).toBe('component_exchange');
  });

  it('should validate nested trees', () => {
    const parsed = ProgrammaticValueSchema.safeParse({
      kind: 'Tuple',
      type_name: 'PoolDetails',
      fields: [{ kind: 'Decimal', field_name: 'balance', value: '10' }, { kind: 'Array', elements: [] }],
    });
    expect(parsed.success).toBe(true);

    expect(ProgrammaticValueSchema.safeParse({ kind: 'Tuple', fields: [{ value: '1' }] }).success).toBe(false);
  });
});
