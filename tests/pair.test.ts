/**
 * Tests for trading pair parsing
 */

import { describe, it, expect } from 'vitest';
import { markPrice, parsePairConfig, parsePairDetails } from '../src/pair.js';
import { SurgeError } from '../src/errors.js';
import { sbor } from './helpers.js';

const CONFIG_VALUES = [
  '60.9',    // price max age
  '1000',    // oi max
  '0.0001',  // trade size min
  '0.005',   // update price delta ratio
  '3600',    // update period
  '0.01',    // margin
  '0.005',   // maintenance margin
  '0.001',   // funding 1
  '0.5',     // funding 2
  '0.1',     // funding 2 delta
  '0.05',    // funding 2 decay
  '0.01',    // funding pool 0
  '0.02',    // funding pool 1
  '0.2',     // funding share
  '0.0005',  // fee 0
  '0.0001',  // fee 1
];

function configNode(values: string[] = CONFIG_VALUES) {
  return sbor.tuple(sbor.string('BTC/USD'), ...values.map(sbor.decimal));
}

const pairNode = sbor.tuple(
  sbor.string('BTC/USD'),
  sbor.tuple(
    sbor.decimal('10'),     // oi long
    sbor.decimal('5'),      // oi short
    sbor.decimal('1000'),   // cost
    sbor.decimal('0'),
    sbor.decimal('0'),
    sbor.decimal('0')       // funding 2 raw
  ),
  configNode()
);

describe('Pair', () => {
  it('should look up mark prices', () => {
    expect(markPrice({ 'BTC/USD': 100 }, 'BTC/USD')).toBe(100);
    expect(() => markPrice({}, 'ETH/USD')).toThrow('No oracle price for pair ETH/USD');
  });

  describe('parsePairConfig', () => {
    it('should read every parameter', () => {
      const config = parsePairConfig(configNode());

      expect(config.pair).toBe('BTC/USD');
      expect(config.priceMaxAge).toBe(60);
      expect(config.oiMax).toBe(1000);
      expect(config.tradeSizeMin).toBe(0.0001);
      expect(config.updatePeriodSeconds).toBe(3600);
      expect(config.margin).toBe(0.01);
      expect(config.marginMaintenance).toBe(0.005);
      expect(config.funding1).toBe(0.001);
      expect(config.funding2).toBe(0.5);
      expect(config.fundingPool0).toBe(0.01);
      expect(config.fundingPool1).toBe(0.02);
      expect(config.fundingShare).toBe(0.2);
      expect(config.fee0).toBe(0.0005);
      expect(config.fee1).toBe(0.0001);
    });

    it('should reject short configs', () => {
      const node = configNode(CONFIG_VALUES.slice(0, 15));
      expect(() => parsePairConfig(node)).toThrow(SurgeError);
      expect(() => parsePairConfig(node)).toThrow('Invalid response for pair config: expected 17 fields, got 16');
    });
  });

  describe('parsePairDetails', () => {
    it('should derive skew and funding at the mark price', () => {
      const details = parsePairDetails(pairNode, { 'BTC/USD': 100 });

      expect(details.pair).toBe('BTC/USD');
      expect(details.oiLong).toBe(10);
      expect(details.oiShort).toBe(5);
      expect(details.oiNet).toBe(15);
      expect(details.cost).toBe(1000);
      expect(details.skew).toBe(500);
      expect(details.funding2Raw).toBe(0);
      expect(details.fundingLongApr).toBeCloseTo((0.05 + 25 / 15) / 100, 10);
      expect(details.fundingShortApr).toBeCloseTo((-0.08 + 25 / 15) / 100, 10);
      expect(details.pairConfig.fundingShare).toBe(0.2);
    });
  });
});
