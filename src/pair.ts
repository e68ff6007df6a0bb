/**
 * Trading pair details
 */

import type { PairConfig, PairDetails, Prices } from './types.js';
import { SurgeError } from './errors.js';
import { calculateFundingRates } from './utils/funding.js';
import { field, fieldsOf, numberValue, stringValue } from './utils/programmatic.js';
import type { ProgrammaticValue } from './utils/programmatic.js';

/**
 * Look up the mark price of a pair
 */
export function markPrice(prices: Prices, pair: string): number {
  const price = prices[pair];
  if (price === undefined) {
    throw SurgeError.priceUnavailable(pair);
  }
  return price;
}

/**
 * Parse a pair's configuration tuple
 */
export function parsePairConfig(node: ProgrammaticValue): PairConfig {
  const path = 'pair config';
  const fields = fieldsOf(node, path);
  const num = (index: number): number => numberValue(field(node, index, path), `${path}[${index}]`);

  if (fields.length < 17) {
    throw SurgeError.invalidResponse(path, `expected 17 fields, got ${fields.length}`);
  }

  return {
    pair: stringValue(field(node, 0, path), path),
    priceMaxAge: Math.trunc(num(1)),
    oiMax: num(2),
    tradeSizeMin: num(3),
    updatePriceDeltaRatio: num(4),
    updatePeriodSeconds: num(5),
    margin: num(6),
    marginMaintenance: num(7),
    funding1: num(8),
    funding2: num(9),
    funding2Delta: num(10),
    funding2Decay: num(11),
    fundingPool0: num(12),
    fundingPool1: num(13),
    fundingShare: num(14),
    fee0: num(15),
    fee1: num(16),
  };
}

/**
 * Parse a pair's state and derive its skew and funding rates at the mark price
 */
export function parsePairDetails(node: ProgrammaticValue, prices: Prices): PairDetails {
  const path = 'pair details';
  const pair = stringValue(field(node, 0, path), path);

  const poolPosition = field(node, 1, path);
  const oiLong = numberValue(field(poolPosition, 0, path), `${path}.oiLong`);
  const oiShort = numberValue(field(poolPosition, 1, path), `${path}.oiShort`);
  const cost = numberValue(field(poolPosition, 2, path), `${path}.cost`);
  const funding2Raw = numberValue(field(poolPosition, 5, path), `${path}.funding2Raw`);

  const pairConfig = parsePairConfig(field(node, 2, path));
  const price = markPrice(prices, pair);
  const oiNet = oiLong + oiShort;
  const skew = (oiLong - oiShort) * price;

  return {
    pair,
    oiLong,
    oiShort,
    oiNet,
    cost,
    skew,
    ...calculateFundingRates(oiLong, oiShort, skew, funding2Raw, price, pairConfig),
    pairConfig,
  };
}
