/**
 * Funding rate calculations for trading pairs
 *
 * Rates are annualized fractions of position value. Positive rates are paid by
 * the side, negative rates are received.
 */

import type { FundingRates, PairConfig } from '../types.js';
import { PROTOCOL_CONFIG } from '../types.js';

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Calculate funding rates for a pair from its open interest
 *
 * The skew term (funding1) and the integrated skew term (funding2) are paid by
 * the heavier side to the lighter one, less the pool's share. The pool also
 * charges both sides a constant rate and a rate proportional to |skew|.
 */
export function calculateFundingRates(
  oiLong: number,
  oiShort: number,
  skew: number,
  funding2Raw: number,
  price: number,
  config: Pick<PairConfig, 'funding1' | 'funding2' | 'fundingShare' | 'fundingPool0' | 'fundingPool1'>
): FundingRates {
  const funding1 = skew * config.funding1;
  const funding2Max = oiLong * price;
  const funding2Min = -oiShort * price;
  const funding2 = clamp(funding2Raw, funding2Min, funding2Max) * config.funding2;

  let fundingLongApr = 0;
  let fundingShortApr = 0;
  let fundingPool = 0;

  if (oiLong !== 0 && oiShort !== 0) {
    const funding = funding1 + funding2;
    let fundingShare: number;
    let fundingLongIndex: number;
    let fundingShortIndex: number;

    if (funding > 0) {
      fundingShare = funding * config.fundingShare;
      fundingLongIndex = funding / oiLong;
      fundingShortIndex = -(funding - fundingShare) / oiShort;
    } else {
      const paid = -funding;
      fundingShare = paid * config.fundingShare;
      fundingLongIndex = -(paid - fundingShare) / oiLong;
      fundingShortIndex = paid / oiShort;
    }

    const oiNet = oiLong + oiShort;
    const fundingPool0 = oiNet * price * config.fundingPool0;
    const fundingPool1 = Math.abs(skew) * config.fundingPool1;
    fundingPool = fundingPool0 + fundingPool1;
    const fundingPoolIndex = fundingPool / oiNet;

    fundingLongApr = (fundingLongIndex + fundingPoolIndex) / price;
    fundingShortApr = (fundingShortIndex + fundingPoolIndex) / price;
    fundingPool += fundingShare;
  }

  return {
    funding1,
    funding2,
    funding2Raw,
    funding2Max,
    funding2Min,
    fundingLongApr,
    fundingLong24h: fundingLongApr / PROTOCOL_CONFIG.DAYS_PER_YEAR,
    fundingShortApr,
    fundingShort24h: fundingShortApr / PROTOCOL_CONFIG.DAYS_PER_YEAR,
    fundingPool24h: fundingPool / PROTOCOL_CONFIG.DAYS_PER_YEAR,
  };
}
