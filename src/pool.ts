/**
 * Liquidity pool details
 *
 * The pool is the counterparty to every trade and collects fees and funding.
 */

import type { PoolDetails } from './types.js';
import { field, stringValue } from './utils/programmatic.js';
import type { ProgrammaticValue } from './utils/programmatic.js';

/**
 * Parse the tuple returned by get_pool_details
 */
export function parsePoolDetails(node: ProgrammaticValue): PoolDetails {
  const value = (index: number, name: keyof PoolDetails): string =>
    stringValue(field(node, index, 'pool details'), `pool details.${name}`);

  return {
    tokenAmount: value(0, 'tokenAmount'),
    balance: value(1, 'balance'),
    unrealizedPoolFunding: value(2, 'unrealizedPoolFunding'),
    pnlSnap: value(3, 'pnlSnap'),
    skewRatio: value(4, 'skewRatio'),
    skewRatioCap: value(5, 'skewRatioCap'),
    lpSupply: value(6, 'lpSupply'),
    lpPrice: value(7, 'lpPrice'),
  };
}
