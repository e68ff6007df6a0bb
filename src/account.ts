/**
 * Margin account details
 *
 * Decodes positions, collateral and the request queue of a margin account and
 * values them at oracle prices.
 */

import type {
  AccountDetails,
  AccountOverview,
  Collateral,
  MarginOrderDetails,
  Permissions,
  Position,
  Prices,
  RemoveCollateralDetails,
  AccountRequest,
  RequestClaim,
} from './types.js';
import { RequestStatus, RequestType } from './types.js';
import { PriceLimit, SlippageLimit } from './limits.js';
import type { PriceLimitKind } from './limits.js';
import { markPrice } from './pair.js';
import {
  boolValue,
  elementsOf,
  field,
  numberValue,
  scalarValue,
  stringValue,
  variantId,
} from './utils/programmatic.js';
import type { ProgrammaticValue } from './utils/programmatic.js';

const STATUS_BY_ID: Record<number, RequestStatus> = {
  0: RequestStatus.DORMANT,
  1: RequestStatus.ACTIVE,
  2: RequestStatus.EXECUTED,
  3: RequestStatus.CANCELED,
  4: RequestStatus.EXPIRED,
  5: RequestStatus.FAILED,
};

/**
 * Map a request status id to its status
 */
export function requestStatus(id: number): RequestStatus {
  return STATUS_BY_ID[id] ?? RequestStatus.UNKNOWN;
}

/**
 * Classify a margin order by its price condition and direction
 */
export function orderType(limit: PriceLimitKind, size: number): RequestType {
  const long = size >= 0;
  switch (limit) {
    case 'none':
      return long ? RequestType.MARKET_LONG : RequestType.MARKET_SHORT;
    case 'gte':
      return long ? RequestType.STOP_LONG : RequestType.STOP_SHORT;
    case 'lte':
      return long ? RequestType.LIMIT_LONG : RequestType.LIMIT_SHORT;
  }
}

/**
 * Parse a position and value it at the mark price
 */
export function parsePosition(node: ProgrammaticValue, prices: Prices): Position {
  const path = 'position';
  const pair = stringValue(field(node, 0, path), `${path}.pair`);
  const size = numberValue(field(node, 1, path), `${path}.size`);
  const margin = numberValue(field(node, 2, path), `${path}.margin`);
  const marginMaintenance = numberValue(field(node, 3, path), `${path}.marginMaintenance`);
  const cost = numberValue(field(node, 4, path), `${path}.cost`);
  const funding = numberValue(field(node, 5, path), `${path}.funding`);

  const price = markPrice(prices, pair);
  const value = size * price;
  const pnl = value - cost - funding;

  return {
    pair,
    size,
    value,
    entryPrice: size === 0 ? 0 : cost / size,
    markPrice: price,
    margin: margin * price,
    marginMaintenance: marginMaintenance * price,
    pnl,
    roi: cost === 0 ? 0 : (pnl / Math.abs(cost)) * 100,
  };
}

/**
 * Parse a collateral entry and value it at the mark price
 */
export function parseCollateral(node: ProgrammaticValue, prices: Prices): Collateral {
  const path = 'collateral';
  const pair = stringValue(field(node, 0, path), `${path}.pair`);
  const resource = stringValue(field(node, 1, path), `${path}.resource`);
  const amount = numberValue(field(node, 2, path), `${path}.amount`);
  const discount = numberValue(field(node, 3, path), `${path}.discount`);
  const margin = numberValue(field(node, 4, path), `${path}.margin`);

  const price = markPrice(prices, pair);
  const value = amount * price;

  return {
    pair,
    resource,
    markPrice: price,
    amount,
    value,
    discount,
    valueDiscounted: value * discount,
    margin: margin * price,
  };
}

/**
 * Aggregate account value and margin usage
 */
export function computeAccountOverview(
  balance: number,
  positions: Position[],
  collaterals: Collateral[]
): AccountOverview {
  const sum = <T>(items: T[], pick: (item: T) => number): number =>
    items.reduce((total, item) => total + pick(item), 0);

  const totalPnl = sum(positions, p => p.pnl);
  const collateralMargin = sum(collaterals, c => c.margin);
  const totalMargin = sum(positions, p => p.margin) + collateralMargin;
  const totalMarginMaintenance = sum(positions, p => p.marginMaintenance) + collateralMargin;
  const totalCollateralValue = sum(collaterals, c => c.value);
  const totalCollateralValueDiscounted = sum(collaterals, c => c.valueDiscounted);

  const accountValue = balance + totalPnl + totalCollateralValue;
  const accountValueDiscounted = balance + totalPnl + totalCollateralValueDiscounted;

  return {
    accountValue,
    accountValueDiscounted,
    availableMargin: accountValueDiscounted - totalMargin,
    availableMarginMaintenance: accountValueDiscounted - totalMarginMaintenance,
    balance,
    totalPnl,
    totalMargin,
    totalMarginMaintenance,
    totalCollateralValue,
    totalCollateralValueDiscounted,
  };
}

function parseRemoveCollateral(inner: ProgrammaticValue): RemoveCollateralDetails {
  const path = 'remove collateral request';
  const claims: RequestClaim[] = elementsOf(field(inner, 1, path), `${path}.claims`).map(claim => ({
    resource: stringValue(field(claim, 0, path), `${path}.claim.resource`),
    size: stringValue(field(claim, 1, path), `${path}.claim.size`),
  }));

  return {
    kind: 'removeCollateral',
    targetAccount: stringValue(field(inner, 0, path), `${path}.targetAccount`),
    claims,
  };
}

function parseMarginOrder(inner: ProgrammaticValue): MarginOrderDetails {
  const path = 'margin order request';
  const references = (index: number, name: string): string[] =>
    elementsOf(field(inner, index, path), `${path}.${name}`).map(ref => scalarValue(ref, `${path}.${name}`));

  return {
    kind: 'marginOrder',
    pair: stringValue(field(inner, 0, path), `${path}.pair`),
    size: numberValue(field(inner, 1, path), `${path}.size`),
    reduceOnly: boolValue(field(inner, 2, path), `${path}.reduceOnly`),
    limitPrice: PriceLimit.fromJson(field(inner, 3, path), `${path}.limitPrice`),
    limitSlippage: SlippageLimit.fromJson(field(inner, 4, path), `${path}.limitSlippage`),
    activateRequests: references(5, 'activateRequests'),
    cancelRequests: references(6, 'cancelRequests'),
  };
}

/**
 * Parse a queued request
 */
export function parseRequest(node: ProgrammaticValue): AccountRequest {
  const path = 'request';
  const index = numberValue(field(node, 0, path), `${path}.index`);
  const body = field(node, 1, path);
  const submission = numberValue(field(node, 2, path), `${path}.submission`);
  const expiry = numberValue(field(node, 3, path), `${path}.expiry`);
  const status = requestStatus(numberValue(field(node, 4, path), `${path}.status`));

  const variant = variantId(body, `${path}.body`);
  if (variant === 0) {
    return {
      type: RequestType.REMOVE_COLLATERAL,
      index,
      submission,
      expiry,
      status,
      details: parseRemoveCollateral(field(body, 0, `${path}.body`)),
    };
  }
  if (variant === 1) {
    const details = parseMarginOrder(field(body, 0, `${path}.body`));
    return {
      type: orderType(details.limitPrice.kind, details.size),
      index,
      submission,
      expiry,
      status,
      details,
    };
  }

  return { type: RequestType.UNKNOWN, index, submission, expiry, status, details: null };
}

/**
 * Collect the pairs that need a price to value an account
 */
export function getPairIds(node: ProgrammaticValue): string[] {
  const path = 'account details';
  const pairIds = new Set<string>();
  for (const index of [1, 2]) {
    for (const item of elementsOf(field(node, index, path), path)) {
      pairIds.add(stringValue(field(item, 0, path), `${path}.pair`));
    }
  }
  return [...pairIds];
}

/**
 * Parse the tuple returned by get_account_details
 */
export function parseAccountDetails(node: ProgrammaticValue, prices: Prices): AccountDetails {
  const path = 'account details';
  const balance = numberValue(field(node, 0, path), `${path}.balance`);
  const positions = elementsOf(field(node, 1, path), `${path}.positions`).map(p => parsePosition(p, prices));
  const collaterals = elementsOf(field(node, 2, path), `${path}.collaterals`).map(c => parseCollateral(c, prices));
  const validRequestsStart = numberValue(field(node, 3, path), `${path}.validRequestsStart`);
  const activeRequests = elementsOf(field(node, 4, path), `${path}.activeRequests`).map(parseRequest);
  const requestsHistory = elementsOf(field(node, 5, path), `${path}.requestsHistory`).map(parseRequest);

  return {
    balance,
    positions,
    collaterals,
    validRequestsStart,
    activeRequests,
    requestsHistory,
    overview: computeAccountOverview(balance, positions, collaterals),
  };
}

/**
 * Parse the tuple returned by get_permissions
 */
export function parsePermissions(node: ProgrammaticValue): Permissions {
  const level = (index: number): string[] =>
    elementsOf(field(node, index, 'permissions'), `permissions.level${index + 1}`)
      .map(item => stringValue(item, `permissions.level${index + 1}`));

  return {
    level1: level(0),
    level2: level(1),
    level3: level(2),
  };
}
