/**
 * Pyth Hermes price client
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Api } from './api.js';
import { createLogger } from './logger.js';
import type { Prices } from './types.js';
import { DEFAULT_ORACLE_URL } from './types.js';

/** Hermes symbols are "Crypto.<pair>" */
const CRYPTO_PREFIX_LENGTH = 'Crypto.'.length;

const FeedSchema = z.object({
  id: z.string(),
  attributes: z.object({ symbol: z.string() }).passthrough(),
});

const FeedsSchema = z.array(FeedSchema);

const LatestPricesSchema = z.object({
  parsed: z.array(z.object({
    id: z.string(),
    price: z.object({
      price: z.string(),
      expo: z.number().int(),
    }),
  })),
});

export type PriceFeed = z.output<typeof FeedSchema>;

const logger = createLogger('oracle');

export class Oracle extends Api {
  constructor(http: AxiosInstance, baseUrl: string = DEFAULT_ORACLE_URL) {
    super(http, baseUrl, logger);
  }

  /**
   * Find the Hermes feed for each pair id
   *
   * Pairs without a matching crypto feed are left out.
   */
  async getCryptoFeeds(pairIds: string[]): Promise<Record<string, PriceFeed>> {
    const feeds = await this.getRequired(FeedsSchema, 'price_feeds');
    const matched: Record<string, PriceFeed> = {};

    for (const pairId of pairIds) {
      const feed = feeds.find(f => f.attributes.symbol.slice(CRYPTO_PREFIX_LENGTH) === pairId);
      if (feed) {
        matched[pairId] = feed;
      } else {
        logger.warn({ pairId }, 'No price feed for pair');
      }
    }
    return matched;
  }

  /**
   * Latest price of each pair
   */
  async getPrices(pairIds: string[]): Promise<Prices> {
    if (pairIds.length === 0) {
      return {};
    }

    const feeds = await this.getCryptoFeeds(pairIds);
    const pairByFeed = new Map<string, string>();
    for (const [pairId, feed] of Object.entries(feeds)) {
      pairByFeed.set(feed.id, pairId);
    }
    if (pairByFeed.size === 0) {
      return {};
    }

    const query = [...pairByFeed.keys()].map(id => `ids[]=${id}`).join('&');
    const data = await this.getRequired(LatestPricesSchema, `updates/price/latest?${query}`);

    const prices: Prices = {};
    for (const update of data.parsed) {
      const pairId = pairByFeed.get(update.id);
      if (pairId === undefined) {
        continue;
      }
      prices[pairId] = Number(update.price.price) * 10 ** update.price.expo;
    }
    logger.debug({ prices }, 'Fetched oracle prices');
    return prices;
  }
}
