/**
 * Polymarket Gamma API Client
 * Used for market discovery and metadata
 */

import { config } from '../config.js';
import { logger } from '../logger.js';
import { createHttpClient, describeHttpError, HttpClient } from '../http-client.js';
import { decodeMarket, decodeMarketList, isPayload } from './market-decoder.js';
import type { MarketDataSource, MarketRecord } from './types.js';

export class GammaClient implements MarketDataSource {
    private client: HttpClient;

    constructor(client?: HttpClient) {
        this.client = client ?? createHttpClient(config.gammaHost);
    }

    /**
     * Fetch a page of markets from the listing endpoint
     */
    async listMarkets(limit: number = 100): Promise<MarketRecord[]> {
        try {
            const response = await this.client.get('/markets', {
                params: { limit },
            });
            const markets = decodeMarketList(response.data);
            logger.debug(`Listed ${markets.length} markets`, { limit });
            return markets;
        } catch (error) {
            logger.warn('Failed to list markets', { limit, error: describeHttpError(error) });
            return [];
        }
    }

    /**
     * Fetch markets the API considers related to a reference market
     */
    async getRelatedMarkets(marketId: string, limit: number = 50, offset: number = 0): Promise<MarketRecord[]> {
        try {
            const response = await this.client.get(`/markets/${encodeURIComponent(marketId)}/related-markets`, {
                params: { limit, offset },
            });
            return decodeMarketList(response.data);
        } catch (error) {
            logger.warn(`Error fetching related markets for ID ${marketId}`, { error: describeHttpError(error) });
            return [];
        }
    }

    /**
     * Fetch the current detail record of one market; null when unavailable
     */
    async getMarket(marketId: string): Promise<MarketRecord | null> {
        try {
            const response = await this.client.get(`/markets/${encodeURIComponent(marketId)}`);
            if (!isPayload(response.data)) {
                logger.warn(`Unexpected payload for market ${marketId}`);
                return null;
            }
            const market = decodeMarket(response.data);
            logger.debug(`Fetched details for market ${marketId}`);
            return market;
        } catch (error) {
            logger.error(`Error fetching details for market ${marketId}`, { error: describeHttpError(error) });
            return null;
        }
    }
}
