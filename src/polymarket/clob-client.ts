/**
 * Polymarket CLOB Client
 * Read-only order book access; credentials are attached when configured
 */

import { ClobClient, ApiKeyCreds } from '@polymarket/clob-client';
import { Wallet } from 'ethers';
import { config, getApiCredentials } from '../config.js';
import { logger, errorMeta } from '../logger.js';
import type { OrderBook, OrderBookEntry } from './types.js';

/**
 * The slice of ClobClient this module uses
 */
export interface OrderBookSource {
    getOrderBook(tokenId: string): Promise<{
        market: string;
        asset_id: string;
        bids: OrderBookEntry[];
        asks: OrderBookEntry[];
    }>;
}

export function createClobSource(): OrderBookSource {
    const signer = config.privateKey ? new Wallet(config.privateKey) : undefined;

    let creds: ApiKeyCreds | undefined;
    const configured = getApiCredentials();
    if (configured) {
        creds = {
            key: configured.apiKey,
            secret: configured.secret,
            passphrase: configured.passphrase,
        };
        logger.info('API credentials set.');
    } else {
        logger.info('No API credentials found, running in read-only mode.');
    }

    return new ClobClient(config.clobHost, config.chainId, signer, creds);
}

export class OrderBookClient {
    private source: OrderBookSource | null;
    private readonly sourceFactory: () => OrderBookSource;

    /**
     * The underlying client is built on first use, so listing-only runs never touch credentials
     */
    constructor(sourceFactory: () => OrderBookSource = createClobSource) {
        this.source = null;
        this.sourceFactory = sourceFactory;
    }

    /**
     * Get order book for a token; null when the CLOB cannot provide one
     */
    async getOrderBook(tokenId: string): Promise<OrderBook | null> {
        if (!this.source) {
            this.source = this.sourceFactory();
        }

        try {
            const book = await this.source.getOrderBook(tokenId);
            return {
                market: book.market,
                assetId: book.asset_id,
                bids: book.bids ?? [],
                asks: book.asks ?? [],
            };
        } catch (error) {
            logger.warn('Could not fetch order book', { tokenId, ...errorMeta(error) });
            return null;
        }
    }
}
