/**
 * Polymarket types for cricket market tooling
 */

/**
 * Raw market payload as returned by the Gamma API.
 * List-valued fields arrive either as arrays or as JSON-encoded strings of arrays.
 */
export interface GammaMarketPayload {
    id?: string | number;
    question?: string;
    slug?: string;
    eventSlug?: string;
    conditionId?: string;
    clobTokenIds?: unknown;
    outcomes?: unknown;
    outcomePrices?: unknown;
    gameStartTime?: string | null;
    startDate?: string | null;
    endDate?: string | null;
    closed?: boolean;
    active?: boolean;
    volume?: string | number | null;
    liquidity?: string | number | null;
    [key: string]: unknown;
}

/**
 * Decoded market snapshot. Read-only: a newer state is obtained by re-fetching.
 */
export interface MarketRecord {
    readonly id: string;
    readonly question: string;
    readonly slug?: string;
    readonly eventSlug?: string;
    readonly conditionId?: string;
    readonly clobTokenIds: readonly string[];
    readonly outcomes: readonly string[];
    readonly outcomePrices: readonly number[];
    readonly gameStartTime?: string;
    readonly startDate?: string;
    readonly endDate?: string;
    readonly closed: boolean;
    readonly active: boolean;
    readonly volume?: number;
    readonly liquidity?: number;
}

export interface OrderBookEntry {
    price: string;
    size: string;
}

export interface OrderBook {
    market: string;
    assetId: string;
    bids: OrderBookEntry[];
    asks: OrderBookEntry[];
}

/**
 * Read access to Gamma market data; implemented by GammaClient and by test fakes
 */
export interface MarketDataSource {
    listMarkets(limit?: number): Promise<MarketRecord[]>;
    getRelatedMarkets(marketId: string, limit?: number, offset?: number): Promise<MarketRecord[]>;
    getMarket(marketId: string): Promise<MarketRecord | null>;
}
