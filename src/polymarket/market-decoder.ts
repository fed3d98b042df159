/**
 * Market payload decoding
 * Normalizes the Gamma API's inconsistent field encodings into a typed MarketRecord
 */

import { logger } from '../logger.js';
import type { GammaMarketPayload, MarketRecord } from './types.js';

/**
 * Accept a raw array or a JSON-encoded string of an array; anything else is empty
 */
function decodeArray(value: unknown, field: string): unknown[] {
    if (Array.isArray(value)) return value;
    if (typeof value !== 'string' || value.trim() === '') return [];

    try {
        const parsed: unknown = JSON.parse(value);
        return Array.isArray(parsed) ? parsed : [];
    } catch {
        logger.debug(`Could not decode ${field}`, { value });
        return [];
    }
}

export function decodeStringArray(value: unknown, field: string = 'outcomes'): string[] {
    return decodeArray(value, field)
        .filter(item => typeof item === 'string' || typeof item === 'number')
        .map(item => String(item));
}

/**
 * Outcome prices are all-or-nothing: one unparsable element empties the list
 */
export function decodePriceArray(value: unknown, field: string = 'outcomePrices'): number[] {
    const items = decodeArray(value, field);
    const prices: number[] = [];

    for (const item of items) {
        const price = toNumber(item);
        if (price === undefined) {
            logger.debug(`Non-numeric entry in ${field}`, { value });
            return [];
        }
        prices.push(price);
    }

    return prices;
}

export function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value !== 'string' || value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Token ids sometimes come as a comma-separated string instead of JSON
 */
function decodeTokenIds(value: unknown): string[] {
    const decoded = decodeStringArray(value, 'clobTokenIds');
    if (decoded.length > 0) return decoded;
    if (typeof value === 'string' && value.includes(',') && !value.trim().startsWith('[')) {
        return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
    }
    return [];
}

/**
 * Decode one Gamma payload. Returns null when the payload has no usable id.
 */
export function decodeMarket(raw: GammaMarketPayload): MarketRecord | null {
    if (raw.id === undefined || raw.id === null || String(raw.id) === '') {
        return null;
    }

    return {
        id: String(raw.id),
        question: optionalString(raw.question) ?? 'N/A',
        slug: optionalString(raw.slug),
        eventSlug: optionalString(raw.eventSlug),
        conditionId: optionalString(raw.conditionId),
        clobTokenIds: decodeTokenIds(raw.clobTokenIds),
        outcomes: decodeStringArray(raw.outcomes),
        outcomePrices: decodePriceArray(raw.outcomePrices),
        gameStartTime: optionalString(raw.gameStartTime),
        startDate: optionalString(raw.startDate),
        endDate: optionalString(raw.endDate),
        closed: raw.closed === true,
        active: raw.active === true,
        volume: toNumber(raw.volume),
        liquidity: toNumber(raw.liquidity),
    };
}

/**
 * Decode a list payload, skipping entries that are not objects or lack an id
 */
export function decodeMarketList(data: unknown): MarketRecord[] {
    if (!Array.isArray(data)) return [];

    const markets: MarketRecord[] = [];
    for (const item of data) {
        if (!isPayload(item)) continue;
        const market = decodeMarket(item);
        if (market) markets.push(market);
    }
    return markets;
}

export function isPayload(value: unknown): value is GammaMarketPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay a detail snapshot on a listing snapshot; fields the detail lacks keep the listing's value
 */
export function mergeMarket(base: MarketRecord, detail: MarketRecord): MarketRecord {
    return {
        id: base.id,
        question: detail.question !== 'N/A' ? detail.question : base.question,
        slug: detail.slug ?? base.slug,
        eventSlug: detail.eventSlug ?? base.eventSlug,
        conditionId: detail.conditionId ?? base.conditionId,
        clobTokenIds: detail.clobTokenIds.length > 0 ? detail.clobTokenIds : base.clobTokenIds,
        outcomes: detail.outcomes.length > 0 ? detail.outcomes : base.outcomes,
        outcomePrices: detail.outcomePrices.length > 0 ? detail.outcomePrices : base.outcomePrices,
        gameStartTime: detail.gameStartTime ?? base.gameStartTime,
        startDate: detail.startDate ?? base.startDate,
        endDate: detail.endDate ?? base.endDate,
        closed: detail.closed,
        active: detail.active,
        volume: detail.volume ?? base.volume,
        liquidity: detail.liquidity ?? base.liquidity,
    };
}

/**
 * Pick the id used to look up a market's order book
 */
export function extractTokenId(market: MarketRecord): string | null {
    if (market.conditionId) return market.conditionId;
    if (market.clobTokenIds.length > 0) return market.clobTokenIds[0];
    return null;
}
