/**
 * Text summaries for market listings and the detail view
 */

import type { MarketRecord, OrderBook } from '../polymarket/types.js';
import { extractTokenId } from '../polymarket/market-decoder.js';
import { formatPercent, getBreakdown } from '../monitor/probabilities.js';

const EVENT_URL = 'https://polymarket.com/event';

export function eventLink(market: MarketRecord): string | null {
    return market.eventSlug ? `${EVENT_URL}/${market.eventSlug}` : null;
}

function formatUsd(value: number): string {
    return `$${value.toFixed(2)}`;
}

/**
 * "(Hasn't started yet)", "(Started 12 minutes ago)" or "(Started 2.5 hours ago)"
 */
export function describeStart(gameStartTime: string, now: Date): string {
    const start = Date.parse(gameStartTime);
    if (isNaN(start)) return '';

    const elapsedMs = now.getTime() - start;
    if (elapsedMs < 0) return " (Hasn't started yet)";

    const hours = elapsedMs / 3600000;
    if (hours < 1) {
        return ` (Started ${Math.floor(elapsedMs / 60000)} minutes ago)`;
    }
    return ` (Started ${hours.toFixed(1)} hours ago)`;
}

function probabilityLines(market: MarketRecord, indent: string): string[] {
    const breakdown = getBreakdown(market);
    if (!breakdown) return [];
    return breakdown.map(entry => `${indent}${entry.outcome}: ${formatPercent(entry.probability, 2)}`);
}

export function formatMarketSummary(market: MarketRecord, now: Date = new Date()): string {
    const lines: string[] = [
        `Market: ${market.question}`,
        `Market ID: ${market.id}`,
    ];

    if (market.gameStartTime) {
        lines.push(`Game Start Time: ${market.gameStartTime}${describeStart(market.gameStartTime, now)}`);
    }

    const probabilities = probabilityLines(market, '  ');
    if (probabilities.length > 0) {
        lines.push('Current probabilities:', ...probabilities);
    } else {
        lines.push('Current probability: Not available');
    }

    if (market.startDate) lines.push(`Market Start Date: ${market.startDate}`);
    if (market.endDate) lines.push(`Market End Date: ${market.endDate}`);
    if (market.volume) lines.push(`Volume: ${formatUsd(market.volume)}`);
    if (market.liquidity) lines.push(`Liquidity: ${formatUsd(market.liquidity)}`);

    const link = eventLink(market);
    if (link) lines.push(`Link: ${link}`);

    return lines.join('\n');
}

export function formatMarketDetail(market: MarketRecord): string {
    const lines: string[] = [
        `=== DETAILED MARKET INFORMATION: ${market.question} ===`,
        '',
        `Market ID: ${market.id}`,
    ];

    const tokenId = extractTokenId(market);
    if (tokenId) lines.push(`Token ID: ${tokenId}`);

    const probabilities = probabilityLines(market, '  ');
    if (probabilities.length > 0) {
        lines.push('', 'Current probabilities:', ...probabilities);
    }

    const dates: string[] = [];
    if (market.startDate) dates.push(`Start Date: ${market.startDate}`);
    if (market.endDate) dates.push(`End Date: ${market.endDate}`);
    if (market.gameStartTime) dates.push(`Game Start Time: ${market.gameStartTime}`);
    if (dates.length > 0) lines.push('', ...dates);

    const status: string[] = [];
    if (market.active) status.push('Active');
    if (market.closed) status.push('Closed');
    if (status.length > 0) lines.push(`Status: ${status.join(', ')}`);

    if (market.volume) lines.push(`Volume: ${formatUsd(market.volume)}`);
    if (market.liquidity) lines.push(`Liquidity: ${formatUsd(market.liquidity)}`);

    const link = eventLink(market);
    if (link) lines.push('', `Polymarket link: ${link}`);

    return lines.join('\n');
}

export function formatOrderBook(book: OrderBook | null, depth: number = 3): string {
    if (!book) return 'No order book data available.';

    const lines: string[] = [];
    if (book.bids.length > 0) {
        lines.push('Top bids (BUY orders):');
        for (const bid of book.bids.slice(0, depth)) {
            lines.push(`  Price: $${bid.price} | Size: ${bid.size}`);
        }
    } else {
        lines.push('No bid orders found.');
    }

    lines.push('');
    if (book.asks.length > 0) {
        lines.push('Top asks (SELL orders):');
        for (const ask of book.asks.slice(0, depth)) {
            lines.push(`  Price: $${ask.price} | Size: ${ask.size}`);
        }
    } else {
        lines.push('No ask orders found.');
    }

    return lines.join('\n');
}
