#!/usr/bin/env node
/**
 * Cricket Markets
 * Lists active cricket markets, optionally filtered by a search term, with an
 * interactive detail and order book view.
 *
 * Usage: node dist/cli/markets.js [--search "<term>"]
 */

import * as readline from 'readline/promises';
import { logger, errorMeta } from '../logger.js';
import { GammaClient } from '../polymarket/gamma-client.js';
import { OrderBookClient } from '../polymarket/clob-client.js';
import { extractTokenId } from '../polymarket/market-decoder.js';
import type { MarketDataSource, MarketRecord } from '../polymarket/types.js';
import { CricketMarketDiscovery, selectMarkets, sortByEndDate } from '../cricket/market-discovery.js';
import { formatMarketDetail, formatMarketSummary, formatOrderBook } from '../reporting/market-summary.js';
import { parseMenuChoice, parseSearchArgs } from './args.js';
import { runMain } from './runtime.js';

async function showDetail(market: MarketRecord, source: MarketDataSource, orderBooks: OrderBookClient): Promise<void> {
    const latest = (await source.getMarket(market.id)) ?? market;
    if (latest === market) {
        logger.info('Note: could not get additional market details; showing listing data.');
    }

    console.log(`\n${formatMarketDetail(latest)}`);

    const tokenId = extractTokenId(latest);
    if (tokenId) {
        console.log('\nAttempting to fetch order book data...\n');
        const book = await orderBooks.getOrderBook(tokenId);
        console.log(formatOrderBook(book));
    }
}

async function promptLoop(markets: MarketRecord[], source: MarketDataSource): Promise<void> {
    const orderBooks = new OrderBookClient();
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    try {
        while (!closed) {
            const answer = await rl.question('\nEnter market number for detailed view (0 to exit): ');
            const choice = parseMenuChoice(answer, markets.length);

            if (choice.kind === 'exit') break;
            if (choice.kind === 'invalid') {
                console.log(choice.message);
                continue;
            }

            try {
                await showDetail(markets[choice.index], source, orderBooks);
            } catch (error) {
                logger.error('Error showing market details', errorMeta(error));
            }
        }
    } catch (error) {
        // Ctrl+C / Ctrl+D closes the interface and rejects the pending question
        if (!closed) throw error;
        console.log('\nExiting...');
    } finally {
        rl.close();
    }
}

async function main(): Promise<number> {
    const { searchTerm } = parseSearchArgs(process.argv.slice(2));
    if (searchTerm) {
        logger.info(`Searching for: ${searchTerm}`);
    }

    const gamma = new GammaClient();
    const discovery = new CricketMarketDiscovery(gamma);

    logger.info('Searching for cricket markets. This may take a moment...');
    const cricketMarkets = await discovery.discoverMarkets();
    if (cricketMarkets.length === 0) {
        logger.warn('No cricket markets found. Make sure Polymarket has active cricket markets available.');
        return 0;
    }
    logger.info(`Found ${cricketMarkets.length} active cricket markets.`);

    const { markets: selected } = selectMarkets(cricketMarkets, searchTerm);
    const markets = sortByEndDate(selected);

    console.log('\n=== ACTIVE CRICKET MARKETS ===\n');
    markets.forEach((market, i) => {
        console.log(`--- Market ${i + 1} of ${markets.length} ---`);
        console.log(formatMarketSummary(market));
        console.log();
    });

    if (process.stdin.isTTY) {
        await promptLoop(markets, gamma);
    }
    return 0;
}

runMain('Cricket Odds Fetcher for Polymarket', main);
