#!/usr/bin/env node
/**
 * Cricket Threshold Monitor
 * Finds upcoming cricket markets, alerts on any outcome above the threshold and
 * keeps polling those markets until they drop back.
 *
 * Usage: node dist/cli/monitor.js [--search "<term>"]
 */

import { config, validateConfig } from '../config.js';
import { logger } from '../logger.js';
import { GammaClient } from '../polymarket/gamma-client.js';
import { CricketMarketDiscovery, selectMarkets, sortByGameStartDesc } from '../cricket/market-discovery.js';
import { ThresholdMonitor } from '../monitor/threshold-monitor.js';
import { thresholdLabel } from '../monitor/probabilities.js';
import { WebhookNotifier } from '../notifications/webhook-notifier.js';
import { formatMarketSummary } from '../reporting/market-summary.js';
import { parseSearchArgs } from './args.js';
import { runMain } from './runtime.js';

async function main(): Promise<number> {
    validateConfig();

    const { searchTerm } = parseSearchArgs(process.argv.slice(2));
    if (searchTerm) {
        logger.info(`Searching for: ${searchTerm}`);
    }

    const gamma = new GammaClient();
    const discovery = new CricketMarketDiscovery(gamma);

    logger.info('Searching for cricket markets. This may take a moment...');
    const discovered = await discovery.discoverMarkets();
    if (discovered.length === 0) {
        logger.warn('No cricket markets found. Make sure Polymarket has active cricket markets available.');
        return 0;
    }

    logger.info('Fetching detailed market information to get game start times...');
    const enriched = await discovery.enrichWithDetails(discovered);
    if (enriched.length === 0) {
        logger.warn('No upcoming cricket markets found.');
        return 0;
    }

    const { markets: selected } = selectMarkets(enriched, searchTerm);
    const markets = sortByGameStartDesc(selected);
    logger.info(`Monitoring ${markets.length} cricket market(s) with threshold >${thresholdLabel(config.alertThreshold)}`);

    const monitor = new ThresholdMonitor(marketId => gamma.getMarket(marketId), new WebhookNotifier());

    const controller = new AbortController();
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, stopping monitor...`);
        controller.abort();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    const report = await monitor.run(markets, controller.signal);
    logger.info(
        `Monitoring finished after ${report.cycles} cycle(s): ` +
        `${report.alerted.length} alerted, ${report.resolved.length} resolved, ${report.remaining.length} still high`
    );
    if (report.notificationsFailed > 0) {
        logger.warn(`${report.notificationsFailed} notification(s) could not be delivered`);
    }

    logger.info('=== INITIAL MARKET SUMMARIES ===');
    markets.forEach((market, i) => {
        logger.info(`--- Market ${i + 1} of ${markets.length} ---\n${formatMarketSummary(market)}`);
    });

    return 0;
}

runMain('Cricket Threshold Monitor', main);
