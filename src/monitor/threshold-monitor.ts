/**
 * Threshold Monitor
 * Alerts on markets whose leading outcome is above the threshold, then re-polls
 * them every interval until each one drops to or below it.
 *
 * Per market: BELOW_THRESHOLD (untracked) -> ABOVE_THRESHOLD (in the watch set) -> RESOLVED (removed)
 */

import { config } from '../config.js';
import { logger, errorMeta } from '../logger.js';
import type { MarketRecord } from '../polymarket/types.js';
import type { Notifier } from '../notifications/webhook-notifier.js';
import {
    OutcomeProbability,
    exceedsThreshold,
    formatBreakdown,
    getBreakdown,
    thresholdLabel,
} from './probabilities.js';

export type WatchState = 'BELOW_THRESHOLD' | 'ABOVE_THRESHOLD' | 'RESOLVED';

export interface WatchEntry {
    readonly marketId: string;
    readonly question: string;
    readonly gameStartTime?: string;
    readonly initialBreakdown: readonly OutcomeProbability[];
    readonly latestBreakdown: readonly OutcomeProbability[] | null;
    readonly isHigh: boolean;
}

export type WatchSet = ReadonlyMap<string, WatchEntry>;

export type NotificationKind = 'alert' | 'still-high' | 'resolved';

export interface MonitorNotification {
    kind: NotificationKind;
    marketId: string;
    question: string;
    text: string;
}

export type CycleStatus = 'still-high' | 'resolved' | 'fetch-failed';

export interface CycleResult {
    marketId: string;
    status: CycleStatus;
}

export interface ScanOutcome {
    watchSet: WatchSet;
    notifications: MonitorNotification[];
}

export interface CycleOutcome {
    watchSet: WatchSet;
    notifications: MonitorNotification[];
    results: CycleResult[];
}

export type MarketFetcher = (marketId: string) => Promise<MarketRecord | null>;

export interface MonitorOptions {
    threshold: number;
    pollIntervalMs: number;
}

export interface MonitorReport {
    cycles: number;
    alerted: string[];
    resolved: string[];
    remaining: string[];
    notificationsSent: number;
    notificationsFailed: number;
}

function alertText(market: MarketRecord, breakdown: readonly OutcomeProbability[], threshold: number): string {
    return (
        `**High Probability Alert (>${thresholdLabel(threshold)})**\n\n` +
        `**Market:** ${market.question}\n` +
        `**Game Start Time:** ${market.gameStartTime ?? 'N/A'}\n` +
        `**Probabilities:**\n${formatBreakdown(breakdown)}`
    );
}

function stillHighText(market: MarketRecord, breakdown: readonly OutcomeProbability[], threshold: number): string {
    return (
        `**Still High Probability (>${thresholdLabel(threshold)})**\n\n` +
        `**Market:** ${market.question}\n` +
        `**Game Start Time:** ${market.gameStartTime ?? 'N/A'}\n` +
        `**Current Probabilities:**\n${formatBreakdown(breakdown)}`
    );
}

function resolvedText(
    question: string,
    entry: WatchEntry,
    current: readonly OutcomeProbability[] | null,
    threshold: number
): string {
    return (
        `**Probability Resolved (<=${thresholdLabel(threshold)})**\n\n` +
        `**Market:** ${question}\n` +
        `**Initial Alert Probabilities:**\n${formatBreakdown(entry.initialBreakdown)}\n` +
        `**Current Probabilities:**\n${formatBreakdown(current)}`
    );
}

/**
 * Initial transition: every market with an outcome strictly above the threshold enters the watch set
 */
export function scanMarkets(
    markets: readonly MarketRecord[],
    threshold: number,
    existing: WatchSet = new Map()
): ScanOutcome {
    const watchSet = new Map(existing);
    const notifications: MonitorNotification[] = [];

    for (const market of markets) {
        if (watchSet.has(market.id)) continue;

        const breakdown = getBreakdown(market);
        if (!breakdown || !exceedsThreshold(breakdown, threshold)) continue;

        watchSet.set(market.id, {
            marketId: market.id,
            question: market.question,
            gameStartTime: market.gameStartTime,
            initialBreakdown: breakdown,
            latestBreakdown: breakdown,
            isHigh: true,
        });
        notifications.push({
            kind: 'alert',
            marketId: market.id,
            question: market.question,
            text: alertText(market, breakdown, threshold),
        });
    }

    return { watchSet, notifications };
}

/**
 * One poll over a snapshot of the watch set. The input map is left untouched.
 */
export async function runCycle(
    current: WatchSet,
    fetchMarket: MarketFetcher,
    threshold: number
): Promise<CycleOutcome> {
    const watchSet = new Map(current);
    const notifications: MonitorNotification[] = [];
    const results: CycleResult[] = [];

    for (const marketId of Array.from(current.keys())) {
        const entry = watchSet.get(marketId);
        if (!entry) continue;

        logger.info(`Checking market: ${entry.question}`);

        let latest: MarketRecord | null;
        try {
            latest = await fetchMarket(marketId);
        } catch (error) {
            logger.error(`Error fetching market ${marketId}`, errorMeta(error));
            latest = null;
        }

        if (!latest) {
            logger.warn(`Could not fetch latest details for market ${marketId}. Will retry next cycle.`);
            results.push({ marketId, status: 'fetch-failed' });
            continue;
        }

        const breakdown = getBreakdown(latest);
        if (breakdown && exceedsThreshold(breakdown, threshold)) {
            logger.info(`Market '${latest.question}' (ID: ${marketId}) still above ${thresholdLabel(threshold)}. Continuing monitoring.`);
            watchSet.set(marketId, {
                ...entry,
                question: latest.question,
                gameStartTime: latest.gameStartTime ?? entry.gameStartTime,
                latestBreakdown: breakdown,
                isHigh: true,
            });
            notifications.push({
                kind: 'still-high',
                marketId,
                question: latest.question,
                text: stillHighText(latest, breakdown, threshold),
            });
            results.push({ marketId, status: 'still-high' });
        } else {
            logger.info(`Market '${latest.question}' (ID: ${marketId}) dropped to or below ${thresholdLabel(threshold)}. Stopping monitoring for this market.`);
            watchSet.delete(marketId);
            notifications.push({
                kind: 'resolved',
                marketId,
                question: latest.question,
                text: resolvedText(latest.question, entry, breakdown, threshold),
            });
            results.push({ marketId, status: 'resolved' });
        }
    }

    return { watchSet, notifications, results };
}

export function watchState(watchSet: WatchSet, marketId: string, resolved: ReadonlySet<string>): WatchState {
    if (watchSet.has(marketId)) return 'ABOVE_THRESHOLD';
    return resolved.has(marketId) ? 'RESOLVED' : 'BELOW_THRESHOLD';
}

export class ThresholdMonitor {
    private readonly fetchMarket: MarketFetcher;
    private readonly notifier: Notifier;
    private readonly options: MonitorOptions;

    private isRunning: boolean = false;
    private currentDelayTimeout: NodeJS.Timeout | null = null;
    private delayResolve: (() => void) | null = null;

    constructor(fetchMarket: MarketFetcher, notifier: Notifier, options: Partial<MonitorOptions> = {}) {
        this.fetchMarket = fetchMarket;
        this.notifier = notifier;
        this.options = {
            threshold: options.threshold ?? config.alertThreshold,
            pollIntervalMs: options.pollIntervalMs ?? config.pollIntervalMs,
        };
    }

    /**
     * Scan, alert, then poll until the watch set is empty or the monitor is stopped
     */
    async run(markets: readonly MarketRecord[], signal?: AbortSignal): Promise<MonitorReport> {
        const { threshold, pollIntervalMs } = this.options;
        const report: MonitorReport = {
            cycles: 0,
            alerted: [],
            resolved: [],
            remaining: [],
            notificationsSent: 0,
            notificationsFailed: 0,
        };

        const onAbort = () => this.stop();
        if (signal?.aborted) {
            return report;
        }
        signal?.addEventListener('abort', onAbort, { once: true });
        this.isRunning = true;

        try {
            logger.info(`Checking markets for initial high probability alerts (>${thresholdLabel(threshold)})...`);
            const scan = scanMarkets(markets, threshold);
            let watchSet = scan.watchSet;
            report.alerted = Array.from(watchSet.keys());

            for (const notification of scan.notifications) {
                logger.info(`Sending high probability alert for market: ${notification.question} (ID: ${notification.marketId})`);
                await this.deliver(notification, report);
            }

            if (watchSet.size > 0) {
                logger.info(`Starting continuous monitoring for ${watchSet.size} market(s) above ${thresholdLabel(threshold)}`);
            }

            while (this.isRunning && watchSet.size > 0) {
                logger.info(`Checking ${watchSet.size} monitored market(s) at ${new Date().toISOString()}`);
                const cycle = await runCycle(watchSet, this.fetchMarket, threshold);
                watchSet = cycle.watchSet;
                report.cycles++;

                for (const result of cycle.results) {
                    if (result.status === 'resolved') report.resolved.push(result.marketId);
                }
                for (const notification of cycle.notifications) {
                    await this.deliver(notification, report);
                }

                if (watchSet.size === 0) {
                    logger.info(`All monitored markets have dropped to or below ${thresholdLabel(threshold)}. Stopping continuous monitoring.`);
                } else if (this.isRunning) {
                    logger.info(`${watchSet.size} market(s) still being monitored. Waiting ${pollIntervalMs / 1000} seconds...`);
                    await this.delay(pollIntervalMs);
                }
            }

            report.remaining = Array.from(watchSet.keys());
            if (report.remaining.length > 0) {
                logger.info(`Monitoring stopped with ${report.remaining.length} market(s) still above threshold`);
            }
            return report;
        } finally {
            signal?.removeEventListener('abort', onAbort);
            this.isRunning = false;
        }
    }

    /**
     * Stop after the current cycle; an in-progress wait ends immediately
     */
    stop(): void {
        this.isRunning = false;

        if (this.currentDelayTimeout) {
            clearTimeout(this.currentDelayTimeout);
            this.currentDelayTimeout = null;
        }
        if (this.delayResolve) {
            this.delayResolve();
            this.delayResolve = null;
        }
    }

    private async deliver(notification: MonitorNotification, report: MonitorReport): Promise<void> {
        const delivered = await this.notifier.send(notification.text);
        if (delivered) {
            report.notificationsSent++;
        } else {
            report.notificationsFailed++;
        }
    }

    private delay(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.delayResolve = resolve;
            this.currentDelayTimeout = setTimeout(() => {
                this.currentDelayTimeout = null;
                this.delayResolve = null;
                resolve();
            }, ms);
        });
    }
}
