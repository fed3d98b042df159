/**
 * Outcome probability breakdowns for market records
 */

import type { MarketRecord } from '../polymarket/types.js';

export interface OutcomeProbability {
    outcome: string;
    probability: number; // 0-1
}

/**
 * Outcome/price pairs of a market, or null when either list is missing or they differ in length
 */
export function getBreakdown(market: MarketRecord): OutcomeProbability[] | null {
    const { outcomes, outcomePrices } = market;
    if (outcomes.length === 0 || outcomePrices.length === 0 || outcomes.length !== outcomePrices.length) {
        return null;
    }
    return outcomes.map((outcome, i) => ({ outcome, probability: outcomePrices[i] }));
}

/**
 * True when any outcome is strictly above the threshold
 */
export function exceedsThreshold(breakdown: readonly OutcomeProbability[] | null, threshold: number): boolean {
    return breakdown !== null && breakdown.some(entry => entry.probability > threshold);
}

export function formatPercent(probability: number, decimals: number): string {
    return `${(probability * 100).toFixed(decimals)}%`;
}

/**
 * Threshold as a short label, e.g. 0.6 -> "60%"
 */
export function thresholdLabel(threshold: number): string {
    return `${Number((threshold * 100).toFixed(1))}%`;
}

/**
 * One "  - outcome: 65.0%" line per outcome, or "N/A"
 */
export function formatBreakdown(breakdown: readonly OutcomeProbability[] | null, decimals: number = 1): string {
    if (!breakdown) return 'N/A';
    return breakdown
        .map(entry => `  - ${entry.outcome}: ${formatPercent(entry.probability, decimals)}`)
        .join('\n');
}
