import dotenv from 'dotenv';

dotenv.config();

export interface ClobCredentials {
    apiKey: string;
    secret: string;
    passphrase: string;
}

export interface Config {
    // Polymarket
    gammaHost: string;
    clobHost: string;
    chainId: number;
    privateKey: string;
    clobApiKey: string;
    clobSecret: string;
    clobPassphrase: string;
    referenceMarketIds: string[];

    // Notifications
    discordWebhookUrl: string;

    // Threshold monitor
    alertThreshold: number;      // Fraction in [0, 1]; any outcome strictly above it triggers an alert
    pollIntervalMs: number;      // Sleep between monitor cycles
    requestTimeoutMs: number;

    // Odds analysis
    oddsApiKey: string;
    oddsApiHost: string;
    matchesFile: string;

    // Logging
    logLevel: string;
    logFile: string;
}

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

function getEnvVarList(name: string, defaultValue: string[]): string[] {
    const value = process.env[name];
    if (!value) return defaultValue;
    const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
    return items.length > 0 ? items : defaultValue;
}

export const config: Config = {
    gammaHost: getEnvVarOptional('GAMMA_HOST', 'https://gamma-api.polymarket.com'),
    clobHost: getEnvVarOptional('CLOB_HOST', 'https://clob.polymarket.com'),
    chainId: 137, // Polygon mainnet
    privateKey: getEnvVarOptional('PK', ''),
    clobApiKey: getEnvVarOptional('CLOB_API_KEY', ''),
    clobSecret: getEnvVarOptional('CLOB_SECRET', ''),
    clobPassphrase: getEnvVarOptional('CLOB_PASS_PHRASE', ''),
    referenceMarketIds: getEnvVarList('REFERENCE_MARKET_IDS', ['531894', '531899', '531895', '531896']),

    discordWebhookUrl: getEnvVarOptional('DISCORD_WEBHOOK_URL', ''),

    alertThreshold: getEnvVarNumber('ALERT_THRESHOLD', 0.60),
    pollIntervalMs: getEnvVarNumber('MONITOR_POLL_INTERVAL_MS', 30000), // 30 seconds
    requestTimeoutMs: getEnvVarNumber('REQUEST_TIMEOUT_MS', 10000),

    oddsApiKey: getEnvVarOptional('ODDS_API_KEY', ''),
    oddsApiHost: getEnvVarOptional('ODDS_API_HOST', 'https://api.the-odds-api.com'),
    matchesFile: getEnvVarOptional('MATCHES_FILE', 'matches.txt'),

    logLevel: getEnvVarOptional('LOG_LEVEL', 'info'),
    logFile: getEnvVarOptional('LOG_FILE', 'polymarket_odds.txt'),
};

/**
 * Check if we have pre-configured CLOB API credentials
 */
export function hasApiCredentials(): boolean {
    return !!(config.clobApiKey && config.clobSecret && config.clobPassphrase);
}

/**
 * Get pre-configured credentials if available
 */
export function getApiCredentials(): ClobCredentials | null {
    if (!hasApiCredentials()) return null;
    return {
        apiKey: config.clobApiKey,
        secret: config.clobSecret,
        passphrase: config.clobPassphrase,
    };
}

export function validateConfig(): void {
    if (config.alertThreshold <= 0 || config.alertThreshold >= 1) {
        throw new Error(`ALERT_THRESHOLD must be between 0 and 1, got ${config.alertThreshold}`);
    }
    if (config.pollIntervalMs <= 0) {
        throw new Error(`MONITOR_POLL_INTERVAL_MS must be positive, got ${config.pollIntervalMs}`);
    }
}
