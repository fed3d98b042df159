/**
 * Webhook Notifier
 * Posts plain-text alerts to a Discord-style webhook ({ "content": text })
 */

import { config } from '../config.js';
import { logger } from '../logger.js';
import { createHttpClient, describeHttpError, HttpClient } from '../http-client.js';

export interface Notifier {
    /**
     * Deliver one message; resolves false when it could not be delivered
     */
    send(content: string): Promise<boolean>;
}

const WEBHOOK_TIMEOUT_MS = 10000;

export class WebhookNotifier implements Notifier {
    private readonly webhookUrl: string;
    private client: HttpClient;

    constructor(webhookUrl: string = config.discordWebhookUrl, client?: HttpClient) {
        this.webhookUrl = webhookUrl;
        this.client = client ?? createHttpClient(undefined, WEBHOOK_TIMEOUT_MS);

        if (!this.webhookUrl) {
            logger.warn('DISCORD_WEBHOOK_URL not set; alerts will only be logged');
        }
    }

    isConfigured(): boolean {
        return this.webhookUrl.length > 0;
    }

    /**
     * Failures are logged, never retried and never thrown
     */
    async send(content: string): Promise<boolean> {
        if (!this.isConfigured()) {
            logger.error('DISCORD_WEBHOOK_URL not set in environment variables. Cannot send Discord alert.');
            return false;
        }

        try {
            logger.debug('Sending Discord alert', { content });
            const response = await this.client.post(this.webhookUrl, { content }, {
                headers: { 'Content-Type': 'application/json' },
            });
            logger.info(`Discord alert sent successfully (Status: ${response.status})`);
            return true;
        } catch (error) {
            logger.error(`Failed to send Discord alert: ${describeHttpError(error)}`);
            return false;
        }
    }
}
