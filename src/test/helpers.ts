/**
 * Shared builders for test data
 */

import type { HttpClient, HttpRequestOptions, HttpResponse } from '../http-client.js';
import type { MarketRecord } from '../polymarket/types.js';

export function makeMarket(overrides: Partial<MarketRecord> = {}): MarketRecord {
    return {
        id: 'm1',
        question: 'Mumbai Indians vs. Chennai Super Kings',
        clobTokenIds: [],
        outcomes: ['Mumbai Indians', 'Chennai Super Kings'],
        outcomePrices: [0.5, 0.5],
        closed: false,
        active: true,
        ...overrides,
    };
}

export interface RecordedRequest {
    method: 'get' | 'post';
    url: string;
    body?: unknown;
    options?: HttpRequestOptions;
}

type Responder = (request: RecordedRequest) => HttpResponse;

/**
 * In-process HttpClient; the responder may throw to simulate a failed request
 */
export class FakeHttpClient implements HttpClient {
    readonly requests: RecordedRequest[] = [];
    private readonly responder: Responder;

    constructor(responder: Responder) {
        this.responder = responder;
    }

    async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        const request: RecordedRequest = { method: 'get', url, options };
        this.requests.push(request);
        return this.responder(request);
    }

    async post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse> {
        const request: RecordedRequest = { method: 'post', url, body, options };
        this.requests.push(request);
        return this.responder(request);
    }
}
