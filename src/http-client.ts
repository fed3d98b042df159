/**
 * Shared axios setup
 * Clients depend on the narrow HttpClient shape so tests can hand them an in-process fake
 */

import axios from 'axios';
import { config } from './config.js';

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpRequestOptions {
    params?: QueryParams;
    headers?: Record<string, string>;
    timeout?: number;
}

export interface HttpResponse {
    status: number;
    data: unknown;
}

export interface HttpClient {
    get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
    post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export function createHttpClient(baseURL?: string, timeout: number = config.requestTimeoutMs): HttpClient {
    const instance = axios.create({
        baseURL,
        timeout,
        headers: {
            'Accept': 'application/json',
        },
    });

    return {
        async get(url, options) {
            const response = await instance.get<unknown>(url, options);
            return { status: response.status, data: response.data };
        },
        async post(url, body, options) {
            const response = await instance.post<unknown>(url, body, options);
            return { status: response.status, data: response.data };
        },
    };
}

/**
 * Message for logging a failed request; includes the HTTP status when there was one
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        return error.response
            ? `HTTP ${error.response.status}: ${error.message}`
            : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
