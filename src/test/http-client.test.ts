import { describe, it, expect } from '@jest/globals';
import { AxiosError, AxiosHeaders } from 'axios';
import { describeHttpError } from '../http-client.js';

describe('describeHttpError', () => {
    it('includes the status of an HTTP error response', () => {
        const config = { headers: new AxiosHeaders() };
        const error = new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, {
            status: 503,
            statusText: 'Service Unavailable',
            headers: {},
            config,
            data: null,
        });

        expect(describeHttpError(error)).toBe('HTTP 503: Request failed with status code 503');
    });

    it('uses the message of an error without a response', () => {
        expect(describeHttpError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'))).toBe(
            'timeout of 10000ms exceeded'
        );
        expect(describeHttpError(new Error('boom'))).toBe('boom');
        expect(describeHttpError('plain failure')).toBe('plain failure');
    });
});
