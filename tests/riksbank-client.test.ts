/**
 * Unit tests for the Riksbank API client
 *
 * Tests cover:
 * - request shape (URL, query parameters, headers, per-attempt timeout)
 * - back-off schedule for 429 / 5xx and the Retry-After floor
 * - non-retryable 4xx and unexpected errors
 * - network errors, the cumulative time budget, and cancellation
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { RiksbankApiClient } from '../src/clients/riksbank-client';
import { RequestCancelledError, UpstreamError } from '../src/errors';
import { BASE_URL, response } from './fixtures';

describe('RiksbankApiClient', () => {
    let http: AxiosInstance;
    let getSpy: jest.SpyInstance;
    let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;
    let client: RiksbankApiClient;

    beforeEach(() => {
        http = axios.create();
        getSpy = jest.spyOn(http, 'get');
        sleep = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
        client = new RiksbankApiClient({ http, sleep, random: () => 0.5 });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        client.close();
        jest.restoreAllMocks();
    });

    describe('getJson', () => {
        it('should return the body of a successful response', async () => {
            getSpy.mockResolvedValueOnce(response(200, { data: ['2024:1'] }));

            const result = await client.getJson('', { series: 'SEQGDPNAYCA' });

            expect(result).toEqual({ data: ['2024:1'] });
            expect(getSpy).toHaveBeenCalledTimes(1);
            expect(getSpy).toHaveBeenCalledWith(
                BASE_URL,
                expect.objectContaining({
                    params: { series: 'SEQGDPNAYCA' },
                    timeout: 10000,
                    headers: expect.objectContaining({ Accept: 'application/json' })
                })
            );
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should append the endpoint path to the base URL', async () => {
            getSpy.mockResolvedValueOnce(response(200, { data: [] }));

            await client.getJson('policy_rounds');

            expect(getSpy).toHaveBeenCalledWith(`${BASE_URL}/policy_rounds`, expect.anything());
        });

        it('should send the subscription key when one is configured', async () => {
            const keyed = new RiksbankApiClient({ http, sleep, subscriptionKey: 'test-key' });
            getSpy.mockResolvedValueOnce(response(200, {}));

            await keyed.getJson('series_ids');
            keyed.close();

            expect(getSpy).toHaveBeenCalledWith(
                `${BASE_URL}/series_ids`,
                expect.objectContaining({
                    headers: expect.objectContaining({ 'Ocp-Apim-Subscription-Key': 'test-key' })
                })
            );
        });

        it('should pass the caller signal to the request', async () => {
            const controller = new AbortController();
            getSpy.mockResolvedValueOnce(response(200, {}));

            await client.getJson('', {}, { signal: controller.signal });

            expect(getSpy).toHaveBeenCalledWith(BASE_URL, expect.objectContaining({ signal: controller.signal }));
        });
    });

    describe('retry behaviour', () => {
        it('should succeed after three 429 responses, waiting per the back-off schedule', async () => {
            getSpy
                .mockResolvedValueOnce(response(429, 'Too Many Requests'))
                .mockResolvedValueOnce(response(429, 'Too Many Requests'))
                .mockResolvedValueOnce(response(429, 'Too Many Requests'))
                .mockResolvedValueOnce(response(200, { data: [] }));

            const result = await client.getJson('', { series: 'SEQGDPNAYCA' });

            expect(result).toEqual({ data: [] });
            expect(getSpy).toHaveBeenCalledTimes(4);
            // base 1000ms * 2^n plus jitter of 0.5 * 1000ms
            expect(sleep.mock.calls.map(call => call[0])).toEqual([1500, 2500, 4500]);
        });

        it('should use Retry-After as a floor on the wait', async () => {
            getSpy
                .mockResolvedValueOnce(response(429, '', { 'retry-after': '7' }))
                .mockResolvedValueOnce(response(429, '', { 'retry-after': '1' }))
                .mockResolvedValueOnce(response(200, {}));

            await client.getJson('');

            expect(sleep.mock.calls.map(call => call[0])).toEqual([7000, 2500]);
        });

        it('should cap the computed wait at maxDelayMs', async () => {
            const capped = new RiksbankApiClient({ http, sleep, random: () => 0.5, maxDelayMs: 2000 });
            getSpy
                .mockResolvedValueOnce(response(503, ''))
                .mockResolvedValueOnce(response(503, ''))
                .mockResolvedValueOnce(response(200, {}));

            await capped.getJson('');
            capped.close();

            expect(sleep.mock.calls.map(call => call[0])).toEqual([1500, 2000]);
        });

        it('should throw an exhausted UpstreamError on persistent 503 responses', async () => {
            getSpy.mockResolvedValue(response(503, 'Service Unavailable'));

            const error = await client.getJson('', { series: 'SEQGDPNAYCA' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({
                code: 'UPSTREAM',
                status: 503,
                attempts: 5,
                exhausted: true,
                url: BASE_URL
            });
            expect(getSpy).toHaveBeenCalledTimes(5);
            expect(sleep.mock.calls.map(call => call[0])).toEqual([1500, 2500, 4500, 8500]);
        });

        it('should not retry a 4xx other than 429', async () => {
            getSpy.mockResolvedValueOnce(response(400, { message: 'bad series' }));

            const error = await client.getJson('', { series: '???' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ status: 400, attempts: 1, exhausted: false });
            expect(getSpy).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should retry network errors and timeouts', async () => {
            getSpy
                .mockRejectedValueOnce(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'))
                .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
                .mockResolvedValueOnce(response(200, { data: [] }));

            const result = await client.getJson('');

            expect(result).toEqual({ data: [] });
            expect(getSpy).toHaveBeenCalledTimes(3);
        });

        it('should report a network failure without a status once retries run out', async () => {
            const small = new RiksbankApiClient({ http, sleep, random: () => 0, maxAttempts: 2 });
            getSpy.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

            const error = await small.getJson('').catch((e: unknown) => e);
            small.close();

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ status: undefined, attempts: 2, exhausted: true });
            expect(sleep.mock.calls.map(call => call[0])).toEqual([1000]);
        });

        it('should rethrow errors that are not HTTP failures', async () => {
            const bug = new TypeError('boom');
            getSpy.mockRejectedValueOnce(bug);

            await expect(client.getJson('')).rejects.toBe(bug);
            expect(getSpy).toHaveBeenCalledTimes(1);
        });

        it('should give up when the next wait would exceed the total time budget', async () => {
            const budgeted = new RiksbankApiClient({ http, sleep, random: () => 0.5, totalTimeoutMs: 5000 });
            getSpy.mockResolvedValue(response(429, '', { 'retry-after': '10' }));

            const error = await budgeted.getJson('').catch((e: unknown) => e);
            budgeted.close();

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ status: 429, attempts: 1, exhausted: true });
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should shorten the last attempt so slow responses stay within the total budget', async () => {
            let now = 0;
            jest.spyOn(Date, 'now').mockImplementation(() => now);
            sleep.mockImplementation(async (ms: number) => {
                now += ms;
            });
            // Each request hangs for 10s, or until its timeout fires
            getSpy.mockImplementation(async (_url: string, config: { timeout: number }) => {
                now += Math.min(10000, config.timeout);
                if (config.timeout < 10000) {
                    throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, 'ECONNABORTED');
                }
                return response(503, '');
            });

            const error = await client.getJson('').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ status: undefined, attempts: 5, exhausted: true });
            expect(getSpy.mock.calls.map(call => call[1].timeout)).toEqual([10000, 10000, 10000, 10000, 3000]);
            expect(now).toBe(60000);
        });

        it('should not send another attempt once the budget is used up', async () => {
            let now = 0;
            const budgeted = new RiksbankApiClient({ http, sleep, random: () => 0, baseDelayMs: 0, totalTimeoutMs: 5000 });
            jest.spyOn(Date, 'now').mockImplementation(() => now);
            getSpy.mockImplementation(async () => {
                now += 5000;
                return response(503, '');
            });

            const error = await budgeted.getJson('').catch((e: unknown) => e);
            budgeted.close();

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ attempts: 1, exhausted: true });
            expect(getSpy).toHaveBeenCalledTimes(1);
        });

        it('should log one line per attempt', async () => {
            getSpy
                .mockResolvedValueOnce(response(429, ''))
                .mockResolvedValueOnce(response(200, {}));

            await client.getJson('');

            expect(console.warn).toHaveBeenCalledTimes(1);
            expect(console.warn).toHaveBeenCalledWith(`GET ${BASE_URL} -> HTTP 429 (attempt 1/5). Retrying in 1500ms...`);
            expect(console.log).toHaveBeenCalledTimes(1);
            expect(console.log).toHaveBeenCalledWith(`GET ${BASE_URL} -> 200 (attempt 2/5)`);
        });
    });

    describe('cancellation', () => {
        it('should not send a request when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(client.getJson('', {}, { signal: controller.signal })).rejects.toBeInstanceOf(RequestCancelledError);
            expect(getSpy).not.toHaveBeenCalled();
        });

        it('should stop waiting out the back-off when the signal aborts', async () => {
            const controller = new AbortController();
            const realTimers = new RiksbankApiClient({ http, random: () => 0 });
            getSpy.mockResolvedValue(response(503, ''));

            setTimeout(() => controller.abort(), 10);
            const error = await realTimers.getJson('', {}, { signal: controller.signal }).catch((e: unknown) => e);
            realTimers.close();

            expect(error).toBeInstanceOf(RequestCancelledError);
            expect(getSpy).toHaveBeenCalledTimes(1);
        });

        it('should report an aborted in-flight request as cancelled', async () => {
            const controller = new AbortController();
            getSpy.mockImplementationOnce(async () => {
                controller.abort();
                throw new axios.CanceledError('canceled');
            });

            await expect(client.getJson('', {}, { signal: controller.signal })).rejects.toBeInstanceOf(RequestCancelledError);
            expect(sleep).not.toHaveBeenCalled();
        });
    });
});
