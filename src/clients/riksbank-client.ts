/**
 * Riksbank Monetary Policy Data API client
 *
 * Endpoints (relative to the base URL):
 * - ''               forecast vintages for one series (?series=<id>)
 * - 'policy_rounds'  published policy round labels
 * - 'series_ids'     series metadata
 *
 * Rate limit: anonymous access is throttled by the API gateway and answers
 * 429 with a Retry-After header. A subscription key raises the quota.
 */

import http from 'http';
import https from 'https';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { RequestCancelledError, UpstreamError } from '../errors';
import { RequestOptions, RetryPolicy } from '../types';

export const DEFAULT_BASE_URL = 'https://api.riksbank.se/monetary_policy_data/v1/forecasts';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    requestTimeoutMs: 10000,
    totalTimeoutMs: 60000
};

export type QueryParams = Record<string, string | number | undefined>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RiksbankApiClientOptions extends Partial<RetryPolicy> {
    baseUrl?: string;
    subscriptionKey?: string;
    http?: AxiosInstance;
    sleep?: Sleep;
    random?: () => number;
}

type AttemptOutcome =
    | { kind: 'response'; response: AxiosResponse<unknown> }
    | { kind: 'network'; message: string };

export class RiksbankApiClient {
    private readonly baseUrl: string;
    private readonly policy: RetryPolicy;
    private readonly subscriptionKey?: string;
    private readonly http: AxiosInstance;
    private readonly sleep: Sleep;
    private readonly random: () => number;
    private readonly httpAgent = new http.Agent({ keepAlive: true });
    private readonly httpsAgent = new https.Agent({ keepAlive: true });

    constructor(options: RiksbankApiClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.policy = {
            maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
            baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
            maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
            requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_RETRY_POLICY.requestTimeoutMs,
            totalTimeoutMs: options.totalTimeoutMs ?? DEFAULT_RETRY_POLICY.totalTimeoutMs
        };
        if (this.policy.maxAttempts < 1) {
            throw new Error(`maxAttempts must be at least 1, got ${this.policy.maxAttempts}`);
        }
        this.subscriptionKey = options.subscriptionKey;
        this.http = options.http ?? axios;
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
    }

    /**
     * GET a JSON document, retrying rate limits (429), server errors (5xx)
     * and network failures with exponential backoff.
     *
     * @param path Endpoint relative to the base URL ('' for the base itself)
     * @throws UpstreamError when the request fails for good
     * @throws RequestCancelledError when `options.signal` aborts
     */
    async getJson(path: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<unknown> {
        const url = path ? `${this.baseUrl}/${path.replace(/^\/+/, '')}` : this.baseUrl;
        const { signal } = options;
        const startedAt = Date.now();

        for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
            this.throwIfCancelled(url, signal);

            const attemptLabel = `attempt ${attempt + 1}/${this.policy.maxAttempts}`;
            const remaining = this.policy.totalTimeoutMs - (Date.now() - startedAt);
            if (remaining <= 0) {
                console.error(`GET ${url} (${attemptLabel}) not sent, ${this.policy.totalTimeoutMs}ms budget used up`);
                throw new UpstreamError(`Upstream request to ${url} did not succeed within ${this.policy.totalTimeoutMs}ms`, {
                    url,
                    attempts: attempt,
                    exhausted: true
                });
            }

            // axios treats a timeout of 0 as no timeout
            const timeout = this.policy.requestTimeoutMs > 0 ? Math.min(this.policy.requestTimeoutMs, remaining) : remaining;
            const outcome = await this.attempt(url, params, timeout, signal);

            if (outcome.kind === 'response') {
                const { status } = outcome.response;

                if (status >= 200 && status < 300) {
                    console.log(`GET ${url} -> ${status} (${attemptLabel})`);
                    return outcome.response.data;
                }

                if (!this.isRetryableStatus(status)) {
                    console.error(`GET ${url} -> ${status} (${attemptLabel}), not retrying`);
                    throw new UpstreamError(`Upstream rejected request to ${url} with HTTP ${status}`, {
                        url,
                        status,
                        attempts: attempt + 1,
                        exhausted: false
                    });
                }
            }

            const status = outcome.kind === 'response' ? outcome.response.status : undefined;
            const failure = outcome.kind === 'response' ? `HTTP ${outcome.response.status}` : outcome.message;

            if (attempt === this.policy.maxAttempts - 1) {
                console.error(`GET ${url} -> ${failure} (${attemptLabel}), retries exhausted`);
                throw new UpstreamError(`Upstream request to ${url} failed after ${attempt + 1} attempts: ${failure}`, {
                    url,
                    status,
                    attempts: attempt + 1,
                    exhausted: true
                });
            }

            const retryAfter = outcome.kind === 'response' ? this.getRetryAfter(outcome.response) : null;
            const waitTime = Math.max(this.calculateBackoff(attempt), retryAfter ?? 0);

            if (Date.now() - startedAt + waitTime > this.policy.totalTimeoutMs) {
                console.error(`GET ${url} -> ${failure} (${attemptLabel}), next wait of ${waitTime}ms exceeds ${this.policy.totalTimeoutMs}ms budget`);
                throw new UpstreamError(`Upstream request to ${url} did not succeed within ${this.policy.totalTimeoutMs}ms: ${failure}`, {
                    url,
                    status,
                    attempts: attempt + 1,
                    exhausted: true
                });
            }

            console.warn(`GET ${url} -> ${failure} (${attemptLabel}). Retrying in ${waitTime}ms...`);
            try {
                await this.sleep(waitTime, signal);
            } catch (error) {
                this.throwIfCancelled(url, signal);
                throw error;
            }
        }

        // The last attempt always returns or throws above
        throw new UpstreamError(`Upstream request to ${url} failed`, {
            url,
            attempts: this.policy.maxAttempts,
            exhausted: true
        });
    }

    /**
     * Release the keep-alive sockets shared by all requests from this client.
     */
    close(): void {
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }

    private async attempt(url: string, params: QueryParams, timeout: number, signal?: AbortSignal): Promise<AttemptOutcome> {
        const headers: Record<string, string> = {
            'User-Agent': 'riksbank-forecast-vintages/1.0',
            'Accept': 'application/json'
        };
        if (this.subscriptionKey) {
            headers['Ocp-Apim-Subscription-Key'] = this.subscriptionKey;
        }

        try {
            const response = await this.http.get<unknown>(url, {
                params,
                headers,
                signal,
                timeout,
                httpAgent: this.httpAgent,
                httpsAgent: this.httpsAgent,
                validateStatus: () => true  // Status handling happens in getJson
            });
            return { kind: 'response', response };
        } catch (error) {
            this.throwIfCancelled(url, signal);
            if (this.isNetworkError(error)) {
                return { kind: 'network', message: this.getErrorMessage(error) };
            }
            throw error;
        }
    }

    /**
     * Exponential backoff with additive jitter of up to one base delay
     * @param attempt Current attempt number (0-indexed)
     * @returns Wait time in milliseconds
     */
    private calculateBackoff(attempt: number): number {
        const exponential = this.policy.baseDelayMs * Math.pow(2, attempt);
        const jitter = this.random() * this.policy.baseDelayMs;
        return Math.min(Math.round(exponential + jitter), this.policy.maxDelayMs);
    }

    private isRetryableStatus(status: number): boolean {
        return status === 429 || (status >= 500 && status < 600);
    }

    /**
     * Network errors and timeouts carry no response and are retryable
     */
    private isNetworkError(error: unknown): boolean {
        return axios.isAxiosError(error) && !error.response;
    }

    /**
     * Parse a Retry-After header given either as delta-seconds or as an HTTP date
     * @returns Wait time in milliseconds, or null when absent or unparseable
     */
    private getRetryAfter(response: AxiosResponse<unknown>): number | null {
        const header: unknown = response.headers['retry-after'];
        if (typeof header !== 'string' || header.trim() === '') {
            return null;
        }

        if (/^\d+$/.test(header.trim())) {
            return parseInt(header, 10) * 1000;
        }

        const at = Date.parse(header);
        if (isNaN(at)) {
            return null;
        }
        return Math.max(at - Date.now(), 0);
    }

    private throwIfCancelled(url: string, signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new RequestCancelledError(`Request to ${url} was cancelled`);
        }
    }

    private getErrorMessage(error: unknown): string {
        if (axios.isAxiosError(error)) {
            return error.code ? `${error.code}: ${error.message}` : error.message;
        }
        if (error instanceof Error) {
            return error.message;
        }
        return String(error);
    }
}

/**
 * Sleep for the given milliseconds, rejecting early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('Aborted'));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new Error('Aborted'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
