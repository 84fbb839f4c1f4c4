/**
 * Series query facade over the Riksbank Monetary Policy Data API
 */

import { DEFAULT_BASE_URL, DEFAULT_RETRY_POLICY, RiksbankApiClient } from './clients/riksbank-client';
import { InvalidArgumentError } from './errors';
import { SERIES, SeriesName } from './series';
import {
    FetchSeriesOptions,
    MonetaryPolicyDataConfig,
    PolicyRound,
    PolicyRoundSelector,
    RequestOptions,
    SeriesInfo,
    SeriesResponse
} from './types';
import { getSubscriptionKey } from './utils/secrets';
import { attachRealized, isPolicyRound, reconcile } from './utils/reconcile';
import { normalizePolicyRounds, normalizeSeries, normalizeSeriesInfo } from './utils/validation';

function readNonNegativeInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`Invalid value for environment variable ${name}: ${raw}`);
    }
    return value;
}

/**
 * Load configuration from environment variables. Every setting has a default,
 * so an empty environment gives anonymous access with the default back-off.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MonetaryPolicyDataConfig {
    const maxAttempts = readNonNegativeInteger(env, 'RIKSBANK_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts);
    if (maxAttempts < 1) {
        throw new Error('Invalid value for environment variable RIKSBANK_MAX_ATTEMPTS: must be at least 1');
    }

    return {
        baseUrl: env.RIKSBANK_API_BASE_URL || DEFAULT_BASE_URL,
        maxAttempts,
        baseDelayMs: readNonNegativeInteger(env, 'RIKSBANK_RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
        maxDelayMs: readNonNegativeInteger(env, 'RIKSBANK_MAX_RETRY_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs),
        requestTimeoutMs: readNonNegativeInteger(env, 'RIKSBANK_REQUEST_TIMEOUT_MS', DEFAULT_RETRY_POLICY.requestTimeoutMs),
        totalTimeoutMs: readNonNegativeInteger(env, 'RIKSBANK_TOTAL_TIMEOUT_MS', DEFAULT_RETRY_POLICY.totalTimeoutMs),
        subscriptionKey: env.RIKSBANK_SUBSCRIPTION_KEY || undefined,
        subscriptionKeyParameter: env.RIKSBANK_SUBSCRIPTION_KEY_PARAMETER || undefined,
        subscriptionKeySecret: env.RIKSBANK_SUBSCRIPTION_KEY_SECRET || undefined
    };
}

/**
 * Map the caller's policy round argument to a selector
 *
 * - null/undefined: every vintage
 * - 'latest' (any case): merged best-known series
 * - 'YYYY:N': vintages up to and including that round
 *
 * @throws InvalidArgumentError for anything else
 */
export function toPolicyRoundSelector(policyRound?: string | null): PolicyRoundSelector {
    if (policyRound === undefined || policyRound === null) {
        return { mode: 'all' };
    }
    if (policyRound.toLowerCase() === 'latest') {
        return { mode: 'latest' };
    }
    if (!isPolicyRound(policyRound)) {
        throw new InvalidArgumentError(`Invalid policy round '${policyRound}': expected 'YYYY:N' or 'latest'`);
    }
    return { mode: 'pinned', round: policyRound };
}

/**
 * Main service class for monetary policy forecast data.
 * Composes fetching, normalization and reconciliation; only the client retries.
 */
export class MonetaryPolicyDataService {
    private readonly config: MonetaryPolicyDataConfig;
    private client: RiksbankApiClient | null = null;
    private initializing: Promise<RiksbankApiClient> | null = null;
    private closed = false;

    /**
     * @param config Full configuration; read from the environment when omitted
     * @param client Pre-built client (tests, or sharing one client between services)
     */
    constructor(config?: MonetaryPolicyDataConfig, client?: RiksbankApiClient) {
        this.config = config ?? loadConfigFromEnv();
        if (client) {
            this.client = client;
        }
    }

    /**
     * Build the client on first use, fetching the subscription key from
     * SSM Parameter Store or Secrets Manager when configured
     */
    private async ensureInitialized(): Promise<RiksbankApiClient> {
        if (this.closed) {
            throw new Error('MonetaryPolicyDataService is closed');
        }
        if (this.client) {
            return this.client;
        }
        if (!this.initializing) {
            this.initializing = this.initialize();
        }
        return this.initializing;
    }

    private async initialize(): Promise<RiksbankApiClient> {
        console.log('Initializing MonetaryPolicyDataService...');

        try {
            const subscriptionKey = await getSubscriptionKey(this.config);
            if (this.closed) {
                throw new Error('service was closed while fetching the subscription key');
            }
            this.client = new RiksbankApiClient({ ...this.config, subscriptionKey });
            console.log(`MonetaryPolicyDataService initialized (${subscriptionKey ? 'with' : 'without'} subscription key)`);
            return this.client;

        } catch (error) {
            this.initializing = null;
            console.error('Failed to initialize MonetaryPolicyDataService:', error);
            throw new Error(`Service initialization failed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    /**
     * Fetch the vintages of one forecast series
     *
     * @param seriesId Riksbank series identifier, e.g. 'SEQGDPNAYCA'
     * @param policyRound null for all vintages, 'latest', or a round such as '2024:3'
     * @throws InvalidArgumentError before any network call when an argument is malformed
     * @throws UpstreamError, ValidationError, NotFoundError, RequestCancelledError
     */
    async fetchSeries(
        seriesId: string,
        policyRound?: string | null,
        options: FetchSeriesOptions = {}
    ): Promise<SeriesResponse> {
        if (seriesId.trim() === '') {
            throw new InvalidArgumentError('Series identifier must not be empty');
        }
        const selector = toPolicyRoundSelector(policyRound);

        const client = await this.ensureInitialized();
        const raw = await client.getJson('', { series: seriesId }, { signal: options.signal });
        const series = normalizeSeries(raw, seriesId);

        let vintages = reconcile(series.vintages, selector);
        if (options.includeRealized && series.vintages.length > 0) {
            const newest = series.vintages[series.vintages.length - 1];
            vintages = vintages.map(v => attachRealized(v, newest));
        }

        console.log(`Series ${seriesId}: ${series.vintages.length} vintages fetched, ${vintages.length} returned (${selector.mode})`);
        return { seriesId, vintages };
    }

    /**
     * Fetch several series concurrently over the shared client. The first
     * failure cancels the remaining requests and is rethrown.
     */
    async fetchSeriesBatch(
        seriesIds: readonly string[],
        policyRound?: string | null,
        options: FetchSeriesOptions = {}
    ): Promise<SeriesResponse[]> {
        const controller = new AbortController();
        const forwardAbort = () => controller.abort();
        if (options.signal?.aborted) {
            controller.abort();
        }
        options.signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            return await Promise.all(seriesIds.map(id =>
                this.fetchSeries(id, policyRound, { ...options, signal: controller.signal }).catch((error: unknown) => {
                    controller.abort();
                    throw error;
                })
            ));
        } finally {
            options.signal?.removeEventListener('abort', forwardAbort);
        }
    }

    /**
     * Fetch a series from the SERIES catalog by name
     */
    async fetchNamedSeries(name: SeriesName, policyRound?: string | null, options?: FetchSeriesOptions): Promise<SeriesResponse> {
        return this.fetchSeries(SERIES[name].id, policyRound, options);
    }

    /**
     * GDP, calendar-adjusted annual percentage change
     * Series: SEQGDPNAYCA
     */
    async fetchGdp(policyRound?: string | null, options?: FetchSeriesOptions): Promise<SeriesResponse> {
        return this.fetchNamedSeries('gdp', policyRound, options);
    }

    /**
     * Unemployment rate, seasonally adjusted
     * Series: SEQLABUEASA
     */
    async fetchUnemployment(policyRound?: string | null, options?: FetchSeriesOptions): Promise<SeriesResponse> {
        return this.fetchNamedSeries('unemployment', policyRound, options);
    }

    /**
     * CPIF, annual percentage change (the inflation target variable)
     * Series: SEMCPIFNAYNA
     */
    async fetchCpif(policyRound?: string | null, options?: FetchSeriesOptions): Promise<SeriesResponse> {
        return this.fetchNamedSeries('cpif', policyRound, options);
    }

    /**
     * Policy rate, quarterly average
     * Series: SEQRATENAYNA
     */
    async fetchPolicyRate(policyRound?: string | null, options?: FetchSeriesOptions): Promise<SeriesResponse> {
        return this.fetchNamedSeries('policyRate', policyRound, options);
    }

    /**
     * List published policy rounds, oldest first
     */
    async listPolicyRounds(options: RequestOptions = {}): Promise<PolicyRound[]> {
        const client = await this.ensureInitialized();
        return normalizePolicyRounds(await client.getJson('policy_rounds', {}, options));
    }

    /**
     * List metadata for every series the API publishes
     */
    async listSeries(options: RequestOptions = {}): Promise<SeriesInfo[]> {
        const client = await this.ensureInitialized();
        return normalizeSeriesInfo(await client.getJson('series_ids', {}, options));
    }

    /**
     * Release the client's connections. Calls made afterwards fail, and an
     * initialization still in flight does not build a client.
     */
    close(): void {
        this.closed = true;
        this.client?.close();
    }
}

/**
 * Run `fn` with a service that is closed afterwards, whatever the outcome
 */
export async function withService<T>(
    fn: (service: MonetaryPolicyDataService) => Promise<T>,
    config?: MonetaryPolicyDataConfig
): Promise<T> {
    const service = new MonetaryPolicyDataService(config);
    try {
        return await fn(service);
    } finally {
        service.close();
    }
}
