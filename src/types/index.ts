/**
 * TypeScript interfaces and types for monetary policy forecast data
 */

export type ObservationKind = 'outcome' | 'forecast';

export interface Observation {
    readonly date: string;  // YYYY-MM-DD
    readonly value: number;
    readonly kind: ObservationKind;  // 'forecast' when date is after the cutoff of the vintage that published it
    readonly realized?: number;  // Only set by attachRealized
}

export interface Vintage {
    readonly revisionTimestamp: string;  // ISO 8601 instant
    readonly forecastCutoffDate: string;  // YYYY-MM-DD
    readonly policyRound: string;  // YYYY:N
    readonly policyRoundEndTimestamp: string;  // ISO 8601 instant
    readonly observations: readonly Observation[];
}

export interface SeriesResponse {
    readonly seriesId: string;
    readonly vintages: readonly Vintage[];
}

export type PolicyRoundSelector =
    | { readonly mode: 'all' }
    | { readonly mode: 'pinned'; readonly round: string }
    | { readonly mode: 'latest' };

export interface PolicyRound {
    readonly id: string;
    readonly year: number;
    readonly iteration: number;
}

export interface SeriesInfo {
    readonly id: string;
    readonly description: string;
    readonly unit?: string;
    readonly decimals?: number;
    readonly startDate?: string;
    readonly sourceAgency?: string;
    readonly note?: string;
}

export interface FetchSeriesOptions {
    includeRealized?: boolean;
    signal?: AbortSignal;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;  // Per attempt
    totalTimeoutMs: number;  // Ceiling for the whole back-off loop
}

export interface MonetaryPolicyDataConfig extends RetryPolicy {
    baseUrl: string;
    subscriptionKey?: string;
    subscriptionKeyParameter?: string;  // SSM parameter name
    subscriptionKeySecret?: string;  // Secrets Manager secret name
}

export type SeriesAction = 'series' | 'policy_rounds' | 'series_ids';

export interface SeriesRequestEvent {
    action?: SeriesAction;
    seriesId?: string;
    policyRound?: string | null;
    includeRealized?: boolean;
}

export type HandlerResult<T> =
    | { success: true; data: T }
    | { success: false; error: { code: string; message: string } };
