/**
 * Payload and vintage builders shared by the tests
 */

import { AxiosHeaders, AxiosResponse, RawAxiosResponseHeaders } from 'axios';
import { Observation, ObservationKind, Vintage } from '../src/types';

export const BASE_URL = 'https://api.riksbank.se/monetary_policy_data/v1/forecasts';

export interface RawVintageFields {
    round: string;
    revision: string;
    cutoff: string;
    observations: Array<[string, unknown]>;
}

export function rawVintage(fields: RawVintageFields) {
    return {
        metadata: {
            policy_round: fields.round,
            policy_round_end_dtm: fields.revision,
            forecast_cutoff_date: fields.cutoff,
            revision_dtm: fields.revision
        },
        observations: fields.observations.map(([dt, value]) => ({ dt, value }))
    };
}

export function seriesPayload(seriesId: string, vintages: unknown) {
    return { data: [{ external_id: seriesId, vintages }] };
}

export function vintage(
    round: string,
    revision: string,
    observations: Array<[string, number, ObservationKind?]>,
    cutoff: string = '2024-01-15'
): Vintage {
    return {
        revisionTimestamp: revision,
        forecastCutoffDate: cutoff,
        policyRound: round,
        policyRoundEndTimestamp: revision,
        observations: observations.map(([date, value, kind]): Observation => ({
            date,
            value,
            kind: kind ?? (date > cutoff ? 'forecast' : 'outcome')
        }))
    };
}

export function response(status: number, data: unknown, headers: RawAxiosResponseHeaders = {}): AxiosResponse<unknown> {
    return {
        status,
        statusText: '',
        data,
        headers,
        config: { headers: new AxiosHeaders() }
    };
}

/**
 * Three GDP rounds, returned by the API out of order
 */
export const GDP_ROUNDS = [
    rawVintage({
        round: '2024:2',
        revision: '2024-06-27T07:30:00Z',
        cutoff: '2024-06-10',
        observations: [['2024-01-01', 0.7], ['2024-04-01', 1.1], ['2024-07-01', 1.4]]
    }),
    rawVintage({
        round: '2024:1',
        revision: '2024-03-27T07:30:00Z',
        cutoff: '2024-03-12',
        observations: [['2023-10-01', -0.2], ['2024-01-01', 0.4], ['2024-04-01', 0.9]]
    }),
    rawVintage({
        round: '2024:3',
        revision: '2024-09-25T07:30:00Z',
        cutoff: '2024-09-10',
        observations: [['2024-04-01', 1.3], ['2024-07-01', 1.6], ['2024-10-01', 1.8]]
    })
];
