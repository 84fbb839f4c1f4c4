/**
 * Normalization of raw Monetary Policy Data API payloads into validated
 * domain records. The first structural violation throws a ValidationError;
 * nothing is defaulted or coerced.
 */

import { ValidationError } from '../errors';
import { Observation, PolicyRound, SeriesInfo, SeriesResponse, Vintage } from '../types';
import { comparePolicyRounds, parsePolicyRound } from './reconcile';

type JsonObject = Record<string, unknown>;

const DECIMAL_PATTERN = /^[-+]?\d+(\.\d+)?([eE][-+]?\d+)?$/;
// The offset is required: without one Date.parse reads the host's local time
const ISO_INSTANT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
    if (!isObject(value)) {
        throw new ValidationError(path, `expected an object, got ${describe(value)}`);
    }
    return value;
}

function expectArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
        throw new ValidationError(path, `expected an array, got ${describe(value)}`);
    }
    return value;
}

function expectString(value: unknown, path: string): string {
    if (typeof value !== 'string' || value === '') {
        throw new ValidationError(path, `expected a non-empty string, got ${describe(value)}`);
    }
    return value;
}

function optionalString(value: unknown, path: string): string | undefined {
    return value === undefined || value === null || value === '' ? undefined : expectString(value, path);
}

function describe(value: unknown): string {
    if (value === undefined) return 'nothing';
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'an array';
    return `${typeof value} ${JSON.stringify(value)}`;
}

/**
 * Validates date format (YYYY-MM-DD) and that the date exists on the calendar
 * @returns Error message if invalid, null if valid
 */
export function validateDateFormat(date: string): string | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
        return `Date ${date} is not in YYYY-MM-DD format`;
    }

    // new Date() rolls 2024-02-30 over to March, so compare the round trip
    const parsedDate = new Date(`${date}T00:00:00Z`);
    if (isNaN(parsedDate.getTime()) || parsedDate.toISOString().slice(0, 10) !== date) {
        return `Date ${date} is not a valid calendar date`;
    }

    return null;
}

function expectDate(value: unknown, path: string): string {
    const date = expectString(value, path);
    const error = validateDateFormat(date);
    if (error) {
        throw new ValidationError(path, error);
    }
    return date;
}

function expectInstant(value: unknown, path: string): string {
    const instant = expectString(value, path);
    if (!ISO_INSTANT_PATTERN.test(instant) || isNaN(Date.parse(instant))) {
        throw new ValidationError(path, `${instant} is not an ISO 8601 timestamp with a UTC offset`);
    }
    if (validateDateFormat(instant.slice(0, 10)) !== null) {
        throw new ValidationError(path, `${instant} is not a valid calendar date`);
    }
    return instant;
}

/**
 * Accepts finite JSON numbers and plain decimal strings. Anything else,
 * including null, '' and '.', is rejected rather than read as zero.
 */
function expectValue(value: unknown, path: string): number {
    if (typeof value === 'number') {
        if (!isFinite(value)) {
            throw new ValidationError(path, `value ${value} is not finite`);
        }
        return value;
    }
    if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
        const numericValue = parseFloat(value);
        if (isFinite(numericValue)) {
            return numericValue;
        }
    }
    throw new ValidationError(path, `expected a decimal number, got ${describe(value)}`);
}

function expectPolicyRound(value: unknown, path: string): string {
    const label = expectString(value, path);
    if (!parsePolicyRound(label)) {
        throw new ValidationError(path, `policy round ${label} is not in YYYY:N format`);
    }
    return label;
}

function normalizeObservations(raw: unknown, cutoff: string, path: string): Observation[] {
    const parsed = expectArray(raw, path).map((item, index) => {
        const itemPath = `${path}[${index}]`;
        const obs = expectObject(item, itemPath);
        const date = expectDate(obs.dt, `${itemPath}.dt`);
        const value = expectValue(obs.value, `${itemPath}.value`);
        const observation: Observation = { date, value, kind: date > cutoff ? 'forecast' : 'outcome' };
        return { observation, itemPath };
    });

    parsed.sort((a, b) => a.observation.date.localeCompare(b.observation.date));

    const observations: Observation[] = [];
    for (const { observation, itemPath } of parsed) {
        const previous = observations[observations.length - 1];
        if (previous && previous.date === observation.date) {
            if (previous.value !== observation.value) {
                throw new ValidationError(
                    itemPath,
                    `duplicate date ${observation.date} with conflicting values ${previous.value} and ${observation.value}`
                );
            }
            continue;
        }
        observations.push(observation);
    }
    return observations;
}

function normalizeVintage(raw: unknown, path: string): Vintage {
    const vintage = expectObject(raw, path);
    const metadata = expectObject(vintage.metadata, `${path}.metadata`);

    const policyRound = expectPolicyRound(metadata.policy_round, `${path}.metadata.policy_round`);
    const policyRoundEndTimestamp = expectInstant(metadata.policy_round_end_dtm, `${path}.metadata.policy_round_end_dtm`);
    const forecastCutoffDate = expectDate(metadata.forecast_cutoff_date, `${path}.metadata.forecast_cutoff_date`);
    const revisionTimestamp = expectInstant(metadata.revision_dtm, `${path}.metadata.revision_dtm`);
    const observations = normalizeObservations(vintage.observations, forecastCutoffDate, `${path}.observations`);

    return { revisionTimestamp, forecastCutoffDate, policyRound, policyRoundEndTimestamp, observations };
}

/**
 * Normalize the forecasts endpoint payload for one series
 *
 * @param raw Parsed JSON body of GET /forecasts?series=<seriesId>
 * @param seriesId The series that was requested
 * @throws ValidationError on the first structural violation
 */
export function normalizeSeries(raw: unknown, seriesId: string): SeriesResponse {
    const body = expectObject(raw, '$');
    const items = expectArray(body.data, '$.data');
    if (items.length === 0) {
        return { seriesId, vintages: [] };
    }

    const item = expectObject(items[0], '$.data[0]');
    if (item.external_id !== undefined) {
        const externalId = expectString(item.external_id, '$.data[0].external_id');
        if (externalId !== seriesId) {
            throw new ValidationError('$.data[0].external_id', `expected series ${seriesId}, got ${externalId}`);
        }
    }

    // The API returns a bare object when a series has a single vintage
    const rawVintages = isObject(item.vintages) ? [item.vintages] : expectArray(item.vintages, '$.data[0].vintages');
    const vintages = rawVintages.map((v, index) => normalizeVintage(v, `$.data[0].vintages[${index}]`));

    vintages.sort((a, b) => comparePolicyRounds(a.policyRound, b.policyRound));
    for (let i = 1; i < vintages.length; i++) {
        if (vintages[i].policyRound === vintages[i - 1].policyRound) {
            throw new ValidationError('$.data[0].vintages', `duplicate policy round ${vintages[i].policyRound}`);
        }
    }

    return { seriesId, vintages };
}

/**
 * Normalize GET /forecasts/policy_rounds into rounds in ascending order
 */
export function normalizePolicyRounds(raw: unknown): PolicyRound[] {
    const body = expectObject(raw, '$');
    const rounds = expectArray(body.data, '$.data').map((label, index) => {
        const path = `$.data[${index}]`;
        const round = parsePolicyRound(expectString(label, path));
        if (!round) {
            throw new ValidationError(path, `policy round ${String(label)} is not in YYYY:N format`);
        }
        return round;
    });
    return rounds.sort((a, b) => a.year - b.year || a.iteration - b.iteration);
}

/**
 * Normalize GET /forecasts/series_ids into series metadata
 */
export function normalizeSeriesInfo(raw: unknown): SeriesInfo[] {
    const body = expectObject(raw, '$');
    return expectArray(body.data, '$.data').map((entry, index) => {
        const path = `$.data[${index}]`;
        const item = expectObject(entry, path);
        const metadata = expectObject(item.metadata, `${path}.metadata`);

        let decimals: number | undefined;
        if (metadata.decimals !== undefined && metadata.decimals !== null) {
            decimals = expectValue(metadata.decimals, `${path}.metadata.decimals`);
            if (!Number.isInteger(decimals) || decimals < 0) {
                throw new ValidationError(`${path}.metadata.decimals`, `expected a non-negative integer, got ${decimals}`);
            }
        }

        const startDate = metadata.start_date === undefined || metadata.start_date === null
            ? undefined
            : expectDate(metadata.start_date, `${path}.metadata.start_date`);

        return {
            id: expectString(item.series_id, `${path}.series_id`),
            description: expectString(metadata.description, `${path}.metadata.description`),
            unit: optionalString(metadata.unit, `${path}.metadata.unit`),
            decimals,
            startDate,
            sourceAgency: optionalString(metadata.source_agency, `${path}.metadata.source_agency`),
            note: optionalString(metadata.note, `${path}.metadata.note`)
        };
    });
}
