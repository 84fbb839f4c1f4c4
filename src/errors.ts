/**
 * Typed failures surfaced by the data layer.
 *
 * Every error carries a `code` tag so callers can switch on it without
 * `instanceof` chains.
 */

export type ErrorCode = 'INVALID_ARGUMENT' | 'UPSTREAM' | 'VALIDATION' | 'NOT_FOUND' | 'CANCELLED';

export abstract class RiksbankDataError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Malformed policy round or series identifier. Never retried.
 */
export class InvalidArgumentError extends RiksbankDataError {
    readonly code = 'INVALID_ARGUMENT';
}

export interface UpstreamErrorDetails {
    url: string;
    status?: number;  // Absent for network-level failures
    attempts: number;
    exhausted: boolean;  // true when the full back-off schedule was used
}

export class UpstreamError extends RiksbankDataError {
    readonly code = 'UPSTREAM';
    readonly url: string;
    readonly status?: number;
    readonly attempts: number;
    readonly exhausted: boolean;

    constructor(message: string, details: UpstreamErrorDetails) {
        super(message);
        this.url = details.url;
        this.status = details.status;
        this.attempts = details.attempts;
        this.exhausted = details.exhausted;
    }
}

/**
 * Upstream payload does not match the expected schema.
 * `path` points at the first offending field, e.g. `data[0].vintages[2].metadata.policy_round`.
 */
export class ValidationError extends RiksbankDataError {
    readonly code = 'VALIDATION';

    constructor(readonly path: string, detail: string) {
        super(`${path}: ${detail}`);
    }
}

export class NotFoundError extends RiksbankDataError {
    readonly code = 'NOT_FOUND';
}

export class RequestCancelledError extends RiksbankDataError {
    readonly code = 'CANCELLED';
}
