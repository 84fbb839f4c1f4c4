/**
 * Vintage reconciliation: selects or merges forecast vintages according to
 * a policy round selector.
 */

import { NotFoundError } from '../errors';
import { Observation, PolicyRound, PolicyRoundSelector, Vintage } from '../types';

const POLICY_ROUND_PATTERN = /^(\d{4}):([1-9]\d*)$/;

/**
 * Parse a policy round label such as '2024:3'
 * @returns The parsed round, or null if the label is not in YYYY:N format
 */
export function parsePolicyRound(label: string): PolicyRound | null {
    const match = POLICY_ROUND_PATTERN.exec(label);
    if (!match) {
        return null;
    }
    return { id: label, year: parseInt(match[1], 10), iteration: parseInt(match[2], 10) };
}

export function isPolicyRound(label: string): boolean {
    return POLICY_ROUND_PATTERN.test(label);
}

/**
 * Order policy round labels by year, then by iteration (numerically, so 2024:10 follows 2024:9).
 * Labels must already be valid.
 */
export function comparePolicyRounds(a: string, b: string): number {
    const left = parsePolicyRound(a);
    const right = parsePolicyRound(b);
    if (!left || !right) {
        throw new RangeError(`Cannot compare policy rounds '${a}' and '${b}'`);
    }
    return left.year - right.year || left.iteration - right.iteration;
}

function compareRevisions(a: Vintage, b: Vintage): number {
    return Date.parse(a.revisionTimestamp) - Date.parse(b.revisionTimestamp);
}

/**
 * Apply a selector to vintages that are already in ascending policy round order.
 *
 * - all: every vintage, unchanged
 * - pinned: vintages up to and including the pinned round
 * - latest: a single vintage holding the most recently revised value per date
 *
 * @throws NotFoundError if a pinned round is not among the vintages
 */
export function reconcile(vintages: readonly Vintage[], selector: PolicyRoundSelector): Vintage[] {
    switch (selector.mode) {
        case 'all':
            return [...vintages];
        case 'pinned':
            return selectUpTo(vintages, selector.round);
        case 'latest':
            return vintages.length === 0 ? [] : [mergeLatest(vintages)];
    }
}

function selectUpTo(vintages: readonly Vintage[], round: string): Vintage[] {
    if (!vintages.some(v => v.policyRound === round)) {
        const known = vintages.map(v => v.policyRound).join(', ') || 'none';
        throw new NotFoundError(`Policy round ${round} not found (available: ${known})`);
    }
    return vintages.filter(v => comparePolicyRounds(v.policyRound, round) <= 0);
}

/**
 * Fold vintages in ascending round order. A later vintage overwrites a date only
 * if its revision timestamp is at least as recent as the one that set the value,
 * so a round revised after a newer round was published still wins.
 *
 * Each observation keeps the kind it had in the vintage it came from. A forecast
 * that no later round replaced stays a forecast even when it is dated before the
 * merged vintage's cutoff.
 */
function mergeLatest(vintages: readonly Vintage[]): Vintage {
    const byDate = new Map<string, { observation: Observation; source: Vintage }>();

    for (const vintage of vintages) {
        for (const observation of vintage.observations) {
            const current = byDate.get(observation.date);
            if (!current || compareRevisions(vintage, current.source) >= 0) {
                byDate.set(observation.date, { observation, source: vintage });
            }
        }
    }

    const last = vintages[vintages.length - 1];
    const observations = [...byDate.values()]
        .map(entry => entry.observation)
        .sort((a, b) => a.date.localeCompare(b.date));

    return {
        revisionTimestamp: last.revisionTimestamp,
        forecastCutoffDate: last.forecastCutoffDate,
        policyRound: last.policyRound,
        policyRoundEndTimestamp: last.policyRoundEndTimestamp,
        observations
    };
}

/**
 * Pair every row of `vintage` with its realized outcome as known in `reference`
 * (typically the newest vintage), without dropping the original forecast.
 *
 * Outcome rows keep their own value as `realized`. Forecast rows get the
 * reference outcome for the same date, when there is one. Every reference
 * outcome the vintage does not cover is added, including history older than
 * the vintage's first row.
 */
export function attachRealized(vintage: Vintage, reference: Vintage): Vintage {
    const cutoff = vintage.forecastCutoffDate;
    const realizedByDate = new Map<string, number>();
    for (const o of reference.observations) {
        if (o.kind === 'outcome' && o.date > cutoff) {
            realizedByDate.set(o.date, o.value);
        }
    }

    const enriched: Observation[] = vintage.observations.map(o => {
        const realized = o.kind === 'outcome' ? o.value : realizedByDate.get(o.date);
        return realized === undefined
            ? { date: o.date, value: o.value, kind: o.kind }
            : { date: o.date, value: o.value, kind: o.kind, realized };
    });

    const covered = new Set(vintage.observations.map(o => o.date));
    const tail: Observation[] = reference.observations
        .filter(o => o.kind === 'outcome' && !covered.has(o.date))
        .map((o): Observation => ({ date: o.date, value: o.value, kind: 'outcome', realized: o.value }));

    return {
        ...vintage,
        observations: [...enriched, ...tail].sort((a, b) => a.date.localeCompare(b.date))
    };
}
