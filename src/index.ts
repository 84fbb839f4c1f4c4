/**
 * Lambda handler for monetary policy forecast queries
 *
 * Event structure:
 * - Series query: { seriesId: string, policyRound?: string | null, includeRealized?: boolean }
 * - Discovery:    { action: 'policy_rounds' } or { action: 'series_ids' }
 *
 * Failures are returned as { success: false, error: { code, message } } rather
 * than thrown, so the invoking layer can serialize them.
 */

import { RiksbankDataError } from './errors';
import { MonetaryPolicyDataService } from './service';
import { HandlerResult, PolicyRound, SeriesInfo, SeriesRequestEvent, SeriesResponse } from './types';

export { MonetaryPolicyDataService, withService, loadConfigFromEnv, toPolicyRoundSelector } from './service';
export { RiksbankApiClient } from './clients/riksbank-client';
export { reconcile, attachRealized, comparePolicyRounds, parsePolicyRound } from './utils/reconcile';
export { normalizeSeries, normalizePolicyRounds, normalizeSeriesInfo } from './utils/validation';
export { SERIES } from './series';
export * from './errors';
export * from './types';

type HandlerData = SeriesResponse | PolicyRound[] | SeriesInfo[];

/**
 * @param event Invocation payload
 * @param service Injected service (tests); otherwise built from the environment and closed afterwards
 */
export async function handler(
    event: SeriesRequestEvent,
    service?: MonetaryPolicyDataService
): Promise<HandlerResult<HandlerData>> {
    const action = event.action ?? 'series';
    console.log(`Monetary policy data handler invoked: ${action}`, JSON.stringify(event));

    let owned: MonetaryPolicyDataService | undefined;
    try {
        const active = service ?? (owned = new MonetaryPolicyDataService());

        switch (action) {
            case 'policy_rounds':
                return { success: true, data: await active.listPolicyRounds() };
            case 'series_ids':
                return { success: true, data: await active.listSeries() };
            case 'series': {
                if (!event.seriesId) {
                    return { success: false, error: { code: 'INVALID_ARGUMENT', message: 'seriesId is required' } };
                }
                const data = await active.fetchSeries(event.seriesId, event.policyRound, {
                    includeRealized: event.includeRealized
                });
                return { success: true, data };
            }
            default:
                return { success: false, error: { code: 'INVALID_ARGUMENT', message: `Unknown action: ${String(action)}` } };
        }

    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        const code = error instanceof RiksbankDataError ? error.code : 'INTERNAL';

        console.error('Handler error:', {
            code,
            message: errorMessage,
            stack: error instanceof Error ? error.stack : undefined,
            event: JSON.stringify(event)
        });

        return { success: false, error: { code, message: errorMessage } };

    } finally {
        owned?.close();
    }
}
