import type { FetchResult, LiteratureSource } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_MAX_RESULTS = 10;

/**
 * Search the source and retrieve full records for the hits.
 *
 * This is the recovery boundary for upstream failures: any error in either
 * step comes back as `{ ok: false }`, never as a rejection. A search without
 * hits is `{ ok: true, records: [] }` and issues no retrieval request.
 */
export async function fetchPapers(
    source: LiteratureSource,
    query: string,
    maxResults = DEFAULT_MAX_RESULTS
): Promise<FetchResult> {
    if (!Number.isInteger(maxResults) || maxResults < 1) {
        throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
    }

    const logger = getLogger();
    let step: 'search' | 'fetch' = 'search';

    try {
        const { ids, totalMatches } = await source.search(query, maxResults);
        logger.debug({ query, totalMatches, returned: ids.length }, `${source.name} search complete`);

        if (ids.length === 0) {
            return { ok: true, records: [], totalMatches };
        }

        step = 'fetch';
        const records = await source.fetchRecords(ids);
        logger.debug({ records: records.length }, `${source.name} records retrieved`);

        return { ok: true, records, totalMatches };
    } catch (error) {
        const reason = `${source.name} ${step} failed: ${error instanceof Error ? error.message : String(error)}`;
        logger.error({ err: error, query, step }, reason);
        return { ok: false, reason, error };
    }
}
