import type { FetchResult, LiteratureSource, OutputRecord } from '../types/index.js';
import { filterNonAcademic } from '../filter/non-academic.js';
import { COMPANY_TERMS } from '../filter/vocabulary.js';
import { writeCsv } from '../exporters/csv.js';
import { getLogger } from '../utils/logger.js';
import { fetchPapers, DEFAULT_MAX_RESULTS } from './fetcher.js';

export interface PipelineOptions {
    query: string;
    maxResults?: number;

    /** CSV destination; records are printed to stdout when omitted */
    output?: string;

    companyTerms?: readonly string[];
}

export interface PipelineResult {
    fetch: FetchResult;
    records: OutputRecord[];
}

/**
 * Run the pipeline end to end:
 *
 * 1. Fetch papers matching the query
 * 2. Keep papers with company-affiliated authors
 * 3. Save to CSV or print
 *
 * A failed fetch continues with zero records. Write failures propagate.
 */
export async function runPipeline(options: PipelineOptions, source: LiteratureSource): Promise<PipelineResult> {
    const logger = getLogger();
    const { query, maxResults = DEFAULT_MAX_RESULTS, output, companyTerms = COMPANY_TERMS } = options;

    const fetched = await fetchPapers(source, query, maxResults);

    if (!fetched.ok) {
        logger.warn({ reason: fetched.reason }, `${source.name} fetch failed; continuing with zero records`);
    } else if (fetched.records.length === 0) {
        logger.info({ query }, 'No papers matched the query');
    }

    const papers = fetched.ok ? fetched.records : [];
    const records = filterNonAcademic(papers, companyTerms);
    logger.info({ fetched: papers.length, kept: records.length }, 'Filtered for non-academic authors');

    writeCsv(records, output);

    return { fetch: fetched, records };
}
