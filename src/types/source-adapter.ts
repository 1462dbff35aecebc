import type { RawPaperRecord } from './paper.js';

/**
 * Identifiers returned by a search, with the total hit count the service reports.
 */
export interface SearchResult {
    ids: string[];
    totalMatches: number;
}

/**
 * Interface for literature services (PubMed).
 * Both steps throw on transport or payload failures; the fetcher decides what to do with them.
 */
export interface LiteratureSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Search by free-text query, bounded by `maxResults`.
     */
    search(query: string, maxResults: number): Promise<SearchResult>;

    /**
     * Retrieve full metadata for the given identifiers.
     */
    fetchRecords(ids: string[]): Promise<RawPaperRecord[]>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** Contact email the service asks every client to send */
    email: string;

    /** Tool name registered with the service */
    tool: string;
}

/**
 * Outcome of the fetch stage. A failed fetch is distinct from a search with no hits.
 */
export type FetchResult =
    | { ok: true; records: RawPaperRecord[]; totalMatches: number }
    | { ok: false; reason: string; error: unknown };
