/**
 * Paper records flowing through the fetch → filter → save pipeline.
 */

/**
 * Author as listed on a PubMed article.
 */
export interface RawAuthor {
    /** `LastName`, or `CollectiveName` for group authors */
    lastName: string;

    foreName: string | null;

    /** Free-text affiliation descriptors, in source order (may be empty) */
    affiliations: string[];
}

/**
 * Paper metadata as normalized from the literature service.
 * Never mutated after normalization.
 */
export interface RawPaperRecord {
    pmid: string;
    title: string;

    /** Authors in the order the article lists them */
    authors: RawAuthor[];

    /** First available year fragment, or null when the article carries no date */
    publicationYear: string | null;
}

/**
 * Marker written wherever a value is not available.
 */
export const NOT_AVAILABLE = 'N/A';

/**
 * Flat, CSV-ready record for a paper with at least one non-academic author.
 * Key order is the column order of the export.
 */
export interface OutputRecord {
    pubmedId: string;
    title: string;
    publicationYear: string;
    nonAcademicAuthors: string[];
    companyAffiliations: string[];

    /** Always NOT_AVAILABLE: PubMed does not reliably expose it */
    correspondingAuthorEmail: typeof NOT_AVAILABLE;
}

export type OutputField = keyof OutputRecord;

/**
 * Human-readable column labels, used for CSV headers and console output.
 */
export const FIELD_LABELS: Record<OutputField, string> = {
    pubmedId: 'PubmedID',
    title: 'Title',
    publicationYear: 'Publication Year',
    nonAcademicAuthors: 'Non-academic Author(s)',
    companyAffiliations: 'Company Affiliation(s)',
    correspondingAuthorEmail: 'Corresponding Author Email',
};
