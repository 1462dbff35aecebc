import { NOT_AVAILABLE, type OutputRecord, type RawAuthor, type RawPaperRecord } from '../types/index.js';
import { COMPANY_TERMS, normalizeTerms } from './vocabulary.js';

/**
 * Whether an affiliation string contains any company-indicator term.
 * Case-insensitive substring match, not whole-word: "corp" matches "Corporation".
 */
export function isCompany(affiliation: string, terms: readonly string[] = COMPANY_TERMS): boolean {
    const text = affiliation.toLowerCase();
    return terms.some((term) => term !== '' && text.includes(term.toLowerCase()));
}

/**
 * First affiliation of the author that matches the vocabulary, or null.
 * Authors without affiliations never match.
 */
export function findCompanyAffiliation(author: RawAuthor, terms: readonly string[] = COMPANY_TERMS): string | null {
    return author.affiliations.find((affiliation) => isCompany(affiliation, terms)) ?? null;
}

/**
 * Keep papers with at least one company-affiliated author and flatten them
 * into output records. Pure: same input, same output.
 *
 * Author names and affiliations are paired one-to-one, so two authors at the
 * same company list that affiliation twice.
 */
export function filterNonAcademic(
    records: readonly RawPaperRecord[],
    terms: readonly string[] = COMPANY_TERMS
): OutputRecord[] {
    const vocabulary = normalizeTerms(terms);
    const output: OutputRecord[] = [];

    for (const record of records) {
        const names: string[] = [];
        const affiliations: string[] = [];

        for (const author of record.authors) {
            const match = findCompanyAffiliation(author, vocabulary);
            if (match !== null) {
                names.push(author.lastName);
                affiliations.push(match);
            }
        }

        if (names.length === 0) continue;

        output.push({
            pubmedId: record.pmid,
            title: record.title,
            publicationYear: record.publicationYear ?? NOT_AVAILABLE,
            nonAcademicAuthors: names,
            companyAffiliations: affiliations,
            correspondingAuthorEmail: NOT_AVAILABLE,
        });
    }

    return output;
}
