/**
 * Company-indicator vocabulary: lowercase substrings whose presence in an
 * affiliation marks it as commercial. Replaceable through `companyTerms` in
 * the config file.
 */
export const COMPANY_TERMS: readonly string[] = [
    'pharma',
    'biotech',
    'inc.',
    'ltd.',
    'gmbh',
    'corp',
    'llc',
];

/**
 * Lowercase, trim, and drop empty or duplicate terms.
 */
export function normalizeTerms(terms: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const term of terms) {
        const normalized = term.trim().toLowerCase();
        if (normalized) seen.add(normalized);
    }
    return [...seen];
}
