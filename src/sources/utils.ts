/**
 * Shared utilities for source adapters.
 */

/**
 * Wrap a possibly-single, possibly-missing XML child into an array.
 */
export function toArray<T>(value: T | T[] | null | undefined): T[] {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Strip inline markup (<i>, <sup>, …) and collapse whitespace.
 * "Effect of <i>TP53</i>\n  loss" → "Effect of TP53 loss"
 */
export function cleanText(input: string | null | undefined): string {
    if (!input) return '';
    return input
        .replace(/<[^>]+>/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

const NAMED_ENTITIES: Record<string, string> = {
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
};

/**
 * Decode the XML predefined entities and numeric character references.
 * `&amp;` goes last so "&amp;lt;" stays "&lt;".
 */
export function decodeEntities(input: string): string {
    return input
        .replace(/&(lt|gt|quot|apos);/g, (_, name: string) => NAMED_ENTITIES[name] ?? `&${name};`)
        .replace(/&#(x[0-9a-fA-F]+|\d+);/g, (reference: string, code: string) => {
            const point = code.startsWith('x') ? parseInt(code.slice(1), 16) : parseInt(code, 10);
            return point <= 0x10ffff ? String.fromCodePoint(point) : reference;
        })
        .replace(/&amp;/g, '&');
}

/**
 * Text of an element kept as raw markup by the parser: tags stripped,
 * whitespace collapsed, entities decoded.
 * "R&amp;D in <i>E. coli</i>" → "R&D in E. coli"
 */
export function markupText(input: string | null | undefined): string {
    return decodeEntities(cleanText(input));
}

/**
 * First four-digit year in a date fragment.
 * "1998 Dec-1999 Jan" → "1998"
 */
export function extractYear(input: string | null | undefined): string | null {
    if (!input) return null;
    const match = input.match(/\b(\d{4})\b/);
    return match?.[1] ?? null;
}
