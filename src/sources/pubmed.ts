import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type {
    LiteratureSource,
    RawAuthor,
    RawPaperRecord,
    SearchResult,
    SourceAdapterOptions,
} from '../types/index.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanText, extractYear, markupText, toArray } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/**
 * Upstream payload did not have the expected shape.
 */
export class PubMedResponseError extends Error {
    constructor(message: string, public readonly details?: unknown) {
        super(message);
        this.name = 'PubMedResponseError';
    }
}

// ─── Response schemas (subset of relevant fields) ─────────

const esearchSchema = z.object({
    esearchresult: z.object({
        count: z.string().optional(),
        idlist: z.array(z.string()).optional(),
        ERROR: z.string().optional(),
    }),
});

/**
 * A text-only element parses to a string; one with inline children to an object.
 */
const xmlText = z.union([
    z.string(),
    z.object({ '#text': z.string().optional() }).passthrough(),
]);

type XmlText = z.infer<typeof xmlText>;

/**
 * Empty elements (`<AuthorList/>`) parse to ''.
 */
function element<T extends z.ZodTypeAny>(schema: T) {
    return z.union([schema, z.literal('')]).optional();
}

const authorSchema = z.object({
    LastName: xmlText.optional(),
    ForeName: xmlText.optional(),
    CollectiveName: xmlText.optional(),
    AffiliationInfo: z.array(element(z.object({ Affiliation: xmlText.optional() }))).optional(),
});

const articleSchema = z.object({
    MedlineCitation: z.object({
        PMID: xmlText,
        Article: z.object({
            ArticleTitle: xmlText.optional(),
            AuthorList: element(z.object({ Author: z.array(authorSchema).optional() })),
            Journal: element(z.object({
                JournalIssue: element(z.object({
                    PubDate: element(z.object({
                        Year: xmlText.optional(),
                        MedlineDate: xmlText.optional(),
                    })),
                })),
            })),
            ArticleDate: z.array(element(z.object({ Year: xmlText.optional() }))).optional(),
        }),
    }),
});

type PubMedArticle = z.infer<typeof articleSchema>;

const efetchSchema = z.object({
    PubmedArticleSet: element(z.object({
        PubmedArticle: z.array(z.unknown()).optional(),
    })),
});

const ARRAY_TAGS = new Set(['PubmedArticle', 'Author', 'AffiliationInfo', 'ArticleDate']);

/**
 * Elements that may carry inline markup (<i>, <sup>, …). The parser hands
 * these back as raw inner text, entities still encoded.
 */
const MARKUP_TAGS = ['*.ArticleTitle', '*.Affiliation'];

/**
 * PubMed source adapter over NCBI E-utilities: esearch for identifiers,
 * efetch for full records.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedAdapter implements LiteratureSource {
    readonly name = 'PubMed';
    private readonly httpClient: HttpClient;
    private readonly email: string;
    private readonly tool: string;
    private readonly baseUrl: string;
    private readonly parser = new XMLParser({
        ignoreAttributes: true,
        ignoreDeclaration: true,
        parseTagValue: false,
        stopNodes: MARKUP_TAGS,
        isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
    });

    constructor(options: SourceAdapterOptions & { httpClient?: HttpClient; baseUrl?: string }) {
        this.email = options.email;
        this.tool = options.tool;
        this.baseUrl = options.baseUrl ?? EUTILS_BASE;
        this.httpClient = options.httpClient ?? createHttpClient({ tool: this.tool, email: this.email });
    }

    async search(query: string, maxResults: number): Promise<SearchResult> {
        const params = new URLSearchParams({
            db: 'pubmed',
            term: query,
            retmax: String(maxResults),
            retmode: 'json',
        });
        this.addContactParams(params);

        const url = `${this.baseUrl}/esearch.fcgi?${params.toString()}`;
        getLogger().debug({ url }, 'PubMed search');

        const body = await this.httpClient.getJson(url);
        const parsed = esearchSchema.safeParse(body);
        if (!parsed.success) {
            throw new PubMedResponseError('Unexpected esearch response shape', parsed.error.issues);
        }

        const result = parsed.data.esearchresult;
        if (result.ERROR) {
            throw new PubMedResponseError(`PubMed search error: ${result.ERROR}`);
        }

        const ids = result.idlist ?? [];
        const count = Number(result.count);
        return { ids, totalMatches: Number.isFinite(count) ? count : ids.length };
    }

    async fetchRecords(ids: string[]): Promise<RawPaperRecord[]> {
        if (ids.length === 0) return [];

        const params = new URLSearchParams({
            db: 'pubmed',
            id: ids.join(','),
            retmode: 'xml',
        });
        this.addContactParams(params);

        const url = `${this.baseUrl}/efetch.fcgi?${params.toString()}`;
        getLogger().debug({ url, count: ids.length }, 'PubMed fetch');

        const xml = await this.httpClient.getText(url);
        return this.parseArticleSet(xml);
    }

    /**
     * Parse an efetch XML document into records. Articles that do not match the
     * expected shape are skipped with a warning.
     */
    parseArticleSet(xml: string): RawPaperRecord[] {
        let document: unknown;
        try {
            document = this.parser.parse(xml, true);
        } catch (error) {
            throw new PubMedResponseError('Malformed efetch XML', error);
        }

        const parsed = efetchSchema.safeParse(document);
        if (!parsed.success) {
            throw new PubMedResponseError('Unexpected efetch response shape', parsed.error.issues);
        }

        const set = parsed.data.PubmedArticleSet;
        if (set === undefined) {
            throw new PubMedResponseError('efetch response has no PubmedArticleSet');
        }

        const records: RawPaperRecord[] = [];
        for (const [index, raw] of toArray(present(set)?.PubmedArticle).entries()) {
            const article = articleSchema.safeParse(raw);
            if (!article.success) {
                getLogger().warn({ index, issues: article.error.issues }, 'Skipping malformed PubMed article');
                continue;
            }
            records.push(normalizeArticle(article.data));
        }

        return records;
    }

    private addContactParams(params: URLSearchParams): void {
        params.set('tool', this.tool);
        params.set('email', this.email);
    }
}

// ─── Normalization ────────────────────────────────────────

function present<T>(node: T | '' | undefined): T | undefined {
    return node === '' ? undefined : node;
}

function textOf(node: XmlText | undefined): string {
    if (node === undefined) return '';
    return cleanText(typeof node === 'string' ? node : node['#text']);
}

/**
 * Text of a MARKUP_TAGS element.
 */
function markupOf(node: XmlText | undefined): string {
    if (node === undefined) return '';
    return markupText(typeof node === 'string' ? node : node['#text']);
}

function normalizeArticle(article: PubMedArticle): RawPaperRecord {
    const citation = article.MedlineCitation;
    const body = citation.Article;

    const authors = toArray(present(body.AuthorList)?.Author)
        .map(normalizeAuthor)
        .filter((author): author is RawAuthor => author !== null);

    return {
        pmid: textOf(citation.PMID),
        title: markupOf(body.ArticleTitle),
        authors,
        publicationYear: resolveYear(article),
    };
}

function normalizeAuthor(author: z.infer<typeof authorSchema>): RawAuthor | null {
    const lastName = textOf(author.LastName) || textOf(author.CollectiveName);
    if (!lastName) return null;

    const affiliations = toArray(author.AffiliationInfo)
        .map((info) => markupOf(present(info)?.Affiliation))
        .filter((affiliation) => affiliation !== '');

    return {
        lastName,
        foreName: textOf(author.ForeName) || null,
        affiliations,
    };
}

/**
 * Journal issue year, else the first year of a MedlineDate range, else the
 * electronic article date.
 */
function resolveYear(article: PubMedArticle): string | null {
    const body = article.MedlineCitation.Article;
    const pubDate = present(present(present(body.Journal)?.JournalIssue)?.PubDate);

    const fromIssue = extractYear(textOf(pubDate?.Year)) ?? extractYear(textOf(pubDate?.MedlineDate));
    if (fromIssue) return fromIssue;

    for (const date of toArray(body.ArticleDate)) {
        const year = extractYear(textOf(present(date)?.Year));
        if (year) return year;
    }

    return null;
}
