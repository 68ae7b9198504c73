import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { Paper, SearchOptions, SourceAdapter } from '../types/index.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { SourceError } from '../utils/errors.js';
import { collapseWhitespace, extractArxivId, stripDoiPrefix } from './utils.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';

/** arXiv serves at most this many entries per query page we ask for */
const MAX_PAGE_SIZE = 100;

/** Elements that may repeat, kept as arrays even when only one is present */
const ARRAY_PATHS = new Set(['feed.entry', 'feed.entry.author', 'feed.entry.link', 'feed.entry.category']);

/**
 * Text nodes carrying namespace attributes (arxiv:doi, arxiv:journal_ref)
 * parse to `{ '#text': ... }` instead of a plain string.
 */
const textNode = z
    .union([z.string(), z.object({ '#text': z.string() })])
    .transform((node) => (typeof node === 'string' ? node : node['#text']));

/**
 * Atom entry, limited to the fields we normalize.
 */
const entrySchema = z.object({
    id: z.string().min(1),
    title: textNode,
    summary: textNode.optional(),
    published: z.string().optional(),
    author: z.array(z.object({ name: textNode })).optional(),
    'arxiv:doi': textNode.optional(),
    'arxiv:journal_ref': textNode.optional(),
});

type ArxivEntry = z.infer<typeof entrySchema>;

const feedSchema = z.object({
    feed: z.object({
        entry: z.array(z.unknown()).optional(),
    }),
});

/**
 * arXiv source adapter, reading the Atom feed of the export API.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter {
    readonly name = 'arXiv';
    readonly sourceId = 'arxiv' as const;
    private httpClient: HttpClient;
    private cache: ResponseCache | null;
    private parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        parseTagValue: false,
        trimValues: true,
        isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
    });

    constructor(options?: { httpClient?: HttpClient; cache?: ResponseCache | null }) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.cache = options?.cache ?? null;
    }

    async search(query: string, options: SearchOptions): Promise<Paper[]> {
        const params = new URLSearchParams({
            search_query: `all:${query.trim()}`,
            start: String(options.offset),
            max_results: String(Math.min(options.limit, MAX_PAGE_SIZE)),
            sortBy: 'relevance',
            sortOrder: 'descending',
        });

        const url = `${ARXIV_API}?${params.toString()}`;
        getLogger().debug({ url }, 'arXiv search');

        return this.parseFeed(await this.getText(url));
    }

    async fetchPaper(id: string): Promise<Paper | null> {
        const arxivId = extractArxivId(id);
        if (!arxivId) return null;

        const params = new URLSearchParams({ id_list: arxivId, max_results: '1' });
        const url = `${ARXIV_API}?${params.toString()}`;
        getLogger().debug({ url }, 'arXiv fetch paper');

        const [paper] = this.parseFeed(await this.getText(url));
        return paper ?? null;
    }

    /**
     * Parse an Atom feed into papers. Malformed entries and arXiv's error
     * entries are skipped; a body that is not a feed at all throws.
     */
    parseFeed(xml: string): Paper[] {
        let document: unknown;
        try {
            document = this.parser.parse(xml);
        } catch (error) {
            throw new SourceError(`Unparseable arXiv response: ${error instanceof Error ? error.message : String(error)}`, this.sourceId);
        }

        const feed = feedSchema.safeParse(document);
        if (!feed.success) {
            throw new SourceError('arXiv response is not an Atom feed', this.sourceId);
        }

        const papers: Paper[] = [];
        for (const raw of feed.data.feed.entry ?? []) {
            const entry = entrySchema.safeParse(raw);
            if (!entry.success) {
                getLogger().warn({ issues: entry.error.issues }, 'Skipping malformed arXiv entry');
                continue;
            }

            if (entry.data.id.includes('/api/errors')) {
                getLogger().warn({ id: entry.data.id, message: entry.data.summary }, 'arXiv reported an error');
                continue;
            }

            papers.push(this.normalizeEntry(entry.data));
        }

        return papers;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async getText(url: string): Promise<string> {
        const cached = this.cache?.get<string>(url);
        if (cached) return cached;

        const response = await this.httpClient.get<unknown>(url, { source: 'arxiv' });
        if (typeof response.data !== 'string') {
            throw new SourceError('arXiv returned a non-XML body', this.sourceId);
        }

        this.cache?.set(url, response.data);
        return response.data;
    }

    private normalizeEntry(entry: ArxivEntry): Paper {
        const arxivId = extractArxivId(entry.id);
        const year = entry.published ? parseInt(entry.published.slice(0, 4), 10) : NaN;
        const abstract = entry.summary ? collapseWhitespace(entry.summary) : '';
        const journalRef = entry['arxiv:journal_ref'] ? collapseWhitespace(entry['arxiv:journal_ref']) : '';

        return {
            source: 'arxiv',
            source_id: arxivId ?? entry.id,
            doi: stripDoiPrefix(entry['arxiv:doi']),
            arxiv_id: arxivId,
            title: collapseWhitespace(entry.title),
            abstract: abstract || null,
            authors: (entry.author ?? [])
                .map((author) => collapseWhitespace(author.name))
                .filter((name) => name.length > 0),
            year: Number.isNaN(year) ? null : year,
            venue: journalRef || 'arXiv',
            url: entry.id,
            // arXiv does not track citations
            citations: 0,
        };
    }
}
