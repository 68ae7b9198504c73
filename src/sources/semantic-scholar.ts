import type { Paper, SearchOptions, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { getHttpClient, HttpError, S2_KEYED_RATE_LIMIT, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { getApiKey } from '../utils/config.js';
import { stripDoiPrefix, extractArxivId, collapseWhitespace } from './utils.js';

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'paperId', 'externalIds', 'title', 'abstract', 'authors',
    'year', 'venue', 'url', 'citationCount',
].join(',');

/** S2 rejects search pages larger than this */
const MAX_PAGE_SIZE = 100;

/**
 * Semantic Scholar API response types.
 */
interface S2Paper {
    paperId: string;
    externalIds?: {
        DOI?: string;
        ArXiv?: string;
        CorpusId?: number;
    } | null;
    title?: string | null;
    abstract?: string | null;
    year?: number | null;
    venue?: string | null;
    citationCount?: number | null;
    authors?: Array<{
        authorId?: string | null;
        name?: string | null;
    }>;
    url?: string | null;
}

interface S2SearchResponse {
    total: number;
    offset: number;
    data?: S2Paper[];
    next?: number;
}

/**
 * Semantic Scholar source adapter.
 * Preferred source when the same paper also comes back from arXiv:
 * it carries citation counts and venues.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 'semantic_scholar' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private cache: ResponseCache | null;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient; cache?: ResponseCache | null }) {
        this.apiKey = options?.apiKey ?? getApiKey('S2_API_KEY');
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.cache = options?.cache ?? null;

        if (this.apiKey) {
            this.httpClient.setRateLimit('s2', S2_KEYED_RATE_LIMIT);
        }
    }

    async search(query: string, options: SearchOptions): Promise<Paper[]> {
        const params = new URLSearchParams({
            query: this.cleanSearchQuery(query),
            offset: String(options.offset),
            limit: String(Math.min(options.limit, MAX_PAGE_SIZE)),
            fields: PAPER_FIELDS,
        });

        const url = `${S2_BASE}/paper/search?${params.toString()}`;
        getLogger().debug({ url }, 'S2 search');

        const body = await this.getJson<S2SearchResponse>(url);
        return (body.data ?? [])
            .filter((paper) => paper.paperId)
            .map((paper) => this.normalizeS2Paper(paper));
    }

    async fetchPaper(id: string): Promise<Paper | null> {
        const url = `${S2_BASE}/paper/${encodeURIComponent(id)}?fields=${PAPER_FIELDS}`;
        getLogger().debug({ url }, 'S2 fetch paper');

        try {
            const paper = await this.getJson<S2Paper>(url);
            return this.normalizeS2Paper(paper);
        } catch (error) {
            // S2 answers 400 for ids it cannot parse and 404 for unknown ones
            if (error instanceof HttpError && (error.status === 404 || error.status === 400)) {
                getLogger().debug({ id, status: error.status }, 'Paper not found on S2');
                return null;
            }
            throw error;
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    private async getJson<T>(url: string): Promise<T> {
        const cached = this.cache?.get<T>(url);
        if (cached) return cached;

        const response = await this.httpClient.get<T>(url, {
            source: 's2',
            headers: this.buildHeaders(),
        });
        this.cache?.set(url, response.data);
        return response.data;
    }

    private normalizeS2Paper(paper: S2Paper): Paper {
        const doi = stripDoiPrefix(paper.externalIds?.DOI ?? null);
        const arxivId = extractArxivId(paper.externalIds?.ArXiv ?? null);

        return {
            source: 'semantic_scholar',
            source_id: paper.paperId,
            doi,
            arxiv_id: arxivId,
            title: paper.title ? collapseWhitespace(paper.title) : 'Untitled',
            abstract: paper.abstract ?? null,
            authors: (paper.authors ?? [])
                .map((author) => author.name?.trim() ?? '')
                .filter((name) => name.length > 0),
            year: paper.year ?? null,
            venue: paper.venue || null,
            url: paper.url ?? (doi ? `https://doi.org/${doi}` : null),
            citations: paper.citationCount ?? 0,
        };
    }

    /**
     * Clean search query. S2 treats hyphens and plus signs as operators.
     */
    private cleanSearchQuery(query: string): string {
        return query
            .replace(/[-+]/g, ' ')
            .replace(/\s+/g, ' ')
            .trim();
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}
