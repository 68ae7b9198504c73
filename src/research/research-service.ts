import {
    PAPER_SOURCES,
    SOURCE_DISPLAY_NAMES,
    isPaperSource,
    type Paper,
    type PaperSource,
    type SearchResult,
    type SourceAdapter,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { UpstreamError, ValidationError, errorMessage } from '../utils/errors.js';
import { extractArxivId, normalizeTitle, stripDoiPrefix } from '../sources/utils.js';

export interface SearchRequest {
    page?: number;
    limit?: number;
    /** Source names; empty or missing means the configured defaults */
    sources?: string[];
}

export interface ResearchServiceOptions {
    defaultLimit?: number;
    defaultSources?: PaperSource[];
}

/**
 * Order in which sources win a duplicate title. Semantic Scholar goes first:
 * its records carry venues and citation counts.
 */
const MERGE_ORDER: readonly PaperSource[] = ['semantic_scholar', 'arxiv'];

/**
 * Merge per-source result lists, keeping the first paper seen for each
 * normalized title and dropping untitled ones.
 */
export function mergeResults(resultsBySource: Map<PaperSource, Paper[]>): Paper[] {
    const merged: Paper[] = [];
    const seenTitles = new Set<string>();

    for (const source of MERGE_ORDER) {
        for (const paper of resultsBySource.get(source) ?? []) {
            const key = normalizeTitle(paper.title);
            if (key && !seenTitles.has(key)) {
                seenTitles.add(key);
                merged.push(paper);
            }
        }
    }

    return merged;
}

/**
 * Map a user-supplied id onto S2's prefixed identifier forms. S2 ids and
 * already-prefixed ids pass through.
 */
export function toS2Identifier(id: string): string {
    const arxivId = extractArxivId(id);
    if (arxivId) {
        return `ARXIV:${arxivId.replace(/v\d+$/, '')}`;
    }

    const doi = stripDoiPrefix(id);
    if (doi && /^10\.\d{4,9}\//.test(doi)) {
        return `DOI:${doi}`;
    }

    return id;
}

/**
 * Paper search and lookup across the configured providers.
 */
export class ResearchService {
    private readonly adapters = new Map<PaperSource, SourceAdapter>();
    private readonly defaultLimit: number;
    private readonly defaultSources: PaperSource[];

    constructor(adapters: SourceAdapter[], options: ResearchServiceOptions = {}) {
        for (const adapter of adapters) {
            this.adapters.set(adapter.sourceId, adapter);
        }
        this.defaultLimit = options.defaultLimit ?? 20;
        this.defaultSources = (options.defaultSources ?? [...PAPER_SOURCES]).filter((source) => this.adapters.has(source));
    }

    /**
     * Search every selected source concurrently and merge the pages.
     * A failing source is logged and skipped; only when all of them fail
     * does the search fail.
     */
    async searchPapers(query: string, request: SearchRequest = {}): Promise<SearchResult> {
        const trimmed = query.trim();
        if (!trimmed) {
            throw new ValidationError('Query must not be empty');
        }

        const page = request.page ?? 1;
        const limit = request.limit ?? this.defaultLimit;
        if (!Number.isInteger(page) || page < 1) {
            throw new ValidationError('page must be a positive integer');
        }
        if (!Number.isInteger(limit) || limit < 1) {
            throw new ValidationError('limit must be a positive integer');
        }

        const sources = this.resolveSources(request.sources);
        const offset = (page - 1) * limit;
        const logger = getLogger();
        const startTime = Date.now();

        logger.info({ query: trimmed, page, limit, sources }, 'Starting paper search');

        const settled = await Promise.allSettled(
            sources.map((source) => this.requireAdapter(source).search(trimmed, { limit, offset }))
        );

        const resultsBySource = new Map<PaperSource, Paper[]>();
        const failedSources: PaperSource[] = [];

        settled.forEach((outcome, index) => {
            const source = sources[index];
            if (source === undefined) return;

            if (outcome.status === 'fulfilled') {
                resultsBySource.set(source, outcome.value);
                logger.info({ source, count: outcome.value.length }, `Results from ${SOURCE_DISPLAY_NAMES[source]}`);
            } else {
                failedSources.push(source);
                logger.error({ source, err: outcome.reason }, `${SOURCE_DISPLAY_NAMES[source]} search failed`);
            }
        });

        if (failedSources.length === sources.length) {
            throw new UpstreamError('All paper sources failed', { failed_sources: failedSources });
        }

        const merged = mergeResults(resultsBySource);
        const duration = (Date.now() - startTime) / 1000;

        logger.info({ query: trimmed, total: merged.length, duration }, 'Search completed');

        return {
            results: merged.slice(0, limit),
            total: merged.length,
            duration,
            query: trimmed,
            page,
            limit,
            sources,
            failed_sources: failedSources,
        };
    }

    /**
     * Look a paper up by id. Semantic Scholar resolves its own ids, DOIs and
     * `arXiv:` ids; arXiv is asked when S2 has nothing and the id is an
     * arXiv id.
     */
    async getPaperDetails(paperId: string): Promise<Paper | null> {
        const id = paperId.trim();
        if (!id) {
            throw new ValidationError('Paper id must not be empty');
        }

        const logger = getLogger();
        logger.info({ paperId: id }, 'Fetching paper details');

        const s2 = this.adapters.get('semantic_scholar');
        const arxiv = this.adapters.get('arxiv');
        const arxivId = extractArxivId(id);

        if (s2) {
            try {
                const paper = await s2.fetchPaper(toS2Identifier(id));
                if (paper) return paper;
            } catch (error) {
                // Without an arXiv fallback there is nobody else to ask
                if (!arxiv || !arxivId) {
                    throw new UpstreamError(`Paper lookup failed: ${errorMessage(error)}`);
                }
                logger.warn({ paperId: id, err: error }, 'S2 lookup failed, trying arXiv');
            }
        }

        if (arxiv && arxivId) {
            try {
                return await arxiv.fetchPaper(arxivId);
            } catch (error) {
                throw new UpstreamError(`Paper lookup failed: ${errorMessage(error)}`);
            }
        }

        return null;
    }

    /**
     * Sources this service can query.
     */
    getSources(): PaperSource[] {
        return [...this.adapters.keys()];
    }

    private resolveSources(requested: string[] | undefined): PaperSource[] {
        const names = (requested ?? [])
            .map((name) => name.trim().toLowerCase())
            .filter((name) => name.length > 0);

        if (names.length === 0) {
            return [...this.defaultSources];
        }

        const unknown = names.filter((name) => !isPaperSource(name) || !this.adapters.has(name));
        if (unknown.length > 0) {
            throw new ValidationError(`Unknown source(s): ${unknown.join(', ')}`, {
                available: this.getSources(),
            });
        }

        // Deduplicate while keeping the caller's order
        return [...new Set(names.filter(isPaperSource))];
    }

    private requireAdapter(source: PaperSource): SourceAdapter {
        const adapter = this.adapters.get(source);
        if (!adapter) {
            throw new ValidationError(`Source not configured: ${source}`);
        }
        return adapter;
    }
}
