/**
 * Paper interface: a search result normalized from any provider
 * (Semantic Scholar, arXiv) into one common shape.
 */
export interface Paper {
    /** Provider that returned this paper */
    source: PaperSource;

    /** Provider-side identifier (S2 paperId, arXiv id with version) */
    source_id: string;

    /** Digital Object Identifier (without https://doi.org/ prefix) */
    doi: string | null;

    /** arXiv identifier (e.g., "2401.01234v2") */
    arxiv_id: string | null;

    title: string;

    abstract: string | null;

    /** Author display names in byline order */
    authors: string[];

    year: number | null;

    /** Venue, journal reference, or "arXiv" for preprints */
    venue: string | null;

    url: string | null;

    /** Citation count (always 0 for arXiv, which does not track citations) */
    citations: number;
}

export type PaperSource = 'semantic_scholar' | 'arxiv';

export const PAPER_SOURCES: readonly PaperSource[] = ['semantic_scholar', 'arxiv'];

/**
 * Human-readable provider names, used in logs and stats.
 */
export const SOURCE_DISPLAY_NAMES: Record<PaperSource, string> = {
    semantic_scholar: 'Semantic Scholar',
    arxiv: 'arXiv',
};

export function isPaperSource(value: string): value is PaperSource {
    return PAPER_SOURCES.some((source) => source === value);
}

/**
 * Paging window handed to a provider.
 */
export interface SearchOptions {
    limit: number;
    offset: number;
}

/**
 * Response of a multi-source search.
 */
export interface SearchResult {
    results: Paper[];
    /** Unique papers across all sources before the page was cut to `limit` */
    total: number;
    /** Wall-clock seconds spent on the search */
    duration: number;
    query: string;
    page: number;
    limit: number;
    sources: PaperSource[];
    /** Sources that errored and contributed nothing */
    failed_sources: PaperSource[];
}
