import type { Paper, PaperSource, SearchOptions } from './paper.js';

/**
 * Interface for paper providers (Semantic Scholar, arXiv).
 * Each adapter normalizes results into the common Paper interface.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Source identifier, as accepted by the `sources` query parameter */
    readonly sourceId: PaperSource;

    /**
     * Keyword search. Results come back in the provider's relevance order.
     */
    search(query: string, options: SearchOptions): Promise<Paper[]>;

    /**
     * Fetch a single paper by a provider-specific ID.
     * Resolves to null when the provider does not know the paper.
     */
    fetchPaper(id: string): Promise<Paper | null>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;
}
