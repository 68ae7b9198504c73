import type { Paper } from './paper.js';

/**
 * Structured LLM analysis of a paper.
 */
export interface PaperAnalysis {
    /** Two or three sentence overview */
    summary: string;
    key_findings: string[];
    methodology: string;
    applications: string[];
    future_work: string[];
}

/**
 * A paper snapshot together with its stored analysis.
 */
export interface AnalyzedPaper extends Paper, PaperAnalysis {
    analysis_id: number;
    created_at: string;
}

export interface AnalysisStats {
    total_papers: number;
    arxiv_papers: number;
    semantic_scholar_papers: number;
}

export type AnalysisSection = keyof PaperAnalysis;
