import type { AnalyzedPaper, LlmProvider } from '../types/index.js';
import type { HubDatabase } from '../storage/database.js';
import type { ResearchService } from '../research/research-service.js';
import { getLogger } from '../utils/logger.js';
import { ApiError, NotFoundError, UpstreamError, ValidationError, errorMessage } from '../utils/errors.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt, parseAnalysis } from './analysis-parser.js';

export interface PaperAnalyzerOptions {
    /** Cap on generated tokens; the provider default when unset */
    maxTokens?: number;
}

/**
 * Resolves a paper, asks the LLM for an analysis and stores it.
 * Stored analyses are reused, so each paper is analyzed once.
 */
export class PaperAnalyzer {
    private readonly inFlight = new Map<string, Promise<AnalyzedPaper>>();

    constructor(
        private readonly research: ResearchService,
        private readonly llm: LlmProvider,
        private readonly db: HubDatabase,
        private readonly options: PaperAnalyzerOptions = {}
    ) {}

    async analyzePaper(paperId: string): Promise<AnalyzedPaper> {
        const id = paperId.trim();
        if (!id) {
            throw new ValidationError('Paper id must not be empty');
        }

        const pending = this.inFlight.get(id);
        if (pending) return pending;

        const analysis = this.runAnalysis(id).finally(() => {
            this.inFlight.delete(id);
        });
        this.inFlight.set(id, analysis);
        return analysis;
    }

    private async runAnalysis(id: string): Promise<AnalyzedPaper> {
        const logger = getLogger();

        const stored = this.db.getPaperAnalysis(id);
        if (stored) {
            logger.info({ paperId: id }, 'Returning stored analysis');
            return stored;
        }

        const paper = await this.research.getPaperDetails(id);
        if (!paper) {
            throw new NotFoundError(`Paper ${id} not found`);
        }

        const storedBySource = this.db.getPaperAnalysis(paper.source_id);
        if (storedBySource) {
            logger.info({ paperId: id, sourceId: paper.source_id }, 'Returning stored analysis');
            return storedBySource;
        }

        logger.info({ sourceId: paper.source_id, title: paper.title, model: this.llm.model }, 'Analyzing paper');

        let text: string;
        try {
            const result = await this.llm.complete(buildAnalysisPrompt(paper), {
                systemPrompt: ANALYSIS_SYSTEM_PROMPT,
                maxTokens: this.options.maxTokens,
            });
            text = result.text;
            logger.debug({ sourceId: paper.source_id, usage: result.usage }, 'LLM completion finished');
        } catch (error) {
            if (error instanceof ApiError) throw error;
            logger.error({ sourceId: paper.source_id, err: error }, 'Paper analysis failed');
            throw new UpstreamError(`Failed to analyze paper: ${errorMessage(error)}`, { provider: this.llm.name });
        }

        const analysis = parseAnalysis(text);
        if (!analysis.summary && analysis.key_findings.length === 0) {
            logger.warn({ sourceId: paper.source_id }, 'LLM answer had no recognizable sections');
        }

        return this.db.storePaperAnalysis(paper, analysis);
    }
}
