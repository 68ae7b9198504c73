import { Router } from 'express';
import { z } from 'zod';
import type { ResearchService } from '../../research/research-service.js';
import type { PaperAnalyzer } from '../../analysis/paper-analyzer.js';
import type { SearchConfig } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware.js';

export interface ResearchRouteDeps {
    research: ResearchService;
    analyzer: PaperAnalyzer;
    search: SearchConfig;
}

export function researchRoutes(deps: ResearchRouteDeps): Router {
    const router = Router();

    const searchQuerySchema = z.object({
        query: z.string().trim().min(1, 'query must not be empty'),
        page: z.coerce.number().int().min(1).default(1),
        limit: z.coerce.number().int().min(1).max(deps.search.maxLimit).default(deps.search.defaultLimit),
        sources: z.string().optional(),
    });

    router.get('/search', asyncHandler(async (req, res) => {
        const params = searchQuerySchema.parse(req.query);
        const result = await deps.research.searchPapers(params.query, {
            page: params.page,
            limit: params.limit,
            sources: params.sources?.split(','),
        });
        res.json(result);
    }));

    router.get('/paper/:paperId', asyncHandler(async (req, res) => {
        const paperId = req.params['paperId'] ?? '';
        const paper = await deps.research.getPaperDetails(paperId);
        if (!paper) {
            throw new NotFoundError('Paper not found');
        }
        res.json(paper);
    }));

    router.post('/analyze/:paperId', asyncHandler(async (req, res) => {
        const analysis = await deps.analyzer.analyzePaper(req.params['paperId'] ?? '');
        res.json(analysis);
    }));

    return router;
}
