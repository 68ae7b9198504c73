import { Router } from 'express';
import { z } from 'zod';
import type { HubDatabase } from '../../storage/database.js';
import { NotFoundError } from '../../utils/errors.js';

const recentQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function analysesRoutes(deps: { db: HubDatabase }): Router {
    const router = Router();

    router.get('/analyses', (req, res) => {
        const { limit } = recentQuerySchema.parse(req.query);
        res.json(deps.db.getRecentAnalyses(limit));
    });

    // Registered before /analyses/:sourceId so "stats" is not read as an id
    router.get('/analyses/stats', (_req, res) => {
        res.json(deps.db.getAnalysisStats());
    });

    router.get('/analyses/:sourceId', (req, res) => {
        const sourceId = req.params['sourceId'] ?? '';
        const analysis = deps.db.getPaperAnalysis(sourceId);
        if (!analysis) {
            throw new NotFoundError(`No analysis stored for ${sourceId}`);
        }
        res.json(analysis);
    });

    router.delete('/analyses/:sourceId', (req, res) => {
        const sourceId = req.params['sourceId'] ?? '';
        if (!deps.db.deletePaperAnalysis(sourceId)) {
            throw new NotFoundError(`No analysis stored for ${sourceId}`);
        }
        res.status(204).end();
    });

    return router;
}
