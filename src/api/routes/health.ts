import { Router } from 'express';
import type { HubDatabase } from '../../storage/database.js';
import type { LlmProvider } from '../../types/index.js';
import { VERSION } from '../../version.js';
import { asyncHandler } from '../middleware.js';

/**
 * Endpoint listing served at /api/v1, which the root greeting links to.
 */
export const API_ENDPOINTS = [
    'GET /api/v1/health',
    'GET /api/v1/health/db',
    'GET /api/v1/health/ollama',
    'GET /api/v1/search',
    'GET /api/v1/paper/:paperId',
    'POST /api/v1/analyze/:paperId',
    'GET /api/v1/analyses',
    'GET /api/v1/analyses/stats',
    'GET|DELETE /api/v1/analyses/:sourceId',
    'GET|POST /api/v1/users',
    'GET|DELETE /api/v1/users/:userId',
    'GET|POST /api/v1/projects',
    'GET|PATCH|DELETE /api/v1/projects/:projectId',
    'PUT|DELETE /api/v1/projects/:projectId/members/:userId',
    'GET|POST /api/v1/projects/:projectId/datasets',
    'GET /api/v1/datasets',
    'GET|PATCH|DELETE /api/v1/datasets/:datasetId',
] as const;

export function rootRoutes(): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json({
            message: 'Welcome to AI Research Hub API',
            version: VERSION,
            docs_url: '/api/v1',
        });
    });

    router.get('/api/v1', (_req, res) => {
        res.json({ version: VERSION, endpoints: API_ENDPOINTS });
    });

    return router;
}

export function healthRoutes(deps: { db: HubDatabase; llm: LlmProvider }): Router {
    const router = Router();

    router.get('/health', (_req, res) => {
        res.json({ status: 'healthy', version: VERSION });
    });

    router.get('/health/db', (_req, res) => {
        if (deps.db.checkConnection()) {
            res.json({ status: 'healthy' });
        } else {
            res.status(503).json({ status: 'unhealthy', error: 'Database connection failed' });
        }
    });

    router.get('/health/ollama', asyncHandler(async (_req, res) => {
        const report = await deps.llm.checkHealth();
        res.status(report.status === 'healthy' ? 200 : 503).json(report);
    }));

    return router;
}
