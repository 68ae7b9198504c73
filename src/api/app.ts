import express, { type Express } from 'express';
import cors from 'cors';
import type { HubConfig, LlmProvider } from '../types/index.js';
import type { HubDatabase } from '../storage/database.js';
import type { ResearchService } from '../research/research-service.js';
import type { PaperAnalyzer } from '../analysis/paper-analyzer.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware.js';
import { healthRoutes, rootRoutes } from './routes/health.js';
import { researchRoutes } from './routes/research.js';
import { analysesRoutes } from './routes/analyses.js';
import { workspaceRoutes } from './routes/workspace.js';

export const API_PREFIX = '/api/v1';

export interface AppDependencies {
    config: HubConfig;
    db: HubDatabase;
    research: ResearchService;
    analyzer: PaperAnalyzer;
    llm: LlmProvider;
}

/**
 * Build the express application. Listening is left to the caller.
 */
export function createApp(deps: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(requestLogger);
    app.use(cors({ origin: deps.config.cors.origins, credentials: true }));
    app.use(express.json({ limit: '1mb' }));

    app.use(rootRoutes());
    app.use(API_PREFIX, healthRoutes(deps));
    app.use(API_PREFIX, researchRoutes({ research: deps.research, analyzer: deps.analyzer, search: deps.config.search }));
    app.use(API_PREFIX, analysesRoutes(deps));
    app.use(API_PREFIX, workspaceRoutes(deps));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
