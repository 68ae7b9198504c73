export * from './types/index.js';
export { VERSION } from './version.js';
export { createApp, API_PREFIX, type AppDependencies } from './api/app.js';
export { startServer, createSourceAdapters, type ServerHandle, type ServerOverrides } from './server.js';
export { HubDatabase } from './storage/database.js';
export { ResearchService, mergeResults, toS2Identifier, type SearchRequest } from './research/research-service.js';
export { SemanticScholarAdapter } from './sources/semantic-scholar.js';
export { ArxivAdapter } from './sources/arxiv.js';
export { OllamaProvider } from './analysis/ollama-provider.js';
export { PaperAnalyzer } from './analysis/paper-analyzer.js';
export { parseAnalysis, buildAnalysisPrompt } from './analysis/analysis-parser.js';
export { ResponseCache, type CacheStats } from './cache/response-cache.js';
export { HttpClient, HttpError, createHttpClient, getHttpClient, type HttpClientOptions } from './utils/http-client.js';
export { resolveConfig, loadEnvVars, mergeConfig } from './utils/config.js';
export { initLogger, getLogger, resetLogger, type LoggerOptions } from './utils/logger.js';
export * from './utils/errors.js';
