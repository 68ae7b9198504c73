/**
 * Barrel export for all shared types.
 */
export type { Paper, PaperSource, SearchOptions, SearchResult } from './paper.js';
export { PAPER_SOURCES, SOURCE_DISPLAY_NAMES, isPaperSource } from './paper.js';
export type {
    User,
    Project,
    ProjectWithMembers,
    Dataset,
    NewUser,
    NewProject,
    ProjectUpdate,
    NewDataset,
    DatasetUpdate,
} from './project.js';
export type { PaperAnalysis, AnalyzedPaper, AnalysisStats, AnalysisSection } from './analysis.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    HubConfig,
    HubConfigOverrides,
    LogLevel,
    ServerConfig,
    CorsConfig,
    DatabaseConfig,
    SearchConfig,
    OllamaConfig,
    CacheConfig,
} from './config.js';
export type { SourceAdapter, SourceAdapterOptions } from './source-adapter.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmHealthReport,
    LlmProviderOptions,
} from './llm-provider.js';
