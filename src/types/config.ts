import type { PaperSource } from './paper.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ServerConfig {
    host: string;
    port: number;
}

export interface CorsConfig {
    /** Origins allowed to call the API with credentials */
    origins: string[];
}

export interface DatabaseConfig {
    /** SQLite file path, or ":memory:" */
    path: string;
}

export interface SearchConfig {
    defaultLimit: number;
    maxLimit: number;
    defaultSources: PaperSource[];
}

/**
 * Ollama configuration for paper analysis.
 */
export interface OllamaConfig {
    baseUrl: string;
    model: string;
    temperature: number;
    topP: number;
    timeoutMs: number;
}

/**
 * Provider response cache.
 */
export interface CacheConfig {
    enabled: boolean;
    dir: string;
    ttlHours: number;
}

/**
 * Full hub configuration merged from CLI flags, env vars, and config file.
 */
export interface HubConfig {
    server: ServerConfig;
    cors: CorsConfig;
    database: DatabaseConfig;
    search: SearchConfig;
    ollama: OllamaConfig;
    cache: CacheConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial configuration, one level deep. The shape of the config file,
 * the environment layer, and CLI overrides.
 */
export type HubConfigOverrides = {
    [K in keyof HubConfig]?: HubConfig[K] extends object
        ? HubConfig[K] extends unknown[]
            ? HubConfig[K]
            : Partial<HubConfig[K]>
        : HubConfig[K];
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HubConfig = {
    server: {
        host: 'localhost',
        port: 8000,
    },
    cors: {
        origins: ['http://localhost:3000'],
    },
    database: {
        path: './ai_research_hub.db',
    },
    search: {
        defaultLimit: 20,
        maxLimit: 100,
        defaultSources: ['semantic_scholar', 'arxiv'],
    },
    ollama: {
        baseUrl: 'http://localhost:11434',
        model: 'llama3.2',
        temperature: 0.7,
        topP: 0.9,
        timeoutMs: 120000,
    },
    cache: {
        enabled: true,
        dir: '.researchhub-cache',
        ttlHours: 24,
    },
    logLevel: 'info',
    jsonLogs: false,
};
