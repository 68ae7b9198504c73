import { cosmiconfig } from 'cosmiconfig';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CONFIG, type HubConfig, type HubConfigOverrides } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const sourceSchema = z.enum(['semantic_scholar', 'arxiv']);
const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Shape of researchhub.config.json. Every field is optional; unknown keys
 * are dropped.
 */
const configFileSchema = z.object({
    server: z.object({
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535),
    }).partial().optional(),
    cors: z.object({
        origins: z.array(z.string().min(1)),
    }).partial().optional(),
    database: z.object({
        path: z.string().min(1),
    }).partial().optional(),
    search: z.object({
        defaultLimit: z.number().int().positive(),
        maxLimit: z.number().int().positive(),
        defaultSources: z.array(sourceSchema).min(1),
    }).partial().optional(),
    ollama: z.object({
        baseUrl: z.string().url(),
        model: z.string().min(1),
        temperature: z.number().min(0).max(2),
        topP: z.number().min(0).max(1),
        timeoutMs: z.number().int().positive(),
    }).partial().optional(),
    cache: z.object({
        enabled: z.boolean(),
        dir: z.string().min(1),
        ttlHours: z.number().positive(),
    }).partial().optional(),
    logLevel: logLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
});

/**
 * Load configuration from researchhub.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults then apply).
 */
async function loadConfigFile(searchFrom?: string): Promise<HubConfigOverrides | null> {
    const explorer = cosmiconfig('researchhub', {
        searchPlaces: ['researchhub.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

function parseInteger(name: string, raw: string, min: number, max: number): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

function parseFlag(raw: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseList(raw: string): string[] {
    return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Read relevant environment variables.
 * The Semantic Scholar key is read where it is needed and never stored here.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): HubConfigOverrides {
    const overrides: HubConfigOverrides = {};

    const host = env['API_HOST'];
    const port = env['API_PORT'];
    if (host || port) {
        overrides.server = {
            ...(host ? { host } : {}),
            ...(port ? { port: parseInteger('API_PORT', port, 1, 65535) } : {}),
        };
    }

    const dbPath = env['DATABASE_PATH'];
    if (dbPath) {
        overrides.database = { path: dbPath };
    }

    const origins = env['CORS_ORIGINS'];
    if (origins) {
        overrides.cors = { origins: parseList(origins) };
    }

    const ollamaUrl = env['OLLAMA_BASE_URL'];
    const ollamaModel = env['OLLAMA_MODEL'];
    if (ollamaUrl || ollamaModel) {
        overrides.ollama = {
            ...(ollamaUrl ? { baseUrl: ollamaUrl } : {}),
            ...(ollamaModel ? { model: ollamaModel } : {}),
        };
    }

    const cacheDir = env['CACHE_DIR'];
    const cacheTtl = env['CACHE_TTL_HOURS'];
    const noCache = env['NO_CACHE'];
    if (cacheDir || cacheTtl || noCache) {
        overrides.cache = {
            ...(cacheDir ? { dir: cacheDir } : {}),
            ...(cacheTtl ? { ttlHours: parseInteger('CACHE_TTL_HOURS', cacheTtl, 1, 24 * 365) } : {}),
            ...(noCache ? { enabled: !parseFlag(noCache) } : {}),
        };
    }

    const logLevel = env['LOG_LEVEL'];
    if (logLevel) {
        const parsed = logLevelSchema.safeParse(logLevel.toLowerCase());
        if (!parsed.success) {
            throw new ConfigError(`LOG_LEVEL must be one of error, warn, info, debug, got "${logLevel}"`);
        }
        overrides.logLevel = parsed.data;
    }

    const jsonLogs = env['JSON_LOGS'];
    if (jsonLogs) {
        overrides.jsonLogs = parseFlag(jsonLogs);
    }

    return overrides;
}

/**
 * Merge configuration layers over the defaults, later layers winning.
 */
export function mergeConfig(...layers: Array<HubConfigOverrides | null | undefined>): HubConfig {
    let merged: HubConfig = { ...DEFAULT_CONFIG };

    for (const layer of layers) {
        if (!layer) continue;
        merged = {
            ...merged,
            ...(layer.logLevel !== undefined ? { logLevel: layer.logLevel } : {}),
            ...(layer.jsonLogs !== undefined ? { jsonLogs: layer.jsonLogs } : {}),
            // Deep merge nested objects
            server: { ...merged.server, ...layer.server },
            cors: { ...merged.cors, ...layer.cors },
            database: { ...merged.database, ...layer.database },
            search: { ...merged.search, ...layer.search },
            ollama: { ...merged.ollama, ...layer.ollama },
            cache: { ...merged.cache, ...layer.cache },
        };
    }

    if (merged.search.defaultLimit > merged.search.maxLimit) {
        throw new ConfigError(
            `search.defaultLimit (${merged.search.defaultLimit}) exceeds search.maxLimit (${merged.search.maxLimit})`
        );
    }

    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: HubConfigOverrides = {},
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<HubConfig> {
    if (!options.env) {
        loadDotenv();
    }
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * API key from the environment. Empty values count as unset.
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
