import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadEnvVars, mergeConfig, resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('loadEnvVars', () => {
    it('should return no overrides for an empty environment', () => {
        expect(loadEnvVars({})).toEqual({});
    });

    it('should read server, database, cors and ollama settings', () => {
        const overrides = loadEnvVars({
            API_HOST: '0.0.0.0',
            API_PORT: '9000',
            DATABASE_PATH: ':memory:',
            CORS_ORIGINS: 'http://localhost:3000, https://hub.example.com ,',
            OLLAMA_BASE_URL: 'http://gpu-box:11434',
            OLLAMA_MODEL: 'mistral',
        });

        expect(overrides).toEqual({
            server: { host: '0.0.0.0', port: 9000 },
            database: { path: ':memory:' },
            cors: { origins: ['http://localhost:3000', 'https://hub.example.com'] },
            ollama: { baseUrl: 'http://gpu-box:11434', model: 'mistral' },
        });
    });

    it('should read cache and logging flags', () => {
        expect(loadEnvVars({ NO_CACHE: 'true', CACHE_TTL_HOURS: '6', LOG_LEVEL: 'DEBUG', JSON_LOGS: '1' })).toEqual({
            cache: { ttlHours: 6, enabled: false },
            logLevel: 'debug',
            jsonLogs: true,
        });
    });

    it('should reject a non-numeric port', () => {
        expect(() => loadEnvVars({ API_PORT: 'abc' }))
            .toThrow('API_PORT must be an integer between 1 and 65535, got "abc"');
    });

    it('should reject a port out of range', () => {
        expect(() => loadEnvVars({ API_PORT: '70000' })).toThrow(ConfigError);
    });

    it('should reject unknown log levels', () => {
        expect(() => loadEnvVars({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    });
});

describe('mergeConfig', () => {
    it('should return the defaults with no layers', () => {
        expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should let later layers win field by field', () => {
        const config = mergeConfig(
            { server: { host: 'file-host', port: 7000 }, logLevel: 'warn' },
            { server: { port: 8080 } },
        );

        expect(config.server).toEqual({ host: 'file-host', port: 8080 });
        expect(config.logLevel).toBe('warn');
        expect(config.ollama).toEqual(DEFAULT_CONFIG.ollama);
    });

    it('should reject a default limit above the maximum', () => {
        expect(() => mergeConfig({ search: { defaultLimit: 50, maxLimit: 10 } })).toThrow(ConfigError);
    });
});

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'research-hub-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should layer CLI flags over env vars over the config file', async () => {
        writeFileSync(join(dir, 'researchhub.config.json'), JSON.stringify({
            server: { host: 'file-host', port: 7000 },
            ollama: { model: 'file-model' },
            search: { defaultSources: ['arxiv'] },
            unknownKey: true,
        }));

        const config = await resolveConfig(
            { server: { port: 9100 } },
            { searchFrom: dir, env: { API_HOST: 'env-host', API_PORT: '8100' } }
        );

        expect(config.server).toEqual({ host: 'env-host', port: 9100 });
        expect(config.ollama.model).toBe('file-model');
        expect(config.search.defaultSources).toEqual(['arxiv']);
    });

    it('should fall back to defaults when the config file is invalid', async () => {
        writeFileSync(join(dir, 'researchhub.config.json'), JSON.stringify({ server: { port: 'eighty' } }));

        const config = await resolveConfig({}, { searchFrom: dir, env: {} });

        expect(config.server).toEqual(DEFAULT_CONFIG.server);
    });
});
