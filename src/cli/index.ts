#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { HubDatabase } from '../storage/database.js';
import { ResponseCache } from '../cache/response-cache.js';
import { ResearchService } from '../research/research-service.js';
import { createSourceAdapters, startServer } from '../server.js';
import { VERSION } from '../version.js';
import { SOURCE_DISPLAY_NAMES, type HubConfig, type HubConfigOverrides, type LogLevel, type Paper } from '../types/index.js';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ServeOptions extends CommonOptions {
    host?: string;
    port?: number;
    db?: string;
    cache: boolean;
}

interface DbOptions extends CommonOptions {
    db?: string;
}

interface SearchCommandOptions extends CommonOptions {
    limit?: number;
    page?: number;
    sources?: string;
    cache: boolean;
}

function positiveInt(name: string, max = Number.MAX_SAFE_INTEGER) {
    return (value: string): number => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
            throw new InvalidArgumentError(`${name} must be an integer between 1 and ${max}.`);
        }
        return parsed;
    };
}

/**
 * CLI flags as a config layer. Only flags actually given appear, so unset
 * ones do not mask the environment or the config file.
 */
function toOverrides(opts: CommonOptions & { host?: string; port?: number; db?: string; cache?: boolean }): HubConfigOverrides {
    const overrides: HubConfigOverrides = {};

    if (opts.host !== undefined || opts.port !== undefined) {
        overrides.server = {
            ...(opts.host !== undefined ? { host: opts.host } : {}),
            ...(opts.port !== undefined ? { port: opts.port } : {}),
        };
    }
    if (opts.db !== undefined) overrides.database = { path: opts.db };
    if (opts.cache === false) overrides.cache = { enabled: false };
    if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;

    return overrides;
}

async function setup(opts: Parameters<typeof toOverrides>[0]): Promise<HubConfig> {
    const config = await resolveConfig(toOverrides(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function logLevelOption(): Option {
    return new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS);
}

function formatPaper(paper: Paper, index: number): string {
    const authors = paper.authors.length > 3
        ? `${paper.authors.slice(0, 3).join(', ')} et al.`
        : paper.authors.join(', ');

    const lines = [
        `${index + 1}. ${paper.title} (${paper.year ?? 'n.d.'})`,
        `   ${authors || 'Unknown authors'} · ${SOURCE_DISPLAY_NAMES[paper.source]} · ${paper.citations} citations`,
    ];
    if (paper.url) lines.push(`   ${paper.url}`);
    return lines.join('\n');
}

const program = new Command();

program
    .name('research-hub')
    .description('AI Research Hub: search papers, analyze them with a local LLM, organize projects and datasets.')
    .version(VERSION);

// ─── SERVE command ────────────────────────────────────────

program
    .command('serve')
    .description('Start the HTTP API')
    .option('--host <host>', 'Interface to bind')
    .option('-p, --port <n>', 'Port to listen on', positiveInt('port', 65535))
    .option('--db <path>', 'SQLite database path')
    .addOption(logLevelOption())
    .option('--json-logs', 'Output JSON logs')
    .option('--no-cache', 'Disable response caching')
    .action(async (opts: ServeOptions) => {
        const config = await setup(opts);
        getHttpClient({ timeout: 30000, version: VERSION });

        const handle = await startServer(config);

        const shutdown = (signal: NodeJS.Signals) => {
            getLogger().info({ signal }, 'Shutting down');
            handle.close().then(
                () => process.exit(0),
                (error: unknown) => {
                    getLogger().error({ err: error }, 'Shutdown failed');
                    process.exit(1);
                }
            );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    });

// ─── DB commands ──────────────────────────────────────────

const dbCommand = program
    .command('db')
    .description('Database maintenance');

dbCommand
    .command('init')
    .description('Check connectivity and apply schema migrations')
    .option('--db <path>', 'SQLite database path')
    .addOption(logLevelOption())
    .action(async (opts: DbOptions) => {
        const config = await setup(opts);
        const db = new HubDatabase(config.database.path, { migrate: false });
        try {
            if (!db.checkConnection()) {
                console.error('Database connection failed');
                process.exitCode = 1;
                return;
            }
            const version = db.migrate();
            console.log(`Database initialized at ${config.database.path} (schema v${version})`);
        } finally {
            db.close();
        }
    });

dbCommand
    .command('check')
    .description('Run a connectivity check against the database')
    .option('--db <path>', 'SQLite database path')
    .addOption(logLevelOption())
    .action(async (opts: DbOptions) => {
        const config = await setup(opts);
        const db = new HubDatabase(config.database.path, { migrate: false });
        try {
            if (db.checkConnection()) {
                console.log('Database connection OK');
            } else {
                console.error('Database connection failed');
                process.exitCode = 1;
            }
        } finally {
            db.close();
        }
    });

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search Semantic Scholar and arXiv from the terminal')
    .argument('<query>', 'Search query')
    .option('-l, --limit <n>', 'Results per page', positiveInt('limit', 100))
    .option('--page <n>', 'Page number', positiveInt('page'))
    .option('-s, --sources <list>', 'Comma-separated sources: semantic_scholar,arxiv')
    .addOption(logLevelOption())
    .option('--no-cache', 'Disable response caching')
    .action(async (query: string, opts: SearchCommandOptions) => {
        const config = await setup(opts);
        const research = new ResearchService(createSourceAdapters(config, getHttpClient({ version: VERSION })), {
            defaultLimit: config.search.defaultLimit,
            defaultSources: config.search.defaultSources,
        });

        const result = await research.searchPapers(query, {
            page: opts.page,
            limit: opts.limit,
            sources: opts.sources?.split(','),
        });

        console.log(`\n🔎 ${result.total} results for "${result.query}" in ${result.duration.toFixed(2)}s\n`);
        result.results.forEach((paper, index) => {
            console.log(formatPaper(paper, (result.page - 1) * result.limit + index));
        });
        if (result.failed_sources.length > 0) {
            console.log(`\n  Unavailable: ${result.failed_sources.map((source) => SOURCE_DISPLAY_NAMES[source]).join(', ')}`);
        }
        console.log('');
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await setup({});
        const cache = new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours, enabled: false });

        switch (action) {
            case 'clear': {
                const removed = cache.clear();
                console.log(removed > 0 ? `Cache cleared (${removed} entries).` : 'No cache to clear.');
                break;
            }
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB in ${stats.directory}`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exitCode = 1;
        }
    });

try {
    await program.parseAsync();
} catch (error) {
    getLogger().error({ err: error }, 'Command failed');
    process.exitCode = 1;
}
