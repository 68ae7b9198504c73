import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';
import type { HubConfig, LlmProvider, SourceAdapter } from './types/index.js';
import { createApp } from './api/app.js';
import { HubDatabase } from './storage/database.js';
import { ResponseCache } from './cache/response-cache.js';
import { SemanticScholarAdapter } from './sources/semantic-scholar.js';
import { ArxivAdapter } from './sources/arxiv.js';
import { ResearchService } from './research/research-service.js';
import { OllamaProvider } from './analysis/ollama-provider.js';
import { PaperAnalyzer } from './analysis/paper-analyzer.js';
import { getHttpClient, type HttpClient } from './utils/http-client.js';
import { getLogger } from './utils/logger.js';

export interface ServerHandle {
    app: Express;
    server: Server;
    db: HubDatabase;
    /** Address actually bound; differs from the config when port 0 was asked for */
    port: number;
    host: string;
    close(): Promise<void>;
}

export interface ServerOverrides {
    httpClient?: HttpClient;
    adapters?: SourceAdapter[];
    llm?: LlmProvider;
}

/**
 * Paper sources wired the way the server uses them.
 */
export function createSourceAdapters(config: HubConfig, httpClient: HttpClient = getHttpClient()): SourceAdapter[] {
    const cache = config.cache.enabled
        ? new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours })
        : null;

    return [
        new SemanticScholarAdapter({ httpClient, cache }),
        new ArxivAdapter({ httpClient, cache }),
    ];
}

/**
 * Open the database, wire the services and start listening.
 */
export async function startServer(config: HubConfig, overrides: ServerOverrides = {}): Promise<ServerHandle> {
    const logger = getLogger();
    const httpClient = overrides.httpClient ?? getHttpClient();

    const db = new HubDatabase(config.database.path);
    if (!db.checkConnection()) {
        db.close();
        throw new Error(`Cannot use database at ${config.database.path}`);
    }

    const research = new ResearchService(overrides.adapters ?? createSourceAdapters(config, httpClient), {
        defaultLimit: config.search.defaultLimit,
        defaultSources: config.search.defaultSources,
    });
    const llm = overrides.llm ?? new OllamaProvider({ ...config.ollama, httpClient });
    const analyzer = new PaperAnalyzer(research, llm, db);

    const app = createApp({ config, db, research, analyzer, llm });

    let server: Server;
    try {
        server = await new Promise<Server>((resolve, reject) => {
            const listener = app.listen(config.server.port, config.server.host);
            listener.once('listening', () => resolve(listener));
            listener.once('error', reject);
        });
    } catch (error) {
        db.close();
        throw error;
    }

    const address = server.address();
    const bound: AddressInfo = typeof address === 'object' && address !== null
        ? address
        : { address: config.server.host, port: config.server.port, family: 'IPv4' };

    logger.info({ host: config.server.host, port: bound.port, db: config.database.path }, 'AI Research Hub API listening');

    let closing: Promise<void> | null = null;

    return {
        app,
        server,
        db,
        port: bound.port,
        host: config.server.host,
        close() {
            closing ??= new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    db.close();
                    if (error) reject(error);
                    else resolve();
                });
                server.closeAllConnections();
            }).then(() => {
                logger.info('Server stopped');
            });
            return closing;
        },
    };
}
