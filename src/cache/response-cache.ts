import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

interface CacheEntry<T> {
    timestamp: number;
    url: string;
    data: T;
}

export interface CacheStats {
    enabled: boolean;
    directory: string;
    entries: number;
    bytes: number;
}

/**
 * File-system memo of provider responses, so repeating a search inside the
 * TTL does not spend rate-limit tokens.
 *
 * Cache key = SHA-256 of the request URL.
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.researchhub-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private pathFor(url: string): string {
        const key = createHash('sha256').update(url).digest('hex');
        return join(this.cacheDir, `${key}.json`);
    }

    /**
     * Get a cached response, or null if not found/expired/unreadable.
     */
    get<T>(url: string): T | null {
        if (!this.enabled) return null;

        const filePath = this.pathFor(url);
        if (!existsSync(filePath)) return null;

        let entry: CacheEntry<T>;
        try {
            entry = JSON.parse(readFileSync(filePath, 'utf-8')) as CacheEntry<T>;
        } catch (error) {
            getLogger().debug({ filePath, err: error }, 'Unreadable cache entry, treating as miss');
            return null;
        }

        if (!entry || typeof entry.timestamp !== 'number' || Date.now() - entry.timestamp > this.ttlMs) {
            getLogger().debug({ url: url.slice(0, 80) }, 'Cache expired');
            return null;
        }

        getLogger().debug({ url: url.slice(0, 80) }, 'Cache hit');
        return entry.data;
    }

    /**
     * Store a response in the cache. Write failures are logged, not thrown.
     */
    set<T>(url: string, data: T): void {
        if (!this.enabled) return;

        const entry: CacheEntry<T> = {
            timestamp: Date.now(),
            url: url.slice(0, 200), // Truncated URL for debugging
            data,
        };

        try {
            writeFileSync(this.pathFor(url), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ err: error }, 'Failed to write cache entry');
        }
    }

    has(url: string): boolean {
        return this.get(url) !== null;
    }

    /**
     * Remove every entry. Returns how many were removed.
     */
    clear(): number {
        if (!existsSync(this.cacheDir)) return 0;

        const files = this.entryFiles();
        for (const file of files) {
            rmSync(join(this.cacheDir, file), { force: true });
        }
        return files.length;
    }

    getStats(): CacheStats {
        const files = existsSync(this.cacheDir) ? this.entryFiles() : [];
        let bytes = 0;
        for (const file of files) {
            bytes += statSync(join(this.cacheDir, file)).size;
        }

        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries: files.length,
            bytes,
        };
    }

    private entryFiles(): string[] {
        return readdirSync(this.cacheDir).filter((file) => file.endsWith('.json'));
    }
}
