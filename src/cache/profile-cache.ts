import { mkdirSync, existsSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import type { RawRecord } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { rawRecordSchema } from '../utils/record-schemas.js';

export interface ProfileCacheStats {
    directory: string;
    entries: number;
    bytes: number;
}

export interface ProfileCacheOptions {
    cacheDir?: string;
    ttlHours?: number;
    logger?: Logger;
    now?: () => number;
}

/**
 * File-system cache for fetched profiles.
 * One JSON file per (backend, id) in the cache directory.
 *
 * Cache key = SHA-256 of `<backend>:<id>`.
 * Only successful fetches are stored. The directory is created on first write.
 */
export class ProfileCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly logger: Logger;
    private readonly now: () => number;

    constructor(options: ProfileCacheOptions = {}) {
        this.cacheDir = options.cacheDir ?? '.scholarank-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.logger = options.logger ?? getLogger();
        this.now = options.now ?? Date.now;
    }

    private filePath(backend: string, id: string): string {
        const key = createHash('sha256').update(`${backend}:${id}`).digest('hex');
        return join(this.cacheDir, `${key}.json`);
    }

    /**
     * Get a cached profile, or null if missing, expired or unreadable.
     */
    get(backend: string, id: string): RawRecord | null {
        const path = this.filePath(backend, id);
        if (!existsSync(path)) return null;

        let entry: unknown;
        try {
            entry = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (error) {
            this.logger.debug({ backend, id, err: errorMessage(error) }, 'Unreadable cache entry');
            return null;
        }

        if (typeof entry !== 'object' || entry === null || !('timestamp' in entry) || !('record' in entry)) {
            return null;
        }
        if (typeof entry.timestamp !== 'number' || this.now() - entry.timestamp > this.ttlMs) {
            this.logger.debug({ backend, id }, 'Cache expired');
            return null;
        }

        const parsed = rawRecordSchema.safeParse(entry.record);
        if (!parsed.success) return null;

        this.logger.debug({ backend, id }, 'Cache hit');
        return parsed.data;
    }

    /**
     * Store a profile in the cache.
     */
    set(backend: string, id: string, record: RawRecord): void {
        try {
            mkdirSync(this.cacheDir, { recursive: true });
            const entry = { timestamp: this.now(), backend, id, record };
            writeFileSync(this.filePath(backend, id), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            this.logger.warn({ err: errorMessage(error) }, 'Failed to write cache entry');
        }
    }

    /**
     * Count the entries on disk. A missing directory is an empty cache.
     */
    stats(): ProfileCacheStats {
        const files = this.entryFiles();
        const bytes = files.reduce((sum, file) => sum + statSync(join(this.cacheDir, file)).size, 0);
        return { directory: this.cacheDir, entries: files.length, bytes };
    }

    /**
     * Remove every entry. Returns the number removed.
     */
    clear(): number {
        const files = this.entryFiles();
        for (const file of files) {
            rmSync(join(this.cacheDir, file), { force: true });
        }
        this.logger.info({ directory: this.cacheDir, removed: files.length }, 'Profile cache cleared');
        return files.length;
    }

    private entryFiles(): string[] {
        if (!existsSync(this.cacheDir)) return [];
        return readdirSync(this.cacheDir).filter((file) => file.endsWith('.json'));
    }
}
