import type { HeadlineMetric } from './researcher.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Profile backend variants.
 */
export type ProfileBackendName = 'scholar-html' | 'openalex-profile' | 'serpapi';

/**
 * OpenAlex listing modes.
 *  - country: every author in the target country above `minHIndexDownload`
 *  - topics: authors in the target country tagged with one of the preset topics
 *  - institutions: authors affiliated with one of the preset institutions
 */
export type OpenAlexMode = 'country' | 'topics' | 'institutions';

/**
 * OpenAlex acquisition configuration.
 */
export interface OpenAlexConfig {
    enabled: boolean;
    modes: OpenAlexMode[];
    perPage: number;
    /** Cap on records yielded per query (institution mode: per institution) */
    maxResults: number;
    /** Delay between page requests, applied after every page */
    throttleMs: number;
    /** Fixed wait before the single retry of a failed page */
    retryBackoffMs: number;
    /** `summary_stats.h_index:>N` filter used by the country mode */
    minHIndexDownload: number;
}

/**
 * Profile backend configuration.
 */
export interface ProfilesConfig {
    backend: ProfileBackendName;
    delayMinMs: number;
    delayMaxMs: number;
    cache: boolean;
    cacheDir: string;
    cacheTtlHours: number;
}

/**
 * Paths to the versioned lookup data. Unset entries use the files shipped
 * under `config/`.
 */
export interface DataFilesConfig {
    exclusionsFile?: string;
    disciplinesFile?: string;
    registryFile?: string;
    countryHintsFile?: string;
    queriesFile?: string;
}

/**
 * Output formats.
 */
export type OutputFormat = 'json' | 'csv';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ScholarankConfig {
    // Input
    idsFile?: string;
    seedFile?: string;
    resumeFile?: string;

    // Pipeline
    targetCountry: string;
    minHIndex: number;
    sortBy: HeadlineMetric;
    topPerDiscipline: number;

    // Sources
    contactEmail: string;
    openalex: OpenAlexConfig;
    profiles: ProfilesConfig;

    // Lookup data
    data: DataFilesConfig;

    // Output
    out: string;
    format: OutputFormat;
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ScholarankConfig = {
    targetCountry: 'CL',
    minHIndex: 1,
    sortBy: 'h_index',
    topPerDiscipline: 10,
    contactEmail: 'scholarank@example.com',
    openalex: {
        enabled: true,
        modes: ['country'],
        perPage: 200,
        maxResults: 20000,
        throttleMs: 100,
        retryBackoffMs: 2000,
        minHIndexDownload: 1,
    },
    profiles: {
        backend: 'scholar-html',
        delayMinMs: 3000,
        delayMaxMs: 7000,
        cache: true,
        cacheDir: '.scholarank-cache',
        cacheTtlHours: 24,
    },
    data: {},
    out: './ranking.json',
    format: 'json',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    scholarank_version: string;
    config_json: string;
    stats_json: string;
}
