import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type ScholarankConfig,
    type OpenAlexConfig,
    type ProfilesConfig,
    type DataFilesConfig,
} from '../types/index.js';
import { getLogger } from './logger.js';
import { ConfigurationError } from './errors.js';

/**
 * Partial configuration as supplied by one layer (file, env, CLI).
 */
export type ConfigOverrides = Partial<Omit<ScholarankConfig, 'openalex' | 'profiles' | 'data'>> & {
    openalex?: Partial<OpenAlexConfig>;
    profiles?: Partial<ProfilesConfig>;
    data?: DataFilesConfig;
};

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const headlineSchema = z.enum(['h_index', 'citations', 'h_index_5y', 'i10_index', 'impact_score', 'consistency_score']);
const backendSchema = z.enum(['scholar-html', 'openalex-profile', 'serpapi']);

const fileConfigSchema = z
    .object({
        idsFile: z.string(),
        seedFile: z.string(),
        resumeFile: z.string(),
        targetCountry: z.string().length(2).transform((s) => s.toUpperCase()),
        minHIndex: z.number().int().min(0),
        sortBy: headlineSchema,
        topPerDiscipline: z.number().int().min(1),
        contactEmail: z.string().min(3),
        openalex: z
            .object({
                enabled: z.boolean(),
                modes: z.array(z.enum(['country', 'topics', 'institutions'])),
                perPage: z.number().int().min(1).max(200),
                maxResults: z.number().int().min(1),
                throttleMs: z.number().min(0),
                retryBackoffMs: z.number().min(0),
                minHIndexDownload: z.number().int().min(0),
            })
            .partial(),
        profiles: z
            .object({
                backend: backendSchema,
                delayMinMs: z.number().min(0),
                delayMaxMs: z.number().min(0),
                cache: z.boolean(),
                cacheDir: z.string(),
                cacheTtlHours: z.number().min(0),
            })
            .partial(),
        data: z
            .object({
                exclusionsFile: z.string(),
                disciplinesFile: z.string(),
                registryFile: z.string(),
                countryHintsFile: z.string(),
                queriesFile: z.string(),
            })
            .partial(),
        out: z.string(),
        format: z.enum(['json', 'csv']),
        db: z.string(),
        logLevel: logLevelSchema,
        jsonLogs: z.boolean(),
    })
    .partial();

/**
 * Validate a raw configuration object (file contents).
 * Throws ConfigurationError listing every offending key.
 */
export function parseConfigObject(raw: unknown, origin: string): ConfigOverrides {
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration in ${origin}: ${issues}`);
    }
    return result.data;
}

/**
 * Load configuration from scholarank.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply then.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scholarank', {
        searchPlaces: ['scholarank.config.json', 'package.json'],
    });

    const result = await explorer.search(searchFrom);
    if (result && !result.isEmpty) {
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parseConfigObject(result.config, result.filepath);
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    // API keys are accessed directly where needed (not stored in config)
    const email = env['OPENALEX_EMAIL'];
    if (email) overrides.contactEmail = email;

    const country = env['SCHOLARANK_TARGET_COUNTRY'];
    if (country) overrides.targetCountry = country.toUpperCase();

    const backend = backendSchema.safeParse(env['SCHOLARANK_PROFILE_BACKEND']);
    if (backend.success) overrides.profiles = { backend: backend.data };

    const level = logLevelSchema.safeParse(env['LOG_LEVEL']);
    if (level.success) overrides.logLevel = level.data;

    return overrides;
}

/**
 * Merge configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(
    fileConfig: ConfigOverrides | null,
    envConfig: ConfigOverrides,
    cliFlags: ConfigOverrides
): ScholarankConfig {
    const merged: ScholarankConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        openalex: {
            ...DEFAULT_CONFIG.openalex,
            ...fileConfig?.openalex,
            ...envConfig.openalex,
            ...cliFlags.openalex,
        },
        profiles: {
            ...DEFAULT_CONFIG.profiles,
            ...fileConfig?.profiles,
            ...envConfig.profiles,
            ...cliFlags.profiles,
        },
        data: {
            ...DEFAULT_CONFIG.data,
            ...fileConfig?.data,
            ...envConfig.data,
            ...cliFlags.data,
        },
    };

    if (merged.profiles.delayMinMs > merged.profiles.delayMaxMs) {
        throw new ConfigurationError(
            `profiles.delayMinMs (${merged.profiles.delayMinMs}) must not exceed profiles.delayMaxMs (${merged.profiles.delayMaxMs})`
        );
    }

    return merged;
}

/**
 * Resolve the effective configuration for a run.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ScholarankConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}
