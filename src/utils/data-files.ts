import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type {
    ExclusionRules,
    DisciplineRules,
    ScholarRegistryData,
    CountryHints,
    OpenAlexQueryPresets,
    DataFilesConfig,
} from '../types/index.js';
import { DataFileError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Lookup data shipped with the package lives in `config/` at the package root.
 */
export function defaultDataPath(fileName: string): string {
    return fileURLToPath(new URL(`../../config/${fileName}`, import.meta.url));
}

const versioned = { version: z.string().min(1) };

const exclusionSchema = z.object({
    ...versioned,
    names: z.array(z.string()),
    affiliations: z.array(z.string()),
    fields: z.array(z.string()),
});

const disciplineSchema = z.object({
    ...versioned,
    rules: z.array(
        z.object({
            label: z.string().min(1),
            keywords: z.array(z.string().min(1)),
            fields: z.array(z.string()).optional(),
        })
    ),
    fieldLabels: z.record(z.string()),
    defaultLabel: z.string().min(1),
});

const registrySchema = z.object({
    ...versioned,
    entries: z.record(z.string()),
});

const countryHintsSchema = z.object({
    ...versioned,
    hints: z.array(
        z.object({
            country: z.string().length(2),
            emailSuffixes: z.array(z.string()),
            affiliationKeywords: z.array(z.string()),
        })
    ),
});

const queryPresetsSchema = z.object({
    ...versioned,
    topics: z.array(z.string()),
    institutions: z.array(z.string()),
});

/**
 * Read and validate one JSON data file.
 */
function loadJsonFile<S extends z.ZodTypeAny>(path: string, schema: S): z.infer<S> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new DataFileError(`Cannot read ${path}: ${errorMessage(error)}`, path);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
        const first = result.error.issues[0];
        const where = first ? `${first.path.join('.')}: ${first.message}` : 'invalid shape';
        throw new DataFileError(`Invalid data file ${path} (${where})`, path);
    }

    getLogger().debug({ path }, 'Loaded data file');
    return result.data;
}

export function loadExclusionRules(path = defaultDataPath('exclusions.json')): ExclusionRules {
    return loadJsonFile(path, exclusionSchema);
}

export function loadDisciplineRules(path = defaultDataPath('disciplines.json')): DisciplineRules {
    return loadJsonFile(path, disciplineSchema);
}

export function loadScholarRegistry(path = defaultDataPath('scholar-registry.json')): ScholarRegistryData {
    return loadJsonFile(path, registrySchema);
}

export function loadCountryHints(path = defaultDataPath('country-hints.json')): CountryHints {
    return loadJsonFile(path, countryHintsSchema);
}

export function loadQueryPresets(path = defaultDataPath('openalex-queries.json')): OpenAlexQueryPresets {
    return loadJsonFile(path, queryPresetsSchema);
}

/**
 * Every lookup table a run consults.
 */
export interface LookupData {
    exclusions: ExclusionRules;
    disciplines: DisciplineRules;
    registry: ScholarRegistryData;
    countryHints: CountryHints;
    queries: OpenAlexQueryPresets;
}

/**
 * Load all lookup data, honouring per-file overrides.
 */
export function loadLookupData(files: DataFilesConfig = {}): LookupData {
    return {
        exclusions: loadExclusionRules(files.exclusionsFile),
        disciplines: loadDisciplineRules(files.disciplinesFile),
        registry: loadScholarRegistry(files.registryFile),
        countryHints: loadCountryHints(files.countryHintsFile),
        queries: loadQueryPresets(files.queriesFile),
    };
}
