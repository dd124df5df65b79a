import type { CanonicalRecord, ExclusionRules } from '../types/index.js';
import { METRIC_FIELDS } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';

export type CleaningStageName =
    | 'malformed'
    | 'excluded_name'
    | 'excluded_affiliation'
    | 'excluded_field'
    | 'wrong_country'
    | 'below_min_h_index';

export interface CleaningOptions {
    exclusions: ExclusionRules;
    /** ISO 3166-1 alpha-2 code records must carry */
    targetCountry: string;
    minHIndex: number;
    logger?: Logger;
}

export interface CleaningStageResult {
    stage: CleaningStageName;
    dropped: number;
    remaining: number;
}

export interface CleaningResult {
    records: CanonicalRecord[];
    stages: CleaningStageResult[];
}

type Stage = { name: CleaningStageName; keep: (record: CanonicalRecord) => boolean };

/**
 * A record is well formed when it has a name and every metric is a
 * non-negative integer.
 */
export function isWellFormed(record: CanonicalRecord): boolean {
    if (!record.name.trim()) return false;
    return METRIC_FIELDS.every((field) => Number.isInteger(record[field]) && record[field] >= 0);
}

function buildStages(options: CleaningOptions): Stage[] {
    const names = new Set(options.exclusions.names);
    const affiliations = new Set(options.exclusions.affiliations);
    const fields = new Set(options.exclusions.fields);
    const country = options.targetCountry.toUpperCase();

    return [
        { name: 'malformed', keep: isWellFormed },
        { name: 'excluded_name', keep: (r) => !names.has(r.name) },
        { name: 'excluded_affiliation', keep: (r) => !affiliations.has(r.affiliation) },
        { name: 'excluded_field', keep: (r) => !fields.has(r.field) },
        { name: 'wrong_country', keep: (r) => r.country_code?.toUpperCase() === country },
        { name: 'below_min_h_index', keep: (r) => r.h_index >= options.minHIndex },
    ];
}

/**
 * Apply the exclusion and threshold stages in order. Records are never
 * modified; a record dropped by one stage is not seen by the next.
 */
export function cleanRecords(records: CanonicalRecord[], options: CleaningOptions): CleaningResult {
    const logger = options.logger ?? getLogger();
    const stages: CleaningStageResult[] = [];
    let current = records;

    for (const stage of buildStages(options)) {
        const survivors = current.filter(stage.keep);
        stages.push({ stage: stage.name, dropped: current.length - survivors.length, remaining: survivors.length });
        logger.info({ stage: stage.name, dropped: current.length - survivors.length, remaining: survivors.length }, 'Cleaning stage');
        current = survivors;
    }

    return { records: current, stages };
}
