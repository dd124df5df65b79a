import { readFileSync } from 'node:fs';
import type { CanonicalRecord } from '../types/index.js';
import { DataFileError, errorMessage } from '../utils/errors.js';
import { canonicalRecordSchema } from '../utils/record-schemas.js';

export interface ResumeResult {
    records: CanonicalRecord[];
    /** Items that failed validation */
    skipped: number;
}

/**
 * Load previously reconciled records from a JSON array. Items that do not
 * validate are skipped and counted.
 */
export function loadResumeFile(path: string): ResumeResult {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new DataFileError(`Cannot read ${path}: ${errorMessage(error)}`, path);
    }

    // Ranking output files wrap the records
    const items = Array.isArray(raw) ? raw : rankingArray(raw);
    if (!items) {
        throw new DataFileError(`${path} is not a JSON array of researcher records`, path);
    }

    const result: ResumeResult = { records: [], skipped: 0 };
    for (const item of items) {
        const parsed = canonicalRecordSchema.safeParse(item);
        if (parsed.success) {
            result.records.push(parsed.data);
        } else {
            result.skipped++;
        }
    }
    return result;
}

function rankingArray(raw: unknown): unknown[] | null {
    if (typeof raw !== 'object' || raw === null || !('ranking' in raw)) return null;
    return Array.isArray(raw.ranking) ? raw.ranking : null;
}
