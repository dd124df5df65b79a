import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { csvParse, type DSVRowString } from 'd3-dsv';
import type { RawRecord } from '../types/index.js';
import { DataFileError, errorMessage } from '../utils/errors.js';
import { parseCount, toCount } from '../sources/fields.js';
import { extractEmailDomain } from '../sources/utils.js';

/** Accepted id column names, most specific first */
const ID_COLUMNS = ['scholar_id', 'google_scholar_id', 'ScholarID', 'id', 'ID'];

type Row = DSVRowString<string>;

function readText(path: string): string {
    try {
        return readFileSync(path, 'utf-8').replace(/^\uFEFF/, '');
    } catch (error) {
        throw new DataFileError(`Cannot read ${path}: ${errorMessage(error)}`, path);
    }
}

/**
 * First non-empty value among the given column names (case-insensitive).
 */
function firstValue(row: Row, keys: string[]): string {
    const columns = Object.keys(row);
    for (const key of keys) {
        const column = columns.find((c) => c.trim().toLowerCase() === key.toLowerCase());
        const value = column ? (row[column] ?? '').trim() : '';
        if (value) return value;
    }
    return '';
}

/**
 * Accept bare ids as well as profile URLs ("…/citations?user=abc&hl=en").
 */
function profileIdFrom(value: string): string {
    const match = value.match(/[?&]user=([\w-]+)/);
    return (match?.[1] ?? value).trim();
}

/**
 * Read profile ids from a CSV (an id column) or a text file (one id per
 * line, blank lines and `#` comments ignored). Duplicates are dropped.
 */
export function loadSeedIds(path: string): string[] {
    const text = readText(path);
    const ids: string[] = [];

    if (extname(path).toLowerCase() === '.csv') {
        const rows = csvParse(text);
        const column = ID_COLUMNS.find((name) => rows.columns.includes(name));
        if (!column) {
            throw new DataFileError(`${path} has no id column (expected one of: ${ID_COLUMNS.join(', ')})`, path);
        }
        for (const row of rows) {
            const id = profileIdFrom(row[column] ?? '');
            if (id) ids.push(id);
        }
    } else {
        for (const line of text.split(/\r?\n/)) {
            const trimmed = line.trim();
            if (!trimmed || trimmed.startsWith('#')) continue;
            ids.push(profileIdFrom(trimmed));
        }
    }

    return [...new Set(ids)];
}

export interface SeedMetricsResult {
    records: RawRecord[];
    /** Rows without an h-index value */
    skippedEmpty: number;
    /** Rows without a name or any identifier */
    skippedInvalid: number;
}

function metric(row: Row, keys: string[]): number {
    return toCount(parseCount(firstValue(row, keys)));
}

/**
 * Read a seed metrics CSV: rows carrying hand-collected bibliometric data.
 * Rows with an empty `h_index` are skipped.
 */
export function loadSeedMetrics(path: string, retrievedAt: Date = new Date()): SeedMetricsResult {
    const rows = csvParse(readText(path));
    const result: SeedMetricsResult = { records: [], skippedEmpty: 0, skippedInvalid: 0 };

    for (const row of rows) {
        if (!firstValue(row, ['h_index'])) {
            result.skippedEmpty++;
            continue;
        }

        const name = firstValue(row, ['name', 'nombre']);
        const id =
            firstValue(row, ['openalex_id']) ||
            profileIdFrom(firstValue(row, ['scholar_id', 'google_scholar_id', 'id', 'url', 'scholar_url']));
        if (!name || !id) {
            result.skippedInvalid++;
            continue;
        }

        const country = firstValue(row, ['country_code', 'country', 'pais']).toUpperCase();
        const topics = firstValue(row, ['topics', 'interests', 'intereses']);
        const email = firstValue(row, ['email_domain', 'email']);

        result.records.push({
            source: 'seed-file',
            source_id: id.replace('https://openalex.org/', ''),
            name,
            affiliation: firstValue(row, ['affiliation', 'afiliacion', 'institucion']),
            country_code: country.length === 2 ? country : null,
            email_domain: extractEmailDomain(email) || email.toLowerCase(),
            orcid: firstValue(row, ['orcid']) || null,
            citations: metric(row, ['citations', 'citas', 'cited_by_count']),
            citations_5y: metric(row, ['citations_5y']),
            h_index: metric(row, ['h_index']),
            h_index_5y: metric(row, ['h_index_5y']),
            i10_index: metric(row, ['i10_index']),
            i10_index_5y: metric(row, ['i10_index_5y']),
            works_count: metric(row, ['works_count', 'trabajos']),
            topics: topics
                .split(';')
                .map((t) => t.trim())
                .filter((t) => t.length > 0),
            field: firstValue(row, ['field', 'campo_principal']),
            domain: firstValue(row, ['domain', 'dominio']),
            retrieved_at: retrievedAt.toISOString(),
        });
    }

    return result;
}
