import type { CanonicalRecord, CountryHints, IdKind, RawRecord, RecordSource } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { resolveCountry } from './country.js';
import type { ScholarRegistry } from './registry.js';

const OPENALEX_ID = /^A\d+$/;

/** Descriptive fields resolved by "non-empty wins, then most recent" */
const DESCRIPTIVE_FIELDS = [
    'name',
    'affiliation',
    'email_domain',
    'topics',
    'field',
    'domain',
    'country_code',
    'orcid',
    'scholar_id',
    'openalex_id',
] as const satisfies ReadonlyArray<keyof CanonicalRecord>;

type DescriptiveField = (typeof DESCRIPTIVE_FIELDS)[number];
type DescriptiveValues = Pick<CanonicalRecord, DescriptiveField>;

export interface ReconcileOptions {
    registry?: ScholarRegistry;
    countryHints?: CountryHints;
    logger?: Logger;
}

export interface ReconcileStats {
    input: number;
    output: number;
    /** Records merged into another record with the same key */
    merged: number;
    /** Scholar-keyed records folded into an OpenAlex record via the registry */
    folded: number;
    registryMatches: number;
    countriesResolved: number;
}

export interface ReconcileResult {
    records: CanonicalRecord[];
    stats: ReconcileStats;
}

function idKindFor(raw: RawRecord): IdKind {
    switch (raw.source) {
        case 'openalex':
        case 'openalex-profile':
            return 'openalex';
        case 'scholar-html':
        case 'serpapi':
            return 'scholar';
        case 'seed-file':
            return OPENALEX_ID.test(raw.source_id) ? 'openalex' : 'scholar';
    }
}

/**
 * Identity key of a canonical record: `<id_kind>:<id>`.
 */
export function canonicalKey(record: Pick<CanonicalRecord, 'id_kind' | 'id'>): string {
    return `${record.id_kind}:${record.id}`;
}

/**
 * Lift a raw record into a single-source canonical record.
 */
export function toCanonical(raw: RawRecord): CanonicalRecord {
    const kind = idKindFor(raw);
    return {
        id: raw.source_id,
        id_kind: kind,
        openalex_id: kind === 'openalex' ? raw.source_id : '',
        scholar_id: kind === 'scholar' ? raw.source_id : '',
        orcid: raw.orcid,
        name: raw.name,
        affiliation: raw.affiliation,
        country_code: raw.country_code,
        email_domain: raw.email_domain,
        topics: [...raw.topics],
        field: raw.field,
        domain: raw.domain,
        citations: raw.citations,
        citations_5y: raw.citations_5y,
        h_index: raw.h_index,
        h_index_5y: raw.h_index_5y,
        i10_index: raw.i10_index,
        i10_index_5y: raw.i10_index_5y,
        works_count: raw.works_count,
        discipline: null,
        consistency_score: null,
        impact_score: null,
        sources: [raw.source],
        retrieved_at: raw.retrieved_at,
    };
}

function timestamp(value: string): number {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? 0 : parsed;
}

function isEmptyValue(value: string | string[] | null): boolean {
    if (value === null) return true;
    return value.length === 0;
}

function pickDescriptive(incumbent: CanonicalRecord, challenger: CanonicalRecord, challengerNewer: boolean): DescriptiveValues {
    const pick = <K extends DescriptiveField>(field: K): CanonicalRecord[K] => {
        const current = incumbent[field];
        const candidate = challenger[field];
        if (isEmptyValue(candidate)) return current;
        if (isEmptyValue(current)) return candidate;
        return challengerNewer ? candidate : current;
    };

    return {
        name: pick('name'),
        affiliation: pick('affiliation'),
        email_domain: pick('email_domain'),
        topics: [...pick('topics')],
        field: pick('field'),
        domain: pick('domain'),
        country_code: pick('country_code'),
        orcid: pick('orcid'),
        scholar_id: pick('scholar_id'),
        openalex_id: pick('openalex_id'),
    };
}

/**
 * Merge two records describing the same researcher. The result keeps the
 * incumbent's identity (`id`, `id_kind`).
 *
 * Numeric fields move as a block from the record with strictly more
 * citations; on equal citations the more recently retrieved one wins, and
 * on equal timestamps the incumbent stays.
 */
export function mergeRecords(incumbent: CanonicalRecord, challenger: CanonicalRecord): CanonicalRecord {
    const incumbentTime = timestamp(incumbent.retrieved_at);
    const challengerTime = timestamp(challenger.retrieved_at);
    const challengerNewer = challengerTime > incumbentTime;

    const numericWinner =
        challenger.citations > incumbent.citations ||
        (challenger.citations === incumbent.citations && challengerNewer)
            ? challenger
            : incumbent;

    const sources = [...new Set<RecordSource>([...incumbent.sources, ...challenger.sources])].sort();

    return {
        id: incumbent.id,
        id_kind: incumbent.id_kind,
        ...pickDescriptive(incumbent, challenger, challengerNewer),
        citations: numericWinner.citations,
        citations_5y: numericWinner.citations_5y,
        h_index: numericWinner.h_index,
        h_index_5y: numericWinner.h_index_5y,
        i10_index: numericWinner.i10_index,
        i10_index_5y: numericWinner.i10_index_5y,
        works_count: numericWinner.works_count,
        // Derived values are stale once inputs change
        discipline: null,
        consistency_score: null,
        impact_score: null,
        sources,
        retrieved_at: challengerNewer ? challenger.retrieved_at : incumbent.retrieved_at,
    };
}

/**
 * Reconcile already-canonical records (resume files, previous runs, or the
 * output of `toCanonical`). Idempotent: reconciling the output again yields
 * the same records.
 */
export function reconcileCanonical(input: CanonicalRecord[], options: ReconcileOptions = {}): ReconcileResult {
    const logger = options.logger ?? getLogger();
    const stats: ReconcileStats = {
        input: input.length,
        output: 0,
        merged: 0,
        folded: 0,
        registryMatches: 0,
        countriesResolved: 0,
    };

    // 1. Same-key merge
    const byKey = new Map<string, CanonicalRecord>();
    for (const record of input) {
        const key = canonicalKey(record);
        const existing = byKey.get(key);
        if (existing) {
            byKey.set(key, mergeRecords(existing, record));
            stats.merged++;
        } else {
            byKey.set(key, record);
        }
    }

    // 2. Registry ids for records that have none
    if (options.registry) {
        for (const [key, record] of byKey) {
            if (record.scholar_id) continue;
            const scholarId = options.registry.lookup(record.name);
            if (scholarId) {
                byKey.set(key, { ...record, scholar_id: scholarId });
                stats.registryMatches++;
            }
        }
    }

    // 3. Fold scholar-keyed records into the OpenAlex record sharing their id
    const openAlexKeyByScholarId = new Map<string, string>();
    for (const [key, record] of byKey) {
        if (record.id_kind === 'openalex' && record.scholar_id && !openAlexKeyByScholarId.has(record.scholar_id)) {
            openAlexKeyByScholarId.set(record.scholar_id, key);
        }
    }
    for (const [key, record] of [...byKey]) {
        if (record.id_kind !== 'scholar') continue;
        const targetKey = openAlexKeyByScholarId.get(record.id);
        const target = targetKey ? byKey.get(targetKey) : undefined;
        if (!targetKey || !target) continue;

        byKey.set(targetKey, mergeRecords(target, record));
        byKey.delete(key);
        stats.folded++;
    }

    // 4. Country for records the sources left blank
    const records: CanonicalRecord[] = [];
    for (const record of byKey.values()) {
        if (record.country_code === null && options.countryHints) {
            const country = resolveCountry(record.email_domain, record.affiliation, options.countryHints);
            if (country) {
                records.push({ ...record, country_code: country });
                stats.countriesResolved++;
                continue;
            }
        }
        records.push(record);
    }

    stats.output = records.length;
    logger.info({ ...stats }, 'Records reconciled');
    return { records, stats };
}

/**
 * Reconcile raw records from any mix of sources into one canonical record
 * per researcher.
 */
export function reconcile(raw: RawRecord[], options: ReconcileOptions = {}): ReconcileResult {
    return reconcileCanonical(raw.map(toCanonical), options);
}
