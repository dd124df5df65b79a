import type { CanonicalRecord, RawRecord, ScoredRecord } from '../types/index.js';
import type { LookupData } from '../utils/data-files.js';
import type { SleepFn } from '../utils/sleep.js';

export const noSleep: SleepFn = async () => {};

export function rawRecord(overrides: Partial<RawRecord> = {}): RawRecord {
    return {
        source: 'openalex',
        source_id: 'A100',
        name: 'Ana Torres',
        affiliation: 'Universidad de Chile',
        country_code: 'CL',
        email_domain: '',
        orcid: null,
        citations: 100,
        citations_5y: 40,
        h_index: 10,
        h_index_5y: 6,
        i10_index: 8,
        i10_index_5y: 4,
        works_count: 30,
        topics: ['Electoral Systems'],
        field: 'Social Sciences',
        domain: 'Social Sciences',
        retrieved_at: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}

export function canonicalRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
    return {
        id: 'A100',
        id_kind: 'openalex',
        openalex_id: 'A100',
        scholar_id: '',
        orcid: null,
        name: 'Ana Torres',
        affiliation: 'Universidad de Chile',
        country_code: 'CL',
        email_domain: '',
        topics: ['Electoral Systems'],
        field: 'Social Sciences',
        domain: 'Social Sciences',
        citations: 100,
        citations_5y: 40,
        h_index: 10,
        h_index_5y: 6,
        i10_index: 8,
        i10_index_5y: 4,
        works_count: 30,
        discipline: null,
        consistency_score: null,
        impact_score: null,
        sources: ['openalex'],
        retrieved_at: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}

export function scoredRecord(overrides: Partial<ScoredRecord> = {}): ScoredRecord {
    return {
        ...canonicalRecord(),
        discipline: 'Political Science',
        consistency_score: 60,
        impact_score: 50,
        ...overrides,
    };
}

/**
 * Small lookup tables for pipeline tests.
 */
export function testLookup(): LookupData {
    return {
        exclusions: {
            version: 'test',
            names: ['Arend Lijphart'],
            affiliations: ['Gobierno de Chile', 'Ministerio de Prueba'],
            fields: ['Computer Science'],
        },
        disciplines: {
            version: 'test',
            rules: [
                { label: 'Political Science', keywords: ['political', 'electoral'] },
                { label: 'Economics', keywords: ['economic'], fields: ['Economics, Econometrics and Finance'] },
            ],
            fieldLabels: { 'Arts and Humanities': 'Humanities' },
            defaultLabel: 'Social Sciences',
        },
        registry: {
            version: 'test',
            entries: { 'Juan-Carlos Ferrer': 'SCH1' },
        },
        countryHints: {
            version: 'test',
            hints: [
                {
                    country: 'CL',
                    emailSuffixes: ['.cl'],
                    affiliationKeywords: ['chile', 'concepción'],
                },
            ],
        },
        queries: {
            version: 'test',
            topics: ['T10001', 'T10002'],
            institutions: ['Universidad de Chile', 'Universidad de Santiago'],
        },
    };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

/**
 * A 200 response whose body stream fails while it is read, like a connection
 * dropped mid-transfer.
 */
export function brokenBodyResponse(): Response {
    const body = new ReadableStream<Uint8Array>({
        start(controller) {
            controller.error(new TypeError('terminated'));
        },
    });
    return new Response(body, { status: 200 });
}
