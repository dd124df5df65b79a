import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
    loadCountryHints,
    loadExclusionRules,
    loadLookupData,
    loadScholarRegistry,
} from '../utils/data-files.js';
import { DataFileError } from '../utils/errors.js';
import { ScholarRegistry } from '../pipeline/registry.js';
import { loadSeedIds, loadSeedMetrics } from '../io/seed-files.js';
import { loadResumeFile } from '../io/resume.js';
import { canonicalRecord } from './fixtures.js';

let tmpDir: string;

function writeTmp(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
}

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarank-io-'));
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('lookup data files', () => {
    it('should load every shipped table', () => {
        const lookup = loadLookupData();

        expect(lookup.exclusions.affiliations).toContain('Gobierno de Chile');
        expect(lookup.exclusions.names).toContain('Arend Lijphart');
        expect(lookup.disciplines.defaultLabel).toBe('Social Sciences');
        expect(lookup.countryHints.hints[0]?.country).toBe('CL');
        expect(lookup.queries.version.length).toBeGreaterThan(0);
    });

    it('should resolve hyphen variants through the shipped registry', () => {
        const registry = new ScholarRegistry(loadScholarRegistry());
        expect(registry.lookup('Juan\u2010Carlos Ferrer')).toBe('1N8BNr8AAAAJ');
        expect(registry.lookup('juan-carlos ferrer')).toBe('1N8BNr8AAAAJ');
        expect(registry.lookup('David Altman')).toBe('oZGkFZoAAAAJ');
    });

    it('should honour a per-file override', () => {
        const file = writeTmp(
            'exclusions.json',
            JSON.stringify({ version: 'local', names: ['Someone'], affiliations: [], fields: [] })
        );

        expect(loadLookupData({ exclusionsFile: file }).exclusions).toEqual({
            version: 'local',
            names: ['Someone'],
            affiliations: [],
            fields: [],
        });
    });

    it('should reject a file with the wrong shape', () => {
        const file = writeTmp('hints.json', JSON.stringify({ version: 'x', hints: [{ country: 'Chile' }] }));
        expect(() => loadCountryHints(file)).toThrow(DataFileError);
    });

    it('should reject a missing or unparsable file', () => {
        const missing = path.join(tmpDir, 'nope.json');
        expect(() => loadExclusionRules(missing)).toThrow(DataFileError);
        expect(() => loadExclusionRules(writeTmp('bad.json', '{ not json'))).toThrow(/^Cannot read /);
    });
});

describe('loadSeedIds', () => {
    it('should read the id column of a CSV', () => {
        const file = writeTmp(
            'ids.csv',
            '\uFEFFname,scholar_id\nAna,abc123\nBeto,https://scholar.google.com/citations?user=def-456&hl=en\nCata,\nAna again,abc123\n'
        );

        expect(loadSeedIds(file)).toEqual(['abc123', 'def-456']);
    });

    it('should fail when a CSV has no id column', () => {
        const file = writeTmp('ids.csv', 'name,email\nAna,a@uchile.cl\n');
        expect(() => loadSeedIds(file)).toThrow(DataFileError);
    });

    it('should read one id per line from a text file', () => {
        const file = writeTmp('ids.txt', '# seed list\nabc123\n\n  def456  \r\nabc123\n');
        expect(loadSeedIds(file)).toEqual(['abc123', 'def456']);
    });
});

describe('loadSeedMetrics', () => {
    const retrievedAt = new Date('2026-02-02T00:00:00.000Z');

    it('should map rows to seed records and count skipped rows', () => {
        const file = writeTmp(
            'seed.csv',
            [
                'name,scholar_id,affiliation,h_index,citations,i10_index,topics,country,email',
                'Ana Torres,abc123,Universidad de Chile,12,"1,500",9,Elections; Parties,cl,Verified email at uchile.cl',
                'Sin Datos,zzz,Universidad X,,,,,,',
                ',yyy,Universidad Y,4,10,1,,,',
            ].join('\n')
        );

        const result = loadSeedMetrics(file, retrievedAt);

        expect(result.skippedEmpty).toBe(1);
        expect(result.skippedInvalid).toBe(1);
        expect(result.records).toEqual([
            {
                source: 'seed-file',
                source_id: 'abc123',
                name: 'Ana Torres',
                affiliation: 'Universidad de Chile',
                country_code: 'CL',
                email_domain: 'uchile.cl',
                orcid: null,
                citations: 1500,
                citations_5y: 0,
                h_index: 12,
                h_index_5y: 0,
                i10_index: 9,
                i10_index_5y: 0,
                works_count: 0,
                topics: ['Elections', 'Parties'],
                field: '',
                domain: '',
                retrieved_at: '2026-02-02T00:00:00.000Z',
            },
        ]);
    });

    it('should prefer an OpenAlex id when present', () => {
        const file = writeTmp(
            'seed.csv',
            'name,openalex_id,scholar_id,h_index\nRosa Vidal,https://openalex.org/A5001,abc,7\n'
        );

        expect(loadSeedMetrics(file, retrievedAt).records[0]?.source_id).toBe('A5001');
    });
});

describe('loadResumeFile', () => {
    it('should read a JSON array and skip invalid items', () => {
        const file = writeTmp(
            'resume.json',
            JSON.stringify([canonicalRecord(), { id: '', name: 'No Id' }, canonicalRecord({ id: 'A2' })])
        );

        const result = loadResumeFile(file);

        expect(result.records.map((r) => r.id)).toEqual(['A100', 'A2']);
        expect(result.skipped).toBe(1);
    });

    it('should read the ranking array of an exported file', () => {
        const file = writeTmp(
            'ranking.json',
            JSON.stringify({ scholarank: { version: '1.0.0' }, ranking: [{ ...canonicalRecord(), rank: 1 }] })
        );

        const result = loadResumeFile(file);

        expect(result.records).toEqual([canonicalRecord()]);
    });

    it('should fill optional fields with defaults', () => {
        const file = writeTmp(
            'resume.json',
            JSON.stringify([
                {
                    id: 'abc',
                    id_kind: 'scholar',
                    name: 'Minimal',
                    citations: 1,
                    citations_5y: 0,
                    h_index: 1,
                    h_index_5y: 0,
                    i10_index: 0,
                    i10_index_5y: 0,
                    works_count: 0,
                    sources: ['scholar-html'],
                    retrieved_at: '2026-01-01T00:00:00.000Z',
                },
            ])
        );

        expect(loadResumeFile(file).records[0]).toMatchObject({
            affiliation: '',
            country_code: null,
            topics: [],
            discipline: null,
        });
    });

    it('should reject anything that is not a record array', () => {
        expect(() => loadResumeFile(writeTmp('x.json', JSON.stringify({ researchers: [] })))).toThrow(DataFileError);
        expect(() => loadResumeFile(path.join(tmpDir, 'missing.json'))).toThrow(DataFileError);
    });
});
