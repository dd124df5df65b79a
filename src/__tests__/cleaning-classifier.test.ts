import { describe, it, expect } from 'vitest';
import { cleanRecords, isWellFormed } from '../pipeline/cleaning.js';
import { classifyRecord, classifyRecords } from '../pipeline/classifier.js';
import { loadDisciplineRules } from '../utils/data-files.js';
import { createSilentLogger } from '../utils/logger.js';
import { canonicalRecord, testLookup } from './fixtures.js';

const logger = createSilentLogger();
const lookup = testLookup();
const cleaningOptions = { exclusions: lookup.exclusions, targetCountry: 'cl', minHIndex: 1, logger };

describe('isWellFormed', () => {
    it('should accept a complete record', () => {
        expect(isWellFormed(canonicalRecord())).toBe(true);
    });

    it('should reject blank names and invalid metrics', () => {
        expect(isWellFormed(canonicalRecord({ name: '   ' }))).toBe(false);
        expect(isWellFormed(canonicalRecord({ h_index: -1 }))).toBe(false);
        expect(isWellFormed(canonicalRecord({ citations: 1.5 }))).toBe(false);
        expect(isWellFormed(canonicalRecord({ works_count: Number.NaN }))).toBe(false);
    });
});

describe('cleanRecords', () => {
    const input = [
        canonicalRecord({ id: 'A1', name: 'Ana Torres' }),
        canonicalRecord({ id: 'A2', name: 'Arend Lijphart' }),
        canonicalRecord({ id: 'A3', affiliation: 'Gobierno de Chile', h_index: 99, citations: 9999 }),
        canonicalRecord({ id: 'A4', field: 'Computer Science' }),
        canonicalRecord({ id: 'A5', country_code: 'AR' }),
        canonicalRecord({ id: 'A6', h_index: 0 }),
        canonicalRecord({ id: 'A7', h_index: -1 }),
        canonicalRecord({ id: 'A8', name: ' ' }),
        canonicalRecord({ id: 'A9', country_code: null }),
    ];

    it('should apply the stages in order and report each one', () => {
        const result = cleanRecords(input, cleaningOptions);

        expect(result.records.map((r) => r.id)).toEqual(['A1']);
        expect(result.stages).toEqual([
            { stage: 'malformed', dropped: 2, remaining: 7 },
            { stage: 'excluded_name', dropped: 1, remaining: 6 },
            { stage: 'excluded_affiliation', dropped: 1, remaining: 5 },
            { stage: 'excluded_field', dropped: 1, remaining: 4 },
            { stage: 'wrong_country', dropped: 2, remaining: 2 },
            { stage: 'below_min_h_index', dropped: 1, remaining: 1 },
        ]);
    });

    it('should never emit an excluded name or affiliation', () => {
        const result = cleanRecords(input, cleaningOptions);
        expect(result.records.some((r) => r.name === 'Arend Lijphart')).toBe(false);
        expect(result.records.some((r) => r.affiliation === 'Gobierno de Chile')).toBe(false);
    });

    it('should return the surviving records unmodified', () => {
        const result = cleanRecords(input, cleaningOptions);
        expect(result.records[0]).toBe(input[0]);
        expect(input).toHaveLength(9);
    });

    it('should be idempotent', () => {
        const once = cleanRecords(input, cleaningOptions);
        const twice = cleanRecords(once.records, cleaningOptions);

        expect(twice.records).toEqual(once.records);
        expect(twice.stages.every((s) => s.dropped === 0)).toBe(true);
    });

    it('should keep h-index exactly at the threshold', () => {
        const result = cleanRecords([canonicalRecord({ h_index: 5 })], { ...cleaningOptions, minHIndex: 5 });
        expect(result.records).toHaveLength(1);
    });
});

describe('classifyRecord', () => {
    const rules = lookup.disciplines;

    it('should match topic keywords case-insensitively', () => {
        expect(classifyRecord({ topics: ['Electoral Systems'], field: '' }, rules)).toBe('Political Science');
    });

    it('should apply rules in order', () => {
        expect(classifyRecord({ topics: ['Economic Growth', 'Political Economy'], field: '' }, rules)).toBe(
            'Political Science'
        );
    });

    it('should match a rule by raw field label', () => {
        expect(
            classifyRecord({ topics: ['Fiscal Policy'], field: 'Economics, Econometrics and Finance' }, rules)
        ).toBe('Economics');
    });

    it('should fall back to the field label map, then the default', () => {
        expect(classifyRecord({ topics: [], field: 'Arts and Humanities' }, rules)).toBe('Humanities');
        expect(classifyRecord({ topics: ['Marine Biology'], field: 'Environmental Science' }, rules)).toBe(
            'Social Sciences'
        );
        expect(classifyRecord({ topics: [], field: 'toString' }, rules)).toBe('Social Sciences');
    });

    it('should classify with the shipped rules', () => {
        const shipped = loadDisciplineRules();
        expect(classifyRecord({ topics: ['Populism in Latin America'], field: '' }, shipped)).toBe('Political Science');
        expect(classifyRecord({ topics: ['Child Psychology'], field: '' }, shipped)).toBe('Psychology');
    });
});

describe('classifyRecords', () => {
    it('should assign disciplines without touching the input', () => {
        const input = [canonicalRecord(), canonicalRecord({ id: 'A2', topics: [], field: 'Arts and Humanities' })];

        const classified = classifyRecords(input, lookup.disciplines);

        expect(classified.map((r) => r.discipline)).toEqual(['Political Science', 'Humanities']);
        expect(input[0]?.discipline).toBeNull();
    });
});
