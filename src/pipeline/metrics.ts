import type { ClassifiedRecord, ScoredRecord } from '../types/index.js';

/**
 * Impact score weights. They sum to 1.
 */
export interface ImpactWeights {
    hIndex: number;
    citations: number;
    hIndex5y: number;
    i10Index: number;
}

export const DEFAULT_IMPACT_WEIGHTS: ImpactWeights = {
    hIndex: 0.4,
    citations: 0.3,
    hIndex5y: 0.2,
    i10Index: 0.1,
};

const TOP_AFFILIATIONS = 20;

// Reduce rather than spread: batches can exceed the engine's argument limit
function maxOf(values: number[]): number {
    return values.reduce((acc, v) => (v > acc ? v : acc), Number.NEGATIVE_INFINITY);
}

function minOf(values: number[]): number {
    return values.reduce((acc, v) => (v < acc ? v : acc), Number.POSITIVE_INFINITY);
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Profile completeness and plausibility, in steps of 20 from 0 to 100.
 *
 * +20 affiliation longer than 5 characters
 * +20 at least one topic
 * +20 e-mail domain longer than 3 characters
 * +20 citations ≥ half of h² (with h and citations both positive)
 * +20 h-index over the recent window above zero
 */
export function consistencyScore(
    record: Pick<ClassifiedRecord, 'affiliation' | 'topics' | 'email_domain' | 'h_index' | 'citations' | 'h_index_5y'>
): number {
    let score = 0;
    if (record.affiliation.length > 5) score += 20;
    if (record.topics.length > 0) score += 20;
    if (record.email_domain.length > 3) score += 20;
    if (record.h_index > 0 && record.citations > 0 && record.citations >= 0.5 * record.h_index * record.h_index) {
        score += 20;
    }
    if (record.h_index_5y > 0) score += 20;
    return score;
}

/**
 * Min–max normalize to [0, 100]. A constant series normalizes to 50.
 */
export function normalizeMinMax(values: number[]): number[] {
    if (values.length === 0) return [];
    const min = minOf(values);
    const max = maxOf(values);
    if (max === min) return values.map(() => 50);
    return values.map((v) => ((v - min) / (max - min)) * 100);
}

/**
 * Batch-relative impact scores, one per record, in input order.
 *
 * impact = norm(h) × 0.4 + norm(citations) × 0.3 + norm(h_5y) × 0.2 + norm(i10) × 0.1
 */
export function impactScores(
    records: Array<Pick<ClassifiedRecord, 'h_index' | 'citations' | 'h_index_5y' | 'i10_index'>>,
    weights: ImpactWeights = DEFAULT_IMPACT_WEIGHTS
): number[] {
    const h = normalizeMinMax(records.map((r) => r.h_index));
    const citations = normalizeMinMax(records.map((r) => r.citations));
    const h5y = normalizeMinMax(records.map((r) => r.h_index_5y));
    const i10 = normalizeMinMax(records.map((r) => r.i10_index));

    return records.map((_, i) =>
        round2(
            (h[i] ?? 0) * weights.hIndex +
                (citations[i] ?? 0) * weights.citations +
                (h5y[i] ?? 0) * weights.hIndex5y +
                (i10[i] ?? 0) * weights.i10Index
        )
    );
}

/**
 * Attach consistency and impact scores. Impact is relative to this batch,
 * so it is recomputed on every run.
 */
export function scoreRecords(records: ClassifiedRecord[], weights?: ImpactWeights): ScoredRecord[] {
    const impact = impactScores(records, weights);
    return records.map((record, i) => ({
        ...record,
        consistency_score: consistencyScore(record),
        impact_score: impact[i] ?? 0,
    }));
}

export interface BatchStatistics {
    total_researchers: number;
    h_index: { mean: number; median: number; std: number; max: number; min: number };
    citations: { mean: number; median: number; total: number; max: number };
    /** Most frequent affiliations, most frequent first */
    top_affiliations: Array<{ affiliation: string; count: number }>;
    disciplines: Record<string, number>;
    generated_at: string;
}

function mean(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function median(values: number[]): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    const upper = sorted[mid] ?? 0;
    if (sorted.length % 2 === 1) return upper;
    return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

/**
 * Sample standard deviation (n − 1). Zero for fewer than two values.
 */
function sampleStd(values: number[]): number {
    if (values.length < 2) return 0;
    const m = mean(values);
    const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
    return Math.sqrt(variance);
}

/**
 * Descriptive statistics of a scored batch. An empty batch yields zeros.
 */
export function computeStatistics(records: ScoredRecord[], generatedAt: Date = new Date()): BatchStatistics {
    const h = records.map((r) => r.h_index);
    const citations = records.map((r) => r.citations);

    const affiliationCounts = new Map<string, number>();
    const disciplineCounts = new Map<string, number>();
    for (const record of records) {
        if (record.affiliation) {
            affiliationCounts.set(record.affiliation, (affiliationCounts.get(record.affiliation) ?? 0) + 1);
        }
        disciplineCounts.set(record.discipline, (disciplineCounts.get(record.discipline) ?? 0) + 1);
    }

    // Array.prototype.sort is stable: equal counts keep first-seen order
    const topAffiliations = [...affiliationCounts]
        .map(([affiliation, count]) => ({ affiliation, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, TOP_AFFILIATIONS);

    return {
        total_researchers: records.length,
        h_index: {
            mean: round2(mean(h)),
            median: round2(median(h)),
            std: round2(sampleStd(h)),
            max: h.length > 0 ? maxOf(h) : 0,
            min: h.length > 0 ? minOf(h) : 0,
        },
        citations: {
            mean: round2(mean(citations)),
            median: round2(median(citations)),
            total: citations.reduce((sum, v) => sum + v, 0),
            max: citations.length > 0 ? maxOf(citations) : 0,
        },
        top_affiliations: topAffiliations,
        disciplines: Object.fromEntries(disciplineCounts),
        generated_at: generatedAt.toISOString(),
    };
}

/**
 * Top `n` records per discipline by h-index (citations break ties).
 */
export function topByDiscipline(records: ScoredRecord[], n: number): Record<string, ScoredRecord[]> {
    const groups = new Map<string, ScoredRecord[]>();
    for (const record of records) {
        const group = groups.get(record.discipline) ?? [];
        group.push(record);
        groups.set(record.discipline, group);
    }

    const result: Record<string, ScoredRecord[]> = {};
    for (const [discipline, group] of groups) {
        result[discipline] = [...group]
            .sort((a, b) => b.h_index - a.h_index || b.citations - a.citations)
            .slice(0, Math.max(0, n));
    }
    return result;
}
