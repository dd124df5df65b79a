import type { HeadlineMetric, RankingEntry, ScoredRecord } from '../types/index.js';

/**
 * Order scored records by the headline metric (descending), breaking ties
 * by citations (descending). Records with equal keys keep their input
 * order. Ranks are 1-based and entries are frozen.
 */
export function rankRecords(records: ScoredRecord[], sortBy: HeadlineMetric = 'h_index'): RankingEntry[] {
    return records
        .map((record, index) => ({ record, index }))
        .sort(
            (a, b) =>
                b.record[sortBy] - a.record[sortBy] ||
                b.record.citations - a.record.citations ||
                a.index - b.index
        )
        .map(({ record }, position) =>
            Object.freeze({ ...record, topics: [...record.topics], sources: [...record.sources], rank: position + 1 })
        );
}
