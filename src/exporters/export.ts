import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { csvFormat } from 'd3-dsv';
import type { OutputFormat, RankingEntry, ScoredRecord } from '../types/index.js';
import type { BatchStatistics } from '../pipeline/metrics.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

/** Column order of the CSV export */
export const CSV_COLUMNS = [
    'rank',
    'name',
    'affiliation',
    'discipline',
    'h_index',
    'citations',
    'h_index_5y',
    'citations_5y',
    'i10_index',
    'i10_index_5y',
    'works_count',
    'consistency_score',
    'impact_score',
    'topics',
    'country_code',
    'email_domain',
    'scholar_id',
    'openalex_id',
    'orcid',
    'sources',
    'retrieved_at',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];
type CsvRow = Record<CsvColumn, string | number>;

export interface ExportData {
    ranking: RankingEntry[];
    statistics: BatchStatistics;
    /** Optional per-discipline leaderboards */
    topByDiscipline?: Record<string, ScoredRecord[]>;
}

// ─── Format Implementations ─────────────────────────────

function toCsvRow(entry: RankingEntry): CsvRow {
    return {
        rank: entry.rank,
        name: entry.name,
        affiliation: entry.affiliation,
        discipline: entry.discipline,
        h_index: entry.h_index,
        citations: entry.citations,
        h_index_5y: entry.h_index_5y,
        citations_5y: entry.citations_5y,
        i10_index: entry.i10_index,
        i10_index_5y: entry.i10_index_5y,
        works_count: entry.works_count,
        consistency_score: entry.consistency_score,
        impact_score: entry.impact_score,
        topics: entry.topics.join('; '),
        country_code: entry.country_code ?? '',
        email_domain: entry.email_domain,
        scholar_id: entry.scholar_id,
        openalex_id: entry.openalex_id,
        orcid: entry.orcid ?? '',
        sources: entry.sources.join(';'),
        retrieved_at: entry.retrieved_at,
    };
}

/**
 * Ranking as CSV with a fixed column order.
 */
export function exportCsv(data: ExportData): string {
    return csvFormat(data.ranking.map(toCsvRow), [...CSV_COLUMNS]);
}

/**
 * Ranking as a JSON document with run metadata and batch statistics.
 */
export function exportJson(data: ExportData): string {
    const leaderboards = data.topByDiscipline
        ? Object.fromEntries(
              Object.entries(data.topByDiscipline).map(([discipline, records]) => [
                  discipline,
                  records.map((r) => ({
                      id: r.id,
                      name: r.name,
                      affiliation: r.affiliation,
                      h_index: r.h_index,
                      citations: r.citations,
                  })),
              ])
          )
        : undefined;

    return JSON.stringify(
        {
            scholarank: {
                version: VERSION,
                generated_at: data.statistics.generated_at,
            },
            statistics: data.statistics,
            ...(leaderboards ? { top_by_discipline: leaderboards } : {}),
            ranking: data.ranking,
        },
        null,
        2
    );
}

// ─── Main Export Function ────────────────────────────────

/**
 * Serialize a ranking and write it to `outputPath`.
 */
export function writeRanking(
    outputPath: string,
    format: OutputFormat,
    data: ExportData,
    logger: Logger = getLogger()
): void {
    let content: string;
    switch (format) {
        case 'json':
            content = exportJson(data);
            break;
        case 'csv':
            content = exportCsv(data);
            break;
    }

    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, 'utf-8');
    logger.info({ format, outputPath, researchers: data.ranking.length }, 'Ranking exported');
}
