/**
 * Researcher data model, normalized from any source (OpenAlex, Google Scholar
 * backends, seed files) into this common shape.
 */

/** Backend that produced a raw record */
export type RecordSource = 'openalex' | 'openalex-profile' | 'scholar-html' | 'serpapi' | 'seed-file';

/** Kind of identifier a canonical record is keyed by */
export type IdKind = 'openalex' | 'scholar';

/**
 * Numeric bibliometric fields shared by raw and canonical records.
 * All values are non-negative integers.
 */
export interface ResearcherMetrics {
    citations: number;
    citations_5y: number;
    h_index: number;
    h_index_5y: number;
    i10_index: number;
    i10_index_5y: number;
    works_count: number;
}

/** Names of the numeric metric fields */
export const METRIC_FIELDS = [
    'citations',
    'citations_5y',
    'h_index',
    'h_index_5y',
    'i10_index',
    'i10_index_5y',
    'works_count',
] as const satisfies ReadonlyArray<keyof ResearcherMetrics>;

/**
 * One researcher as returned by a single source call.
 */
export interface RawRecord extends ResearcherMetrics {
    source: RecordSource;

    /** Identifier native to the source (OpenAlex author id, Scholar user id) */
    source_id: string;

    name: string;
    affiliation: string;

    /** ISO 3166-1 alpha-2, upper case (null when the source does not say) */
    country_code: string | null;

    /** Verified e-mail domain shown on the profile (e.g. "uchile.cl") */
    email_domain: string;

    orcid: string | null;

    /** Topics / interests, most relevant first */
    topics: string[];

    /** Raw upstream field label (OpenAlex topic field) */
    field: string;

    /** Raw upstream domain label (OpenAlex topic domain) */
    domain: string;

    /** ISO timestamp of retrieval */
    retrieved_at: string;
}

/**
 * The reconciled, de-duplicated researcher entity.
 */
export interface CanonicalRecord extends ResearcherMetrics {
    /** Stable identifier, an OpenAlex author id when one is known */
    id: string;
    id_kind: IdKind;

    openalex_id: string;
    scholar_id: string;
    orcid: string | null;

    name: string;
    affiliation: string;
    readonly country_code: string | null;
    email_domain: string;
    topics: string[];
    field: string;
    domain: string;

    /** Assigned by the classifier */
    discipline: string | null;

    /** Assigned by the metrics calculator */
    consistency_score: number | null;
    impact_score: number | null;

    /** Sorted, de-duplicated list of contributing sources */
    sources: RecordSource[];

    /** Latest retrieval timestamp among contributing records */
    retrieved_at: string;
}

/**
 * A canonical record after classification.
 */
export interface ClassifiedRecord extends CanonicalRecord {
    discipline: string;
}

/**
 * A classified record after scoring.
 */
export interface ScoredRecord extends ClassifiedRecord {
    consistency_score: number;
    impact_score: number;
}

/**
 * Terminal artifact of the pipeline: a scored record plus its 1-based position.
 */
export type RankingEntry = Readonly<ScoredRecord & { rank: number }>;

/** Metrics the ranking can be ordered by */
export type HeadlineMetric =
    | 'h_index'
    | 'citations'
    | 'h_index_5y'
    | 'i10_index'
    | 'impact_score'
    | 'consistency_score';
