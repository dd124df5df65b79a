/**
 * Barrel export for all shared types.
 */
export { METRIC_FIELDS } from './researcher.js';
export type {
    RecordSource,
    IdKind,
    ResearcherMetrics,
    RawRecord,
    CanonicalRecord,
    ClassifiedRecord,
    ScoredRecord,
    RankingEntry,
    HeadlineMetric,
} from './researcher.js';
export type {
    ExclusionRules,
    DisciplineRule,
    DisciplineRules,
    ScholarRegistryData,
    CountryHint,
    CountryHints,
    OpenAlexQueryPresets,
} from './rules.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    ScholarankConfig,
    LogLevel,
    ProfileBackendName,
    OpenAlexMode,
    OpenAlexConfig,
    ProfilesConfig,
    DataFilesConfig,
    OutputFormat,
    RunRecord,
} from './config.js';
export type {
    SourceAdapter,
    SourceAdapterOptions,
    ListingQuery,
    ProfileBackend,
    ProfileResult,
    ProfileFailureReason,
} from './source-adapter.js';
