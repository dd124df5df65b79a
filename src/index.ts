/**
 * Library entry point.
 */
export * from './types/index.js';
export { buildRanking, rerank, rankCanonical, acquireRecords, buildListingQueries } from './builder/ranking-builder.js';
export type { BuildDependencies, AcquisitionResult, RankingOutcome, RunOutcome } from './builder/ranking-builder.js';
export { reconcile, reconcileCanonical, mergeRecords, toCanonical, canonicalKey } from './pipeline/reconciler.js';
export type { ReconcileOptions, ReconcileResult, ReconcileStats } from './pipeline/reconciler.js';
export { ScholarRegistry } from './pipeline/registry.js';
export { resolveCountry } from './pipeline/country.js';
export { cleanRecords, isWellFormed } from './pipeline/cleaning.js';
export type { CleaningOptions, CleaningResult, CleaningStageName, CleaningStageResult } from './pipeline/cleaning.js';
export { classifyRecord, classifyRecords } from './pipeline/classifier.js';
export {
    consistencyScore,
    impactScores,
    scoreRecords,
    computeStatistics,
    topByDiscipline,
    DEFAULT_IMPACT_WEIGHTS,
} from './pipeline/metrics.js';
export type { BatchStatistics, ImpactWeights } from './pipeline/metrics.js';
export { rankRecords } from './pipeline/ranking.js';
export * from './sources/index.js';
export { ProfileCache } from './cache/profile-cache.js';
export { loadSeedIds, loadSeedMetrics } from './io/seed-files.js';
export { loadResumeFile } from './io/resume.js';
export { exportCsv, exportJson, writeRanking, CSV_COLUMNS } from './exporters/export.js';
export { RankingDatabase } from './storage/database.js';
export { resolveConfig, mergeConfig, loadEnvVars, parseConfigObject } from './utils/config.js';
export { loadLookupData } from './utils/data-files.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { ConfigurationError, DataFileError } from './utils/errors.js';
export { initLogger, getLogger, createSilentLogger } from './utils/logger.js';
export { VERSION } from './version.js';
