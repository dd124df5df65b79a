import type {
    CanonicalRecord,
    ListingQuery,
    ProfileBackend,
    ProfileFailureReason,
    RankingEntry,
    RawRecord,
    ScholarankConfig,
    ScoredRecord,
    SourceAdapter,
} from '../types/index.js';
import { ProfileCache } from '../cache/profile-cache.js';
import { OpenAlexAuthorsAdapter } from '../sources/openalex.js';
import { createProfileBackend } from '../sources/index.js';
import { loadSeedIds, loadSeedMetrics } from '../io/seed-files.js';
import { loadResumeFile } from '../io/resume.js';
import { reconcileCanonical, toCanonical, type ReconcileStats } from '../pipeline/reconciler.js';
import { ScholarRegistry } from '../pipeline/registry.js';
import { cleanRecords, type CleaningStageResult } from '../pipeline/cleaning.js';
import { classifyRecords } from '../pipeline/classifier.js';
import { computeStatistics, scoreRecords, topByDiscipline, type BatchStatistics } from '../pipeline/metrics.js';
import { rankRecords } from '../pipeline/ranking.js';
import { writeRanking } from '../exporters/export.js';
import { RankingDatabase } from '../storage/database.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { loadLookupData, type LookupData } from '../utils/data-files.js';
import { getApiKey } from '../utils/config.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { RandomFn, SleepFn } from '../utils/sleep.js';
import { VERSION } from '../version.js';

/**
 * Collaborators a run can be given instead of the ones built from configuration.
 */
export interface BuildDependencies {
    lookup?: LookupData;
    listingAdapter?: SourceAdapter;
    profileBackend?: ProfileBackend;
    httpClient?: HttpClient;
    sleep?: SleepFn;
    random?: RandomFn;
    logger?: Logger;
    now?: () => Date;
}

export interface AcquisitionResult {
    records: RawRecord[];
    listingRecords: number;
    profileRecords: number;
    seedRecords: number;
    /** Malformed listing items dropped by the adapter */
    listingSkipped: number;
    profileFailures: Record<ProfileFailureReason, number>;
}

export interface RankingOutcome {
    ranking: RankingEntry[];
    /** Reconciled records before cleaning, as stored in the run store */
    reconciled: CanonicalRecord[];
    statistics: BatchStatistics;
    topByDiscipline: Record<string, ScoredRecord[]>;
    reconcile: ReconcileStats;
    cleaning: CleaningStageResult[];
}

export interface RunOutcome extends RankingOutcome {
    runId: number | null;
    outputPath: string;
}

/**
 * Listing queries for the configured OpenAlex modes.
 */
export function buildListingQueries(config: ScholarankConfig, lookup: LookupData): ListingQuery[] {
    const queries: ListingQuery[] = [];
    for (const mode of config.openalex.modes) {
        switch (mode) {
            case 'country':
                queries.push({
                    kind: 'country',
                    countryCode: config.targetCountry,
                    minHIndex: config.openalex.minHIndexDownload,
                });
                break;
            case 'topics':
                if (lookup.queries.topics.length > 0) {
                    queries.push({ kind: 'topics', countryCode: config.targetCountry, topicIds: lookup.queries.topics });
                }
                break;
            case 'institutions':
                for (const institution of lookup.queries.institutions) {
                    queries.push({ kind: 'institution', institution, countryCode: config.targetCountry });
                }
                break;
        }
    }
    return queries;
}

function buildProfileBackend(config: ScholarankConfig, httpClient: HttpClient, deps: BuildDependencies, logger: Logger): ProfileBackend {
    return createProfileBackend(config.profiles.backend, {
        httpClient,
        email: config.contactEmail,
        serpApiKey: getApiKey('SERPAPI_KEY'),
        delayMinMs: config.profiles.delayMinMs,
        delayMaxMs: config.profiles.delayMaxMs,
        cache: config.profiles.cache
            ? new ProfileCache({ cacheDir: config.profiles.cacheDir, ttlHours: config.profiles.cacheTtlHours, logger })
            : undefined,
        sleep: deps.sleep,
        random: deps.random,
        logger,
        now: deps.now,
    });
}

/**
 * Collect raw records from every configured source: OpenAlex listings, one
 * profile call per seed id, and the seed metrics file. Calls run one at a
 * time.
 */
export async function acquireRecords(
    config: ScholarankConfig,
    lookup: LookupData,
    sources: { listingAdapter?: SourceAdapter; profileBackend?: ProfileBackend },
    logger: Logger = getLogger(),
    now: () => Date = () => new Date()
): Promise<AcquisitionResult> {
    const result: AcquisitionResult = {
        records: [],
        listingRecords: 0,
        profileRecords: 0,
        seedRecords: 0,
        listingSkipped: 0,
        profileFailures: { blocked: 0, not_found: 0, transport: 0, malformed: 0 },
    };

    // Step 1: paginated listings
    if (config.openalex.enabled && sources.listingAdapter) {
        const adapter = sources.listingAdapter;
        const skippedBefore = adapter.getSkippedCount();
        for (const query of buildListingQueries(config, lookup)) {
            const before = result.records.length;
            const skipped = adapter.getSkippedCount();
            for await (const record of adapter.fetch(query)) {
                result.records.push(record);
            }
            logger.info(
                {
                    query: query.kind,
                    records: result.records.length - before,
                    skippedMalformed: adapter.getSkippedCount() - skipped,
                },
                'Listing query finished'
            );
        }
        result.listingRecords = result.records.length;
        result.listingSkipped = adapter.getSkippedCount() - skippedBefore;
    }

    // Step 2: per-id profiles
    if (config.idsFile && sources.profileBackend) {
        const ids = loadSeedIds(config.idsFile);
        logger.info({ ids: ids.length, backend: sources.profileBackend.name }, 'Fetching profiles');

        for (const [index, id] of ids.entries()) {
            const outcome = await sources.profileBackend.fetchProfile(id);
            if (outcome.ok) {
                result.records.push(outcome.record);
                result.profileRecords++;
            } else {
                result.profileFailures[outcome.reason]++;
            }
            if ((index + 1) % 10 === 0) {
                logger.info({ done: index + 1, total: ids.length }, 'Profile progress');
            }
        }
    }

    // Step 3: hand-collected metrics
    if (config.seedFile) {
        const seed = loadSeedMetrics(config.seedFile, now());
        result.records = result.records.concat(seed.records);
        result.seedRecords = seed.records.length;
        logger.info(
            { records: seed.records.length, skippedEmpty: seed.skippedEmpty, skippedInvalid: seed.skippedInvalid },
            'Seed metrics loaded'
        );
    }

    logger.info(
        {
            total: result.records.length,
            listing: result.listingRecords,
            profiles: result.profileRecords,
            seed: result.seedRecords,
            listingSkipped: result.listingSkipped,
            failures: result.profileFailures,
        },
        'Acquisition complete'
    );
    return result;
}

/**
 * Reconcile, clean, classify, score and order canonical records. Pure apart
 * from logging.
 */
export function rankCanonical(
    records: CanonicalRecord[],
    config: ScholarankConfig,
    lookup: LookupData,
    options: { logger?: Logger; now?: Date } = {}
): RankingOutcome {
    const logger = options.logger ?? getLogger();

    const reconciled = reconcileCanonical(records, {
        registry: new ScholarRegistry(lookup.registry),
        countryHints: lookup.countryHints,
        logger,
    });

    const cleaned = cleanRecords(reconciled.records, {
        exclusions: lookup.exclusions,
        targetCountry: config.targetCountry,
        minHIndex: config.minHIndex,
        logger,
    });

    const scored = scoreRecords(classifyRecords(cleaned.records, lookup.disciplines));
    const ranking = rankRecords(scored, config.sortBy);

    return {
        ranking,
        reconciled: reconciled.records,
        statistics: computeStatistics(scored, options.now),
        topByDiscipline: topByDiscipline(scored, config.topPerDiscipline),
        reconcile: reconciled.stats,
        cleaning: cleaned.stages,
    };
}

/**
 * Persist the outcome to the run store (when configured) and write the
 * ranking file.
 */
function emit(config: ScholarankConfig, outcome: RankingOutcome, logger: Logger, createdAt: Date): RunOutcome {
    let runId: number | null = null;

    if (config.db) {
        const db = new RankingDatabase(config.db, { logger });
        try {
            runId = db.transaction(() => {
                const id = db.insertRun({
                    created_at: createdAt.toISOString(),
                    scholarank_version: VERSION,
                    config_json: JSON.stringify(config),
                    stats_json: JSON.stringify({
                        statistics: outcome.statistics,
                        reconcile: outcome.reconcile,
                        cleaning: outcome.cleaning,
                    }),
                });
                db.insertResearchers(id, outcome.reconciled);
                db.insertRanking(id, outcome.ranking, config.sortBy);
                return id;
            });
            logger.info({ runId, db: config.db }, 'Run stored');
        } finally {
            db.close();
        }
    }

    writeRanking(
        config.out,
        config.format,
        { ranking: outcome.ranking, statistics: outcome.statistics, topByDiscipline: outcome.topByDiscipline },
        logger
    );

    return { ...outcome, runId, outputPath: config.out };
}

/**
 * Full run: acquire from the network, rank, store and write.
 *
 * 1. Build sources (credentials are checked before any request)
 * 2. Acquire raw records
 * 3. Add records from a resume file
 * 4. Reconcile, clean, classify, score, sort
 * 5. Persist and export
 */
export async function buildRanking(config: ScholarankConfig, deps: BuildDependencies = {}): Promise<RunOutcome> {
    const logger = deps.logger ?? getLogger();
    const now = deps.now ?? (() => new Date());
    const startTime = Date.now();

    const httpClient =
        deps.httpClient ??
        createHttpClient({
            version: VERSION,
            email: config.contactEmail,
            retryBackoffMs: config.openalex.retryBackoffMs,
            sleep: deps.sleep,
            logger,
        });

    const profileBackend =
        deps.profileBackend ?? (config.idsFile ? buildProfileBackend(config, httpClient, deps, logger) : undefined);

    const listingAdapter =
        deps.listingAdapter ??
        new OpenAlexAuthorsAdapter({
            httpClient,
            email: config.contactEmail,
            perPage: config.openalex.perPage,
            maxResults: config.openalex.maxResults,
            throttleMs: config.openalex.throttleMs,
            sleep: deps.sleep,
            logger,
            now,
        });

    const lookup = deps.lookup ?? loadLookupData(config.data);

    logger.info(
        {
            country: config.targetCountry,
            modes: config.openalex.enabled ? config.openalex.modes : [],
            backend: profileBackend?.name ?? null,
            sortBy: config.sortBy,
        },
        'Starting ranking build'
    );

    const acquired = await acquireRecords(config, lookup, { listingAdapter, profileBackend }, logger, now);

    let canonical = acquired.records.map(toCanonical);
    if (config.resumeFile) {
        const resumed = loadResumeFile(config.resumeFile);
        logger.info({ records: resumed.records.length, skipped: resumed.skipped }, 'Resume file loaded');
        canonical = resumed.records.concat(canonical);
    }

    const outcome = emit(config, rankCanonical(canonical, config, lookup, { logger, now: now() }), logger, now());

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(
        { researchers: outcome.ranking.length, requests: httpClient.getAllRequestCounts(), elapsed: `${elapsed}s` },
        'Ranking build complete'
    );
    return outcome;
}

/**
 * Re-rank without network access, from a resume file or a stored run
 * (the latest one unless `runId` is given).
 */
export function rerank(
    config: ScholarankConfig,
    options: { runId?: number; lookup?: LookupData; logger?: Logger; now?: () => Date } = {}
): RunOutcome {
    const logger = options.logger ?? getLogger();
    const now = options.now ?? (() => new Date());
    const lookup = options.lookup ?? loadLookupData(config.data);

    let records: CanonicalRecord[] = [];

    if (config.resumeFile) {
        const resumed = loadResumeFile(config.resumeFile);
        logger.info({ records: resumed.records.length, skipped: resumed.skipped }, 'Resume file loaded');
        records = resumed.records;
    } else if (config.db) {
        const db = new RankingDatabase(config.db, { logger });
        try {
            const runId = options.runId ?? db.getLatestRunId();
            if (runId !== null) {
                records = db.getCanonicalRecords(runId);
                logger.info({ runId, records: records.length }, 'Loaded stored run');
            } else {
                logger.warn({ db: config.db }, 'Run store has no runs');
            }
        } finally {
            db.close();
        }
    }

    return emit(config, rankCanonical(records, config, lookup, { logger, now: now() }), logger, now());
}
