#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { parseConfigObject, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { buildRanking, rerank, type RunOutcome } from '../builder/ranking-builder.js';
import { RankingDatabase } from '../storage/database.js';
import { ProfileCache } from '../cache/profile-cache.js';
import { VERSION } from '../version.js';

const HEADLINE_METRICS = ['h_index', 'citations', 'h_index_5y', 'i10_index', 'impact_score', 'consistency_score'];

type CommonFlags = {
    configDir?: string;
    out?: string;
    format?: string;
    db?: string;
    country?: string;
    minHIndex?: number;
    sortBy?: string;
    top?: number;
    resume?: string;
    logLevel?: string;
    jsonLogs?: boolean;
};

type BuildFlags = CommonFlags & {
    ids?: string;
    seed?: string;
    backend?: string;
    modes?: string[];
    maxResults?: number;
    openalex: boolean;
    cache: boolean;
};

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
    }
    return parsed;
}

/**
 * Flags as a config layer. Only flags the user actually passed are included,
 * so unset flags never mask file or environment values.
 */
function commonOverrides(opts: CommonFlags): Record<string, unknown> {
    return {
        ...(opts.out !== undefined ? { out: opts.out } : {}),
        ...(opts.format !== undefined ? { format: opts.format } : {}),
        ...(opts.db !== undefined ? { db: opts.db } : {}),
        ...(opts.country !== undefined ? { targetCountry: opts.country } : {}),
        ...(opts.minHIndex !== undefined ? { minHIndex: opts.minHIndex } : {}),
        ...(opts.sortBy !== undefined ? { sortBy: opts.sortBy } : {}),
        ...(opts.top !== undefined ? { topPerDiscipline: opts.top } : {}),
        ...(opts.resume !== undefined ? { resumeFile: opts.resume } : {}),
        ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
        ...(opts.jsonLogs ? { jsonLogs: true } : {}),
    };
}

function buildOverrides(opts: BuildFlags): Record<string, unknown> {
    const openalex = {
        ...(!opts.openalex ? { enabled: false } : {}),
        ...(opts.modes !== undefined ? { modes: opts.modes } : {}),
        ...(opts.maxResults !== undefined ? { maxResults: opts.maxResults } : {}),
    };
    const profiles = {
        ...(opts.backend !== undefined ? { backend: opts.backend } : {}),
        ...(!opts.cache ? { cache: false } : {}),
    };

    return {
        ...commonOverrides(opts),
        ...(opts.ids !== undefined ? { idsFile: opts.ids } : {}),
        ...(opts.seed !== undefined ? { seedFile: opts.seed } : {}),
        ...(Object.keys(openalex).length > 0 ? { openalex } : {}),
        ...(Object.keys(profiles).length > 0 ? { profiles } : {}),
    };
}

function addCommonOptions(command: Command): Command {
    return command
        .option('-o, --out <path>', 'Output file path')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'csv']))
        .option('--db <path>', 'SQLite run store path')
        .option('-c, --country <code>', 'Target country (ISO 3166-1 alpha-2)')
        .option('--min-h-index <n>', 'Minimum h-index kept after cleaning', parseInteger)
        .addOption(new Option('--sort-by <metric>', 'Headline metric').choices(HEADLINE_METRICS))
        .option('--top <n>', 'Researchers per discipline leaderboard', parseInteger)
        .option('--resume <path>', 'JSON file of previously reconciled records')
        .option('--config-dir <dir>', 'Directory to search for scholarank.config.json')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs');
}

function report(outcome: RunOutcome): void {
    console.log(`\nRanked ${outcome.ranking.length} researchers → ${outcome.outputPath}`);
    if (outcome.runId !== null) {
        console.log(`Stored as run ${outcome.runId}`);
    }
    for (const entry of outcome.ranking.slice(0, 10)) {
        console.log(`  ${String(entry.rank).padStart(3)}. ${entry.name} (h=${entry.h_index}, citations=${entry.citations})`);
    }
    console.log('');
}

function fail(message: string, error: unknown): void {
    getLogger().error({ err: errorMessage(error) }, message);
    process.exitCode = 1;
}

const program = new Command();

program
    .name('scholarank')
    .description('Build a ranked list of researchers from OpenAlex and Google Scholar profile sources.')
    .version(VERSION);

// ─── BUILD command ────────────────────────────────────────

addCommonOptions(
    program
        .command('build')
        .description('Acquire records from the configured sources and build a ranking')
        .option('--ids <path>', 'Profile ids (CSV with an id column, or one id per line)')
        .option('--seed <path>', 'CSV of hand-collected researcher metrics')
        .addOption(
            new Option('-b, --backend <backend>', 'Profile backend').choices(['scholar-html', 'openalex-profile', 'serpapi'])
        )
        .addOption(
            new Option('--modes <modes...>', 'OpenAlex listing modes').choices(['country', 'topics', 'institutions'])
        )
        .option('--max-results <n>', 'Cap on records per OpenAlex query', parseInteger)
        .option('--no-openalex', 'Skip the OpenAlex listings')
        .option('--no-cache', 'Disable the profile cache')
).action(async function (this: Command) {
    const opts = this.opts<BuildFlags>();
    try {
        const config = await resolveConfig(parseConfigObject(buildOverrides(opts), 'command-line flags'), {
            searchFrom: opts.configDir,
        });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        report(await buildRanking(config, { logger: getLogger() }));
    } catch (error) {
        fail('Build failed', error);
    }
});

// ─── RANK command ─────────────────────────────────────────

addCommonOptions(
    program
        .command('rank')
        .description('Re-rank stored records (a resume file or the run store) without network access')
        .option('--run <id>', 'Run id to re-rank (default: latest)', parseInteger)
).action(async function (this: Command) {
    const opts = this.opts<CommonFlags & { run?: number }>();
    try {
        const config = await resolveConfig(parseConfigObject(commonOverrides(opts), 'command-line flags'), {
            searchFrom: opts.configDir,
        });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        if (!config.resumeFile && !config.db) {
            throw new ConfigurationError('rank needs records: pass --resume <file> or --db <path>');
        }
        report(rerank(config, { runId: opts.run, logger: getLogger() }));
    } catch (error) {
        fail('Rank failed', error);
    }
});

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show run store statistics and the latest ranking')
    .requiredOption('-i, --input <dbPath>', 'Run store path')
    .option('-n, --limit <n>', 'Ranking rows to show', parseInteger, 10)
    .action(function (this: Command) {
        const opts = this.opts<{ input: string; limit: number }>();
        try {
            const db = new RankingDatabase(opts.input);
            try {
                const stats = db.getStats();
                console.log('\nScholarank Run Store\n');
                console.log(`  Runs:        ${stats.runs}`);
                console.log(`  Researchers: ${stats.researchers}`);
                console.log(`  Rankings:    ${stats.rankings}`);

                const runs = db.getRuns();
                if (runs.length > 0) {
                    console.log('\n  Runs:');
                    for (const run of runs) {
                        console.log(`    #${run.run_id}  ${run.created_at}  v${run.scholarank_version}`);
                    }
                }

                if (stats.latestRunId !== null) {
                    console.log(`\n  Run ${stats.latestRunId}:`);
                    for (const row of db.getRanking(stats.latestRunId, opts.limit)) {
                        console.log(
                            `    ${String(row.rank).padStart(3)}. ${row.name} [${row.discipline}] h=${row.h_index} citations=${row.citations} impact=${row.impact_score}`
                        );
                    }
                }
                console.log('');
            } finally {
                db.close();
            }
        } catch (error) {
            fail('Inspect failed', error);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the profile cache')
    .argument('<action>', 'Action: clear | stats')
    .option('--config-dir <dir>', 'Directory to search for scholarank.config.json')
    .action(async function (this: Command, action: string) {
        const opts = this.opts<{ configDir?: string }>();
        try {
            const config = await resolveConfig({}, { searchFrom: opts.configDir });
            const cache = new ProfileCache({ cacheDir: config.profiles.cacheDir, ttlHours: config.profiles.cacheTtlHours });
            switch (action) {
                case 'clear':
                    console.log(`Cache cleared (${cache.clear()} entries).`);
                    break;
                case 'stats': {
                    const stats = cache.stats();
                    if (stats.entries === 0) {
                        console.log(`No cache entries in ${stats.directory}.`);
                        return;
                    }
                    console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB in ${stats.directory}`);
                    break;
                }
                default:
                    throw new ConfigurationError(`Unknown action: ${action}. Valid: clear, stats`);
            }
        } catch (error) {
            fail('Cache command failed', error);
        }
    });

await program.parseAsync();
