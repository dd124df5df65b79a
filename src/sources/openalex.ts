import type { ListingQuery, RawRecord, RecordSource, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { sleep as realSleep, type SleepFn } from '../utils/sleep.js';
import { readArray, readCount, readObject, readOptionalString, readString, readStringList, isObject } from './fields.js';
import { stripOpenAlexPrefix, stripOrcidPrefix } from './utils.js';

export const OPENALEX_BASE = 'https://api.openalex.org';

/** Cursor value that starts a cursor-paginated listing */
const FIRST_CURSOR = '*';

const MAX_PER_PAGE = 200;

/** Topics kept per author, most relevant first */
const MAX_TOPICS = 5;

/** Calendar years counted into `citations_5y` (current year included) */
const RECENT_YEARS = 5;

export interface OpenAlexAdapterOptions extends SourceAdapterOptions {
    httpClient?: HttpClient;
    perPage?: number;
    /** Cap on records yielded per `fetch` call */
    maxResults?: number;
    /** Delay between page requests */
    throttleMs?: number;
    sleep?: SleepFn;
    logger?: Logger;
    now?: () => Date;
}

/**
 * Map one OpenAlex author object to a RawRecord.
 * Returns null when the item has no usable id or display name.
 *
 * @see https://docs.openalex.org/api-entities/authors/author-object
 */
export function parseOpenAlexAuthor(
    author: unknown,
    retrievedAt: Date,
    source: RecordSource = 'openalex'
): RawRecord | null {
    if (!isObject(author)) return null;

    const id = stripOpenAlexPrefix(readString(author, 'id'));
    const name = readString(author, 'display_name');
    if (!id || !name) return null;

    const institutions = readArray(author, 'last_known_institutions');
    const institution = institutions.find(isObject) ?? {};
    const country = readString(institution, 'country_code').toUpperCase();

    const summary = readObject(author, 'summary_stats');
    const topicItems = readArray(author, 'topics').slice(0, MAX_TOPICS);
    const firstTopic = topicItems[0];

    return {
        source,
        source_id: id,
        name,
        affiliation: readString(institution, 'display_name'),
        country_code: country || null,
        email_domain: '',
        orcid: stripOrcidPrefix(readOptionalString(author, 'orcid')),
        citations: readCount(author, 'cited_by_count'),
        citations_5y: recentCitations(author, retrievedAt.getUTCFullYear()),
        h_index: readCount(summary, 'h_index'),
        h_index_5y: 0,
        i10_index: readCount(summary, 'i10_index'),
        i10_index_5y: 0,
        works_count: readCount(author, 'works_count'),
        topics: readStringList({ topics: topicItems }, 'topics', 'display_name'),
        field: readString(readObject(firstTopic, 'field'), 'display_name'),
        domain: readString(readObject(firstTopic, 'domain'), 'display_name'),
        retrieved_at: retrievedAt.toISOString(),
    };
}

/**
 * Citations received in the last RECENT_YEARS calendar years, from `counts_by_year`.
 */
function recentCitations(author: unknown, currentYear: number): number {
    let total = 0;
    for (const entry of readArray(author, 'counts_by_year')) {
        if (readCount(entry, 'year') > currentYear - RECENT_YEARS) {
            total += readCount(entry, 'cited_by_count');
        }
    }
    return total;
}

/**
 * Build the `filter` parameter for a listing query.
 */
export function buildAuthorFilter(query: ListingQuery): string {
    switch (query.kind) {
        case 'country':
            return `last_known_institutions.country_code:${query.countryCode},summary_stats.h_index:>${query.minHIndex}`;
        case 'topics':
            return `last_known_institutions.country_code:${query.countryCode},topics.id:${query.topicIds.join('|')}`;
        case 'institution':
            return `affiliations.institution.display_name.search:${query.institution}`;
    }
}

/**
 * OpenAlex `/authors` listing adapter.
 * Walks the cursor-paginated collection one page at a time.
 *
 * @see https://docs.openalex.org/how-to-use-the-api/get-lists-of-entities/paging
 */
export class OpenAlexAuthorsAdapter implements SourceAdapter {
    readonly name = 'OpenAlex';
    private readonly httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly perPage: number;
    private readonly maxResults: number;
    private readonly throttleMs: number;
    private readonly sleep: SleepFn;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private skipped = 0;

    constructor(options: OpenAlexAdapterOptions = {}) {
        this.apiKey = options.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options.email;
        this.httpClient = options.httpClient ?? getHttpClient();
        this.perPage = Math.min(Math.max(1, Math.floor(options.perPage ?? MAX_PER_PAGE)), MAX_PER_PAGE);
        this.maxResults = options.maxResults ?? Number.POSITIVE_INFINITY;
        this.throttleMs = options.throttleMs ?? 100;
        this.sleep = options.sleep ?? realSleep;
        this.logger = options.logger ?? getLogger();
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Number of malformed result items skipped since construction.
     */
    getSkippedCount(): number {
        return this.skipped;
    }

    async *fetch(query: ListingQuery): AsyncGenerator<RawRecord> {
        let cursor = FIRST_CURSOR;
        let yielded = 0;
        let page = 0;
        const filter = buildAuthorFilter(query);

        while (yielded < this.maxResults) {
            const url = this.buildUrl(filter, cursor);

            let body: unknown;
            try {
                const response = await this.httpClient.getJson(url, { source: 'openalex' });
                body = response.data;
            } catch (error) {
                if (!(error instanceof HttpError)) throw error;
                this.logger.warn(
                    { query: query.kind, page, status: error.status, yielded, err: error.message },
                    'OpenAlex page failed, keeping partial results'
                );
                break;
            }
            page++;

            const results = readArray(body, 'results');
            if (results.length === 0) break;

            const retrievedAt = this.now();
            for (const item of results) {
                if (yielded >= this.maxResults) break;

                const record = parseOpenAlexAuthor(item, retrievedAt);
                if (!record) {
                    this.skipped++;
                    continue;
                }
                if (query.kind === 'institution' && query.countryCode && record.country_code !== query.countryCode) {
                    continue;
                }

                yield record;
                yielded++;
            }

            const next = readString(readObject(body, 'meta'), 'next_cursor');
            if (!next) break;
            cursor = next;

            if (page % 20 === 0) {
                this.logger.info({ query: query.kind, page, yielded }, 'OpenAlex listing progress');
            }

            await this.sleep(this.throttleMs);
        }

        this.logger.debug({ query: query.kind, pages: page, yielded }, 'OpenAlex listing finished');
    }

    private buildUrl(filter: string, cursor: string): string {
        const params = new URLSearchParams({
            filter,
            sort: 'cited_by_count:desc',
            per_page: String(this.perPage),
            cursor,
        });
        this.addAuthParams(params);
        return `${OPENALEX_BASE}/authors?${params.toString()}`;
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}
