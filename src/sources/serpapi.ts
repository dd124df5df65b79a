import type { ProfileResult, RawRecord } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { getApiKey } from '../utils/config.js';
import { BaseProfileBackend, isBlockedResponse, type ProfileBackendOptions } from './profile-backend.js';
import { isObject, readArray, readCount, readObject, readString, readStringList } from './fields.js';
import { extractEmailDomain } from './utils.js';

const SERPAPI_BASE = 'https://serpapi.com/search';

export interface SerpApiOptions extends ProfileBackendOptions {
    /** Defaults to the SERPAPI_KEY environment variable */
    apiKey?: string;
}

type MetricPair = { all: number; since: number };

/**
 * Read one row of `cited_by.table`, e.g. `{ h_index: { all: 12, since_2021: 9 } }`.
 * The "since" key carries a year that moves over time.
 */
function readTableMetric(table: unknown[], key: string): MetricPair {
    for (const row of table) {
        const cell = readObject(row, key);
        if (Object.keys(cell).length === 0) continue;

        const sinceKey = Object.keys(cell).find((k) => k.startsWith('since'));
        return {
            all: readCount(cell, 'all'),
            since: sinceKey ? readCount(cell, sinceKey) : 0,
        };
    }
    return { all: 0, since: 0 };
}

/**
 * Map a `google_scholar_author` response to a RawRecord.
 * Returns null when the response has no author name.
 *
 * @see https://serpapi.com/google-scholar-author-api
 */
export function parseSerpApiAuthor(body: unknown, scholarId: string, retrievedAt: Date): RawRecord | null {
    if (!isObject(body)) return null;

    const author = readObject(body, 'author');
    const name = readString(author, 'name');
    if (!name) return null;

    const table = readArray(readObject(body, 'cited_by'), 'table');
    const citations = readTableMetric(table, 'citations');
    const hIndex = readTableMetric(table, 'h_index');
    const i10Index = readTableMetric(table, 'i10_index');

    return {
        source: 'serpapi',
        source_id: scholarId,
        name,
        affiliation: readString(author, 'affiliations'),
        country_code: null,
        email_domain: extractEmailDomain(readString(author, 'email')),
        orcid: null,
        citations: citations.all,
        citations_5y: citations.since,
        h_index: hIndex.all,
        h_index_5y: hIndex.since,
        i10_index: i10Index.all,
        i10_index_5y: i10Index.since,
        works_count: readArray(body, 'articles').length,
        topics: readStringList(author, 'interests', 'title'),
        field: '',
        domain: '',
        retrieved_at: retrievedAt.toISOString(),
    };
}

/**
 * Paid SerpApi Scholar backend. Requires SERPAPI_KEY.
 */
export class SerpApiBackend extends BaseProfileBackend {
    readonly name = 'serpapi' as const;
    private readonly apiKey: string;

    constructor(options: SerpApiOptions = {}) {
        super(options);
        const apiKey = options.apiKey ?? getApiKey('SERPAPI_KEY');
        if (!apiKey) {
            throw new ConfigurationError('The serpapi profile backend needs an API key: set SERPAPI_KEY');
        }
        this.apiKey = apiKey;
    }

    protected async fetchUncached(id: string): Promise<ProfileResult> {
        const params = new URLSearchParams({
            engine: 'google_scholar_author',
            author_id: id,
            hl: 'en',
            api_key: this.apiKey,
        });

        const response = await this.httpClient.getJson(`${SERPAPI_BASE}?${params.toString()}`, { source: 'serpapi' });

        const error = readString(response.data, 'error');
        if (error) {
            return isBlockedResponse(error)
                ? { ok: false, reason: 'blocked', message: error }
                : { ok: false, reason: 'not_found', message: error };
        }

        const record = parseSerpApiAuthor(response.data, id, this.now());
        if (!record) {
            return { ok: false, reason: 'malformed', message: `SerpApi returned no author for ${id}` };
        }
        return { ok: true, record };
    }
}
