import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAlexAuthorsAdapter, buildAuthorFilter, parseOpenAlexAuthor } from '../sources/openalex.js';
import { HttpClient } from '../utils/http-client.js';
import { createSilentLogger } from '../utils/logger.js';
import type { RawRecord } from '../types/index.js';
import { brokenBodyResponse, jsonResponse, noSleep } from './fixtures.js';

const RETRIEVED_AT = new Date('2026-03-01T12:00:00.000Z');

function author(id: string, name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        id: `https://openalex.org/${id}`,
        display_name: name,
        cited_by_count: 120,
        works_count: 25,
        summary_stats: { h_index: 7, i10_index: 5 },
        last_known_institutions: [{ display_name: 'Universidad de Chile', country_code: 'cl' }],
        ...extra,
    };
}

function page(results: unknown[], nextCursor: string | null): Response {
    return jsonResponse({ meta: { count: results.length, next_cursor: nextCursor }, results });
}

function makeAdapter(options: { maxResults?: number; sleep?: (ms: number) => Promise<void> } = {}): OpenAlexAuthorsAdapter {
    const logger = createSilentLogger();
    return new OpenAlexAuthorsAdapter({
        httpClient: new HttpClient({ sleep: noSleep, logger }),
        maxResults: options.maxResults,
        sleep: options.sleep ?? noSleep,
        logger,
        now: () => RETRIEVED_AT,
        apiKey: '',
    });
}

async function collect(iterable: AsyncIterable<RawRecord>): Promise<RawRecord[]> {
    const out: RawRecord[] = [];
    for await (const record of iterable) out.push(record);
    return out;
}

function requestedUrl(mockFetch: ReturnType<typeof vi.fn>, call: number): URL {
    const args: unknown[] = mockFetch.mock.calls[call] ?? [];
    return new URL(String(args[0]));
}

const COUNTRY_QUERY = { kind: 'country', countryCode: 'CL', minHIndex: 1 } as const;

describe('parseOpenAlexAuthor', () => {
    it('should map an author object to a raw record', () => {
        const record = parseOpenAlexAuthor(
            author('A5001', 'Marta Soto', {
                orcid: 'https://orcid.org/0000-0001-0000-0001',
                counts_by_year: [
                    { year: 2026, cited_by_count: 10 },
                    { year: 2022, cited_by_count: 20 },
                    { year: 2021, cited_by_count: 40 },
                ],
                topics: [
                    {
                        display_name: 'Electoral Systems',
                        field: { display_name: 'Political Science and International Relations' },
                        domain: { display_name: 'Social Sciences' },
                    },
                    { display_name: 'Public Opinion' },
                ],
            }),
            RETRIEVED_AT
        );

        expect(record).toEqual({
            source: 'openalex',
            source_id: 'A5001',
            name: 'Marta Soto',
            affiliation: 'Universidad de Chile',
            country_code: 'CL',
            email_domain: '',
            orcid: '0000-0001-0000-0001',
            citations: 120,
            citations_5y: 30,
            h_index: 7,
            h_index_5y: 0,
            i10_index: 5,
            i10_index_5y: 0,
            works_count: 25,
            topics: ['Electoral Systems', 'Public Opinion'],
            field: 'Political Science and International Relations',
            domain: 'Social Sciences',
            retrieved_at: '2026-03-01T12:00:00.000Z',
        });
    });

    it('should default missing fields', () => {
        const record = parseOpenAlexAuthor({ id: 'https://openalex.org/A9', display_name: 'Solo Nombre' }, RETRIEVED_AT);

        expect(record).toMatchObject({
            source_id: 'A9',
            affiliation: '',
            country_code: null,
            orcid: null,
            citations: 0,
            h_index: 0,
            topics: [],
            field: '',
        });
    });

    it('should keep at most five topics', () => {
        const topics = ['a', 'b', 'c', 'd', 'e', 'f'].map((t) => ({ display_name: t }));
        const record = parseOpenAlexAuthor(author('A1', 'X', { topics }), RETRIEVED_AT);
        expect(record?.topics).toEqual(['a', 'b', 'c', 'd', 'e']);
    });

    it('should return null without an id or name', () => {
        expect(parseOpenAlexAuthor({ display_name: 'No Id' }, RETRIEVED_AT)).toBeNull();
        expect(parseOpenAlexAuthor({ id: 'https://openalex.org/A1' }, RETRIEVED_AT)).toBeNull();
        expect(parseOpenAlexAuthor('not an object', RETRIEVED_AT)).toBeNull();
    });

    it('should clamp negative and fractional counts', () => {
        const record = parseOpenAlexAuthor(author('A2', 'Y', { cited_by_count: -5, works_count: 3.7 }), RETRIEVED_AT);
        expect(record?.citations).toBe(0);
        expect(record?.works_count).toBe(3);
    });
});

describe('buildAuthorFilter', () => {
    it('should build the country filter', () => {
        expect(buildAuthorFilter(COUNTRY_QUERY)).toBe(
            'last_known_institutions.country_code:CL,summary_stats.h_index:>1'
        );
    });

    it('should join topic ids with a pipe', () => {
        expect(buildAuthorFilter({ kind: 'topics', countryCode: 'CL', topicIds: ['T1', 'T2'] })).toBe(
            'last_known_institutions.country_code:CL,topics.id:T1|T2'
        );
    });

    it('should search institutions by display name', () => {
        expect(buildAuthorFilter({ kind: 'institution', institution: 'Universidad de Talca' })).toBe(
            'affiliations.institution.display_name.search:Universidad de Talca'
        );
    });
});

describe('OpenAlexAuthorsAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should follow the cursor until it runs out', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValueOnce(page([author('A1', 'Uno'), author('A2', 'Dos')], 'cursor-2'))
            .mockResolvedValueOnce(page([author('A3', 'Tres')], null));
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));

        expect(records.map((r) => r.source_id)).toEqual(['A1', 'A2', 'A3']);
        expect(mockFetch).toHaveBeenCalledTimes(2);

        const first = requestedUrl(mockFetch, 0);
        expect(first.pathname).toBe('/authors');
        expect(first.searchParams.get('cursor')).toBe('*');
        expect(first.searchParams.get('sort')).toBe('cited_by_count:desc');
        expect(first.searchParams.get('per_page')).toBe('200');
        expect(first.searchParams.get('filter')).toBe('last_known_institutions.country_code:CL,summary_stats.h_index:>1');
        expect(requestedUrl(mockFetch, 1).searchParams.get('cursor')).toBe('cursor-2');
    });

    it('should stop on an empty page', async () => {
        const mockFetch = vi.fn().mockResolvedValueOnce(page([], 'cursor-2'));
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));

        expect(records).toEqual([]);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should stop at maxResults without requesting another page', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValueOnce(page([author('A1', 'Uno'), author('A2', 'Dos'), author('A3', 'Tres')], 'cursor-2'));
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter({ maxResults: 2 }).fetch(COUNTRY_QUERY));

        expect(records).toHaveLength(2);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should keep partial results when a later page keeps failing', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValueOnce(page([author('A1', 'Uno')], 'cursor-2'))
            .mockImplementation(() =>
                Promise.resolve(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
            );
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));

        expect(records.map((r) => r.source_id)).toEqual(['A1']);
        // one good page, then the failing page and its single retry
        expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should retry a page whose body fails mid-read and keep earlier records', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValueOnce(page([author('A1', 'Uno')], 'cursor-2'))
            .mockImplementation(() => Promise.resolve(brokenBodyResponse()));
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));

        expect(records.map((r) => r.source_id)).toEqual(['A1']);
        expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should recover when the retry of a broken body succeeds', async () => {
        const mockFetch = vi
            .fn()
            .mockResolvedValueOnce(brokenBodyResponse())
            .mockResolvedValueOnce(page([author('A1', 'Uno')], null));
        vi.stubGlobal('fetch', mockFetch);

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));

        expect(records.map((r) => r.source_id)).toEqual(['A1']);
        expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should end without records when the first page fails twice', async () => {
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

        const records = await collect(makeAdapter().fetch(COUNTRY_QUERY));
        expect(records).toEqual([]);
    });

    it('should skip and count malformed items', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn().mockResolvedValueOnce(page([author('A1', 'Uno'), { id: 'https://openalex.org/A2' }, 42], null))
        );

        const adapter = makeAdapter();
        const records = await collect(adapter.fetch(COUNTRY_QUERY));

        expect(records).toHaveLength(1);
        expect(adapter.getSkippedCount()).toBe(2);
    });

    it('should drop institution results outside the target country', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn().mockResolvedValueOnce(
                page(
                    [
                        author('A1', 'Local'),
                        author('A2', 'Visiting', {
                            last_known_institutions: [{ display_name: 'Universidad de Chile', country_code: 'AR' }],
                        }),
                    ],
                    null
                )
            )
        );

        const records = await collect(
            makeAdapter().fetch({ kind: 'institution', institution: 'Universidad de Chile', countryCode: 'CL' })
        );

        expect(records.map((r) => r.name)).toEqual(['Local']);
    });

    it('should throttle between pages', async () => {
        vi.stubGlobal(
            'fetch',
            vi
                .fn()
                .mockResolvedValueOnce(page([author('A1', 'Uno')], 'cursor-2'))
                .mockResolvedValueOnce(page([author('A2', 'Dos')], null))
        );
        const sleep = vi.fn(async (_ms: number) => {});

        await collect(makeAdapter({ sleep }).fetch(COUNTRY_QUERY));

        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(100);
    });
});
