import { load } from 'cheerio';
import type { ProfileResult, RawRecord } from '../types/index.js';
import { BaseProfileBackend, isBlockedResponse } from './profile-backend.js';
import { parseCount } from './fields.js';
import { extractEmailDomain } from './utils.js';

const SCHOLAR_BASE = 'https://scholar.google.com';

const BROWSER_HEADERS = {
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

type MetricPair = { all: number; since: number };

/**
 * Parse a Scholar citations profile page.
 * Returns null when the markup carries no profile name.
 */
export function parseScholarProfile(html: string, scholarId: string, retrievedAt: Date): RawRecord | null {
    const $ = load(html);

    const name = $('#gsc_prf_in').first().text().trim();
    if (!name) return null;

    const metrics = new Map<string, MetricPair>();
    $('#gsc_rsb_st tr').each((_, row) => {
        const cells = $(row).find('td');
        if (cells.length < 3) return;

        const label = cells.eq(0).text().trim().toLowerCase();
        metrics.set(label, {
            all: parseCount(cells.eq(1).text()),
            since: parseCount(cells.eq(2).text()),
        });
    });

    const metric = (label: string): MetricPair => {
        for (const [key, value] of metrics) {
            if (key.includes(label)) return value;
        }
        return { all: 0, since: 0 };
    };

    const citations = metric('citations');
    const hIndex = metric('h-index');
    const i10Index = metric('i10-index');

    return {
        source: 'scholar-html',
        source_id: scholarId,
        name,
        affiliation: $('.gsc_prf_il').first().text().trim(),
        country_code: null,
        email_domain: extractEmailDomain($('#gsc_prf_ivh').first().text()),
        orcid: null,
        citations: citations.all,
        citations_5y: citations.since,
        h_index: hIndex.all,
        h_index_5y: hIndex.since,
        i10_index: i10Index.all,
        i10_index_5y: i10Index.since,
        works_count: 0,
        topics: $('a.gsc_prf_inta')
            .map((_, el) => $(el).text().trim())
            .get()
            .filter((topic) => topic.length > 0),
        field: '',
        domain: '',
        retrieved_at: retrievedAt.toISOString(),
    };
}

/**
 * Direct-HTML Scholar profile backend.
 */
export class ScholarHtmlBackend extends BaseProfileBackend {
    readonly name = 'scholar-html' as const;

    protected async fetchUncached(id: string): Promise<ProfileResult> {
        const params = new URLSearchParams({ user: id, hl: 'en' });
        const url = `${SCHOLAR_BASE}/citations?${params.toString()}`;

        // A 429 or a marked error page from Scholar is a block, not a transient failure
        const response = await this.httpClient.getText(url, {
            source: 'scholar',
            headers: BROWSER_HEADERS,
            abortWhen: (status, body) => status === 429 || isBlockedResponse(body),
        });

        if (isBlockedResponse(response.data)) {
            return { ok: false, reason: 'blocked', message: 'Scholar returned an anti-bot page' };
        }

        const record = parseScholarProfile(response.data, id, this.now());
        if (!record) {
            return { ok: false, reason: 'malformed', message: `No profile markup for ${id}` };
        }
        return { ok: true, record };
    }
}
