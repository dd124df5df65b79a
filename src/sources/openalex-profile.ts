import type { ProfileResult } from '../types/index.js';
import { BaseProfileBackend, type ProfileBackendOptions } from './profile-backend.js';
import { OPENALEX_BASE, parseOpenAlexAuthor } from './openalex.js';
import { stripOpenAlexPrefix } from './utils.js';

export interface OpenAlexProfileOptions extends ProfileBackendOptions {
    apiKey?: string;
    email?: string;
}

/**
 * Single-author OpenAlex backend. Reads the structured institution,
 * summary statistics and topic fields of `/authors/<id>`.
 */
export class OpenAlexProfileBackend extends BaseProfileBackend {
    readonly name = 'openalex-profile' as const;
    private readonly apiKey?: string;
    private readonly email?: string;

    constructor(options: OpenAlexProfileOptions = {}) {
        super(options);
        this.apiKey = options.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options.email;
    }

    protected async fetchUncached(id: string): Promise<ProfileResult> {
        const params = new URLSearchParams();
        if (this.apiKey) params.set('api_key', this.apiKey);
        if (this.email) params.set('mailto', this.email);

        const query = params.toString();
        const url = `${OPENALEX_BASE}/authors/${encodeURIComponent(stripOpenAlexPrefix(id))}${query ? `?${query}` : ''}`;

        const response = await this.httpClient.getJson(url, { source: 'openalex' });
        const record = parseOpenAlexAuthor(response.data, this.now(), 'openalex-profile');
        if (!record) {
            return { ok: false, reason: 'malformed', message: `OpenAlex author ${id} has no id or name` };
        }
        return { ok: true, record };
    }
}
