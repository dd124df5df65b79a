import type { RawRecord } from './researcher.js';

/**
 * Query for the paginated listing backend.
 */
export type ListingQuery =
    | { kind: 'country'; countryCode: string; minHIndex: number }
    | { kind: 'topics'; countryCode: string; topicIds: string[] }
    | { kind: 'institution'; institution: string; countryCode?: string };

/**
 * Interface for listing adapters that page through an upstream collection.
 * Records are produced lazily, one page at a time.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Stream normalized records for a query. Never rejects on transport
     * failures: the stream ends early and what was yielded is kept.
     */
    fetch(query: ListingQuery): AsyncIterable<RawRecord>;

    /** Malformed upstream items dropped so far */
    getSkippedCount(): number;
}

/** Why a profile call produced no data */
export type ProfileFailureReason = 'blocked' | 'not_found' | 'transport' | 'malformed';

/**
 * Outcome of a single profile fetch.
 */
export type ProfileResult =
    | { ok: true; record: RawRecord }
    | { ok: false; reason: ProfileFailureReason; message: string };

/**
 * Interface for per-identifier profile backends (Scholar HTML, SerpApi,
 * OpenAlex single author). Variants are selected by configuration.
 */
export interface ProfileBackend {
    readonly name: string;

    /**
     * Fetch one profile by its opaque external id.
     * Resolves with a failure reason instead of rejecting.
     */
    fetchProfile(id: string): Promise<ProfileResult>;
}

/**
 * Options shared by adapters and backends.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for the polite pool (OpenAlex) */
    email?: string;
}
