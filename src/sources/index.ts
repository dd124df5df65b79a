import type { ProfileBackend, ProfileBackendName } from '../types/index.js';
import { OpenAlexProfileBackend } from './openalex-profile.js';
import type { ProfileBackendOptions } from './profile-backend.js';
import { ScholarHtmlBackend } from './scholar-html.js';
import { SerpApiBackend } from './serpapi.js';

export { OpenAlexAuthorsAdapter, parseOpenAlexAuthor, buildAuthorFilter } from './openalex.js';
export type { OpenAlexAdapterOptions } from './openalex.js';
export { BaseProfileBackend, isBlockedResponse } from './profile-backend.js';
export type { ProfileBackendOptions } from './profile-backend.js';
export { ScholarHtmlBackend, parseScholarProfile } from './scholar-html.js';
export { OpenAlexProfileBackend } from './openalex-profile.js';
export { SerpApiBackend, parseSerpApiAuthor } from './serpapi.js';

export interface CreateProfileBackendOptions extends ProfileBackendOptions {
    /** Contact e-mail for the OpenAlex polite pool */
    email?: string;
    /** SerpApi key; defaults to SERPAPI_KEY */
    serpApiKey?: string;
}

/**
 * Instantiate the profile backend selected by configuration.
 * Throws ConfigurationError when the backend's credential is missing.
 */
export function createProfileBackend(name: ProfileBackendName, options: CreateProfileBackendOptions = {}): ProfileBackend {
    const { email, serpApiKey, ...common } = options;

    switch (name) {
        case 'scholar-html':
            return new ScholarHtmlBackend(common);
        case 'openalex-profile':
            return new OpenAlexProfileBackend({ ...common, email });
        case 'serpapi':
            return new SerpApiBackend({ ...common, apiKey: serpApiKey });
    }
}
