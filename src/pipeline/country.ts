import type { CountryHints } from '../types/index.js';
import { normalizeName } from '../sources/utils.js';

/**
 * Resolve a country from the e-mail domain (suffix match) or, failing that,
 * from affiliation keywords. Hints are tried in file order.
 */
export function resolveCountry(emailDomain: string, affiliation: string, hints: CountryHints): string | null {
    const domain = emailDomain.trim().toLowerCase();
    if (domain) {
        for (const hint of hints.hints) {
            if (hint.emailSuffixes.some((suffix) => domain.endsWith(suffix.toLowerCase()))) {
                return hint.country.toUpperCase();
            }
        }
    }

    const text = normalizeName(affiliation);
    if (text) {
        for (const hint of hints.hints) {
            if (hint.affiliationKeywords.some((keyword) => text.includes(normalizeName(keyword)))) {
                return hint.country.toUpperCase();
            }
        }
    }

    return null;
}
