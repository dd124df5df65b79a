/**
 * Shared utilities for source adapters.
 */

const OPENALEX_PREFIX = 'https://openalex.org/';
const ORCID_PREFIX = /^https?:\/\/orcid\.org\//i;

/**
 * Strip the OpenAlex URL prefix to get the bare id.
 * "https://openalex.org/A5023888391" → "A5023888391"
 */
export function stripOpenAlexPrefix(id: string | null | undefined): string {
    if (!id) return '';
    return id.replace(OPENALEX_PREFIX, '').trim();
}

/**
 * Strip the ORCID URL prefix.
 * "https://orcid.org/0000-0002-1825-0097" → "0000-0002-1825-0097"
 */
export function stripOrcidPrefix(orcid: string | null | undefined): string | null {
    if (!orcid) return null;
    return orcid.replace(ORCID_PREFIX, '').trim() || null;
}

/**
 * Hyphen look-alikes that upstream sources use interchangeably in names.
 */
const HYPHEN_VARIANTS = /[\u2010\u2011\u2012\u2013\u2014\u2015\u2212]/g;

/**
 * Normalize a display name for cross-source matching:
 * diacritics removed, hyphen variants unified, case folded, whitespace collapsed.
 *
 * "Juan‐Carlos Ferrér" → "juan-carlos ferrer"
 */
export function normalizeName(name: string): string {
    return name
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(HYPHEN_VARIANTS, '-')
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Extract an e-mail domain from profile text.
 * "Verified email at uchile.cl - Homepage" → "uchile.cl"
 * "someone@puc.cl" → "puc.cl"
 */
export function extractEmailDomain(text: string | null | undefined): string {
    if (!text) return '';

    const atMatch = text.match(/@([\w.-]+\.[a-z]{2,})/i);
    if (atMatch?.[1]) return atMatch[1].toLowerCase();

    const verified = text.match(/verified email at\s+([\w.-]+\.[a-z]{2,})/i);
    if (verified?.[1]) return verified[1].toLowerCase();

    return '';
}
