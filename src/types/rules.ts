/**
 * Versioned lookup data consulted read-only by the pipeline.
 * Loaded from the JSON files under `config/`.
 */

/** Denylisted names, affiliations and raw field labels */
export interface ExclusionRules {
    version: string;
    names: string[];
    affiliations: string[];
    fields: string[];
}

/**
 * One ordered classifier rule. Matches when any keyword occurs in the
 * lower-cased topic text, or when `fields` contains the raw field label.
 */
export interface DisciplineRule {
    label: string;
    keywords: string[];
    fields?: string[];
}

export interface DisciplineRules {
    version: string;
    rules: DisciplineRule[];
    /** Raw field label → discipline label, used when no rule matches */
    fieldLabels: Record<string, string>;
    defaultLabel: string;
}

/** Static display name → Scholar profile id mapping */
export interface ScholarRegistryData {
    version: string;
    entries: Record<string, string>;
}

/** Hints used to resolve a country from affiliation text or e-mail domain */
export interface CountryHint {
    country: string;
    emailSuffixes: string[];
    affiliationKeywords: string[];
}

export interface CountryHints {
    version: string;
    hints: CountryHint[];
}

/** Topic ids and institution names used by the OpenAlex acquisition presets */
export interface OpenAlexQueryPresets {
    version: string;
    topics: string[];
    institutions: string[];
}
