import { z } from 'zod';

/**
 * Runtime schemas for records read back from disk (profile cache, resume
 * files, the run store). Records produced in-process are typed statically.
 */

const count = z.number().int().min(0);

const metricsShape = {
    citations: count,
    citations_5y: count,
    h_index: count,
    h_index_5y: count,
    i10_index: count,
    i10_index_5y: count,
    works_count: count,
};

export const recordSourceSchema = z.enum(['openalex', 'openalex-profile', 'scholar-html', 'serpapi', 'seed-file']);

export const rawRecordSchema = z.object({
    ...metricsShape,
    source: recordSourceSchema,
    source_id: z.string(),
    name: z.string(),
    affiliation: z.string(),
    country_code: z.string().nullable(),
    email_domain: z.string(),
    orcid: z.string().nullable(),
    topics: z.array(z.string()),
    field: z.string(),
    domain: z.string(),
    retrieved_at: z.string(),
});

export const canonicalRecordSchema = z.object({
    ...metricsShape,
    id: z.string().min(1),
    id_kind: z.enum(['openalex', 'scholar']),
    openalex_id: z.string().default(''),
    scholar_id: z.string().default(''),
    orcid: z.string().nullable().default(null),
    name: z.string().min(1),
    affiliation: z.string().default(''),
    country_code: z.string().nullable().default(null),
    email_domain: z.string().default(''),
    topics: z.array(z.string()).default([]),
    field: z.string().default(''),
    domain: z.string().default(''),
    discipline: z.string().nullable().default(null),
    consistency_score: z.number().nullable().default(null),
    impact_score: z.number().nullable().default(null),
    sources: z.array(recordSourceSchema).min(1),
    retrieved_at: z.string(),
});
