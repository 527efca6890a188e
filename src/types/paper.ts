import { z } from 'zod';

export const CLASSIFICATIONS = ['foundational', 'incremental'] as const;
export const PAPER_STATUSES = ['to-read', 'reading', 'read'] as const;

/**
 * Structured insights extracted from a paper by the language model.
 * Persisted nested inside a paper record under the `insights` key.
 */
export const InsightsSchema = z.object({
    /** What problem or research question the paper addresses */
    problem: z.string(),
    /** The approach or method used */
    method: z.string(),
    /** Main results or findings */
    key_results: z.string(),
    contributions: z.array(z.string()),
    related_work: z.array(z.string()),
    future_directions: z.array(z.string()),
    /** Foundational work introduces new concepts; incremental work improves on existing ones */
    classification: z.enum(CLASSIFICATIONS),
});

export type Insights = z.infer<typeof InsightsSchema>;
export type Classification = Insights['classification'];

/**
 * A paper in the user's collection. One JSON file per record on disk.
 */
export const PaperRecordSchema = z.object({
    /** Namespaced identifier, e.g. "arxiv:2301.12345" */
    id: z.string().min(1),
    title: z.string(),
    authors: z.array(z.string()),
    url: z.string(),
    /** Local PDF path, null when no PDF was retained */
    pdf_path: z.string().nullable(),
    /** ISO-8601 timestamp of when the paper was added */
    added_date: z.string(),
    /** Interest tags active when the paper was added */
    interests: z.array(z.string()),
    insights: InsightsSchema,
    status: z.enum(PAPER_STATUSES),
    notes: z.string().default(''),
});

export type PaperRecord = z.infer<typeof PaperRecordSchema>;
export type PaperStatus = PaperRecord['status'];

/**
 * Paper discovered from arXiv but not yet added to the collection.
 */
export interface PaperCandidate {
    id: string;
    title: string;
    authors: string[];
    abstract: string;
    url: string;
    /** ISO-8601 publication timestamp */
    published_date: string;
    /** arXiv categories, e.g. ["cs.LG"] */
    arxiv_categories: string[];
}

/**
 * Research interests used to build discovery queries.
 */
export const ResearchInterestsSchema = z.object({
    /** Broad areas, e.g. "deep learning" */
    areas: z.array(z.string()),
    /** Narrow topics, e.g. "attention mechanisms" */
    topics: z.array(z.string()),
    arxiv_categories: z.array(z.string()).default([]),
});

export type ResearchInterests = z.infer<typeof ResearchInterestsSchema>;
export type InterestKind = keyof ResearchInterests;

export const INTEREST_KINDS: readonly InterestKind[] = ['areas', 'topics', 'arxiv_categories'];

export function isPaperStatus(value: string): value is PaperStatus {
    return PAPER_STATUSES.some((status) => status === value);
}

export function isInterestKind(value: string): value is InterestKind {
    return INTEREST_KINDS.some((kind) => kind === value);
}
