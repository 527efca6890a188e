import type { Insights, PaperCandidate, PaperRecord } from '../types/index.js';

export function makeInsights(overrides: Partial<Insights> = {}): Insights {
    return {
        problem: 'Test problem',
        method: 'Test method',
        key_results: 'Test results',
        contributions: ['Contribution 1'],
        related_work: ['Related 1'],
        future_directions: ['Future 1'],
        classification: 'foundational',
        ...overrides,
    };
}

export function makePaper(overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        id: 'arxiv:2301.12345',
        title: 'Test Paper',
        authors: ['Author One', 'Author Two'],
        url: 'https://arxiv.org/abs/2301.12345',
        pdf_path: null,
        added_date: '2025-10-31T09:00:00.000Z',
        interests: ['deep learning'],
        insights: makeInsights(),
        status: 'to-read',
        notes: '',
        ...overrides,
    };
}

export function makeCandidate(overrides: Partial<PaperCandidate> = {}): PaperCandidate {
    return {
        id: 'arxiv:2301.12345v1',
        title: 'Sparse Attention Mechanisms',
        authors: ['Author One'],
        abstract: 'We study sparse attention.',
        url: 'http://arxiv.org/abs/2301.12345v1',
        published_date: '2025-11-08T17:00:00Z',
        arxiv_categories: ['cs.LG'],
        ...overrides,
    };
}

/** Same insights as makeInsights(), serialized the way a model might return them. */
export const INSIGHTS_JSON = `{
    "problem": "Test problem",
    "method": "Test method",
    "key_results": "Test results",
    "contributions": ["Contribution 1"],
    "related_work": ["Related 1"],
    "future_directions": ["Future 1"],
    "classification": "foundational"
}`;
