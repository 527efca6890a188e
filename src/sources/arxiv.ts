import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { PaperCandidate, ResearchInterests, SourceAdapter } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { collapseWhitespace, extractArxivId, toPaperId } from './utils.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';

const DAY_MS = 24 * 60 * 60 * 1000;

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    trimValues: true,
    parseTagValue: false,
    isArray: (name) => name === 'entry' || name === 'author' || name === 'category',
});

/**
 * Atom feed entries (subset of relevant fields).
 */
const AtomEntrySchema = z.object({
    id: z.string(),
    title: z.string().default(''),
    summary: z.string().default(''),
    published: z.string().default(''),
    author: z.array(z.object({ name: z.string() })).default([]),
    category: z.array(z.object({ term: z.string() })).default([]),
});

const AtomFeedSchema = z.object({
    feed: z.object({
        entry: z.array(AtomEntrySchema).default([]),
    }),
});

type AtomEntry = z.infer<typeof AtomEntrySchema>;

export interface ArxivAdapterOptions {
    httpClient?: HttpClient;
    /** Clock used for the lookback window */
    now?: () => Date;
}

/**
 * Build an arXiv search query from research interests.
 * Categories and topics are ANDed; areas stand in for topics when none are set.
 */
export function buildQuery(interests: ResearchInterests): string {
    const parts: string[] = [];

    if (interests.arxiv_categories.length > 0) {
        parts.push('(' + interests.arxiv_categories.map((cat) => `cat:${cat}`).join(' OR ') + ')');
    }

    const phrases = interests.topics.length > 0 ? interests.topics : interests.areas;
    if (phrases.length > 0) {
        parts.push('(' + phrases.map((phrase) => `(ti:"${phrase}" OR abs:"${phrase}")`).join(' OR ') + ')');
    }

    if (parts.length === 0) return 'all:*';
    return parts.join(' AND ');
}

/**
 * Parse an arXiv Atom response into candidates. The API reports bad ids
 * as an entry under /api/errors; those are dropped.
 */
export function parseAtomFeed(xml: string): PaperCandidate[] {
    const feed = AtomFeedSchema.parse(parser.parse(xml));
    return feed.feed.entry
        .filter((entry) => !entry.id.includes('/api/errors'))
        .map(toCandidate);
}

function toCandidate(entry: AtomEntry): PaperCandidate {
    const arxivId = extractArxivId(entry.id) ?? entry.id.split('/').pop() ?? entry.id;

    return {
        id: toPaperId(arxivId),
        title: collapseWhitespace(entry.title),
        authors: entry.author.map((author) => author.name),
        abstract: entry.summary,
        url: entry.id,
        published_date: entry.published,
        arxiv_categories: entry.category.map((category) => category.term),
    };
}

/**
 * arXiv source adapter, backed by the public Atom API.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter {
    readonly name = 'arXiv';
    private httpClient: HttpClient;
    private readonly now: () => Date;

    constructor(options: ArxivAdapterOptions = {}) {
        this.httpClient = options.httpClient ?? getHttpClient();
        this.now = options.now ?? (() => new Date());
    }

    async discover(interests: ResearchInterests, lookbackDays = 7, maxResults = 20): Promise<PaperCandidate[]> {
        const query = buildQuery(interests);
        const params = new URLSearchParams({
            search_query: query,
            start: '0',
            max_results: String(maxResults),
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        });

        const candidates = await this.fetchFeed(params);
        const since = this.now().getTime() - lookbackDays * DAY_MS;
        const recent = candidates.filter((candidate) => new Date(candidate.published_date).getTime() >= since);

        getLogger().debug(
            { query, found: candidates.length, recent: recent.length, lookbackDays },
            'arXiv discovery'
        );
        return recent;
    }

    async getById(id: string): Promise<PaperCandidate | null> {
        const arxivId = extractArxivId(id);
        if (!arxivId) {
            getLogger().debug({ id }, 'Not an arXiv identifier');
            return null;
        }

        const candidates = await this.fetchFeed(new URLSearchParams({ id_list: arxivId }));
        return candidates[0] ?? null;
    }

    private async fetchFeed(params: URLSearchParams): Promise<PaperCandidate[]> {
        const url = `${ARXIV_API}?${params.toString()}`;
        getLogger().debug({ url }, 'arXiv query');

        const response = await this.httpClient.get<string>(url, { source: 'arxiv' });
        return parseAtomFeed(response.data);
    }
}
