import type { PaperCandidate, ResearchInterests } from './paper.js';

/**
 * Interface for paper discovery sources.
 * Each adapter normalizes results into the common PaperCandidate shape.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Find recent papers matching the user's interests.
     * @param lookbackDays - Only papers published within this many days are returned
     * @param maxResults - Upper bound on the number of results requested from the source
     */
    discover(interests: ResearchInterests, lookbackDays?: number, maxResults?: number): Promise<PaperCandidate[]>;

    /**
     * Fetch a single paper by its identifier, with or without the source namespace prefix.
     */
    getById(id: string): Promise<PaperCandidate | null>;
}

