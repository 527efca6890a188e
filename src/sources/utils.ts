/**
 * Shared utilities for source adapters.
 */

export const ARXIV_ID_PREFIX = 'arxiv:';

/**
 * Extract an arXiv ID from the formats users and the API produce.
 * "https://arxiv.org/abs/2401.01234v1" → "2401.01234v1"
 * "arxiv:2401.01234" → "2401.01234"
 * "hep-th/9901001" → "hep-th/9901001"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/([\w.-]+\/\d{7}(?:v\d+)?|\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /^arxiv:([\w.-]+\/\d{7}(?:v\d+)?|\d{4}\.\d{4,5}(?:v\d+)?)$/i,
        /^(\d{4}\.\d{4,5}(?:v\d+)?)$/,
        /^([a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?)$/,
    ];

    for (const pattern of patterns) {
        const match = input.trim().match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Namespaced collection id for an arXiv paper: "2401.01234v1" → "arxiv:2401.01234v1".
 */
export function toPaperId(arxivId: string): string {
    return `${ARXIV_ID_PREFIX}${arxivId}`;
}

/**
 * Collapse the line breaks and runs of spaces the Atom feed leaves in titles.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
