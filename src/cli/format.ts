import { PAPER_STATUSES, type PaperCandidate, type PaperRecord, type PaperStatus, type ResearchInterests } from '../types/index.js';

/**
 * Shorten text to `max` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

function bullets(items: string[]): string[] {
    return items.length > 0 ? items.map((item) => `  • ${item}`) : ['  (none)'];
}

export function formatCandidate(candidate: PaperCandidate, index: number): string {
    const authors = candidate.authors.slice(0, 3).join(', ') + (candidate.authors.length > 3 ? ', et al.' : '');
    return [
        `${index}. ${candidate.title}`,
        `   Authors: ${authors}`,
        `   Published: ${candidate.published_date.slice(0, 10)}`,
        `   ID: ${candidate.id}`,
        `   URL: ${candidate.url}`,
    ].join('\n');
}

export function formatInterests(interests: ResearchInterests): string {
    const show = (items: string[]) => (items.length > 0 ? items.join(', ') : '(none)');
    return [
        `  Areas:      ${show(interests.areas)}`,
        `  Topics:     ${show(interests.topics)}`,
        `  Categories: ${show(interests.arxiv_categories)}`,
    ].join('\n');
}

/**
 * Papers grouped under a heading per status, in reading order. Empty groups are omitted.
 */
export function formatCollection(papers: PaperRecord[]): string {
    const byStatus = new Map<PaperStatus, PaperRecord[]>(PAPER_STATUSES.map((status) => [status, []]));
    for (const paper of papers) {
        byStatus.get(paper.status)?.push(paper);
    }

    const sections: string[] = [];
    for (const [status, group] of byStatus) {
        if (group.length === 0) continue;
        const lines = [`${status.toUpperCase()} (${group.length}):`];
        for (const paper of group) {
            lines.push(`  • ${paper.title}`);
            lines.push(`    ${paper.id} - ${paper.insights.classification}`);
        }
        sections.push(lines.join('\n'));
    }
    return sections.join('\n\n');
}

export function formatSearchResult(paper: PaperRecord): string {
    return [
        `• ${paper.title}`,
        `  ${paper.id} [${paper.status}]`,
        `  Problem: ${truncate(paper.insights.problem, 100)}`,
    ].join('\n');
}

export function formatPaperDetail(paper: PaperRecord): string {
    const { insights } = paper;
    const lines = [
        `📄 ${paper.title}`,
        '',
        `ID: ${paper.id}`,
        `Authors: ${paper.authors.join(', ')}`,
        `Status: ${paper.status}`,
        `Added: ${paper.added_date.slice(0, 10)}`,
        `URL: ${paper.url}`,
    ];
    if (paper.pdf_path) lines.push(`PDF: ${paper.pdf_path}`);
    if (paper.interests.length > 0) lines.push(`Interests: ${paper.interests.join(', ')}`);

    lines.push(
        '',
        '🧠 INSIGHTS',
        '',
        'Problem:', insights.problem,
        '',
        'Method:', insights.method,
        '',
        'Key Results:', insights.key_results,
        '',
        'Contributions:', ...bullets(insights.contributions),
        '',
        'Related Work:', ...bullets(insights.related_work),
        '',
        'Future Directions:', ...bullets(insights.future_directions),
        '',
        `Classification: ${insights.classification}`,
    );

    if (paper.notes) {
        lines.push('', 'Notes:', paper.notes);
    }
    return lines.join('\n');
}

/**
 * Split a comma-separated CLI value into trimmed, non-empty items.
 */
export function parseList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}
