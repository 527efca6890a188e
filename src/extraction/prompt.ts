/** Longest slice of paper text sent to the model. */
export const MAX_PROMPT_TEXT_LENGTH = 8000;

export const TRUNCATION_MARKER = '\n\n[... text truncated ...]';

/**
 * Truncate paper text to the prompt budget, marking the cut so the model
 * knows it is not seeing the whole paper.
 */
export function truncatePaperText(text: string, maxLength = MAX_PROMPT_TEXT_LENGTH): string {
    if (text.length <= maxLength) return text;
    return text.slice(0, maxLength) + TRUNCATION_MARKER;
}

/**
 * Build the insight-extraction prompt for one paper.
 */
export function buildExtractionPrompt(title: string, fullText: string): string {
    const text = truncatePaperText(fullText);

    return `Extract key insights from this research paper.

Paper Title: ${title}

Paper Text:
${text}

Please analyze this paper and extract the following information:

1. PROBLEM: What problem or research question does this paper address? (2-3 sentences)
2. METHOD: What approach or method does the paper use? (2-3 sentences)
3. KEY RESULTS: What are the main results or findings? (2-3 sentences)
4. CONTRIBUTIONS: What are the key contributions? (bullet points)
5. RELATED WORK: What related work is referenced? (list 3-5 key papers/areas)
6. FUTURE DIRECTIONS: What future research directions are mentioned? (bullet points)
7. CLASSIFICATION: Is this foundational (introduces new concepts/methods) or incremental (improves existing work)?

Respond with a single JSON object and nothing else:
{
  "problem": "...",
  "method": "...",
  "key_results": "...",
  "contributions": ["...", "..."],
  "related_work": ["...", "..."],
  "future_directions": ["...", "..."],
  "classification": "foundational" or "incremental"
}`;
}
