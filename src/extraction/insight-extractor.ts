import type { Insights, LlmProvider } from '../types/index.js';
import { ExtractionError } from '../utils/errors.js';
import { buildExtractionPrompt } from './prompt.js';
import { parseInsightsResponse } from './response-parser.js';

/** Response-length ceiling for one extraction. */
export const EXTRACTION_MAX_TOKENS = 2000;

/** Low temperature keeps the output focused. */
export const EXTRACTION_TEMPERATURE = 0.2;

/**
 * Turns paper text into structured insights with a single LLM call.
 */
export class InsightExtractor {
    constructor(private readonly provider: LlmProvider) {}

    /**
     * Extract insights from the text of a paper.
     * @throws ExtractionError when the model call fails or its output cannot be parsed
     */
    async extract(paperText: string, paperTitle: string): Promise<Insights> {
        const prompt = buildExtractionPrompt(paperTitle, paperText);

        let responseText: string;
        try {
            const result = await this.provider.complete(prompt, {
                maxTokens: EXTRACTION_MAX_TOKENS,
                temperature: EXTRACTION_TEMPERATURE,
                jsonMode: this.provider.supportsStructuredOutput,
            });
            responseText = result.text;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ExtractionError(`Failed to extract insights: ${reason}`, { cause: error });
        }

        return parseInsightsResponse(responseText);
    }
}
