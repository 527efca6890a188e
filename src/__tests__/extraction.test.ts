import { describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import {
    buildExtractionPrompt,
    truncatePaperText,
    MAX_PROMPT_TEXT_LENGTH,
    TRUNCATION_MARKER,
} from '../extraction/prompt.js';
import { extractJsonPayload, parseInsightsResponse, PAYLOAD_STRATEGIES } from '../extraction/response-parser.js';
import { InsightExtractor } from '../extraction/insight-extractor.js';
import { ExtractionError, InsightParseError, InsightValidationError } from '../utils/errors.js';
import type { LlmProvider } from '../types/index.js';
import { INSIGHTS_JSON, makeInsights } from './fixtures.js';

const SAMPLE_TEXT = `
Abstract: We propose a novel attention mechanism...

1. Introduction
The problem of efficient attention has been widely studied...

2. Method
Our approach uses sparse attention patterns...
`;

function fakeProvider(complete: LlmProvider['complete'], supportsStructuredOutput = false): LlmProvider {
    return {
        name: 'fake',
        supportsStructuredOutput,
        complete,
        isAvailable: async () => true,
    };
}

describe('Prompt construction', () => {
    it('should embed the title and text', () => {
        const prompt = buildExtractionPrompt('Sparse Attention Mechanisms', SAMPLE_TEXT);

        expect(prompt).toContain('Paper Title: Sparse Attention Mechanisms');
        expect(prompt).toContain(SAMPLE_TEXT);
    });

    it('should request all seven fields as JSON', () => {
        const prompt = buildExtractionPrompt('T', SAMPLE_TEXT);

        for (const field of ['problem', 'method', 'key_results', 'contributions', 'related_work', 'future_directions', 'classification']) {
            expect(prompt).toContain(`"${field}"`);
        }
        expect(prompt).toContain('PROBLEM');
        expect(prompt).toContain('JSON');
        expect(prompt).toContain('"foundational" or "incremental"');
    });

    it('should be deterministic', () => {
        expect(buildExtractionPrompt('T', SAMPLE_TEXT)).toBe(buildExtractionPrompt('T', SAMPLE_TEXT));
    });

    it('should not mark text that fits', () => {
        const text = 'x'.repeat(MAX_PROMPT_TEXT_LENGTH);
        expect(truncatePaperText(text)).toBe(text);
        expect(buildExtractionPrompt('T', text)).not.toContain('truncated');
    });

    it('should truncate long text and add the marker', () => {
        const longText = 'x'.repeat(10000);
        const prompt = buildExtractionPrompt('Test Paper', longText);
        const overhead = buildExtractionPrompt('Test Paper', '').length;

        expect(prompt).toContain('[... text truncated ...]');
        expect(prompt.length).toBe(overhead + MAX_PROMPT_TEXT_LENGTH + TRUNCATION_MARKER.length);
        expect(prompt.length).toBeLessThan(overhead + longText.length);
    });

    it('should cut at exactly the limit', () => {
        expect(truncatePaperText('abcdef', 4)).toBe('abcd' + TRUNCATION_MARKER);
    });
});

describe('Response parsing', () => {
    const expected = makeInsights();

    it('should try strategies in a fixed order', () => {
        expect(PAYLOAD_STRATEGIES.map((s) => s.name)).toEqual(['json-fence', 'bare-fence', 'raw']);
    });

    it('should parse bare JSON', () => {
        expect(parseInsightsResponse(INSIGHTS_JSON)).toEqual(expected);
    });

    it('should parse a json-labeled fence', () => {
        expect(parseInsightsResponse('```json\n' + INSIGHTS_JSON + '\n```')).toEqual(expected);
    });

    it('should parse a bare fence', () => {
        expect(parseInsightsResponse('```\n' + INSIGHTS_JSON + '\n```')).toEqual(expected);
    });

    it('should give equal results for all three styles', () => {
        const styles = [INSIGHTS_JSON, '```json\n' + INSIGHTS_JSON + '\n```', '```\n' + INSIGHTS_JSON + '\n```'];
        const [first, ...rest] = styles.map(parseInsightsResponse);
        for (const insights of rest) {
            expect(insights).toEqual(first);
        }
    });

    it('should ignore prose around a fence', () => {
        const response = 'Here are the insights:\n```json\n' + INSIGHTS_JSON + '\n```\nLet me know if you need more.';
        expect(parseInsightsResponse(response)).toEqual(expected);
    });

    it('should skip a language tag on a bare fence', () => {
        expect(extractJsonPayload('```JSON\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should read an unclosed fence to the end', () => {
        expect(extractJsonPayload('```json\n{"a": 1}\n')).toBe('{"a": 1}');
    });

    it('should prefer the json fence over an earlier bare fence', () => {
        expect(extractJsonPayload('```\nnot this\n```\n```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should drop keys outside the insights shape', () => {
        const withExtra = INSIGHTS_JSON.replace('{', '{\n    "confidence": 0.9,');
        expect(parseInsightsResponse(withExtra)).toEqual(expected);
    });

    it('should accept empty strings and lists', () => {
        const degenerate = {
            problem: '', method: '', key_results: '',
            contributions: [], related_work: [], future_directions: [],
            classification: 'incremental',
        };
        expect(parseInsightsResponse(JSON.stringify(degenerate))).toEqual(degenerate);
    });

    it('should reject prose with a parse error', () => {
        expect(() => parseInsightsResponse('This is not JSON')).toThrow(InsightParseError);
        expect(() => parseInsightsResponse('This is not JSON')).toThrow(/^Failed to parse response: /);
    });

    it('should reject a missing key with a validation error', () => {
        const { classification: _c, ...partial } = makeInsights();
        let error: unknown;
        try {
            parseInsightsResponse(JSON.stringify(partial));
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(InsightValidationError);
        expect(error instanceof InsightValidationError && error.issues.map((i) => i.path.join('.'))).toEqual(['classification']);
        expect(error instanceof InsightValidationError && error.cause).toBeInstanceOf(ZodError);
    });

    it('should reject a classification outside the enum', () => {
        const response = INSIGHTS_JSON.replace('"foundational"', '"seminal"');
        expect(() => parseInsightsResponse(response)).toThrow(InsightValidationError);
    });

    it('should reject a list field given as a string', () => {
        const response = INSIGHTS_JSON.replace('["Contribution 1"]', '"Contribution 1"');
        expect(() => parseInsightsResponse(response)).toThrow(InsightValidationError);
    });

    it('should classify parse failures as extraction failures', () => {
        expect(new InsightValidationError([])).toBeInstanceOf(ExtractionError);
        expect(new InsightParseError('x')).toBeInstanceOf(ExtractionError);
    });
});

describe('InsightExtractor', () => {
    const completion = (text: string) => ({
        text,
        usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
        model: 'fake-model',
        provider: 'fake',
    });

    it('should call the provider with the extraction prompt and sampling limits', async () => {
        const complete = vi.fn().mockResolvedValue(completion(INSIGHTS_JSON));
        const extractor = new InsightExtractor(fakeProvider(complete));

        const insights = await extractor.extract(SAMPLE_TEXT, 'Sparse Attention');

        expect(insights).toEqual(makeInsights());
        expect(complete).toHaveBeenCalledTimes(1);
        expect(complete).toHaveBeenCalledWith(buildExtractionPrompt('Sparse Attention', SAMPLE_TEXT), {
            maxTokens: 2000,
            temperature: 0.2,
            jsonMode: false,
        });
    });

    it('should ask for JSON mode when the provider supports it', async () => {
        const complete = vi.fn().mockResolvedValue(completion(INSIGHTS_JSON));
        await new InsightExtractor(fakeProvider(complete, true)).extract(SAMPLE_TEXT, 'T');

        expect(complete.mock.calls[0]?.[1]).toEqual({ maxTokens: 2000, temperature: 0.2, jsonMode: true });
    });

    it('should parse a fenced response', async () => {
        const complete = vi.fn().mockResolvedValue(completion('```json\n' + INSIGHTS_JSON + '\n```'));
        const insights = await new InsightExtractor(fakeProvider(complete)).extract(SAMPLE_TEXT, 'T');

        expect(insights.classification).toBe('foundational');
    });

    it('should wrap provider failures', async () => {
        const cause = new Error('overloaded');
        const complete = vi.fn().mockRejectedValue(cause);
        const extractor = new InsightExtractor(fakeProvider(complete));

        const error = await extractor.extract(SAMPLE_TEXT, 'T').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).not.toBeInstanceOf(InsightParseError);
        expect(error instanceof Error && error.message).toBe('Failed to extract insights: overloaded');
        expect(error instanceof Error && error.cause).toBe(cause);
    });

    it('should surface unparseable output as a parse error', async () => {
        const complete = vi.fn().mockResolvedValue(completion('I cannot help with that.'));
        const extractor = new InsightExtractor(fakeProvider(complete));

        await expect(extractor.extract(SAMPLE_TEXT, 'T')).rejects.toThrow(InsightParseError);
    });
});
