import Anthropic from '@anthropic-ai/sdk';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';

/**
 * Anthropic Messages API adapter.
 */
export class AnthropicProvider implements LlmProvider {
    readonly name = 'anthropic';
    readonly supportsStructuredOutput = false;
    private readonly client: Anthropic;
    private readonly model: string;
    private readonly hasApiKey: boolean;

    constructor(options: LlmProviderOptions, client?: Anthropic) {
        this.model = options.model;
        this.hasApiKey = Boolean(options.apiKey);
        this.client = client ?? new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs });
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const response = await this.client.messages.create({
            model: this.model,
            max_tokens: params.maxTokens ?? 4096,
            temperature: params.temperature ?? 0.3,
            messages: [{ role: 'user', content: prompt }],
        });

        const text = response.content
            .map((block) => (block.type === 'text' ? block.text : ''))
            .join('');

        const promptTokens = response.usage.input_tokens;
        const completionTokens = response.usage.output_tokens;

        return {
            text,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: response.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return this.hasApiKey;
    }
}
