import type { LlmConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';

export { AnthropicProvider } from './anthropic.js';
export { OllamaProvider, DEFAULT_OLLAMA_URL } from './ollama.js';

/**
 * Build the provider selected in the configuration.
 */
export function createLlmProvider(config: LlmConfig): LlmProvider {
    switch (config.provider) {
        case 'anthropic':
            return new AnthropicProvider({
                apiKey: getApiKey('ANTHROPIC_API_KEY'),
                model: config.model,
                timeoutMs: config.timeoutMs,
            });
        case 'ollama':
            return new OllamaProvider({
                baseUrl: config.baseUrl,
                model: config.model,
                timeoutMs: config.timeoutMs,
            });
    }
}
