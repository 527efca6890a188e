import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

/**
 * Subset of the /api/generate response used here.
 */
interface OllamaGenerateResponse {
    model: string;
    response: string;
    prompt_eval_count?: number;
    eval_count?: number;
}

/**
 * Local Ollama server adapter, called through the shared HTTP client.
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly supportsStructuredOutput = true;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly timeoutMs: number | undefined;
    private httpClient: HttpClient;

    constructor(options: LlmProviderOptions) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
        this.model = options.model;
        this.timeoutMs = options.timeoutMs;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = this.model;
        const body = {
            model,
            prompt,
            stream: false,
            ...(params.jsonMode ? { format: 'json' } : {}),
            options: {
                temperature: params.temperature ?? 0.3,
                num_predict: params.maxTokens ?? 4096,
            },
        };

        getLogger().debug({ model, promptLength: prompt.length }, 'Ollama generate');

        const { data } = await this.httpClient.post<OllamaGenerateResponse>(`${this.baseUrl}/api/generate`, body, {
            source: 'ollama',
            timeout: this.timeoutMs,
        });

        const promptTokens = data.prompt_eval_count ?? 0;
        const completionTokens = data.eval_count ?? 0;

        return {
            text: data.response,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: data.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.httpClient.get(`${this.baseUrl}/api/tags`, { source: 'ollama', timeout: 5000 });
            return true;
        } catch (error) {
            getLogger().debug({ error, baseUrl: this.baseUrl }, 'Ollama server not reachable');
            return false;
        }
    }
}
