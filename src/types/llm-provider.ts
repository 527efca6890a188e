/**
 * Interface for LLM provider adapters (Anthropic, Ollama).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Whether this provider can be asked for JSON-only output */
    readonly supportsStructuredOutput: boolean;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The prompt to send
     * @param params - Additional parameters (temperature, max_tokens, etc.)
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider is available (API key present, Ollama server running).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Temperature (0.0 to 1.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like Anthropic) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    /** Request timeout in milliseconds */
    timeoutMs?: number;
}
