/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Supported LLM backends.
 */
export type LlmProviderName = 'anthropic' | 'ollama';

/**
 * LLM provider configuration.
 */
export interface LlmConfig {
    provider: LlmProviderName;
    model: string;
    /** Base URL for self-hosted providers (Ollama) */
    baseUrl?: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

/**
 * Discovery defaults used when `discover` is run without flags.
 */
export interface DiscoveryConfig {
    lookbackDays: number;
    maxResults: number;
    /** Contact email sent to arXiv in the User-Agent header */
    email?: string;
}

/**
 * Full paper-reader configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperReaderConfig {
    /** Root of the user's collection: papers/, pdfs/ and interests.json live here */
    dataDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    discovery: DiscoveryConfig;

    llm: LlmConfig;
}

/**
 * Default configuration values. The data directory has no default here;
 * it is resolved by the config loader.
 */
export const DEFAULT_CONFIG: Omit<PaperReaderConfig, 'dataDir'> = {
    logLevel: 'info',
    jsonLogs: false,
    discovery: {
        lookbackDays: 7,
        maxResults: 20,
    },
    llm: {
        provider: 'anthropic',
        model: 'claude-3-5-sonnet-latest',
        timeoutMs: 120000,
    },
};
