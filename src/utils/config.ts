import { homedir } from 'node:os';
import { join } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type PaperReaderConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * CLI flags and env vars may override any top-level field and any nested field.
 * Leave a key out rather than setting it to undefined, or it shadows lower-precedence sources.
 */
export type ConfigOverrides = Partial<Omit<PaperReaderConfig, 'discovery' | 'llm'>> & {
    discovery?: Partial<PaperReaderConfig['discovery']>;
    llm?: Partial<PaperReaderConfig['llm']>;
};

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const ProviderSchema = z.enum(['anthropic', 'ollama']);

/**
 * Shape accepted in paperreader.config.json. Every field is optional.
 */
const ConfigFileSchema = z.object({
    dataDir: z.string().optional(),
    logLevel: LogLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
    discovery: z.object({
        lookbackDays: z.number().int().positive().optional(),
        maxResults: z.number().int().positive().optional(),
        email: z.string().optional(),
    }).optional(),
    llm: z.object({
        provider: ProviderSchema.optional(),
        model: z.string().optional(),
        baseUrl: z.string().optional(),
        timeoutMs: z.number().int().positive().optional(),
    }).optional(),
});

/**
 * Where the collection lives when nothing else says otherwise.
 */
export function defaultDataDir(): string {
    return join(homedir(), '.paper-reader');
}

/**
 * Load configuration from paperreader.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used.
 */
async function loadConfigFile(searchFrom: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('paperreader', {
        searchPlaces: ['paperreader.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const llm: Partial<PaperReaderConfig['llm']> = {};

    if (env['PAPER_READER_DATA_DIR']) {
        overrides.dataDir = env['PAPER_READER_DATA_DIR'];
    }

    const provider = ProviderSchema.safeParse(env['PAPER_READER_LLM_PROVIDER']);
    if (provider.success) {
        llm.provider = provider.data;
    } else if (env['PAPER_READER_LLM_PROVIDER']) {
        getLogger().warn({ value: env['PAPER_READER_LLM_PROVIDER'] }, 'Ignoring unknown PAPER_READER_LLM_PROVIDER');
    }

    if (env['PAPER_READER_LLM_MODEL']) {
        llm.model = env['PAPER_READER_LLM_MODEL'];
    }
    if (env['OLLAMA_BASE_URL']) {
        llm.baseUrl = env['OLLAMA_BASE_URL'];
    }

    if (Object.keys(llm).length > 0) {
        overrides.llm = llm;
    }
    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 * @param searchFrom - Directory searched for paperreader.config.json
 */
export async function resolveConfig(cliFlags: ConfigOverrides, searchFrom = process.cwd()): Promise<PaperReaderConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        dataDir: defaultDataDir(),
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        discovery: {
            ...DEFAULT_CONFIG.discovery,
            ...fileConfig?.discovery,
            ...envConfig.discovery,
            ...cliFlags.discovery,
        },
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...envConfig.llm,
            ...cliFlags.llm,
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
