/**
 * Barrel export for all shared types.
 */
export {
    CLASSIFICATIONS,
    PAPER_STATUSES,
    INTEREST_KINDS,
    InsightsSchema,
    PaperRecordSchema,
    ResearchInterestsSchema,
    isPaperStatus,
    isInterestKind,
} from './paper.js';
export type {
    Insights,
    Classification,
    PaperRecord,
    PaperStatus,
    PaperCandidate,
    ResearchInterests,
    InterestKind,
} from './paper.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PaperReaderConfig,
    LogLevel,
    LlmProviderName,
    LlmConfig,
    DiscoveryConfig,
} from './config.js';
export type { SourceAdapter } from './source-adapter.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
