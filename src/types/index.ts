/**
 * Barrel export for all shared types.
 */
export { OaStatus } from './paper.js';
export type { PaperMetadata, OaStatusSource, OpenAccessInfo, ProviderId } from './paper.js';
export { ProcessingState } from './result.js';
export type { ProcessingResult } from './result.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PaperScoutConfig, LogLevel, LlmConfig, LlmProviderName } from './config.js';
export type { SourceAdapter, SourceAdapterOptions } from './source-adapter.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
    MetadataExtractor,
    WeakMetadata,
} from './llm-provider.js';
