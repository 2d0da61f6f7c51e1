/**
 * Library entry point.
 */
export * from './types/index.js';
export { createMetadata, withOpenAccess, fillGaps, isWeak, dedupKey, InvalidMetadataError } from './model/metadata.js';
export { ResultTracker, StateTransitionError, canTransition, isTerminal } from './model/result.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export type { HttpResult, HttpClientOptions, HttpRequestOptions } from './utils/http-client.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { ArxivAdapter } from './sources/arxiv.js';
export { CrossrefAdapter } from './sources/crossref.js';
export { UnpaywallAdapter } from './sources/unpaywall.js';
export { OpenAlexAdapter } from './sources/openalex.js';
export { CoreAdapter } from './sources/core.js';
export { ResolutionOrchestrator, createOrchestrator } from './pipeline/orchestrator.js';
export type { ProviderAdapters, OrchestratorOptions } from './pipeline/orchestrator.js';
export { parsePaperList, collectIdentifiers, loadPaperList } from './pipeline/paper-list.js';
export { LlmMetadataExtractor, createExtractor } from './llm/metadata-extractor.js';
export { OllamaProvider } from './llm/ollama.js';
export { OpenAiProvider } from './llm/openai.js';
export { downloadArtifacts } from './retrieval/downloader.js';
export { generateReport } from './reporting/report.js';
export { serializeResults, saveResults } from './exporters/export.js';
export { SeenStore } from './storage/seen-store.js';
