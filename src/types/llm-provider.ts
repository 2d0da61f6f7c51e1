import type { PaperMetadata } from './paper.js';

/**
 * Interface for LLM provider adapters (Ollama, OpenAI).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The prompt to send
     * @param params - Sampling parameters
     * @returns The completion, or null when the backend failed or replied with nothing
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult | null>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    timeoutMs?: number;
}

/**
 * Weakly-populated fields handed to a metadata extractor alongside raw text.
 */
export interface WeakMetadata {
    title: string;
    authors: readonly string[];
    doi: string | null;
    abstract: string | null;
}

/**
 * Pluggable enrichment capability: turns raw text plus weak fields into a
 * better-populated record. Resolves to null on any failure; never rejects.
 */
export interface MetadataExtractor {
    extract(text: string, weak: WeakMetadata): Promise<PaperMetadata | null>;
}
