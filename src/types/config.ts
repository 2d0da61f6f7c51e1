/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Supported LLM backends for metadata extraction.
 */
export type LlmProviderName = 'ollama' | 'openai';

/**
 * LLM enrichment configuration.
 */
export interface LlmConfig {
    enabled: boolean;
    provider: LlmProviderName;
    model: string;
    /** Ollama server or OpenAI-compatible endpoint */
    baseUrl: string;
    timeoutMs: number;
    /** OpenAI API key (read from OPENAI_API_KEY when not configured) */
    apiKey?: string;
}

/**
 * Full paperscout configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperScoutConfig {
    // Gateway
    rateLimitPerSecond: number;
    maxRetries: number;
    timeoutMs: number;
    userAgent: string;

    /** Contact email: enables Unpaywall and the Crossref/OpenAlex polite pools */
    contactEmail: string;

    /** CORE API key (full-text repository search) */
    coreApiKey?: string;

    // Output
    outputDir: string;

    /** Topics searched by `paperscout topics` when none are given */
    topics: string[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // LLM
    llm: LlmConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PaperScoutConfig = {
    rateLimitPerSecond: 1,
    maxRetries: 3,
    timeoutMs: 30000,
    userAgent: 'paperscout/1.0',
    contactEmail: '',
    outputDir: 'results',
    topics: [],
    logLevel: 'info',
    jsonLogs: false,
    llm: {
        enabled: false,
        provider: 'ollama',
        model: 'llama2',
        baseUrl: 'http://localhost:11434',
        timeoutMs: 60000,
    },
};
