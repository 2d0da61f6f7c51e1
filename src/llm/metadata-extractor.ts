import {
    DEFAULT_CONFIG,
    type LlmConfig,
    type LlmProvider,
    type MetadataExtractor,
    type PaperMetadata,
    type WeakMetadata,
} from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { asString, isRecord } from '../sources/utils.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

/** Characters of source text included in the prompt */
const MAX_CONTENT_CHARS = 3000;

const EXTRACTION_TEMPERATURE = 0.1;

/**
 * Metadata extraction over any completion backend.
 * Resolves to null on every failure: backend error, empty reply, unparseable JSON.
 */
export class LlmMetadataExtractor implements MetadataExtractor {
    constructor(private readonly provider: LlmProvider) {}

    async extract(text: string, weak: WeakMetadata): Promise<PaperMetadata | null> {
        try {
            const completion = await this.provider.complete(buildExtractionPrompt(text, weak), {
                temperature: EXTRACTION_TEMPERATURE,
            });
            if (!completion) return null;

            return parseExtraction(completion.text, weak);
        } catch (error) {
            getLogger().warn({ provider: this.provider.name, error }, 'Metadata extraction failed');
            return null;
        }
    }
}

/**
 * Build the extractor for the configured backend, or null when extraction
 * is disabled or the backend cannot be used.
 */
export function createExtractor(config: LlmConfig): MetadataExtractor | null {
    if (!config.enabled) return null;

    if (config.provider === 'openai') {
        if (!config.apiKey) {
            getLogger().warn('OpenAI API key not configured, metadata extraction disabled');
            return null;
        }
        return new LlmMetadataExtractor(
            new OpenAiProvider({
                apiKey: config.apiKey,
                // The default base URL points at a local Ollama server
                baseUrl: config.baseUrl !== DEFAULT_CONFIG.llm.baseUrl ? config.baseUrl : undefined,
                model: config.model,
                timeoutMs: config.timeoutMs,
            })
        );
    }

    const httpClient = new HttpClient({ rateLimitPerSecond: 10, timeoutMs: config.timeoutMs, maxRetries: 0 });
    return new LlmMetadataExtractor(
        new OllamaProvider(httpClient, {
            baseUrl: config.baseUrl,
            model: config.model,
            timeoutMs: config.timeoutMs,
        })
    );
}

export function buildExtractionPrompt(content: string, weak: WeakMetadata): string {
    return `Extract scholarly paper metadata from the following content.

Title: ${weak.title}
Authors: ${weak.authors.join(', ')}
DOI: ${weak.doi ?? ''}
Abstract: ${weak.abstract ?? ''}

Content (truncated): ${content.slice(0, MAX_CONTENT_CHARS)}

Return ONLY a JSON object:
{"title": "...", "authors": ["..."], "doi": "...", "arxiv_id": null, "publication_year": 2023, "journal": "...", "abstract": "...", "keywords": ["..."]}`;
}

/**
 * Strip markdown code fences around a JSON reply.
 * Text after the closing fence is dropped.
 */
export function cleanJsonResponse(text: string): string {
    let body = text.trim();
    const fence = body.includes('```json') ? '```json' : body.includes('```') ? '```' : null;
    if (fence) {
        const afterOpen = body.slice(body.indexOf(fence) + fence.length);
        const close = afterOpen.indexOf('```');
        body = close >= 0 ? afterOpen.slice(0, close) : afterOpen;
    }
    return body.trim();
}

/**
 * Parse an extraction reply into a record. Missing title, authors and DOI
 * fall back to the weak values; anything unparseable yields null.
 */
export function parseExtraction(raw: string, weak: WeakMetadata): PaperMetadata | null {
    let data: unknown;
    try {
        data = JSON.parse(cleanJsonResponse(raw));
    } catch (error) {
        getLogger().warn({ error: error instanceof Error ? error.message : String(error) }, 'Failed to parse LLM response');
        return null;
    }
    if (!isRecord(data)) {
        getLogger().warn('LLM response is not a JSON object');
        return null;
    }

    const authors = stringList(data['authors']);
    const year = data['publication_year'];

    return createMetadata({
        title: asString(data['title']) ?? weak.title,
        authors: authors.length > 0 ? authors : weak.authors,
        doi: asString(data['doi']) ?? weak.doi,
        arxiv_id: asString(data['arxiv_id']),
        year: typeof year === 'number' || typeof year === 'string' ? year : null,
        venue: asString(data['journal']),
        abstract: asString(data['abstract']),
        keywords: stringList(data['keywords']),
    });
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
