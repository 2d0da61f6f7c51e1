import type { PaperMetadata, ProviderId } from './paper.js';

/**
 * Interface for provider adapters (arXiv, Crossref, Unpaywall, OpenAlex, CORE).
 * Each adapter fetches the provider's native items and normalizes them into PaperMetadata.
 *
 * Adapters never throw on transport failures or malformed payloads: they log a
 * warning and return an empty list or null.
 */
export interface SourceAdapter<TRaw> {
    /** Human-readable provider name */
    readonly name: string;

    readonly sourceId: ProviderId;

    /**
     * Free-text search. Returns raw provider items in provider ranking order.
     */
    search(query: string, maxResults: number): Promise<TRaw[]>;

    /**
     * Look up a single work by DOI, where the provider supports it.
     */
    lookupByDoi?(doi: string): Promise<TRaw | null>;

    /**
     * Normalize one raw item. Returns null for non-article items or items without usable data.
     * Pure: the same input always yields an equal record.
     */
    toMetadata(raw: TRaw): PaperMetadata | null;
}

/**
 * Options for adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (CORE) */
    apiKey?: string;

    /** Contact email for polite pools (Crossref, OpenAlex) and Unpaywall */
    email?: string;
}
