import { OaStatus, type PaperMetadata, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { isRecord } from './utils.js';

const CORE_BASE = 'https://api.core.ac.uk/v3';

/** Word distance allowed inside a rewritten phrase query */
const PHRASE_SLOP = 10;

/**
 * CORE work (subset of relevant fields).
 */
export interface CoreWork {
    id?: number | string;
    title?: string | null;
    authors?: Array<{ name?: string }>;
    doi?: string | null;
    yearPublished?: number | null;
    publisher?: string | null;
    abstract?: string | null;
    downloadUrl?: string | null;
    sourceFulltextUrls?: string[] | string | null;
}

interface CoreSearchResponse {
    totalHits?: number;
    results?: CoreWork[];
}

/**
 * CORE adapter: the full-text repository index.
 * Requires an API key; without one, searches return nothing and make no request.
 *
 * @see https://api.core.ac.uk/docs/v3
 */
export class CoreAdapter implements SourceAdapter<CoreWork> {
    readonly name = 'CORE';
    readonly sourceId = 'core' as const;
    private readonly apiKey?: string;
    private warnedMissingKey = false;

    constructor(
        private readonly httpClient: HttpClient,
        options: SourceAdapterOptions = {}
    ) {
        this.apiKey = options.apiKey || undefined;
    }

    async search(query: string, maxResults: number): Promise<CoreWork[]> {
        if (!this.apiKey) {
            if (!this.warnedMissingKey) {
                getLogger().warn('CORE API key not configured, skipping CORE search');
                this.warnedMissingKey = true;
            }
            return [];
        }

        const q = toPhraseQuery(query);
        getLogger().debug({ query: q, maxResults }, 'CORE search');

        const response = await this.httpClient.get<CoreSearchResponse>(
            `${CORE_BASE}/search/works`,
            { q, limit: Math.min(maxResults, 100), sort: 'relevance' },
            { source: this.sourceId, headers: { Authorization: `Bearer ${this.apiKey}` } }
        );
        if (!response.ok) return [];

        const results = isRecord(response.data) ? response.data.results : undefined;
        if (!Array.isArray(results)) {
            getLogger().warn({ query }, 'Unexpected CORE search payload');
            return [];
        }
        return results.filter(isRecord);
    }

    /**
     * Normalize a CORE work. A download location makes it green.
     */
    toMetadata(work: CoreWork): PaperMetadata | null {
        try {
            const downloadUrl = work.downloadUrl || firstFulltextUrl(work.sourceFulltextUrls);

            return createMetadata({
                title: work.title?.trim() || 'Unknown',
                authors: (Array.isArray(work.authors) ? work.authors : [])
                    .map((a) => (isRecord(a) && typeof a.name === 'string' ? a.name : '')),
                doi: work.doi ?? null,
                year: work.yearPublished ?? null,
                venue: work.publisher ?? null,
                abstract: work.abstract ?? null,
                oa_status: downloadUrl ? OaStatus.GREEN : null,
                oa_url: downloadUrl,
            });
        } catch (error) {
            getLogger().warn({ id: work.id, error }, 'Failed to normalize CORE work');
            return null;
        }
    }
}

/**
 * Rewrite a bare multi-word query as a proximity phrase: `a b` → `"a b"~10`.
 * Quoted and fielded (`title:...`) queries pass through untouched.
 */
export function toPhraseQuery(query: string): string {
    if (!query.includes(' ') || query.startsWith('"') || query.includes(':')) {
        return query;
    }
    return `"${query}"~${PHRASE_SLOP}`;
}

function firstFulltextUrl(urls: CoreWork['sourceFulltextUrls']): string | null {
    if (typeof urls === 'string') return urls || null;
    if (Array.isArray(urls)) return urls.find((url) => typeof url === 'string' && url.length > 0) ?? null;
    return null;
}
