import { OaStatus, type OpenAccessInfo, type PaperMetadata, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import type { HttpClient, QueryParams } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { invertedIndexToText, normalizeDoi, extractArxivId, isRecord } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex API response types (subset of relevant fields).
 */
export interface OpenAlexWork {
    id?: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_year?: number | null;
    abstract_inverted_index?: Record<string, number[]> | null;
    primary_location?: {
        source?: { display_name?: string | null } | null;
        landing_page_url?: string | null;
        license?: string | null;
    } | null;
    authorships?: Array<{
        author?: { id?: string; display_name?: string | null };
    }>;
    keywords?: Array<{ display_name?: string; score?: number }>;
    open_access?: {
        is_oa?: boolean;
        oa_url?: string | null;
    } | null;
}

interface OpenAlexSearchResponse {
    meta?: { count: number; per_page: number; page: number };
    results?: OpenAlexWork[];
}

/**
 * OpenAlex adapter: the secondary citation-graph index.
 * Searched after Crossref, and the OA fallback when Unpaywall is unavailable.
 *
 * OpenAlex only says whether a work is open, not how; an open work is
 * reported as green and flagged as approximated.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter<OpenAlexWork> {
    readonly name = 'OpenAlex';
    readonly sourceId = 'openalex' as const;
    private readonly email?: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: SourceAdapterOptions = {}
    ) {
        this.email = options.email || undefined;
    }

    async search(query: string, maxResults: number): Promise<OpenAlexWork[]> {
        getLogger().debug({ query, maxResults }, 'OpenAlex search');

        const response = await this.httpClient.get<OpenAlexSearchResponse>(
            `${OPENALEX_BASE}/works`,
            { search: query, per_page: Math.min(maxResults, 200), ...this.authParams() },
            { source: this.sourceId }
        );
        if (!response.ok) return [];

        const results = isRecord(response.data) ? response.data.results : undefined;
        if (!Array.isArray(results)) {
            getLogger().warn({ query }, 'Unexpected OpenAlex search payload');
            return [];
        }
        return results.filter(isRecord);
    }

    async lookupByDoi(doi: string): Promise<OpenAlexWork | null> {
        getLogger().debug({ doi }, 'OpenAlex DOI lookup');

        const response = await this.httpClient.get<OpenAlexWork>(
            `${OPENALEX_BASE}/works/doi:${encodeURIComponent(doi)}`,
            this.authParams(),
            { source: this.sourceId }
        );
        if (!response.ok) return null;

        if (!isRecord(response.data)) {
            getLogger().warn({ doi }, 'Unexpected OpenAlex work payload');
            return null;
        }
        return response.data;
    }

    /**
     * OA classification of a work, or null when OpenAlex does not report it as open.
     */
    toOpenAccess(work: OpenAlexWork): OpenAccessInfo | null {
        const openAccess = isRecord(work.open_access) ? work.open_access : null;
        if (!openAccess?.is_oa) return null;

        return {
            status: OaStatus.GREEN,
            url: openAccess.oa_url || null,
            license: work.primary_location?.license || null,
            source: 'approximated',
        };
    }

    toMetadata(work: OpenAlexWork): PaperMetadata | null {
        try {
            const doi = normalizeDoi(work.doi);
            const landingPage = work.primary_location?.landing_page_url ?? null;

            const authors = (Array.isArray(work.authorships) ? work.authorships : [])
                .map((a) => a.author?.display_name)
                .filter((name): name is string => !!name);

            const keywords = (Array.isArray(work.keywords) ? work.keywords : [])
                .map((k) => k.display_name)
                .filter((k): k is string => !!k);

            const oa = this.toOpenAccess(work);

            return createMetadata({
                title: work.display_name || work.title || 'Unknown',
                authors,
                doi,
                arxiv_id: extractArxivId(landingPage),
                year: work.publication_year ?? null,
                venue: work.primary_location?.source?.display_name ?? null,
                abstract: invertedIndexToText(work.abstract_inverted_index),
                keywords,
                oa_status: oa?.status ?? null,
                oa_url: oa?.url ?? null,
                oa_status_source: oa?.source ?? null,
                license: oa?.license ?? null,
            });
        } catch (error) {
            getLogger().warn({ id: work.id, error }, 'Failed to normalize OpenAlex work');
            return null;
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    private authParams(): QueryParams {
        return { mailto: this.email };
    }
}
