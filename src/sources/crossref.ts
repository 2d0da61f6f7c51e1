import type { PaperMetadata, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { isComponentDoi, isRecord, stripMarkup } from './utils.js';

const CROSSREF_BASE = 'https://api.crossref.org';

/** Date fields consulted for the publication year, most authoritative first */
const YEAR_FIELDS = ['published-print', 'published-online', 'created'] as const;

/**
 * Crossref date shape: { "date-parts": [[2019, 5, 1]] }
 */
interface CrossrefDate {
    'date-parts'?: Array<Array<number | null>>;
}

/**
 * Crossref work (subset of relevant fields).
 */
export interface CrossrefWork {
    DOI?: string;
    type?: string;
    title?: string[];
    author?: Array<{ given?: string; family?: string; name?: string }>;
    'published-print'?: CrossrefDate;
    'published-online'?: CrossrefDate;
    created?: CrossrefDate;
    'container-title'?: string[];
    abstract?: string;
    subject?: string[];
}

type CrossrefListResponse = {
    status?: string;
    message?: { items?: CrossrefWork[] };
};

interface CrossrefWorkResponse {
    status?: string;
    message?: CrossrefWork;
}

/**
 * Crossref adapter: the primary citation-graph index.
 * Used for free-text search and authoritative DOI lookup.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter implements SourceAdapter<CrossrefWork> {
    readonly name = 'Crossref';
    readonly sourceId = 'crossref' as const;
    private readonly email?: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: SourceAdapterOptions = {}
    ) {
        this.email = options.email || undefined;
    }

    async search(query: string, maxResults: number): Promise<CrossrefWork[]> {
        getLogger().debug({ query, maxResults }, 'Crossref search');

        const response = await this.httpClient.get<CrossrefListResponse>(
            `${CROSSREF_BASE}/works`,
            { query, rows: maxResults, sort: 'relevance', mailto: this.email },
            { source: this.sourceId }
        );
        if (!response.ok) return [];

        const items = isRecord(response.data) ? response.data.message?.items : undefined;
        if (!Array.isArray(items)) {
            getLogger().warn({ query }, 'Unexpected Crossref search payload');
            return [];
        }
        return items.filter(isRecord);
    }

    async lookupByDoi(doi: string): Promise<CrossrefWork | null> {
        getLogger().debug({ doi }, 'Crossref DOI lookup');

        const response = await this.httpClient.get<CrossrefWorkResponse>(
            `${CROSSREF_BASE}/works/${encodeURIComponent(doi)}`,
            { mailto: this.email },
            { source: this.sourceId }
        );
        if (!response.ok) return null;

        const message = isRecord(response.data) ? response.data.message : undefined;
        if (!isRecord(message)) {
            getLogger().warn({ doi }, 'Unexpected Crossref work payload');
            return null;
        }
        return message;
    }

    /**
     * Normalize a Crossref work. Figure, table, and supplement components return null.
     */
    toMetadata(item: CrossrefWork): PaperMetadata | null {
        try {
            if (isComponentDoi(item.DOI)) {
                return null;
            }

            const title = Array.isArray(item.title) ? item.title.find((t) => typeof t === 'string' && t.trim()) : undefined;

            const authors = (Array.isArray(item.author) ? item.author : [])
                .map((a) => (a.given || a.family ? `${a.given ?? ''} ${a.family ?? ''}` : a.name ?? '').trim())
                .filter((name) => name.length > 0);

            const venues = Array.isArray(item['container-title']) ? item['container-title'] : [];

            return createMetadata({
                title: title ?? 'Unknown',
                authors,
                doi: item.DOI ?? null,
                year: crossrefYear(item),
                venue: venues[0] ?? null,
                abstract: stripMarkup(item.abstract),
                keywords: Array.isArray(item.subject) ? item.subject : [],
            });
        } catch (error) {
            getLogger().warn({ doi: item.DOI, error }, 'Failed to normalize Crossref work');
            return null;
        }
    }
}

/**
 * First populated year among print date, online date, and creation date.
 */
function crossrefYear(item: CrossrefWork): number | null {
    for (const field of YEAR_FIELDS) {
        const year = item[field]?.['date-parts']?.[0]?.[0];
        if (typeof year === 'number' && year > 0) {
            return year;
        }
    }
    return null;
}
