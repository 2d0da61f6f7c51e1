import { OaStatus, type OpenAccessInfo, type PaperMetadata, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { isRecord } from './utils.js';

const UNPAYWALL_BASE = 'https://api.unpaywall.org/v2';

/** Provider color → OA status; anything else is UNKNOWN */
const COLOR_MAP: Readonly<Record<string, OaStatus>> = {
    gold: OaStatus.GOLD,
    green: OaStatus.GREEN,
    hybrid: OaStatus.HYBRID,
    bronze: OaStatus.BRONZE,
};

type UnpaywallLocation = {
    url?: string | null;
    url_for_pdf?: string | null;
    url_for_landing_page?: string | null;
    license?: string | null;
};

/**
 * Unpaywall DOI record (subset of relevant fields).
 */
export interface UnpaywallRecord {
    doi?: string;
    title?: string | null;
    is_oa?: boolean;
    oa_status?: string | null;
    best_oa_location?: UnpaywallLocation | null;
    year?: number | null;
    journal_name?: string | null;
    z_authors?: Array<{ given?: string; family?: string }> | null;
}

/**
 * Unpaywall adapter: the OA-status index.
 * DOI lookup only; the service refuses requests without a contact email,
 * so none are made when it is missing.
 *
 * @see https://unpaywall.org/products/api
 */
export class UnpaywallAdapter implements SourceAdapter<UnpaywallRecord> {
    readonly name = 'Unpaywall';
    readonly sourceId = 'unpaywall' as const;
    private readonly email?: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: SourceAdapterOptions = {}
    ) {
        this.email = options.email || undefined;
    }

    /**
     * Unpaywall has no free-text search over DOIs worth using here.
     */
    async search(): Promise<UnpaywallRecord[]> {
        return [];
    }

    async lookupByDoi(doi: string): Promise<UnpaywallRecord | null> {
        if (!this.email) {
            getLogger().debug({ doi }, 'Skipping Unpaywall lookup: no contact email');
            return null;
        }

        const response = await this.httpClient.get<UnpaywallRecord>(
            `${UNPAYWALL_BASE}/${encodeURIComponent(doi)}`,
            { email: this.email },
            { source: this.sourceId }
        );
        if (!response.ok) return null;

        if (!isRecord(response.data)) {
            getLogger().warn({ doi }, 'Unexpected Unpaywall payload');
            return null;
        }
        return response.data;
    }

    /**
     * OA classification of a DOI record.
     */
    toOpenAccess(record: UnpaywallRecord): OpenAccessInfo {
        if (!record.is_oa) {
            return { status: OaStatus.CLOSED, url: null, license: null, source: 'provider' };
        }

        const location = isRecord(record.best_oa_location) ? record.best_oa_location : null;
        const color = typeof record.oa_status === 'string' ? record.oa_status.toLowerCase() : '';

        return {
            status: COLOR_MAP[color] ?? OaStatus.UNKNOWN,
            url: location?.url_for_pdf || location?.url_for_landing_page || location?.url || null,
            license: location?.license || null,
            source: 'provider',
        };
    }

    /**
     * A full record when the payload carries a title; OA fields come from `toOpenAccess`.
     */
    toMetadata(record: UnpaywallRecord): PaperMetadata | null {
        if (typeof record.title !== 'string' || !record.title.trim()) return null;

        try {
            const oa = this.toOpenAccess(record);
            return createMetadata({
                title: record.title,
                authors: (Array.isArray(record.z_authors) ? record.z_authors : [])
                    .map((a) => `${a.given ?? ''} ${a.family ?? ''}`.trim()),
                doi: record.doi ?? null,
                year: record.year ?? null,
                venue: record.journal_name ?? null,
                oa_status: oa.status,
                oa_url: oa.url,
                license: oa.license,
            });
        } catch (error) {
            getLogger().warn({ doi: record.doi, error }, 'Failed to normalize Unpaywall record');
            return null;
        }
    }
}
