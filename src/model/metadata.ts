import { OaStatus, type OpenAccessInfo, type PaperMetadata, type OaStatusSource } from '../types/index.js';
import { normalizeDoi, normalizeTitle, parseYear } from '../sources/utils.js';

/**
 * Thrown when a record cannot satisfy the PaperMetadata invariants.
 */
export class InvalidMetadataError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidMetadataError';
    }
}

/**
 * Loose input accepted by createMetadata. Only the title is required.
 */
export interface MetadataInput {
    title: string;
    authors?: readonly string[];
    doi?: string | null;
    arxiv_id?: string | null;
    year?: number | string | null;
    venue?: string | null;
    abstract?: string | null;
    keywords?: readonly string[];
    oa_status?: OaStatus | null;
    oa_url?: string | null;
    oa_status_source?: OaStatusSource | null;
    license?: string | null;
}

/**
 * Build a frozen PaperMetadata, enforcing:
 * - non-empty title
 * - lowercase DOI without resolver prefix
 * - four-digit year or null
 * - de-duplicated keywords
 * - a closed status never carries an OA location
 */
export function createMetadata(input: MetadataInput): PaperMetadata {
    const title = input.title.replace(/\s+/g, ' ').trim();
    if (!title) {
        throw new InvalidMetadataError('Paper title must not be empty');
    }

    const oaStatus = input.oa_status ?? null;

    return Object.freeze({
        title,
        authors: Object.freeze((input.authors ?? []).map((a) => a.trim()).filter((a) => a.length > 0)),
        doi: normalizeDoi(input.doi),
        arxiv_id: input.arxiv_id?.trim() || null,
        year: parseYear(input.year),
        venue: input.venue?.trim() || null,
        abstract: input.abstract?.trim() || null,
        keywords: Object.freeze(uniqueStrings(input.keywords ?? [])),
        oa_status: oaStatus,
        oa_url: oaStatus === OaStatus.CLOSED ? null : input.oa_url ?? null,
        oa_status_source: oaStatus ? input.oa_status_source ?? 'provider' : null,
        license: input.license ?? null,
    });
}

/**
 * Return a copy of the record with OA fields taken from the resolution chain.
 * Identity fields are carried over unchanged.
 */
export function withOpenAccess(meta: PaperMetadata, info: OpenAccessInfo): PaperMetadata {
    return createMetadata({
        ...meta,
        oa_status: info.status,
        oa_url: info.url,
        license: info.license ?? meta.license,
        oa_status_source: info.source,
    });
}

/**
 * Fill the gaps of a weak record from an extracted one.
 * Title, DOI and OA fields always stay those of the original record.
 */
export function fillGaps(meta: PaperMetadata, extracted: PaperMetadata): PaperMetadata {
    return createMetadata({
        ...meta,
        authors: meta.authors.length > 0 ? meta.authors : extracted.authors,
        arxiv_id: meta.arxiv_id ?? extracted.arxiv_id,
        year: meta.year ?? extracted.year,
        venue: meta.venue ?? extracted.venue,
        abstract: meta.abstract ?? extracted.abstract,
        keywords: [...meta.keywords, ...extracted.keywords],
    });
}

/**
 * Whether a record is missing fields an extractor could supply.
 */
export function isWeak(meta: PaperMetadata): boolean {
    return meta.authors.length === 0 || meta.abstract === null || meta.year === null;
}

/**
 * Derive the cross-provider identity of a work:
 * DOI if present, else arXiv ID, else normalized title.
 */
export function dedupKey(meta: PaperMetadata): string {
    if (meta.doi) return `doi:${meta.doi}`;
    if (meta.arxiv_id) return `arxiv:${meta.arxiv_id}`;
    return `title:${normalizeTitle(meta.title)}`;
}

function uniqueStrings(values: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const value of values) {
        const trimmed = value.trim();
        if (trimmed) seen.add(trimmed);
    }
    return [...seen];
}
