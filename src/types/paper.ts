/**
 * PaperMetadata: the canonical record for one scholarly work.
 * Normalized from any provider (arXiv, Crossref, Unpaywall, OpenAlex, CORE) into this common shape.
 */
export interface PaperMetadata {
    /** Paper title (never empty) */
    readonly title: string;

    /** Author display names, in publication order */
    readonly authors: readonly string[];

    /** Digital Object Identifier, lowercase, without https://doi.org/ prefix */
    readonly doi: string | null;

    /** arXiv identifier (e.g., "2401.01234v2") */
    readonly arxiv_id: string | null;

    /** Four-digit publication year */
    readonly year: number | null;

    /** Journal or venue name */
    readonly venue: string | null;

    readonly abstract: string | null;

    /** Keywords; duplicates removed, order carries no meaning */
    readonly keywords: readonly string[];

    readonly oa_status: OaStatus | null;

    /** Best full-text location (PDF preferred over landing page) */
    readonly oa_url: string | null;

    /**
     * Where oa_status came from. "approximated" marks the OpenAlex is-OA flag
     * mapped to green, which is a guess rather than a provider classification.
     */
    readonly oa_status_source: OaStatusSource | null;

    /** License identifier (e.g., "cc-by") */
    readonly license: string | null;
}

/**
 * Open-access color classification.
 */
export enum OaStatus {
    GOLD = 'gold',
    GREEN = 'green',
    HYBRID = 'hybrid',
    BRONZE = 'bronze',
    CLOSED = 'closed',
    UNKNOWN = 'unknown',
}

export type OaStatusSource = 'provider' | 'approximated';

/**
 * OA fields assigned by the resolution fallback chain.
 */
export interface OpenAccessInfo {
    status: OaStatus;
    url: string | null;
    license: string | null;
    source: OaStatusSource;
}

/**
 * Provider that supplied a record.
 */
export type ProviderId = 'arxiv' | 'crossref' | 'unpaywall' | 'openalex' | 'core';
