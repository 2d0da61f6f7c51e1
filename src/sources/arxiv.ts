import { XMLParser } from 'fast-xml-parser';
import { OaStatus, type PaperMetadata, type SourceAdapter } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata } from '../model/metadata.js';
import { asArray, isRecord } from './utils.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';

/** Canonical abstract-page URL; the capture is the identifier as written, less any trailing slash */
const ARXIV_ABS_PATTERN = /arxiv\.org\/abs\/([^\s?#]+)/i;

/**
 * One Atom entry, flattened out of the feed XML.
 */
export interface ArxivEntry {
    /** Canonical abstract URL, e.g. "http://arxiv.org/abs/2301.12345v1" */
    id: string;
    title: string;
    summary: string | null;
    published: string | null;
    authors: string[];
    doi: string | null;
    journalRef: string | null;
    categories: string[];
}

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    isArray: (name) => name === 'entry' || name === 'author' || name === 'category',
});

/**
 * arXiv adapter: the preprint archive.
 * Every arXiv record is open by construction: green, with the PDF variant of its abstract URL.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter<ArxivEntry> {
    readonly name = 'arXiv';
    readonly sourceId = 'arxiv' as const;

    constructor(private readonly httpClient: HttpClient) {}

    async search(query: string, maxResults: number): Promise<ArxivEntry[]> {
        getLogger().debug({ query, maxResults }, 'arXiv search');

        const response = await this.httpClient.get<string>(
            ARXIV_API,
            {
                search_query: `all:${query}`,
                start: 0,
                max_results: maxResults,
                sortBy: 'relevance',
                sortOrder: 'descending',
            },
            { source: this.sourceId }
        );
        if (!response.ok) return [];

        if (typeof response.data !== 'string') {
            getLogger().warn({ query }, 'Unexpected arXiv payload');
            return [];
        }
        return parseArxivFeed(response.data);
    }

    toMetadata(entry: ArxivEntry): PaperMetadata | null {
        const arxivId = arxivIdFromUrl(entry.id);
        if (!arxivId) return null;

        try {
            return createMetadata({
                title: entry.title || `arXiv:${arxivId}`,
                authors: entry.authors,
                doi: entry.doi,
                arxiv_id: arxivId,
                year: entry.published,
                venue: entry.journalRef,
                abstract: entry.summary,
                keywords: entry.categories,
                oa_status: OaStatus.GREEN,
                oa_url: toPdfUrl(entry.id),
            });
        } catch (error) {
            getLogger().warn({ id: entry.id, error }, 'Failed to normalize arXiv entry');
            return null;
        }
    }

    /**
     * Synthesize a record from a canonical abstract URL without a network round-trip.
     * Returns null when the URL is not an arXiv abstract page.
     */
    recordFromUrl(url: string): PaperMetadata | null {
        const arxivId = arxivIdFromUrl(url);
        if (!arxivId) return null;

        return createMetadata({
            title: `arXiv:${arxivId}`,
            arxiv_id: arxivId,
            oa_status: OaStatus.GREEN,
            oa_url: `https://arxiv.org/pdf/${arxivId}`,
        });
    }
}

/**
 * Identifier from a canonical abstract URL.
 */
export function arxivIdFromUrl(url: string): string | null {
    const match = ARXIV_ABS_PATTERN.exec(url);
    return match?.[1]?.replace(/\/+$/, '') || null;
}

/**
 * "https://arxiv.org/abs/2301.12345" → "https://arxiv.org/pdf/2301.12345"
 */
export function toPdfUrl(absUrl: string): string {
    return absUrl.replace('/abs/', '/pdf/');
}

/**
 * Parse an arXiv Atom feed into flat entries. Malformed XML yields an empty list.
 */
export function parseArxivFeed(xml: string): ArxivEntry[] {
    let document: unknown;
    try {
        document = parser.parse(xml);
    } catch (error) {
        getLogger().warn({ error }, 'Failed to parse arXiv XML response');
        return [];
    }

    const feed = isRecord(document) ? document['feed'] : undefined;
    if (!isRecord(feed)) {
        getLogger().warn('arXiv response has no feed element');
        return [];
    }

    const entries: ArxivEntry[] = [];
    for (const entry of asArray(feed['entry'])) {
        if (!isRecord(entry)) continue;

        const id = textOf(entry['id']);
        if (!id || !arxivIdFromUrl(id)) continue;

        entries.push({
            id,
            title: collapse(textOf(entry['title']) ?? ''),
            summary: textOf(entry['summary']),
            published: textOf(entry['published']),
            authors: asArray(entry['author'])
                .map((author) => (isRecord(author) ? textOf(author['name']) : null))
                .filter((name): name is string => !!name),
            doi: textOf(entry['doi']),
            journalRef: textOf(entry['journal_ref']),
            categories: asArray(entry['category'])
                .map((category) => (isRecord(category) ? textOf(category['@_term']) : null))
                .filter((term): term is string => !!term),
        });
    }

    return entries;
}

/**
 * Text content of a parsed node: a bare value, or `#text` when the element carries attributes.
 */
function textOf(node: unknown): string | null {
    if (typeof node === 'string') return node.trim() || null;
    if (typeof node === 'number') return String(node);
    if (isRecord(node)) return textOf(node['#text']);
    return null;
}

function collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
