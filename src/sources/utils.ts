/**
 * Shared utilities for provider adapters.
 */

/** DOI shape as it appears in free text and URLs */
export const DOI_PATTERN = /10\.\d{4,9}\/[-._;()/:\w]+/;

/** DOI suffixes of figure, table, and supplement components registered under an article */
const COMPONENT_DOI_PATTERN = /\/(?:fig|table|supp)-\d+/i;

/** Punctuation that commonly trails an identifier pasted into prose */
const TRAILING_PUNCTUATION = /[.,;)]+$/;

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * This function reconstructs the original text.
 *
 * @param invertedIndex - The inverted index object or null
 * @returns Reconstructed abstract text or null
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex || typeof invertedIndex !== 'object') {
        return null;
    }

    const words: Array<[number, string]> = [];

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        for (const pos of positions) {
            if (typeof pos === 'number' && pos >= 0) {
                words.push([pos, word]);
            }
        }
    }

    if (words.length === 0) return null;

    words.sort((a, b) => a[0] - b[0]);

    return words.map(([, word]) => word).join(' ');
}

/**
 * Normalize a DOI: strip resolver prefixes and lowercase.
 * "https://doi.org/10.1234/TEST" → "10.1234/test"
 */
export function normalizeDoi(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim()
        .toLowerCase() || null;
}

/**
 * Find the first DOI embedded in a string, with trailing punctuation removed.
 */
export function findDoi(text: string): string | null {
    const match = DOI_PATTERN.exec(text);
    return match ? trimTrailingPunctuation(match[0]) : null;
}

/**
 * Strip sentence punctuation that trails an identifier.
 * "10.1234/abc)." → "10.1234/abc"
 */
export function trimTrailingPunctuation(value: string): string {
    return value.replace(TRAILING_PUNCTUATION, '');
}

/**
 * Whether a DOI names a figure/table/supplement component rather than an article.
 */
export function isComponentDoi(doi: string | null | undefined): boolean {
    return !!doi && COMPONENT_DOI_PATTERN.test(doi);
}

/**
 * Extract arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "2401.01234v2" → "2401.01234v2"
 * "http://arxiv.org/abs/hep-th/9901001v1" → "hep-th/9901001v1"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/([a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?|\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /arxiv:(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /^(\d{4}\.\d{4,5}(?:v\d+)?)$/,
    ];

    for (const pattern of patterns) {
        const match = input.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Clean and normalize a paper title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\w\s]/g, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')      // Collapse whitespace
        .trim();
}

/**
 * Remove embedded markup tags (JATS, HTML) and collapse whitespace.
 */
export function stripMarkup(text: string | null | undefined): string | null {
    if (!text) return null;
    return text
        .replace(/<[^>]+>/g, '')
        .replace(/\s+/g, ' ')
        .trim() || null;
}

/**
 * Read a four-digit year from a number or a date-like string ("2019-05-01").
 */
export function parseYear(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isInteger(value) && value >= 1000 && value <= 9999 ? value : null;
    }
    if (typeof value === 'string') {
        const year = parseInt(value.slice(0, 4), 10);
        return isNaN(year) ? null : parseYear(year);
    }
    return null;
}

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Return the value when it is a non-empty string.
 */
export function asString(value: unknown): string | null {
    return typeof value === 'string' && value.trim() ? value : null;
}

/**
 * Wrap a value that may be a single item or a list into a list.
 * XML and some JSON APIs collapse one-element lists into a bare value.
 */
export function asArray<T>(value: T | T[] | null | undefined): T[] {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}
