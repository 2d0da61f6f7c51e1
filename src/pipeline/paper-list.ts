import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { defaultLoaders } from 'cosmiconfig';
import { getLogger } from '../utils/logger.js';
import { DOI_PATTERN as DOI_SOURCE_PATTERN, isRecord, trimTrailingPunctuation } from '../sources/utils.js';

const DOI_PATTERN = new RegExp(DOI_SOURCE_PATTERN.source, 'g');
const URL_PATTERN = /https?:\/\/[^\s<>"]+/g;

/** Structured paper-list file parsed from JSON or YAML */
export type TreeValue = null | boolean | number | string | TreeValue[] | { [key: string]: TreeValue };

/** Extensions parsed as structured trees rather than free text */
const STRUCTURED_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

/**
 * Extract DOIs and URLs from free text.
 *
 * DOIs come back as resolver URLs (`https://doi.org/<doi>`), followed by the
 * remaining URLs. Resolver links found in the text are left out: their DOI
 * is already captured by the DOI pattern. First-seen order is kept.
 */
export function parsePaperList(text: string): string[] {
    const entries: string[] = [];

    for (const match of text.matchAll(DOI_PATTERN)) {
        const doi = trimTrailingPunctuation(match[0]);
        if (doi) entries.push(`https://doi.org/${doi}`);
    }

    for (const match of text.matchAll(URL_PATTERN)) {
        const url = trimTrailingPunctuation(match[0]);
        if (!url.includes('doi.org')) entries.push(url);
    }

    return unique(entries);
}

/**
 * Walk a parsed JSON/YAML tree and collect identifiers from every string leaf.
 */
export function collectIdentifiers(tree: TreeValue): string[] {
    const entries: string[] = [];

    const visit = (node: TreeValue): void => {
        if (typeof node === 'string') {
            entries.push(...parsePaperList(node));
        } else if (Array.isArray(node)) {
            node.forEach(visit);
        } else if (node !== null && typeof node === 'object') {
            Object.values(node).forEach(visit);
        }
    };

    visit(tree);
    return unique(entries);
}

/**
 * Read a paper list from disk. JSON and YAML files are walked as trees,
 * anything else is scanned as text. A missing or unreadable file yields an
 * empty list.
 */
export async function loadPaperList(filePath: string): Promise<string[]> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (error) {
        getLogger().error({ filePath, error: error instanceof Error ? error.message : String(error) }, 'Cannot read paper list');
        return [];
    }

    const extension = extname(filePath).toLowerCase();
    if (!STRUCTURED_EXTENSIONS.has(extension)) {
        return parsePaperList(content);
    }

    try {
        const loader = extension === '.json' ? defaultLoaders['.json'] : defaultLoaders['.yaml'];
        const parsed: unknown = await loader(filePath, content);
        return collectIdentifiers(toTree(parsed));
    } catch (error) {
        getLogger().warn({ filePath, error: error instanceof Error ? error.message : String(error) }, 'Failed to parse structured paper list, scanning as text');
        return parsePaperList(content);
    }
}

// ─── Private helpers ──────────────────────────────────────

/**
 * Narrow a loader's output to a TreeValue; values JSON cannot hold become null.
 */
function toTree(value: unknown): TreeValue {
    if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(toTree);
    }
    if (isRecord(value)) {
        const node: { [key: string]: TreeValue } = {};
        for (const [key, child] of Object.entries(value)) {
            node[key] = toTree(child);
        }
        return node;
    }
    return null;
}

function unique(values: string[]): string[] {
    return [...new Set(values)];
}
