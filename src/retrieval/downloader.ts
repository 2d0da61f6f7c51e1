import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ProcessingResult } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const MAX_FILENAME_LENGTH = 80;

export interface DownloadOptions {
    outputDir: string;
    httpClient: HttpClient;
}

/**
 * Download the OA location of every result that has one.
 *
 * Files already on disk are not fetched again and count as available.
 * A response is only written when it looks like a PDF. Failures are logged
 * and skipped; the batch always runs to the end.
 *
 * @returns Number of artifacts available on disk afterwards
 */
export async function downloadArtifacts(
    results: readonly ProcessingResult[],
    options: DownloadOptions
): Promise<number> {
    const { outputDir, httpClient } = options;
    mkdirSync(outputDir, { recursive: true });

    let available = 0;
    for (const result of results) {
        const url = result.metadata?.oa_url;
        if (!result.metadata || !url) continue;

        const filePath = join(outputDir, artifactFilename(result.metadata.title));
        if (existsSync(filePath)) {
            getLogger().debug({ filePath }, 'Already downloaded');
            available++;
            continue;
        }

        const response = await httpClient.getBinary(url, { source: 'download' });
        if (!response.ok) continue;

        const contentType = response.headers['content-type'] ?? '';
        if (!isPdfResponse(url, contentType)) {
            getLogger().warn({ url, contentType }, 'Not a PDF response, skipping');
            continue;
        }

        try {
            writeFileSync(filePath, response.data);
            getLogger().info({ filePath }, 'Downloaded');
            available++;
        } catch (error) {
            getLogger().warn({ url, filePath, error: error instanceof Error ? error.message : String(error) }, 'Failed to write artifact');
        }
    }

    return available;
}

/**
 * File name for a title: letters, digits, underscore, space and hyphen only,
 * at most 80 characters, `paper` when nothing is left.
 */
export function artifactFilename(title: string): string {
    const safe = title
        .replace(/[^\p{L}\p{N}_\s-]/gu, '')
        .slice(0, MAX_FILENAME_LENGTH)
        .trim();
    return `${safe || 'paper'}.pdf`;
}

/**
 * Whether a successful response is a PDF, by content type or by URL shape.
 */
export function isPdfResponse(url: string, contentType: string): boolean {
    return contentType.toLowerCase().includes('pdf') || url.endsWith('.pdf') || url.includes('arxiv.org/pdf');
}
