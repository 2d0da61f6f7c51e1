import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { PaperMetadata, ProcessingResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

/**
 * One entry of the saved JSON artifact.
 */
export interface ExportedResult {
    identifier: string;
    state: string;
    elapsed_ms: number;
    retry_count: number;
    error_message: string | null;
    metadata?: ExportedMetadata;
}

type ExportedMetadata = Omit<PaperMetadata, 'oa_status'> & { oa_status: string | null };

// ─── Main Export Functions ───────────────────────────────

/**
 * Render results as a JSON array with two-space indentation.
 */
export function serializeResults(results: readonly ProcessingResult[]): string {
    return JSON.stringify(results.map(toExported), null, 2);
}

/**
 * Write results to `<outputDir>/<filename>`, creating the directory when needed.
 * The default file name is `results_YYYYMMDD_HHMMSS.json` in local time.
 *
 * @returns Path of the written file
 */
export function saveResults(
    results: readonly ProcessingResult[],
    outputDir: string,
    filename?: string,
    now: Date = new Date()
): string {
    mkdirSync(outputDir, { recursive: true });
    const filePath = join(outputDir, filename || defaultFilename(now));

    writeFileSync(filePath, serializeResults(results), 'utf-8');
    getLogger().info({ filePath, results: results.length }, 'Results saved');
    return filePath;
}

export function defaultFilename(now: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `results_${date}_${time}.json`;
}

// ─── Format Implementation ──────────────────────────────

function toExported(result: ProcessingResult): ExportedResult {
    const exported: ExportedResult = {
        identifier: result.identifier,
        state: result.state,
        elapsed_ms: result.elapsed_ms,
        retry_count: result.retry_count,
        error_message: result.error_message ?? null,
    };

    if (result.metadata) {
        exported.metadata = {
            ...result.metadata,
            authors: [...result.metadata.authors],
            keywords: [...result.metadata.keywords],
            oa_status: result.metadata.oa_status ?? null,
        };
    }

    return exported;
}
