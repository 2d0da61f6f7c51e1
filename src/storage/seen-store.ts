import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { ProcessingResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { dedupKey } from '../model/metadata.js';

const SEEN_FILE = 'seen.json';

/**
 * Ledger of works reported by earlier runs, kept as a JSON array of dedup
 * keys in `<outputDir>/seen.json`.
 */
export class SeenStore {
    private readonly filePath: string;
    private readonly keys: Set<string>;

    constructor(outputDir: string) {
        this.filePath = join(outputDir, SEEN_FILE);
        this.keys = this.load();
    }

    get size(): number {
        return this.keys.size;
    }

    has(key: string): boolean {
        return this.keys.has(key);
    }

    /**
     * Results not reported before. Results without metadata are always kept.
     */
    filterNew(results: readonly ProcessingResult[]): ProcessingResult[] {
        return results.filter((r) => !r.metadata || !this.keys.has(dedupKey(r.metadata)));
    }

    /**
     * Record results as seen and persist the ledger.
     * With `downloadedOnly`, only results that have an OA location are recorded.
     *
     * @returns Number of keys added
     */
    markSeen(results: readonly ProcessingResult[], options: { downloadedOnly?: boolean } = {}): number {
        const before = this.keys.size;
        for (const { metadata } of results) {
            if (!metadata) continue;
            if (options.downloadedOnly && !metadata.oa_url) continue;
            this.keys.add(dedupKey(metadata));
        }

        const added = this.keys.size - before;
        if (added > 0) this.save();
        return added;
    }

    // ─── Private helpers ──────────────────────────────────────

    private load(): Set<string> {
        if (!existsSync(this.filePath)) return new Set();

        try {
            const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
            if (!Array.isArray(parsed)) {
                getLogger().warn({ filePath: this.filePath }, 'Seen ledger is not a JSON array, starting empty');
                return new Set();
            }
            return new Set(parsed.filter((key): key is string => typeof key === 'string'));
        } catch (error) {
            getLogger().warn({ filePath: this.filePath, error: error instanceof Error ? error.message : String(error) }, 'Failed to read seen ledger, starting empty');
            return new Set();
        }
    }

    private save(): void {
        mkdirSync(dirname(this.filePath), { recursive: true });
        writeFileSync(this.filePath, JSON.stringify([...this.keys], null, 2), 'utf-8');
    }
}
