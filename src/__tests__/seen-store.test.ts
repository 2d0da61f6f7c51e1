import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SeenStore } from '../storage/seen-store.js';
import { createMetadata } from '../model/metadata.js';
import { ResultTracker, resultForRecord } from '../model/result.js';
import { OaStatus } from '../types/index.js';

const withDoi = resultForRecord('https://doi.org/10.1/a', createMetadata({ title: 'A', doi: '10.1/A' }));
const withPdf = resultForRecord('', createMetadata({ title: 'B', arxiv_id: '2301.1', oa_status: OaStatus.GREEN, oa_url: 'https://arxiv.org/pdf/2301.1' }));
const failed = new ResultTracker('x').triaged().fail('boom').toResult();

describe('SeenStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'paperscout-seen-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should start empty without a ledger file', () => {
        const store = new SeenStore(dir);

        expect(store.size).toBe(0);
        expect(store.filterNew([withDoi, withPdf, failed])).toEqual([withDoi, withPdf, failed]);
    });

    it('should persist marked keys for the next run', () => {
        expect(new SeenStore(dir).markSeen([withDoi, withPdf, failed])).toBe(2);

        const reopened = new SeenStore(dir);
        expect(reopened.has('doi:10.1/a')).toBe(true);
        expect(reopened.has('arxiv:2301.1')).toBe(true);
        expect(reopened.filterNew([withDoi, withPdf, failed])).toEqual([failed]);
        expect(JSON.parse(readFileSync(join(dir, 'seen.json'), 'utf-8'))).toEqual(['doi:10.1/a', 'arxiv:2301.1']);
    });

    it('should only record results with an OA location when asked', () => {
        const store = new SeenStore(dir);

        expect(store.markSeen([withDoi, withPdf], { downloadedOnly: true })).toBe(1);
        expect(store.has('doi:10.1/a')).toBe(false);
    });

    it('should not write the ledger when nothing was added', () => {
        expect(new SeenStore(dir).markSeen([failed])).toBe(0);
        expect(existsSync(join(dir, 'seen.json'))).toBe(false);
    });

    it('should start empty from a corrupt or non-array ledger', () => {
        writeFileSync(join(dir, 'seen.json'), '{not json');
        expect(new SeenStore(dir).size).toBe(0);

        writeFileSync(join(dir, 'seen.json'), '{"a": 1}');
        expect(new SeenStore(dir).size).toBe(0);
    });
});
