import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { collectIdentifiers, loadPaperList, parsePaperList } from '../pipeline/paper-list.js';

describe('parsePaperList', () => {
    it('should list DOIs as resolver URLs before other URLs', () => {
        const text = [
            '10.1016/j.oregeorev.2018.12.018',
            'https://arxiv.org/abs/2301.12345',
            'https://doi.org/10.1234/xyz',
        ].join('\n');

        expect(parsePaperList(text)).toEqual([
            'https://doi.org/10.1016/j.oregeorev.2018.12.018',
            'https://doi.org/10.1234/xyz',
            'https://arxiv.org/abs/2301.12345',
        ]);
    });

    it('should trim punctuation trailing an identifier', () => {
        expect(parsePaperList('As shown before (see 10.1234/abc).')).toEqual(['https://doi.org/10.1234/abc']);
        expect(parsePaperList('Read https://example.org/paper, then stop.')).toEqual(['https://example.org/paper']);
    });

    it('should keep first-seen order without duplicates', () => {
        expect(parsePaperList('10.1234/abc 10.5678/def 10.1234/abc')).toEqual([
            'https://doi.org/10.1234/abc',
            'https://doi.org/10.5678/def',
        ]);
    });

    it('should return nothing for text without identifiers', () => {
        expect(parsePaperList('just some notes')).toEqual([]);
    });
});

describe('collectIdentifiers', () => {
    it('should walk every string leaf of a nested tree', () => {
        const tree = {
            reading: ['10.1234/abc', { link: 'https://arxiv.org/abs/2301.12345' }],
            count: 2,
            done: false,
            extra: null,
            notes: 'also 10.1234/abc',
        };

        expect(collectIdentifiers(tree)).toEqual([
            'https://doi.org/10.1234/abc',
            'https://arxiv.org/abs/2301.12345',
        ]);
    });
});

describe('loadPaperList', () => {
    let dir: string;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), 'paperscout-list-'));
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should scan plain text files', async () => {
        const path = join(dir, 'papers.txt');
        writeFileSync(path, '10.1234/abc\nhttps://example.org/paper\n');

        expect(await loadPaperList(path)).toEqual(['https://doi.org/10.1234/abc', 'https://example.org/paper']);
    });

    it('should walk YAML files as trees', async () => {
        const path = join(dir, 'papers.yaml');
        writeFileSync(path, 'papers:\n  - doi: 10.1234/abc\n  - url: https://arxiv.org/abs/2301.12345\n');

        expect(await loadPaperList(path)).toEqual([
            'https://doi.org/10.1234/abc',
            'https://arxiv.org/abs/2301.12345',
        ]);
    });

    it('should walk JSON files as trees', async () => {
        const path = join(dir, 'papers.json');
        writeFileSync(path, JSON.stringify({ items: [{ doi: '10.5678/def' }, 'https://example.org/paper'] }));

        expect(await loadPaperList(path)).toEqual(['https://doi.org/10.5678/def', 'https://example.org/paper']);
    });

    it('should fall back to text when a structured file does not parse', async () => {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '{ "items": [10.1234/abc');

        expect(await loadPaperList(path)).toEqual(['https://doi.org/10.1234/abc']);
    });

    it('should return an empty list for a missing file', async () => {
        expect(await loadPaperList(join(dir, 'missing.txt'))).toEqual([]);
    });
});
