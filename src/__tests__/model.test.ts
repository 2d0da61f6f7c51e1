import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, OaStatus, ProcessingState } from '../types/index.js';
import { createMetadata, withOpenAccess, fillGaps, isWeak, dedupKey, InvalidMetadataError } from '../model/metadata.js';
import { ResultTracker, StateTransitionError, canTransition, isTerminal, resultForRecord } from '../model/result.js';

describe('PaperMetadata', () => {
    describe('createMetadata', () => {
        it('should normalize title, DOI, year and keywords', () => {
            const meta = createMetadata({
                title: '  Rock\n  Mechanics ',
                doi: 'https://doi.org/10.1234/ABC',
                year: '2019-05-01',
                keywords: ['rocks', ' rocks ', 'mechanics', ''],
                authors: [' Ann Lee ', ''],
            });

            expect(meta.title).toBe('Rock Mechanics');
            expect(meta.doi).toBe('10.1234/abc');
            expect(meta.year).toBe(2019);
            expect(meta.keywords).toEqual(['rocks', 'mechanics']);
            expect(meta.authors).toEqual(['Ann Lee']);
            expect(Object.isFrozen(meta)).toBe(true);
        });

        it('should reject an empty title', () => {
            expect(() => createMetadata({ title: '   ' })).toThrow(InvalidMetadataError);
        });

        it('should never keep an OA location on a closed record', () => {
            const meta = createMetadata({ title: 'T', oa_status: OaStatus.CLOSED, oa_url: 'https://x.example/a.pdf' });
            expect(meta.oa_url).toBeNull();
        });

        it('should default the status source to provider when a status is set', () => {
            expect(createMetadata({ title: 'T', oa_status: OaStatus.GOLD }).oa_status_source).toBe('provider');
            expect(createMetadata({ title: 'T' }).oa_status_source).toBeNull();
        });
    });

    describe('withOpenAccess', () => {
        it('should return a new record with the OA fields replaced', () => {
            const original = createMetadata({ title: 'T', doi: '10.1/x', license: 'cc0' });

            const updated = withOpenAccess(original, {
                status: OaStatus.GREEN,
                url: 'https://repo.example/x.pdf',
                license: null,
                source: 'approximated',
            });

            expect(updated).not.toBe(original);
            expect(original.oa_status).toBeNull();
            expect(updated).toMatchObject({
                title: 'T',
                doi: '10.1/x',
                oa_status: OaStatus.GREEN,
                oa_url: 'https://repo.example/x.pdf',
                oa_status_source: 'approximated',
                license: 'cc0',
            });
        });
    });

    describe('fillGaps', () => {
        it('should fill missing fields but keep title, DOI and OA fields', () => {
            const weak = createMetadata({ title: 'Original', doi: '10.1/x', oa_status: OaStatus.BRONZE, oa_url: 'https://a.example' });
            const extracted = createMetadata({
                title: 'Other',
                doi: '10.9/other',
                authors: ['Ann Lee'],
                year: 2020,
                abstract: 'Found it.',
                oa_status: OaStatus.GOLD,
            });

            const filled = fillGaps(weak, extracted);

            expect(filled).toMatchObject({
                title: 'Original',
                doi: '10.1/x',
                authors: ['Ann Lee'],
                year: 2020,
                abstract: 'Found it.',
                oa_status: OaStatus.BRONZE,
                oa_url: 'https://a.example',
            });
            expect(isWeak(weak)).toBe(true);
            expect(isWeak(filled)).toBe(false);
        });
    });

    describe('dedupKey', () => {
        it('should prefer DOI, then arXiv ID, then normalized title', () => {
            expect(dedupKey(createMetadata({ title: 'A', doi: '10.1/X', arxiv_id: '2301.1' }))).toBe('doi:10.1/x');
            expect(dedupKey(createMetadata({ title: 'A', arxiv_id: '2301.00001' }))).toBe('arxiv:2301.00001');
            expect(dedupKey(createMetadata({ title: 'Deep-Learning: A Survey' }))).toBe('title:deep learning a survey');
        });
    });
});

describe('ProcessingResult', () => {
    const meta = createMetadata({ title: 'T', doi: '10.1/x' });
    const openMeta = createMetadata({ title: 'T', doi: '10.1/x', oa_status: OaStatus.GOLD, oa_url: 'https://a.example/t.pdf' });

    it('should allow only forward moves and failure from non-terminal states', () => {
        expect(canTransition(ProcessingState.NEW, ProcessingState.TRIAGED)).toBe(true);
        expect(canTransition(ProcessingState.METADATA_EXTRACTED, ProcessingState.TRIAGED)).toBe(false);
        expect(canTransition(ProcessingState.TRIAGED, ProcessingState.FAILED)).toBe(true);
        expect(canTransition(ProcessingState.COMPLETED, ProcessingState.FAILED)).toBe(false);
        expect(isTerminal(ProcessingState.FAILED)).toBe(true);
        expect(isTerminal(ProcessingState.OA_VERIFIED)).toBe(false);
    });

    it('should finish as completed when an OA location was resolved', () => {
        const result = new ResultTracker('https://doi.org/10.1/x').triaged().extracted(meta).resolved(openMeta).toResult(2);

        expect(result.state).toBe(ProcessingState.COMPLETED);
        expect(result.metadata).toBe(openMeta);
        expect(result.retry_count).toBe(2);
        expect(result.error_message).toBeUndefined();
        expect(Object.isFrozen(result)).toBe(true);
    });

    it('should stay at metadata_extracted without an OA location', () => {
        expect(resultForRecord('', meta).state).toBe(ProcessingState.METADATA_EXTRACTED);
        expect(resultForRecord('', openMeta).state).toBe(ProcessingState.COMPLETED);
    });

    it('should carry an error message and no metadata when failed', () => {
        const result = new ResultTracker('10.1/x').triaged().extracted(meta).fail('boom').toResult();

        expect(result.state).toBe(ProcessingState.FAILED);
        expect(result.error_message).toBe('boom');
        expect(result.metadata).toBeUndefined();
    });

    it('should reject moves out of a terminal state', () => {
        const tracker = new ResultTracker('x').triaged().extracted(openMeta).resolved(openMeta);
        expect(() => tracker.fail('late')).toThrow(StateTransitionError);
        expect(() => tracker.fail('late')).toThrow('Illegal state transition: completed -> failed');
    });

    it('should reject resolving before extraction', () => {
        expect(() => new ResultTracker('x').triaged().resolved(meta)).toThrow(StateTransitionError);
    });

    it('should measure elapsed time with the given clock', () => {
        let now = 1000;
        const tracker = new ResultTracker('x', () => now).triaged();
        now = 1250;
        expect(tracker.toResult().elapsed_ms).toBe(250);
    });
});

describe('DEFAULT_CONFIG', () => {
    it('should throttle to one request per second by default', () => {
        expect(DEFAULT_CONFIG.rateLimitPerSecond).toBe(1);
        expect(DEFAULT_CONFIG.maxRetries).toBe(3);
    });

    it('should have LLM disabled by default', () => {
        expect(DEFAULT_CONFIG.llm.enabled).toBe(false);
        expect(DEFAULT_CONFIG.llm.provider).toBe('ollama');
    });
});
