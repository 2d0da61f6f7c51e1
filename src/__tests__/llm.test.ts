import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    LlmMetadataExtractor,
    buildExtractionPrompt,
    cleanJsonResponse,
    createExtractor,
    parseExtraction,
} from '../llm/metadata-extractor.js';
import { OllamaProvider } from '../llm/ollama.js';
import { DEFAULT_CONFIG, type LlmProvider, type WeakMetadata } from '../types/index.js';
import { stubFetch, fastClient, json } from './helpers.js';

const weak: WeakMetadata = { title: 'Weak Title', authors: [], doi: '10.1/w', abstract: null };

function fakeProvider(complete: LlmProvider['complete']): LlmProvider {
    return { name: 'fake', complete };
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('cleanJsonResponse', () => {
    it('should strip a json fence and anything after it', () => {
        expect(cleanJsonResponse('Here you go:\n```json\n{"a": 1}\n```\nThanks')).toBe('{"a": 1}');
    });

    it('should strip a bare fence', () => {
        expect(cleanJsonResponse('```\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should pass plain replies through trimmed', () => {
        expect(cleanJsonResponse('  {"a": 1}  ')).toBe('{"a": 1}');
    });
});

describe('parseExtraction', () => {
    it('should map reply fields onto a record', () => {
        const reply = '```json\n{"title": "Rock Physics", "authors": ["Ann Lee", 7], "publication_year": 2021, "journal": "Rock Journal", "keywords": ["rocks"]}\n```';

        expect(parseExtraction(reply, weak)).toMatchObject({
            title: 'Rock Physics',
            authors: ['Ann Lee'],
            doi: '10.1/w',
            year: 2021,
            venue: 'Rock Journal',
            abstract: null,
            keywords: ['rocks'],
        });
    });

    it('should fall back to the weak title and authors', () => {
        const meta = parseExtraction('{"title": "", "authors": [], "publication_year": "2019"}', {
            ...weak,
            authors: ['Jane Roe'],
        });

        expect(meta?.title).toBe('Weak Title');
        expect(meta?.authors).toEqual(['Jane Roe']);
        expect(meta?.year).toBe(2019);
    });

    it('should reject replies that are not JSON objects', () => {
        expect(parseExtraction('I could not find anything.', weak)).toBeNull();
        expect(parseExtraction('["a", "b"]', weak)).toBeNull();
    });
});

describe('buildExtractionPrompt', () => {
    it('should include the weak fields and truncate the content', () => {
        const prompt = buildExtractionPrompt('x'.repeat(5000), { ...weak, authors: ['A', 'B'] });

        expect(prompt).toContain('Title: Weak Title\nAuthors: A, B\nDOI: 10.1/w\nAbstract: \n');
        expect(prompt).toContain(`Content (truncated): ${'x'.repeat(3000)}\n`);
        expect(prompt).not.toContain('x'.repeat(3001));
    });
});

describe('LlmMetadataExtractor', () => {
    it('should parse the completion text', async () => {
        const complete = vi.fn<LlmProvider['complete']>().mockResolvedValue({
            text: '{"authors": ["Ann Lee"], "abstract": "About rocks."}',
            model: 'test-model',
            provider: 'fake',
        });
        const extractor = new LlmMetadataExtractor(fakeProvider(complete));

        const meta = await extractor.extract('raw text', weak);

        expect(meta?.authors).toEqual(['Ann Lee']);
        expect(meta?.abstract).toBe('About rocks.');
        expect(complete).toHaveBeenCalledWith(buildExtractionPrompt('raw text', weak), { temperature: 0.1 });
    });

    it('should resolve to null when the backend has no completion', async () => {
        const extractor = new LlmMetadataExtractor(fakeProvider(async () => null));

        expect(await extractor.extract('raw text', weak)).toBeNull();
    });

    it('should resolve to null when the backend throws', async () => {
        const extractor = new LlmMetadataExtractor(fakeProvider(async () => {
            throw new Error('connection refused');
        }));

        expect(await extractor.extract('raw text', weak)).toBeNull();
    });
});

describe('OllamaProvider', () => {
    it('should post a non-streaming generate request', async () => {
        const mockFetch = stubFetch([{ match: '/api/generate', replies: [json({ model: 'llama2', response: '{"a": 1}', done: true })] }]);
        const provider = new OllamaProvider(fastClient(), { baseUrl: 'http://ollama.local:11434/', model: 'llama2' });

        const completion = await provider.complete('hi');

        expect(completion).toEqual({ text: '{"a": 1}', model: 'llama2', provider: 'ollama' });
        const [url, init] = mockFetch.mock.calls[0] ?? [];
        expect(url).toBe('http://ollama.local:11434/api/generate');
        expect(init?.method).toBe('POST');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'llama2',
            prompt: 'hi',
            stream: false,
            options: { temperature: 0.1 },
        });
    });

    it('should return null for an empty completion', async () => {
        stubFetch([{ match: '/api/generate', replies: [json({ response: '   ' })] }]);
        const provider = new OllamaProvider(fastClient(), { model: 'llama2' });

        expect(await provider.complete('hi')).toBeNull();
    });

    it('should return null when the server answers with an error', async () => {
        stubFetch([]);
        const provider = new OllamaProvider(fastClient(), { model: 'llama2' });

        expect(await provider.complete('hi')).toBeNull();
    });
});

describe('createExtractor', () => {
    it('should return null when extraction is disabled', () => {
        expect(createExtractor(DEFAULT_CONFIG.llm)).toBeNull();
    });

    it('should build an Ollama-backed extractor by default', () => {
        expect(createExtractor({ ...DEFAULT_CONFIG.llm, enabled: true })).toBeInstanceOf(LlmMetadataExtractor);
    });

    it('should require an API key for OpenAI', () => {
        expect(createExtractor({ ...DEFAULT_CONFIG.llm, enabled: true, provider: 'openai' })).toBeNull();
        expect(
            createExtractor({ ...DEFAULT_CONFIG.llm, enabled: true, provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-key' })
        ).toBeInstanceOf(LlmMetadataExtractor);
    });
});
