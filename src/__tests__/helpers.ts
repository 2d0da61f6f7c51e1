import { vi, type Mock } from 'vitest';
import { HttpClient, type HttpClientOptions } from '../utils/http-client.js';

/**
 * One canned HTTP reply.
 */
export interface FakeReply {
    status?: number;
    json?: unknown;
    text?: string;
    bytes?: Uint8Array;
    headers?: Record<string, string>;
}

/**
 * A URL substring (or pattern) and the replies served for it, in order.
 * The last reply repeats once the list is exhausted.
 */
export interface FakeRoute {
    match: string | RegExp;
    replies: FakeReply[];
}

export type FetchMock = Mock<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>;

/**
 * Replace global fetch with a router over canned replies. Unmatched URLs get a 404.
 * Call `vi.unstubAllGlobals()` in afterEach.
 */
export function stubFetch(routes: FakeRoute[]): FetchMock {
    const served = new Map<FakeRoute, number>();

    const mock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>(async (input) => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
        const route = routes.find((r) => (typeof r.match === 'string' ? url.includes(r.match) : r.match.test(url)));
        if (!route || route.replies.length === 0) {
            return new Response('not found', { status: 404, statusText: 'Not Found' });
        }

        const index = served.get(route) ?? 0;
        served.set(route, index + 1);
        const reply = route.replies[Math.min(index, route.replies.length - 1)] ?? {};
        return toResponse(reply);
    });

    vi.stubGlobal('fetch', mock);
    return mock;
}

/**
 * URLs requested through a fetch mock, in call order.
 */
export function requestedUrls(mock: FetchMock): string[] {
    return mock.mock.calls.map(([input]) => (typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url));
}

/**
 * A gateway with a 1 ms interval and no retries unless asked for.
 */
export function fastClient(options: HttpClientOptions = {}): HttpClient {
    return new HttpClient({ rateLimitPerSecond: 1000, maxRetries: 0, ...options });
}

export function json(data: unknown, status = 200): FakeReply {
    return { status, json: data };
}

export function atom(xml: string): FakeReply {
    return { text: xml, headers: { 'content-type': 'application/atom+xml; charset=utf-8' } };
}

export function status(code: number, headers: Record<string, string> = {}): FakeReply {
    return { status: code, text: '', headers };
}

function toResponse(reply: FakeReply): Response {
    const init = { status: reply.status ?? 200, statusText: 'Fake', headers: { ...reply.headers } };
    if (reply.json !== undefined) {
        return new Response(JSON.stringify(reply.json), {
            ...init,
            headers: { 'content-type': 'application/json', ...reply.headers },
        });
    }
    if (reply.bytes !== undefined) {
        return new Response(reply.bytes, init);
    }
    return new Response(reply.text ?? '', init);
}

/**
 * Atom feed with one entry per item.
 */
export function arxivFeed(entries: Array<{ id: string; title: string; doi?: string; published?: string; authors?: string[] }>): string {
    const body = entries
        .map((e) => `
  <entry>
    <id>http://arxiv.org/abs/${e.id}</id>
    <published>${e.published ?? '2023-01-02T10:00:00Z'}</published>
    <title>${e.title}</title>
    <summary>Summary of ${e.title}.</summary>
    ${(e.authors ?? ['Jane Roe']).map((name) => `<author><name>${name}</name></author>`).join('\n    ')}
    ${e.doi ? `<arxiv:doi>${e.doi}</arxiv:doi>` : ''}
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
  </entry>`)
        .join('');

    return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:arxiv="http://arxiv.org/schemas/atom">
  <title>arXiv Query</title>${body}
</feed>`;
}
