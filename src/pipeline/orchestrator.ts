import type { MetadataExtractor, PaperMetadata, PaperScoutConfig, ProcessingResult } from '../types/index.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { createMetadata, dedupKey, fillGaps, isWeak, withOpenAccess } from '../model/metadata.js';
import { isTerminal, ResultTracker, resultForRecord } from '../model/result.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { CrossrefAdapter } from '../sources/crossref.js';
import { UnpaywallAdapter } from '../sources/unpaywall.js';
import { OpenAlexAdapter } from '../sources/openalex.js';
import { CoreAdapter } from '../sources/core.js';
import { findDoi, normalizeDoi } from '../sources/utils.js';

/** Lower bound on the per-provider share of an ad-hoc search */
const MIN_PER_SOURCE = 5;

/**
 * The provider adapters the orchestrator fans out to.
 */
export interface ProviderAdapters {
    arxiv: ArxivAdapter;
    crossref: CrossrefAdapter;
    unpaywall: UnpaywallAdapter;
    openalex: OpenAlexAdapter;
    core: CoreAdapter;
}

export interface OrchestratorOptions {
    /** Unpaywall is only consulted when a contact email is configured */
    contactEmail?: string;
    extractor?: MetadataExtractor | null;
}

/**
 * Resolution orchestrator.
 *
 * Pipeline per query:
 * 1. Query arXiv, Crossref, then OpenAlex (sequentially, one shared gateway)
 * 2. Normalize and drop cross-provider duplicates by dedup key
 * 3. Optionally fill gaps of weak records through the metadata extractor
 * 4. Resolve OA status: Unpaywall, then the OpenAlex fallback
 * 5. Assign the final state: completed with an OA location, metadata_extracted without
 */
export class ResolutionOrchestrator {
    private readonly contactEmail: string;
    private readonly extractor: MetadataExtractor | null;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly adapters: ProviderAdapters,
        options: OrchestratorOptions = {}
    ) {
        this.contactEmail = options.contactEmail ?? '';
        this.extractor = options.extractor ?? null;
    }

    /**
     * Search arXiv, Crossref and OpenAlex for one query.
     * Provider order decides which duplicate survives and how the list is truncated.
     */
    async searchAdHoc(query: string, maxResults = 50): Promise<ProcessingResult[]> {
        const perSource = Math.max(Math.floor(maxResults / 3), MIN_PER_SOURCE);
        getLogger().info({ query, maxResults, perSource }, 'Ad-hoc search');

        const { arxiv, crossref, openalex } = this.adapters;
        const seen = new Set<string>();
        const results: ProcessingResult[] = [];

        const claim = (meta: PaperMetadata): boolean => {
            const key = dedupKey(meta);
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        };

        // arXiv records are complete as returned
        for (const entry of await arxiv.search(query, perSource)) {
            const meta = arxiv.toMetadata(entry);
            if (!meta || !claim(meta)) continue;
            results.push(resultForRecord(identifierFor(meta), meta));
        }

        for (const item of await crossref.search(query, perSource)) {
            const meta = crossref.toMetadata(item);
            if (!meta || !claim(meta)) continue;
            const enriched = await this.enrichWeak(meta, item);
            results.push(resultForRecord(identifierFor(enriched), await this.enrichOA(enriched)));
        }

        for (const work of await openalex.search(query, perSource)) {
            const meta = openalex.toMetadata(work);
            if (!meta || !claim(meta)) continue;
            const enriched = await this.enrichWeak(meta, work);
            const resolved = enriched.oa_url ? enriched : await this.enrichOA(enriched);
            results.push(resultForRecord(identifierFor(resolved), resolved));
        }

        getLogger().info({ query, found: results.length }, 'Ad-hoc search complete');
        return results.slice(0, maxResults);
    }

    /**
     * One ad-hoc search per topic, concatenated in topic order.
     */
    async searchByTopics(topics: readonly string[], maxPerTopic = 20): Promise<ProcessingResult[]> {
        const results: ProcessingResult[] = [];
        for (const topic of topics) {
            getLogger().info({ topic }, 'Topic search');
            results.push(...(await this.searchAdHoc(topic, maxPerTopic)));
        }
        return results;
    }

    /**
     * Search the CORE full-text index.
     */
    async searchFullText(query: string, maxResults = 50): Promise<ProcessingResult[]> {
        const { core } = this.adapters;
        const seen = new Set<string>();
        const results: ProcessingResult[] = [];

        for (const work of await core.search(query, maxResults)) {
            const meta = core.toMetadata(work);
            if (!meta) continue;
            const key = dedupKey(meta);
            if (seen.has(key)) continue;
            seen.add(key);
            results.push(resultForRecord(identifierFor(meta), meta));
        }

        return results.slice(0, maxResults);
    }

    /**
     * Resolve OA status for a record with a DOI.
     * Unpaywall is authoritative when reachable; OpenAlex's is-OA flag is the fallback.
     * Never rejects: any failure returns the record unchanged.
     */
    async enrichOA(record: PaperMetadata): Promise<PaperMetadata> {
        const { doi } = record;
        if (!doi) return record;

        const { unpaywall, openalex } = this.adapters;
        try {
            if (this.contactEmail) {
                const found = await unpaywall.lookupByDoi(doi);
                if (found) {
                    return withOpenAccess(record, unpaywall.toOpenAccess(found));
                }
            }

            const work = await openalex.lookupByDoi(doi);
            const oa = work ? openalex.toOpenAccess(work) : null;
            if (oa) {
                return withOpenAccess(record, oa);
            }
        } catch (error) {
            getLogger().warn({ doi, error: describe(error) }, 'OA resolution failed');
        }

        return record;
    }

    /**
     * Resolve a single DOI or URL. Never rejects: every failure becomes a FAILED result.
     */
    async processEntry(identifier: string): Promise<ProcessingResult> {
        const entry = identifier.trim();
        const isUrl = entry.startsWith('http');
        const retriesBefore = this.httpClient.getRetryCount();
        const tracker = new ResultTracker(isUrl ? entry : `https://doi.org/${entry}`);

        try {
            tracker.triaged();
            if (isUrl) {
                await this.processUrl(entry, tracker);
            } else {
                await this.processDoi(entry, tracker);
            }
        } catch (error) {
            getLogger().error({ identifier: entry, error: describe(error) }, 'Error processing entry');
            if (!isTerminal(tracker.current)) {
                tracker.fail(describe(error));
            }
        }

        return tracker.toResult(this.httpClient.getRetryCount() - retriesBefore);
    }

    /**
     * Process identifiers in order, one result per entry.
     */
    async processPaperList(entries: readonly string[]): Promise<ProcessingResult[]> {
        getLogger().info({ count: entries.length }, 'Processing paper list');
        const results: ProcessingResult[] = [];
        for (const entry of entries) {
            results.push(await this.processEntry(entry));
        }
        return results;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async processDoi(doi: string, tracker: ResultTracker): Promise<void> {
        const found = normalizeDoi(findDoi(doi));
        if (!found) {
            tracker.fail('Not a DOI');
            return;
        }

        const { crossref } = this.adapters;
        const item = await crossref.lookupByDoi(found);
        if (!item) {
            tracker.fail('DOI not found in Crossref');
            return;
        }

        const meta = crossref.toMetadata(item);
        if (!meta) {
            tracker.fail('Not a citable article');
            return;
        }

        const enriched = await this.enrichWeak(meta, item);
        tracker.extracted(enriched);
        tracker.resolved(await this.enrichOA(enriched));
    }

    private async processUrl(url: string, tracker: ResultTracker): Promise<void> {
        const preprint = this.adapters.arxiv.recordFromUrl(url);
        if (preprint) {
            tracker.extracted(preprint).resolved(preprint);
            return;
        }

        const doi = findDoi(url);
        if (doi) {
            await this.processDoi(doi, tracker);
            return;
        }

        tracker.extracted(createMetadata({ title: url }));
    }

    /**
     * Fill the gaps of a weak record from the provider's raw item.
     */
    private async enrichWeak(meta: PaperMetadata, raw: unknown): Promise<PaperMetadata> {
        if (!this.extractor || !isWeak(meta)) return meta;

        const extracted = await this.extractor.extract(JSON.stringify(raw), {
            title: meta.title,
            authors: meta.authors,
            doi: meta.doi,
            abstract: meta.abstract,
        });
        if (!extracted) return meta;

        getLogger().debug({ title: meta.title }, 'Filled weak record from extractor');
        return fillGaps(meta, extracted);
    }
}

/**
 * Wire the gateway and every adapter from the resolved configuration.
 */
export function createOrchestrator(
    config: PaperScoutConfig,
    options: { extractor?: MetadataExtractor | null; httpClient?: HttpClient } = {}
): ResolutionOrchestrator {
    const { extractor, httpClient = createHttpClient(config) } = options;
    const email = config.contactEmail || undefined;

    return new ResolutionOrchestrator(
        httpClient,
        {
            arxiv: new ArxivAdapter(httpClient),
            crossref: new CrossrefAdapter(httpClient, { email }),
            unpaywall: new UnpaywallAdapter(httpClient, { email }),
            openalex: new OpenAlexAdapter(httpClient, { email }),
            core: new CoreAdapter(httpClient, { apiKey: config.coreApiKey }),
        },
        { contactEmail: config.contactEmail, extractor }
    );
}

/**
 * arXiv abstract URL, else DOI resolver URL, else empty.
 */
function identifierFor(meta: PaperMetadata): string {
    if (meta.arxiv_id) return `https://arxiv.org/abs/${meta.arxiv_id}`;
    if (meta.doi) return `https://doi.org/${meta.doi}`;
    return '';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
