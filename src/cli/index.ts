#!/usr/bin/env node
import { existsSync } from 'node:fs';
import { Command, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { createOrchestrator, type ResolutionOrchestrator } from '../pipeline/orchestrator.js';
import { loadPaperList } from '../pipeline/paper-list.js';
import { createExtractor } from '../llm/metadata-extractor.js';
import { downloadArtifacts } from '../retrieval/downloader.js';
import { generateReport } from '../reporting/report.js';
import { saveResults } from '../exporters/export.js';
import { SeenStore } from '../storage/seen-store.js';
import { DEFAULT_MAX_RESULTS, parsePositiveInt, perTopicBudget, toConfigOverrides, type RunOptions } from './options.js';
import type { PaperScoutConfig, ProcessingResult } from '../types/index.js';

const VERSION = '1.0.0';

const SAMPLE_SIZE = 5;

type Search = (orchestrator: ResolutionOrchestrator, config: PaperScoutConfig) => Promise<ProcessingResult[]>;

const program = new Command();

program
    .name('paperscout')
    .description('Resolve scholarly metadata across providers and find open-access copies.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

withRunOptions(
    program
        .command('search')
        .description('Search arXiv, Crossref and OpenAlex for a query')
        .argument('<query>', 'Free-text query')
).action(async (query: string, opts: RunOptions) => {
    console.log(`Searching: ${query}`);
    await run(opts, (orchestrator) => orchestrator.searchAdHoc(query, opts.maxResults));
});

// ─── TOPICS command ───────────────────────────────────────

withRunOptions(
    program
        .command('topics')
        .description('Search each topic in turn (configured topics when none are given)')
        .argument('[topics...]', 'Topics to search')
).action(async (topics: string[], opts: RunOptions) => {
    await run(opts, (orchestrator, config) => {
        const list = topics.length > 0 ? topics : config.topics;
        if (list.length === 0) {
            getLogger().error('No topics given and none configured');
            process.exit(1);
        }
        console.log(`Searching ${list.length} topic(s): ${list.join(', ')}`);
        return orchestrator.searchByTopics(list, perTopicBudget(opts.maxResults, list.length, topics.length > 0));
    });
});

// ─── LIST command ─────────────────────────────────────────

withRunOptions(
    program
        .command('list')
        .description('Resolve every DOI and URL found in a text, JSON or YAML file')
        .argument('<file>', 'Paper list file')
).action(async (file: string, opts: RunOptions) => {
    if (!existsSync(file)) {
        console.error(`File not found: ${file}`);
        process.exit(1);
    }
    console.log(`Processing: ${file}`);
    await run(opts, async (orchestrator) => orchestrator.processPaperList(await loadPaperList(file)));
});

// ─── FULLTEXT command ─────────────────────────────────────

withRunOptions(
    program
        .command('fulltext')
        .description('Search the CORE full-text index (needs CORE_API_KEY)')
        .argument('<query>', 'Free-text query')
).action(async (query: string, opts: RunOptions) => {
    console.log(`Searching full text: ${query}`);
    await run(opts, (orchestrator) => orchestrator.searchFullText(query, opts.maxResults));
});

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'paperscout failed');
    process.exit(1);
});

// ─── Private helpers ──────────────────────────────────────

function withRunOptions(command: Command): Command {
    return command
        .option('-m, --max-results <n>', 'Maximum results', parsePositiveInt, DEFAULT_MAX_RESULTS)
        .option('--download', 'Download open-access PDFs', false)
        .option('--new-only', 'Only report works not seen in earlier runs', false)
        .option('--report-only', 'Print the report without saving JSON', false)
        .option('-o, --output <file>', 'Results file name inside the output directory')
        .option('--output-dir <dir>', 'Directory for results, PDFs and the seen ledger')
        .option('-c, --config <path>', 'Config file path')
        .option('--email <email>', 'Contact email (enables Unpaywall)')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs', false)
        .option('--enable-llm', 'Fill weak records with LLM metadata extraction', false)
        .addOption(new Option('--llm-provider <provider>', 'LLM backend').choices(['ollama', 'openai']))
        .option('--llm-model <model>', 'LLM model name')
        .option('--llm-base-url <url>', 'Ollama server or OpenAI-compatible endpoint');
}

async function run(opts: RunOptions, search: Search): Promise<void> {
    let config: PaperScoutConfig;
    try {
        config = await resolveConfig(toConfigOverrides(opts), opts.config);
    } catch (error) {
        getLogger().error({ error, path: opts.config }, 'Failed to load config file');
        process.exit(1);
    }
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const logger = getLogger();

    const httpClient = createHttpClient(config);
    const orchestrator = createOrchestrator(config, { httpClient, extractor: createExtractor(config.llm) });

    let results = await search(orchestrator, config);
    if (results.length === 0) {
        console.log('No results found.');
        process.exit(1);
    }

    const seen = new SeenStore(config.outputDir);
    if (opts.newOnly) {
        const total = results.length;
        results = seen.filterNew(results);
        console.log(`${results.length} new papers (filtered from ${total})`);
        if (results.length === 0) {
            console.log('No new papers since last run.');
            return;
        }
    }

    console.log(`\nFound ${results.length} papers\n`);
    console.log(generateReport(results));

    if (opts.download) {
        const count = await downloadArtifacts(results, { outputDir: config.outputDir, httpClient });
        console.log(`\nDownloaded ${count} PDFs to ${config.outputDir}/`);
    }

    if (!opts.reportOnly) {
        const filePath = saveResults(results, config.outputDir, opts.output);
        console.log(`\nResults saved to: ${filePath}`);
    }

    seen.markSeen(results, { downloadedOnly: opts.download });
    logger.debug({ requests: httpClient.getAllRequestCounts(), retries: httpClient.getRetryCount() }, 'Run complete');

    printSample(results);
}

function printSample(results: readonly ProcessingResult[]): void {
    const sample = results.filter((r) => r.metadata).slice(0, SAMPLE_SIZE);
    if (sample.length === 0) return;

    console.log('\nSample Results:');
    sample.forEach((result, index) => {
        const meta = result.metadata;
        if (!meta) return;
        const tag = meta.oa_status ? ` [${meta.oa_status}]` : '';
        console.log(`  ${index + 1}. ${meta.title}${tag}`);
        if (meta.authors.length > 0) console.log(`     Authors: ${meta.authors.slice(0, 3).join(', ')}`);
        if (meta.doi) console.log(`     DOI: ${meta.doi}`);
        if (meta.oa_url) console.log(`     PDF: ${meta.oa_url}`);
        console.log('');
    });
}
