import { InvalidArgumentError } from 'commander';
import type { LlmProviderName, LogLevel } from '../types/index.js';
import type { ConfigOverrides } from '../utils/config.js';

/**
 * Options shared by every run command.
 */
export interface RunOptions {
    maxResults: number;
    download?: boolean;
    newOnly?: boolean;
    reportOnly?: boolean;
    output?: string;
    outputDir?: string;
    config?: string;
    email?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    enableLlm?: boolean;
    llmProvider?: LlmProviderName;
    llmModel?: string;
    llmBaseUrl?: string;
}

export const DEFAULT_MAX_RESULTS = 50;

/**
 * commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/**
 * Map parsed CLI options onto the highest-precedence config layer.
 * Flags that were not given stay undefined so lower layers show through.
 */
export function toConfigOverrides(opts: RunOptions): ConfigOverrides {
    return {
        contactEmail: opts.email,
        outputDir: opts.outputDir,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs || undefined,
        llm: {
            enabled: opts.enableLlm || undefined,
            provider: opts.llmProvider,
            model: opts.llmModel,
            baseUrl: opts.llmBaseUrl,
        },
    };
}

/**
 * Per-topic share of the result budget: an even split when topics were
 * given on the command line, the whole budget for configured topics.
 */
export function perTopicBudget(maxResults: number, topicCount: number, fromCommandLine: boolean): number {
    if (!fromCommandLine || topicCount === 0) return maxResults;
    return Math.max(1, Math.floor(maxResults / topicCount));
}
