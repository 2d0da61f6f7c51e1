import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LlmConfig, type LogLevel, type PaperScoutConfig } from '../types/index.js';
import { isRecord } from '../sources/utils.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'paperscout';

/**
 * Partial configuration as given by one layer (file, env, CLI).
 */
export type ConfigOverrides = Partial<Omit<PaperScoutConfig, 'llm'>> & { llm?: Partial<LlmConfig> };

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Load configuration using cosmiconfig: an explicit path when given, else
 * paperscout.config.{json,yaml,yml} or .paperscoutrc in the working directory.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(configPath?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: [
            'paperscout.config.json',
            'paperscout.config.yaml',
            'paperscout.config.yml',
            '.paperscoutrc',
        ],
    });

    try {
        const result = configPath ? await explorer.load(configPath) : await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeConfig(result.config);
        }
    } catch (error) {
        if (configPath) throw error;
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (env['PAPERSCOUT_EMAIL']) overrides.contactEmail = env['PAPERSCOUT_EMAIL'];
    if (env['CORE_API_KEY']) overrides.coreApiKey = env['CORE_API_KEY'];
    if (env['OPENAI_API_KEY']) overrides.llm = { apiKey: env['OPENAI_API_KEY'] };

    return overrides;
}

/**
 * Merge configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null>): PaperScoutConfig {
    let merged: PaperScoutConfig = { ...DEFAULT_CONFIG, llm: { ...DEFAULT_CONFIG.llm } };

    for (const layer of layers) {
        if (!layer) continue;
        const { llm, ...rest } = layer;
        merged = {
            ...merged,
            ...definedOnly(rest),
            llm: { ...merged.llm, ...definedOnly<Partial<LlmConfig>>(llm ?? {}) },
        };
    }

    return merged;
}

/**
 * Resolve the effective configuration for a run.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    configPath?: string
): Promise<PaperScoutConfig> {
    const fileConfig = await loadConfigFile(configPath);
    return mergeConfig(fileConfig, loadEnvVars(), cliFlags);
}

/**
 * Keep only the known, well-typed keys of a parsed config file.
 */
export function sanitizeConfig(raw: unknown): ConfigOverrides {
    if (!isRecord(raw)) return {};
    const config: ConfigOverrides = {};

    const num = (key: string): number | undefined => (typeof raw[key] === 'number' ? Number(raw[key]) : undefined);
    const str = (key: string): string | undefined => (typeof raw[key] === 'string' ? String(raw[key]) : undefined);

    config.rateLimitPerSecond = num('rateLimitPerSecond');
    config.maxRetries = num('maxRetries');
    config.timeoutMs = num('timeoutMs');
    config.userAgent = str('userAgent');
    config.contactEmail = str('contactEmail');
    config.coreApiKey = str('coreApiKey');
    config.outputDir = str('outputDir');

    const topics = raw['topics'];
    if (Array.isArray(topics)) {
        config.topics = topics.filter((t): t is string => typeof t === 'string');
    }

    const logLevel = raw['logLevel'];
    config.logLevel = LOG_LEVELS.find((level) => level === logLevel);
    const jsonLogs = raw['jsonLogs'];
    if (typeof jsonLogs === 'boolean') config.jsonLogs = jsonLogs;

    const llm = raw['llm'];
    if (isRecord(llm)) {
        const { enabled, provider, model, baseUrl, timeoutMs, apiKey } = llm;
        config.llm = {
            enabled: typeof enabled === 'boolean' ? enabled : undefined,
            provider: provider === 'ollama' || provider === 'openai' ? provider : undefined,
            model: typeof model === 'string' ? model : undefined,
            baseUrl: typeof baseUrl === 'string' ? baseUrl : undefined,
            timeoutMs: typeof timeoutMs === 'number' ? timeoutMs : undefined,
            apiKey: typeof apiKey === 'string' ? apiKey : undefined,
        };
    }

    return definedOnly(config);
}

function definedOnly<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}
