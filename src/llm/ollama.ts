import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isRecord } from '../sources/utils.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

interface OllamaGenerateResponse {
    model?: string;
    response?: string;
    done?: boolean;
}

/**
 * Local Ollama server, non-streaming `/api/generate`.
 *
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly timeoutMs?: number;

    constructor(
        private readonly httpClient: HttpClient,
        options: LlmProviderOptions
    ) {
        this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.model = options.model;
        this.timeoutMs = options.timeoutMs;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult | null> {
        const { model } = this;
        const response = await this.httpClient.post<OllamaGenerateResponse>(
            `${this.baseUrl}/api/generate`,
            {
                model,
                prompt,
                stream: false,
                options: { temperature: params.temperature ?? 0.1 },
            },
            { source: 'ollama', timeoutMs: this.timeoutMs }
        );
        if (!response.ok) return null;

        const text = isRecord(response.data) ? response.data.response : undefined;
        if (typeof text !== 'string' || !text.trim()) {
            getLogger().warn({ model }, 'Ollama returned an empty completion');
            return null;
        }

        return { text, model, provider: this.name };
    }
}
