import OpenAI from 'openai';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * OpenAI chat completions (or any compatible endpoint given by `baseUrl`).
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        this.model = options.model;
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            maxRetries: 1,
        });
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult | null> {
        const { model } = this;

        try {
            const completion = await this.client.chat.completions.create({
                model,
                messages: [{ role: 'user', content: prompt }],
                temperature: params.temperature ?? 0.1,
            });

            const text = completion.choices[0]?.message.content;
            if (!text) {
                getLogger().warn({ model }, 'OpenAI returned an empty completion');
                return null;
            }
            return { text, model: completion.model || model, provider: this.name };
        } catch (error) {
            getLogger().warn({ model, error: error instanceof Error ? error.message : String(error) }, 'OpenAI completion failed');
            return null;
        }
    }
}
