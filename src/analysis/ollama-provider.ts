import { z } from 'zod';
import type {
    LlmCompletionParams,
    LlmCompletionResult,
    LlmHealthReport,
    LlmProvider,
    LlmProviderOptions,
} from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { SourceError, errorMessage } from '../utils/errors.js';

/**
 * Non-streaming `/api/generate` answer. Token counts are absent when the
 * prompt was served from Ollama's context cache.
 */
const generateResponseSchema = z.object({
    model: z.string(),
    response: z.string(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

const tagsResponseSchema = z.object({
    models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Local Ollama server.
 *
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly model: string;
    private readonly baseUrl: string;
    private readonly temperature: number;
    private readonly topP: number;
    private readonly timeoutMs: number;
    private httpClient: HttpClient;

    constructor(options: LlmProviderOptions & { httpClient?: HttpClient }) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.model = options.model;
        this.temperature = options.temperature ?? 0.7;
        this.topP = options.topP ?? 0.9;
        this.timeoutMs = options.timeoutMs ?? 120_000;
        this.httpClient = options.httpClient ?? getHttpClient();
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.model;
        const options: Record<string, number> = {
            temperature: params.temperature ?? this.temperature,
            top_p: params.topP ?? this.topP,
        };
        if (params.maxTokens !== undefined) {
            options['num_predict'] = params.maxTokens;
        }

        const body: Record<string, unknown> = { model, prompt, stream: false, options };
        if (params.systemPrompt) {
            body['system'] = params.systemPrompt;
        }

        getLogger().debug({ model, promptLength: prompt.length }, 'Ollama generate');

        const response = await this.httpClient.post<unknown>(`${this.baseUrl}/api/generate`, body, {
            source: 'ollama',
            timeout: this.timeoutMs,
        });

        const parsed = generateResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new SourceError('Unexpected response from Ollama /api/generate', this.name);
        }

        const promptTokens = parsed.data.prompt_eval_count ?? 0;
        const completionTokens = parsed.data.eval_count ?? 0;

        return {
            text: parsed.data.response,
            usage: {
                promptTokens,
                completionTokens,
                totalTokens: promptTokens + completionTokens,
            },
            model: parsed.data.model,
            provider: this.name,
        };
    }

    /**
     * Healthy when the server answers and has the configured model pulled.
     */
    async checkHealth(): Promise<LlmHealthReport> {
        try {
            const response = await this.httpClient.get<unknown>(`${this.baseUrl}/api/tags`, {
                source: 'ollama',
                timeout: 5000,
            });

            const parsed = tagsResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                return { status: 'unhealthy', model: this.model, error: 'Unexpected response from Ollama /api/tags' };
            }

            const names = parsed.data.models.map((entry) => entry.name);
            if (!names.some((name) => modelMatches(name, this.model))) {
                return { status: 'unhealthy', model: this.model, error: `Model ${this.model} is not available` };
            }

            return { status: 'healthy', model: this.model };
        } catch (error) {
            getLogger().error({ err: error }, 'Ollama health check failed');
            return { status: 'unhealthy', model: this.model, error: errorMessage(error) };
        }
    }
}

/**
 * `llama3.2` and `llama3.2:latest` name the same model.
 */
export function modelMatches(installed: string, wanted: string): boolean {
    const withTag = (name: string) => (name.includes(':') ? name : `${name}:latest`);
    return withTag(installed) === withTag(wanted);
}
