/**
 * Interface for LLM provider adapters.
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Model used when a request does not name one */
    readonly model: string;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The prompt to send
     * @param params - Additional parameters (temperature, max_tokens, etc.)
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check whether the provider can serve the default model.
     */
    checkHealth(): Promise<LlmHealthReport>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Nucleus sampling cutoff */
    topP?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

export type LlmHealthReport =
    | { status: 'healthy'; model: string }
    | { status: 'unhealthy'; model: string; error: string };

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** Base URL of the provider's HTTP API */
    baseUrl: string;
    /** Default model */
    model: string;
    /** Default sampling temperature */
    temperature?: number;
    /** Default nucleus sampling cutoff */
    topP?: number;
    /** Per-request timeout */
    timeoutMs?: number;
}
