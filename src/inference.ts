// inference.ts - language-model backends behind one injectable interface

import { createLogger } from './logger';
import {
    DEFAULT_MODEL_ID,
    LIMITS,
    OLLAMA_BASE_URL,
    OLLAMA_MODEL,
    OPENROUTER_ENDPOINT,
} from './config';
import { ContextForgeError, InvalidConfigError, ProviderError, TimeoutError, sanitizeSnippet } from './structured_error';

const log = createLogger('inference');

// ============================================================================
// Types
// ============================================================================

export interface ModelConfig {
    model: string;
    temperature: number;
    max_tokens: number;
    system?: string;
}

/**
 * The only external call the pipeline makes. Implementations reject with
 * ProviderError (or TimeoutError) and must honour `signal` when given.
 */
export interface InferenceBackend {
    readonly id: string;
    infer(prompt: string, config: ModelConfig, signal?: AbortSignal): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

function isAbortError(e: unknown): boolean {
    return e instanceof Error && e.name === 'AbortError';
}

/** choices[0].message.content of an OpenAI-compatible response, or null. */
function extractChatCompletion(data: unknown): string | null {
    if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) return null;
    const choice: unknown = data.choices[0];
    if (!isRecord(choice) || !isRecord(choice.message)) return null;
    const content = choice.message.content;
    return typeof content === 'string' ? content : null;
}

async function postJson(
    backendId: string,
    fetchImpl: FetchLike,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    signal?: AbortSignal
): Promise<unknown> {
    let resp: Response;
    try {
        resp = await fetchImpl(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal,
        });
    } catch (e) {
        if (isAbortError(e)) {
            throw new ProviderError(backendId, 'request aborted', null, e);
        }
        throw new ProviderError(backendId, `network_error: ${sanitizeSnippet(errorMessage(e))}`, null, e);
    }

    const bodyText = await resp.text();
    if (!resp.ok) {
        log.warn('Provider returned error status', { backend: backendId, status: resp.status, body: sanitizeSnippet(bodyText) });
        throw new ProviderError(backendId, `HTTP ${resp.status}: ${sanitizeSnippet(bodyText)}`, resp.status);
    }

    try {
        return JSON.parse(bodyText);
    } catch (e) {
        throw new ProviderError(backendId, `provider_response_not_json: ${sanitizeSnippet(bodyText)}`, resp.status, e);
    }
}

// ============================================================================
// OpenRouter (OpenAI-compatible chat completions)
// ============================================================================

export interface OpenRouterBackendOptions {
    id?: string;
    apiKey?: string;
    endpoint?: string;
    fetchImpl?: FetchLike;
}

export class OpenRouterBackend implements InferenceBackend {
    readonly id: string;
    private readonly apiKey: string;
    private readonly endpoint: string;
    private readonly fetchImpl: FetchLike;

    constructor(options: OpenRouterBackendOptions = {}) {
        this.id = options.id ?? 'openrouter';
        this.apiKey = options.apiKey || process.env.OPENROUTER_API_KEY || '';
        this.endpoint = options.endpoint ?? OPENROUTER_ENDPOINT;
        this.fetchImpl = options.fetchImpl ?? fetch;
        if (!this.apiKey) {
            log.warn('No API key configured. Set OPENROUTER_API_KEY environment variable.', { backend: this.id });
        }
    }

    async infer(prompt: string, config: ModelConfig, signal?: AbortSignal): Promise<string> {
        const messages = config.system
            ? [{ role: 'system', content: config.system }, { role: 'user', content: prompt }]
            : [{ role: 'user', content: prompt }];

        const data = await postJson(
            this.id,
            this.fetchImpl,
            this.endpoint,
            { Authorization: `Bearer ${this.apiKey}`, 'X-Title': 'contextforge' },
            {
                model: config.model,
                messages,
                temperature: config.temperature,
                max_tokens: config.max_tokens,
                stream: false,
            },
            signal
        );

        const completion = extractChatCompletion(data);
        if (completion === null) {
            throw new ProviderError(this.id, 'response has no choices[0].message.content');
        }
        return completion;
    }
}

// ============================================================================
// Ollama (local /api/generate)
// ============================================================================

export interface OllamaBackendOptions {
    id?: string;
    baseUrl?: string;
    /** Overrides ModelConfig.model; local installs rarely carry the hosted model names. */
    model?: string;
    fetchImpl?: FetchLike;
}

export class OllamaBackend implements InferenceBackend {
    readonly id: string;
    private readonly baseUrl: string;
    private readonly model: string | undefined;
    private readonly fetchImpl: FetchLike;

    constructor(options: OllamaBackendOptions = {}) {
        this.id = options.id ?? 'ollama';
        this.baseUrl = (options.baseUrl ?? OLLAMA_BASE_URL).replace(/\/+$/, '');
        this.model = options.model;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async infer(prompt: string, config: ModelConfig, signal?: AbortSignal): Promise<string> {
        const data = await postJson(
            this.id,
            this.fetchImpl,
            `${this.baseUrl}/api/generate`,
            {},
            {
                model: this.model ?? config.model,
                prompt,
                system: config.system,
                stream: false,
                options: { temperature: config.temperature, num_predict: config.max_tokens },
            },
            signal
        );

        if (!isRecord(data) || typeof data.response !== 'string') {
            throw new ProviderError(this.id, 'response has no "response" string');
        }
        return data.response;
    }
}

// ============================================================================
// Timeout wrapper
// ============================================================================

/**
 * Bounds one inference call. On expiry the call is rejected with
 * TimeoutError and the backend's signal is aborted. Any other rejection that
 * is not already a ContextForgeError surfaces as a ProviderError, so callers
 * retry it like any provider failure.
 */
export async function inferWithTimeout(
    backend: InferenceBackend,
    prompt: string,
    config: ModelConfig,
    timeoutMs: number
): Promise<string> {
    const ac = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            // Reject first so the race settles with TimeoutError, not the backend's abort error.
            reject(new TimeoutError(backend.id, timeoutMs));
            ac.abort();
        }, timeoutMs);
    });

    const call = (async () => {
        try {
            return await backend.infer(prompt, config, ac.signal);
        } catch (e) {
            if (e instanceof ContextForgeError) throw e;
            throw new ProviderError(backend.id, sanitizeSnippet(errorMessage(e)), null, e);
        }
    })();

    try {
        return await Promise.race([call, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

// ============================================================================
// Registry
// ============================================================================

export class BackendRegistry {
    private backends = new Map<string, InferenceBackend>();

    register(backend: InferenceBackend): this {
        this.backends.set(backend.id, backend);
        return this;
    }

    has(id: string): boolean {
        return this.backends.has(id);
    }

    get(id: string): InferenceBackend {
        const backend = this.backends.get(id);
        if (!backend) {
            throw new InvalidConfigError('backend', `unknown backend '${id}' (registered: ${[...this.backends.keys()].join(', ') || 'none'})`);
        }
        return backend;
    }

    ids(): string[] {
        return [...this.backends.keys()];
    }
}

export function createDefaultRegistry(): BackendRegistry {
    return new BackendRegistry()
        .register(new OpenRouterBackend())
        .register(new OllamaBackend({ model: OLLAMA_MODEL }));
}

export function defaultModelConfig(overrides: Partial<ModelConfig> = {}): ModelConfig {
    return {
        model: DEFAULT_MODEL_ID,
        temperature: 0.7,
        max_tokens: LIMITS.MAX_OUTPUT_TOKENS,
        ...overrides,
    };
}
