import test from 'node:test';
import assert from 'node:assert/strict';

import {
    BackendRegistry,
    FetchLike,
    InferenceBackend,
    ModelConfig,
    OllamaBackend,
    OpenRouterBackend,
    defaultModelConfig,
    inferWithTimeout,
} from '../src/inference';
import { InvalidConfigError, ProviderError, TimeoutError } from '../src/structured_error';

interface Captured {
    url: string;
    init: RequestInit;
}

function stubFetch(respond: () => Response | Promise<Response>): { fetchImpl: FetchLike; calls: Captured[] } {
    const calls: Captured[] = [];
    return {
        calls,
        fetchImpl: async (url, init) => {
            calls.push({ url, init });
            return respond();
        },
    };
}

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const config: ModelConfig = { model: 'test/model', temperature: 0.2, max_tokens: 64, system: 'be brief' };

test('openrouter sends a chat completion and returns the message content', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse({ choices: [{ message: { content: 'hello' } }] }));
    const backend = new OpenRouterBackend({ apiKey: 'test-secret', endpoint: 'http://stub.local/chat', fetchImpl });

    assert.equal(await backend.infer('say hi', config), 'hello');
    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'http://stub.local/chat');
    assert.equal(new Headers(calls[0].init.headers).get('Authorization'), 'Bearer test-secret');
    assert.deepEqual(JSON.parse(String(calls[0].init.body)), {
        model: 'test/model',
        messages: [
            { role: 'system', content: 'be brief' },
            { role: 'user', content: 'say hi' },
        ],
        temperature: 0.2,
        max_tokens: 64,
        stream: false,
    });
});

test('provider failures become ProviderError', async () => {
    const cases: Array<() => Response> = [
        () => new Response('upstream exploded', { status: 500 }),
        () => new Response('<html>not json</html>', { status: 200 }),
        () => jsonResponse({ choices: [] }),
    ];
    for (const respond of cases) {
        const { fetchImpl } = stubFetch(respond);
        const backend = new OpenRouterBackend({ apiKey: 'test-secret', fetchImpl });
        await assert.rejects(backend.infer('x', config), ProviderError);
    }

    const { fetchImpl } = stubFetch(() => new Response('bad gateway', { status: 502 }));
    await assert.rejects(
        new OpenRouterBackend({ apiKey: 'test-secret', fetchImpl }).infer('x', config),
        (err: unknown) => err instanceof ProviderError && err.httpStatus === 502
    );
});

test('network errors become ProviderError', async () => {
    const fetchImpl: FetchLike = async () => {
        throw new TypeError('fetch failed');
    };
    await assert.rejects(
        new OpenRouterBackend({ apiKey: 'test-secret', fetchImpl }).infer('x', config),
        (err: unknown) => err instanceof ProviderError && /network_error: fetch failed/.test(err.message)
    );
});

test('ollama posts to /api/generate with its own model name', async () => {
    const { fetchImpl, calls } = stubFetch(() => jsonResponse({ response: 'local answer' }));
    const backend = new OllamaBackend({ baseUrl: 'http://ollama.local/', model: 'mistral', fetchImpl });

    assert.equal(await backend.infer('q', config), 'local answer');
    assert.equal(calls[0].url, 'http://ollama.local/api/generate');
    const body: unknown = JSON.parse(String(calls[0].init.body));
    assert.deepEqual(body, {
        model: 'mistral',
        prompt: 'q',
        system: 'be brief',
        stream: false,
        options: { temperature: 0.2, num_predict: 64 },
    });
});

test('inferWithTimeout rejects with TimeoutError and aborts the call', async () => {
    let aborted = false;
    const hanging: InferenceBackend = {
        id: 'slow',
        infer: (_prompt, _config, signal) =>
            new Promise<string>((_resolve, reject) => {
                signal?.addEventListener('abort', () => {
                    aborted = true;
                    reject(new Error('aborted'));
                });
            }),
    };

    await assert.rejects(
        inferWithTimeout(hanging, 'p', config, 20),
        (err: unknown) => err instanceof TimeoutError && err.backend === 'slow' && err.timeoutMs === 20
    );
    assert.equal(aborted, true);
});

test('inferWithTimeout turns a foreign rejection into ProviderError', async () => {
    const cause = new TypeError('socket hang up');
    const flaky: InferenceBackend = {
        id: 'flaky',
        infer: async () => {
            throw cause;
        },
    };

    await assert.rejects(
        inferWithTimeout(flaky, 'p', config, 1000),
        (err: unknown) =>
            err instanceof ProviderError &&
            err.backend === 'flaky' &&
            err.message === 'flaky: socket hang up' &&
            err.httpStatus === null &&
            err.cause === cause
    );
});

test('inferWithTimeout passes through a fast answer', async () => {
    const fast: InferenceBackend = { id: 'fast', infer: async () => 'done' };
    assert.equal(await inferWithTimeout(fast, 'p', config, 1000), 'done');
});

test('registry resolves registered backends and rejects unknown ids', () => {
    const fast: InferenceBackend = { id: 'fast', infer: async () => 'done' };
    const registry = new BackendRegistry().register(fast);
    assert.equal(registry.get('fast'), fast);
    assert.equal(registry.has('missing'), false);
    assert.deepEqual(registry.ids(), ['fast']);
    assert.throws(() => registry.get('missing'), InvalidConfigError);
});

test('default model config fills the output token limit', () => {
    const cfg = defaultModelConfig({ model: 'm' });
    assert.equal(cfg.model, 'm');
    assert.equal(cfg.temperature, 0.7);
    assert.equal(typeof cfg.max_tokens, 'number');
});
