import test from 'node:test';
import assert from 'node:assert/strict';

import { ModelRouter, FetchFn, sanitizeErrorSnippet } from '../src/model_router';
import { RouterGenerationClient } from '../src/generation_client';
import { GenerationError } from '../src/structured_error';

interface Captured {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

function scriptedFetch(responses: Array<() => Response>, calls: Captured[]): FetchFn {
    return async (input, init) => {
        if (init?.signal?.aborted) throw new Error('aborted');
        const raw = typeof init?.body === 'string' ? init.body : '{}';
        const headers: Record<string, string> = {};
        new Headers(init?.headers).forEach((value, key) => {
            headers[key] = value;
        });
        calls.push({ url: String(input), headers, body: JSON.parse(raw) });
        const next = responses.shift();
        if (!next) throw new Error('connection refused');
        return next();
    };
}

const json = (data: unknown, status = 200) => () => new Response(JSON.stringify(data), { status });

const MESSAGES = [
    { role: 'system' as const, content: 'You are a hardware engineer.' },
    { role: 'user' as const, content: 'Write an inverter.' },
];

test('ollama call posts to /api/chat and reads message.content', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({
        provider: 'ollama',
        ollamaHost: 'http://localhost:11434/',
        fetchImpl: scriptedFetch([json({ model: 'qwen2.5-coder:14b', message: { content: 'hello' }, done_reason: 'stop', prompt_eval_count: 10, eval_count: 5 })], calls),
    });

    const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES, max_tokens: 512, json: true });

    assert.equal(res.ok, true);
    if (!res.ok) return;
    assert.equal(res.completion, 'hello');
    assert.equal(res.finish_reason, 'stop');
    assert.deepEqual(res.tokenUsage, { promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    assert.equal(res.provider.name, 'ollama');

    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, 'http://localhost:11434/api/chat');
    assert.equal(calls[0].body.stream, false);
    assert.equal(calls[0].body.format, 'json');
    assert.deepEqual(calls[0].body.options, { temperature: 0.2, num_predict: 512 });
});

test('json mode is not requested from models that lack it', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({
        provider: 'ollama',
        fetchImpl: scriptedFetch([json({ message: { content: '{}' } })], calls),
    });
    await router.executeModelCall({ model_id: 'codellama:13b', messages: MESSAGES, json: true });
    assert.equal(calls[0].body.format, undefined);
});

test('openrouter call sends the bearer key and parses choices', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({
        provider: 'openrouter',
        apiKey: 'test-secret',
        fetchImpl: scriptedFetch([json({ id: 'gen-1', model: 'openai/gpt-4o', choices: [{ message: { content: 'module m; endmodule' }, finish_reason: 'stop' }], usage: { prompt_tokens: 3, completion_tokens: 4 } })], calls),
    });

    const res = await router.executeModelCall({ model_id: 'openai/gpt-4o', messages: MESSAGES, json: true });

    assert.equal(res.ok, true);
    if (!res.ok) return;
    assert.equal(res.completion, 'module m; endmodule');
    assert.equal(res.provider.requestId, 'gen-1');
    assert.equal(res.tokenUsage.totalTokens, 7);
    assert.equal(calls[0].url, 'https://openrouter.ai/api/v1/chat/completions');
    assert.equal(calls[0].headers.authorization, 'Bearer test-secret');
    assert.deepEqual(calls[0].body.response_format, { type: 'json_object' });
});

test('429 is RATE_LIMITED and retryable', async () => {
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([() => new Response('slow down', { status: 429 })], []) });
    const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.errorCode, 'RATE_LIMITED');
    assert.equal(res.retryable, true);
    assert.equal(res.httpStatus, 429);
    assert.equal(res.providerBodySnippet, 'slow down');
});

test('HTTP errors are retryable only for 5xx', async () => {
    const router = new ModelRouter({
        provider: 'ollama',
        fetchImpl: scriptedFetch([() => new Response('boom', { status: 503 }), () => new Response('bad', { status: 400 })], []),
    });
    const first = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    const second = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    assert.ok(!first.ok && first.errorCode === 'HTTP_ERROR' && first.retryable);
    assert.ok(!second.ok && second.errorCode === 'HTTP_ERROR' && !second.retryable);
});

test('non-JSON and completion-less bodies are MALFORMED_RESPONSE', async () => {
    const router = new ModelRouter({
        provider: 'ollama',
        fetchImpl: scriptedFetch([() => new Response('<html>', { status: 200 }), json({ done: true })], []),
    });
    const notJson = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    const missing = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    assert.ok(!notJson.ok && notJson.message === 'provider_response_not_json');
    assert.ok(!missing.ok && missing.message === 'provider_response_missing_completion');
});

test('empty message content is rejected before any network call', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([], calls) });
    const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: [{ role: 'user', content: '   ' }] });
    assert.ok(!res.ok && res.errorCode === 'INVALID_REQUEST');
    assert.equal(calls.length, 0);
});

test('transport failure is NETWORK_ERROR with the cause', async () => {
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([], []) });
    const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    assert.ok(!res.ok);
    if (res.ok) return;
    assert.equal(res.errorCode, 'NETWORK_ERROR');
    assert.equal(res.message, 'network_error: connection refused');
});

test('circuit opens after ten consecutive network failures', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([], calls) });
    for (let i = 0; i < 10; i++) {
        const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
        assert.ok(!res.ok && res.errorCode === 'NETWORK_ERROR');
    }
    const blocked = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES });
    assert.ok(!blocked.ok && blocked.errorCode === 'CIRCUIT_OPEN');
    assert.equal(calls.length, 10);
});

test('a cancelled caller signal yields ABORTED', async () => {
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([json({ message: { content: 'x' } })], []) });
    const ac = new AbortController();
    ac.abort();
    const res = await router.executeModelCall({ model_id: 'qwen2.5-coder:14b', messages: MESSAGES }, { signal: ac.signal });
    assert.ok(!res.ok && res.errorCode === 'ABORTED');
});

test('sanitizeErrorSnippet redacts keys and addresses', () => {
    assert.equal(sanitizeErrorSnippet('key sk-abcdefghijklmnop from 10.0.0.1'), 'key [REDACTED] from [REDACTED]');
});

/* -------------------------------------------------------------------------- */
/* Generation client                                                          */
/* -------------------------------------------------------------------------- */

test('generation client sends system + rendered task and returns the completion', async () => {
    const calls: Captured[] = [];
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([json({ message: { content: 'done' } })], calls) });
    const client = new RouterGenerationClient(router, 'qwen2.5-coder:14b');

    const text = await client.generate({ system: 'sys', task: 'Do it' }, { temperature: 0 });

    assert.equal(text, 'done');
    assert.deepEqual(calls[0].body.messages, [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'Do it' },
    ]);
    assert.deepEqual(calls[0].body.options, { temperature: 0, num_predict: 8192 });
});

test('generation client turns router failures into GenerationError', async () => {
    const router = new ModelRouter({ provider: 'ollama', fetchImpl: scriptedFetch([() => new Response('nope', { status: 500 })], []) });
    const client = new RouterGenerationClient(router, 'qwen2.5-coder:14b');

    await assert.rejects(
        client.generate({ system: 'sys', task: 'Do it' }),
        (err: unknown) =>
            err instanceof GenerationError &&
            err.generationCode === 'HTTP_ERROR' &&
            err.retryable === true &&
            err.message === 'ollama error 500'
    );
});
