/**
 * Backend reachability check behind `rtlforge check`.
 *
 * Ollama is asked for its installed models; OpenRouter is only checked
 * for a configured key, so the check never spends credits.
 */

import type { Provider } from './config';
import type { FetchFn } from './model_router';
import { errorMessage } from './structured_error';

const OLLAMA_TAGS_PATH = '/api/tags';
const DEFAULT_CHECK_TIMEOUT_MS = 5000;

export interface BackendCheckOptions {
    provider: Provider;
    modelId: string;
    apiKey: string;
    ollamaHost: string;
    fetchImpl?: FetchFn;
    timeoutMs?: number;
}

export type BackendCheckResult =
    | {
          ok: true;
          provider: Provider;
          /** Installed models; empty when the provider does not list them */
          models: string[];
          /** Null when the provider was not asked */
          modelAvailable: boolean | null;
      }
    | { ok: false; provider: Provider; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseOllamaTags(data: unknown): string[] | null {
    if (!isRecord(data) || !Array.isArray(data.models)) return null;
    const names: string[] = [];
    for (const entry of data.models) {
        if (!isRecord(entry)) continue;
        const name = typeof entry.model === 'string' ? entry.model : entry.name;
        if (typeof name === 'string') names.push(name);
    }
    return names;
}

export async function checkBackend(options: BackendCheckOptions): Promise<BackendCheckResult> {
    const { provider } = options;

    if (provider === 'openrouter') {
        if (!options.apiKey) {
            return { ok: false, provider, error: 'No API key configured. Set OPENROUTER_API_KEY environment variable.' };
        }
        return { ok: true, provider, models: [], modelAvailable: null };
    }

    const url = `${options.ollamaHost.replace(/\/+$/, '')}${OLLAMA_TAGS_PATH}`;
    const fetchImpl = options.fetchImpl ?? fetch;
    const timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;

    let body: string;
    try {
        const resp = await fetchImpl(url, { method: 'GET', signal: AbortSignal.timeout(timeoutMs) });
        body = await resp.text();
        if (!resp.ok) {
            return { ok: false, provider, error: `Ollama at ${options.ollamaHost} answered ${resp.status}` };
        }
    } catch (e) {
        return { ok: false, provider, error: `Cannot reach Ollama at ${options.ollamaHost}: ${errorMessage(e)}` };
    }

    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        return { ok: false, provider, error: `Ollama at ${options.ollamaHost} returned a non-JSON model list` };
    }
    const models = parseOllamaTags(data);
    if (models === null) {
        return { ok: false, provider, error: `Ollama at ${options.ollamaHost} returned an unexpected model list` };
    }
    return { ok: true, provider, models, modelAvailable: models.includes(options.modelId) };
}

export function formatCheckReport(result: BackendCheckResult, options: Pick<BackendCheckOptions, 'modelId' | 'ollamaHost'>): string[] {
    if (!result.ok) return [`Error: ${result.error}`];

    if (result.provider === 'openrouter') {
        return ['OpenRouter API key is configured.', `Model: ${options.modelId}`];
    }
    const lines = [
        `Ollama is running at ${options.ollamaHost}`,
        `Available models: ${result.models.length > 0 ? result.models.join(', ') : '(none)'}`,
    ];
    if (result.modelAvailable === false) {
        lines.push(`Warning: configured model ${options.modelId} is not installed (ollama pull ${options.modelId})`);
    }
    return lines;
}
