/**
 * Generation Client - "produce text from a structured prompt"
 *
 * Hides provider differences behind one call. Failures surface as
 * GenerationError; the caller decides whether that costs an attempt.
 */

import { createLogger } from './logger';
import { GenerationError } from './structured_error';
import { ModelRouter, ModelRouterError } from './model_router';
import { GenerationPrompt, renderUserMessage } from './prompts';

const log = createLogger('generation');

export interface GenerateOptions {
    signal?: AbortSignal;
    /** Request a JSON object from the backend. */
    json?: boolean;
    maxTokens?: number;
    temperature?: number;
    /** Label for logs: 'decompose', 'implementation', 'harness' */
    purpose?: string;
    module?: string;
    runId?: string;
}

export interface GenerationClient {
    generate(prompt: GenerationPrompt, options?: GenerateOptions): Promise<string>;
}

function toGenerationError(err: ModelRouterError): GenerationError {
    const context = {
        provider: err.meta.provider,
        model: err.meta.modelId,
        purpose: err.meta.purpose,
        module: err.meta.module,
        http_status: err.httpStatus,
        body: err.providerBodySnippet,
    };
    switch (err.errorCode) {
        case 'INVALID_REQUEST':
            return new GenerationError('INVALID_REQUEST', err.message, false, context);
        case 'CIRCUIT_OPEN':
            return new GenerationError('CIRCUIT_OPEN', err.message, true, context);
        case 'RATE_LIMITED':
            return new GenerationError('RATE_LIMITED', err.message, true, context);
        case 'HTTP_ERROR':
            return new GenerationError('HTTP_ERROR', err.message, err.retryable, context);
        case 'MALFORMED_RESPONSE':
            return new GenerationError('MALFORMED_RESPONSE', err.message, false, context);
        case 'ABORTED':
        case 'NETWORK_ERROR':
            return new GenerationError('NETWORK_ERROR', err.message, err.retryable, context);
    }
}

export class RouterGenerationClient implements GenerationClient {
    constructor(
        private readonly router: ModelRouter,
        private readonly modelId: string
    ) { }

    async generate(prompt: GenerationPrompt, options: GenerateOptions = {}): Promise<string> {
        const result = await this.router.executeModelCall(
            {
                model_id: this.modelId,
                messages: [
                    { role: 'system', content: prompt.system },
                    { role: 'user', content: renderUserMessage(prompt) },
                ],
                temperature: options.temperature ?? 0.2,
                max_tokens: options.maxTokens,
                json: options.json,
            },
            {
                run_id: options.runId ?? null,
                purpose: options.purpose ?? null,
                module: options.module ?? null,
                signal: options.signal,
            }
        );

        if (!result.ok) {
            log.warn(`Generation failed`, { code: result.errorCode, message: result.message, purpose: options.purpose, module: options.module });
            throw toGenerationError(result);
        }

        log.debug(`Generation complete`, {
            purpose: options.purpose,
            module: options.module,
            latency_ms: result.provider.latencyMs,
            tokens: result.tokenUsage.totalTokens,
        });
        return result.completion;
    }
}
