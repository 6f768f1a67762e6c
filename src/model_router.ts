// model_router.ts - provider adapters for chat-completion backends

import crypto from "crypto";
import { createLogger } from "./logger";
import { ModelRegistry } from "./model_registry";
import { TIMEOUTS } from "./config";
import type { Provider } from "./config";

const log = createLogger('model-router');

// ============================================================================
// Types
// ============================================================================

export type ModelRole = "system" | "user" | "assistant";

export interface ModelMessage {
    role: ModelRole;
    content: string;
}

export interface ModelRequest {
    model_id: string;
    messages: ModelMessage[];
    max_tokens?: number;
    temperature?: number;
    /** Ask the backend for a JSON object (honoured where the model supports it). */
    json?: boolean;
    timeout_ms?: number;
}

export interface CallContext {
    run_id?: string | null;
    purpose?: string | null;
    module?: string | null;
    signal?: AbortSignal;
}

export interface ModelResponse {
    ok: true;
    completion: string;
    finish_reason: string | null;
    tokenUsage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    provider: {
        name: Provider;
        requestId: string | null;
        modelId: string;
        latencyMs: number;
    };
    meta: {
        promptHash: string;
        responseHash: string;
    };
}

export type ModelRouterErrorCode =
    | "INVALID_REQUEST"
    | "CIRCUIT_OPEN"
    | "RATE_LIMITED"
    | "NETWORK_ERROR"
    | "HTTP_ERROR"
    | "MALFORMED_RESPONSE"
    | "ABORTED";

export interface ModelRouterError {
    ok: false;
    errorCode: ModelRouterErrorCode;
    message: string;
    retryable: boolean;
    httpStatus: number | null;
    providerBodySnippet: string | null;
    meta: {
        provider: Provider;
        modelId: string;
        runId: string | null;
        purpose: string | null;
        module: string | null;
    };
}

export type FetchFn = typeof fetch;

export interface ModelRouterConfig {
    provider: Provider;
    apiKey?: string;
    ollamaHost?: string;
    maxConcurrentCalls?: number;
    timeoutMs?: number;
    fetchImpl?: FetchFn;
    debug?: boolean;
}

// ============================================================================
// Frozen constants
// ============================================================================

const FROZEN = {
    OPENROUTER_ENDPOINT: "https://openrouter.ai/api/v1/chat/completions",
    OLLAMA_CHAT_PATH: "/api/chat",

    MAX_PROMPT_CHARS: 400_000,
    MAX_COMPLETION_TOKENS: 8192,

    CIRCUIT_BREAKER: {
        MAX_FAILURES: 10,
        WINDOW_MS: 60_000,
        COOLDOWN_MS: 10_000,
    },

    SANITIZE: {
        ERROR_SNIPPET_MAX_CHARS: 500,
        STRIP_PATTERNS: [
            /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
            /[a-fA-F0-9]{32,}/g,
            /sk-[A-Za-z0-9-]{10,}/g,
            /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        ],
    },
} as const;

// ============================================================================
// Circuit Breaker
// ============================================================================

export class CircuitBreaker {
    private failures: number[] = [];
    private openUntilMs = 0;

    isOpen(nowMs: number): boolean {
        return nowMs < this.openUntilMs;
    }

    recordFailure(nowMs: number): void {
        this.failures.push(nowMs);
        const cutoff = nowMs - FROZEN.CIRCUIT_BREAKER.WINDOW_MS;
        this.failures = this.failures.filter((t) => t >= cutoff);

        if (this.failures.length >= FROZEN.CIRCUIT_BREAKER.MAX_FAILURES) {
            this.openUntilMs = nowMs + FROZEN.CIRCUIT_BREAKER.COOLDOWN_MS;
        }
    }

    recordSuccess(): void {
        this.failures = [];
    }
}

// ============================================================================
// Concurrency Limiter (simple semaphore)
// ============================================================================

export class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Array<() => void> = [];

    constructor(private maxSlots: number) { }

    async acquireSlot(): Promise<void> {
        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    releaseSlot(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clampInt(n: unknown): number {
    const x = Number(n);
    if (!Number.isFinite(x)) return 0;
    return Math.max(0, Math.floor(x));
}

function sha256Hex(s: string): string {
    return crypto.createHash("sha256").update(s).digest("hex");
}

export function sanitizeErrorSnippet(input: string): string {
    let out = input || "";
    for (const re of FROZEN.SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, "[REDACTED]");
    }
    if (out.length > FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    out = out.replace(/[^\x20-\x7E]+/g, " ");
    return out;
}

function safeTemperature(x: number | undefined): number {
    if (x === undefined || !Number.isFinite(x)) return 0.2;
    return Math.max(0, Math.min(2.0, x));
}

function validateMessages(messages: ModelMessage[]): { ok: true } | { ok: false; err: string } {
    if (messages.length === 0) {
        return { ok: false, err: "messages must be a non-empty array" };
    }
    for (const m of messages) {
        if (m.role !== "system" && m.role !== "user" && m.role !== "assistant") {
            return { ok: false, err: "message.role must be system|user|assistant" };
        }
        if (m.content.trim().length === 0) {
            return { ok: false, err: "message.content must be non-empty string" };
        }
    }
    return { ok: true };
}

function wantsJsonMode(req: ModelRequest): boolean {
    if (!req.json) return false;
    const modelInfo = ModelRegistry.getInstance().getModelInfo(req.model_id);
    return modelInfo?.supportsJsonMode !== false;
}

interface ParsedCompletion {
    completion: string;
    finishReason: string | null;
    requestId: string | null;
    modelId: string | null;
    promptTokens: number;
    completionTokens: number;
}

// ============================================================================
// Provider adapters
// ============================================================================

interface ProviderAdapter {
    endpoint(): string;
    headers(): Record<string, string>;
    payload(req: ModelRequest): Record<string, unknown>;
    parse(data: unknown): ParsedCompletion | null;
}

function openRouterAdapter(apiKey: string): ProviderAdapter {
    return {
        endpoint: () => FROZEN.OPENROUTER_ENDPOINT,
        headers: () => ({
            "Content-Type": "application/json",
            "Authorization": `Bearer ${apiKey}`,
            "X-Title": "rtl-forge",
        }),
        payload: (req) => {
            const payload: Record<string, unknown> = {
                model: req.model_id,
                messages: req.messages,
                temperature: safeTemperature(req.temperature),
                max_tokens: req.max_tokens || FROZEN.MAX_COMPLETION_TOKENS,
                stream: false,
            };
            if (wantsJsonMode(req)) payload.response_format = { type: "json_object" };
            return payload;
        },
        parse: (data) => {
            if (!isRecord(data) || !Array.isArray(data.choices)) return null;
            const choice: unknown = data.choices[0];
            if (!isRecord(choice) || !isRecord(choice.message)) return null;
            const content = choice.message.content;
            if (typeof content !== "string") return null;
            const usage = isRecord(data.usage) ? data.usage : {};
            return {
                completion: content,
                finishReason: typeof choice.finish_reason === "string" ? choice.finish_reason : null,
                requestId: typeof data.id === "string" ? data.id : null,
                modelId: typeof data.model === "string" ? data.model : null,
                promptTokens: clampInt(usage.prompt_tokens),
                completionTokens: clampInt(usage.completion_tokens),
            };
        },
    };
}

function ollamaAdapter(host: string): ProviderAdapter {
    return {
        endpoint: () => `${host.replace(/\/+$/, "")}${FROZEN.OLLAMA_CHAT_PATH}`,
        headers: () => ({ "Content-Type": "application/json" }),
        payload: (req) => {
            const payload: Record<string, unknown> = {
                model: req.model_id,
                messages: req.messages,
                stream: false,
                options: {
                    temperature: safeTemperature(req.temperature),
                    num_predict: req.max_tokens || FROZEN.MAX_COMPLETION_TOKENS,
                },
            };
            if (wantsJsonMode(req)) payload.format = "json";
            return payload;
        },
        parse: (data) => {
            if (!isRecord(data) || !isRecord(data.message)) return null;
            const content = data.message.content;
            if (typeof content !== "string") return null;
            return {
                completion: content,
                finishReason: typeof data.done_reason === "string" ? data.done_reason : null,
                requestId: null,
                modelId: typeof data.model === "string" ? data.model : null,
                promptTokens: clampInt(data.prompt_eval_count),
                completionTokens: clampInt(data.eval_count),
            };
        },
    };
}

// ============================================================================
// ModelRouter
// ============================================================================

/**
 * One backend call per `executeModelCall`. Retrying is the caller's decision:
 * the module verifier counts every call against its attempt budget.
 */
export class ModelRouter {
    private breaker = new CircuitBreaker();
    private limiter: ConcurrencyLimiter;
    private adapter: ProviderAdapter;
    private fetchImpl: FetchFn;
    private timeoutMs: number;
    private debug: boolean;
    readonly provider: Provider;

    constructor(config: ModelRouterConfig) {
        this.provider = config.provider;
        if (config.provider === "openrouter") {
            const key = config.apiKey || process.env.OPENROUTER_API_KEY || '';
            if (!key) {
                log.warn("No API key configured. Set OPENROUTER_API_KEY environment variable.");
            }
            this.adapter = openRouterAdapter(key);
        } else {
            this.adapter = ollamaAdapter(config.ollamaHost || "http://127.0.0.1:11434");
        }
        this.fetchImpl = config.fetchImpl ?? fetch;
        this.timeoutMs = config.timeoutMs ?? TIMEOUTS.MODEL_CALL_MS;
        this.debug = config.debug ?? false;
        this.limiter = new ConcurrencyLimiter(Math.max(1, config.maxConcurrentCalls ?? 1));
    }

    async executeModelCall(
        req: ModelRequest,
        ctx: CallContext = {}
    ): Promise<ModelResponse | ModelRouterError> {
        const vm = validateMessages(req.messages);
        if (!vm.ok) {
            return this.err("INVALID_REQUEST", vm.err, false, null, null, req.model_id, ctx);
        }

        const payload = this.adapter.payload(req);
        const body = JSON.stringify(payload);
        if (body.length > FROZEN.MAX_PROMPT_CHARS) {
            return this.err(
                "INVALID_REQUEST",
                `Prompt too large: ${body.length} chars > ${FROZEN.MAX_PROMPT_CHARS}`,
                false,
                null,
                null,
                req.model_id,
                ctx
            );
        }

        if (this.breaker.isOpen(Date.now())) {
            return this.err(
                "CIRCUIT_OPEN",
                "Circuit breaker open (too many recent failures)",
                true,
                null,
                null,
                req.model_id,
                ctx
            );
        }

        await this.limiter.acquireSlot();
        try {
            if (this.debug) {
                log.debug(`API call`, { provider: this.provider, model: req.model_id, purpose: ctx.purpose, module: ctx.module, prompt_chars: body.length });
            }

            const res = await this.tryOnce(body, req, ctx);

            if (res.ok) {
                this.breaker.recordSuccess();
                if (this.debug) {
                    log.debug(`API success`, { latency_ms: res.provider.latencyMs, tokens: res.tokenUsage.totalTokens, finish: res.finish_reason });
                }
            } else if (
                res.errorCode === "NETWORK_ERROR" ||
                res.errorCode === "RATE_LIMITED" ||
                (res.errorCode === "HTTP_ERROR" && res.retryable)
            ) {
                this.breaker.recordFailure(Date.now());
            }

            return res;
        } finally {
            this.limiter.releaseSlot();
        }
    }

    private async tryOnce(
        body: string,
        req: ModelRequest,
        ctx: CallContext
    ): Promise<ModelResponse | ModelRouterError> {
        const timeoutMs = Math.min(req.timeout_ms ?? this.timeoutMs, this.timeoutMs);

        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), timeoutMs);
        const signal = ctx.signal ? AbortSignal.any([ac.signal, ctx.signal]) : ac.signal;

        const started = Date.now();

        try {
            const resp = await this.fetchImpl(this.adapter.endpoint(), {
                method: "POST",
                headers: this.adapter.headers(),
                body,
                signal,
            });

            const latencyMs = Date.now() - started;
            const bodyText = await resp.text();

            if (!resp.ok) {
                const httpStatus = resp.status;
                const retryable = httpStatus >= 500 || httpStatus === 429;

                return this.err(
                    httpStatus === 429 ? "RATE_LIMITED" : "HTTP_ERROR",
                    `${this.provider} error ${httpStatus}`,
                    retryable,
                    httpStatus,
                    bodyText,
                    req.model_id,
                    ctx
                );
            }

            let data: unknown;
            try {
                data = JSON.parse(bodyText);
            } catch {
                return this.err("MALFORMED_RESPONSE", "provider_response_not_json", false, resp.status, bodyText, req.model_id, ctx);
            }

            const parsed = this.adapter.parse(data);
            if (!parsed) {
                return this.err("MALFORMED_RESPONSE", "provider_response_missing_completion", false, resp.status, bodyText, req.model_id, ctx);
            }

            return {
                ok: true,
                completion: parsed.completion,
                finish_reason: parsed.finishReason,
                tokenUsage: {
                    promptTokens: parsed.promptTokens,
                    completionTokens: parsed.completionTokens,
                    totalTokens: parsed.promptTokens + parsed.completionTokens,
                },
                provider: {
                    name: this.provider,
                    requestId: parsed.requestId,
                    modelId: parsed.modelId || req.model_id,
                    latencyMs,
                },
                meta: {
                    promptHash: sha256Hex(JSON.stringify(req.messages)),
                    responseHash: sha256Hex(parsed.completion),
                },
            };
        } catch (e) {
            if (ctx.signal?.aborted) {
                return this.err("ABORTED", "call cancelled", false, null, null, req.model_id, ctx);
            }
            const isTimeout = ac.signal.aborted;
            const msg = isTimeout
                ? `timeout after ${timeoutMs}ms`
                : `network_error: ${e instanceof Error ? e.message : String(e)}`;
            return this.err("NETWORK_ERROR", msg, true, null, null, req.model_id, ctx);
        } finally {
            clearTimeout(tid);
        }
    }

    private err(
        errorCode: ModelRouterErrorCode,
        message: string,
        retryable: boolean,
        httpStatus: number | null,
        providerBodySnippet: string | null,
        modelId: string,
        ctx: CallContext
    ): ModelRouterError {
        return {
            ok: false,
            errorCode,
            message: sanitizeErrorSnippet(message),
            retryable,
            httpStatus,
            providerBodySnippet: providerBodySnippet ? sanitizeErrorSnippet(providerBodySnippet) : null,
            meta: {
                provider: this.provider,
                modelId,
                runId: ctx.run_id ?? null,
                purpose: ctx.purpose ?? null,
                module: ctx.module ?? null,
            },
        };
    }
}
